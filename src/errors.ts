export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly option: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// keeps the stack of the error that caused it below its own
export class RethrownError extends Error {
  originalError: Error;
  stackBeforeRethrow: string | undefined;

  constructor(message: string, error: Error) {
    super(message);
    this.name = this.constructor.name;
    this.originalError = error;
    this.stackBeforeRethrow = this.stack;
    const messageLines = (this.message.match(/\n/g) || []).length + 1;
    this.stack =
      this.stack
        ?.split('\n')
        .slice(0, messageLines + 1)
        .join('\n') +
      '\n' +
      error.stack;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
