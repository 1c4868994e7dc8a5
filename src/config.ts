import { get } from 'svelte/store';
import { isSceneName, type SceneName } from './createScene.js';
import { ConfigError } from './errors.js';
import { EventHandler } from './eventHandler.js';
import { configOptions, defaultConfigOptions } from './stores/main.js';

export type ConfigOptions = {
  width: number;
  height: number;
  samples: number;
  // safety cap on scatter events per path, not a quality setting
  maxDepth: number;
  tileHeight: number;
  // 0 renders every tile on the calling thread
  workers: number;
  seed: string;
  pdfEpsilon: number;
  scene: SceneName;
  output: string;
};

type ConfigEvents = {
  'config-update': ConfigOptions;
};

const positiveIntegers = ['width', 'height', 'samples', 'maxDepth', 'tileHeight'] as const;

export function validateOptions(options: ConfigOptions): void {
  for (const key of positiveIntegers) {
    const value = options[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a positive integer, got ${value}`, key);
    }
  }

  if (!Number.isInteger(options.workers) || options.workers < 0) {
    throw new ConfigError(`workers must be a non-negative integer, got ${options.workers}`, 'workers');
  }

  if (!(options.pdfEpsilon >= 0)) {
    throw new ConfigError(`pdfEpsilon must be non-negative, got ${options.pdfEpsilon}`, 'pdfEpsilon');
  }

  if (!isSceneName(options.scene)) {
    throw new ConfigError(`unknown scene "${options.scene}"`, 'scene');
  }
}

export class ConfigManager {
  public options: ConfigOptions;
  public prevOptions: ConfigOptions;
  public e: EventHandler<ConfigEvents>;

  constructor() {
    this.options = get(configOptions);
    this.prevOptions = this.options;
    this.e = new EventHandler();

    // we're subscribing to the svelte store
    configOptions.subscribe((value) => {
      this.prevOptions = this.options;
      this.options = value;

      this.e.fireEvent('config-update', this.options);
    });
  }

  setStoreProperty(props: Partial<ConfigOptions>) {
    const next = { ...this.options, ...props };
    validateOptions(next);
    configOptions.set(next);
  }

  reset() {
    configOptions.set({ ...defaultConfigOptions });
  }
}

export const configManager = new ConfigManager();
