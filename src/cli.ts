import { parseArgs } from "node:util";
import type { ConfigOptions } from "./config.js";
import { isSceneName } from "./createScene.js";
import { ConfigError } from "./errors.js";

const integerFlags = [
  ["width", "width"],
  ["height", "height"],
  ["samples", "samples"],
  ["max-depth", "maxDepth"],
  ["workers", "workers"],
  ["tile-height", "tileHeight"],
] as const;

export function parseOptions(argv: string[]): Partial<ConfigOptions> {
  let { values } = parseArgs({
    args: argv,
    options: {
      width: { type: "string" },
      height: { type: "string" },
      samples: { type: "string" },
      "max-depth": { type: "string" },
      workers: { type: "string" },
      "tile-height": { type: "string" },
      seed: { type: "string" },
      scene: { type: "string" },
      output: { type: "string", short: "o" },
    },
  });

  let options: Partial<ConfigOptions> = {};

  for (let [flag, key] of integerFlags) {
    let raw = values[flag];
    if (raw === undefined) continue;

    let value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new ConfigError(`--${flag} expects an integer, got "${raw}"`, key);
    }
    options[key] = value;
  }

  if (values.scene !== undefined) {
    if (!isSceneName(values.scene)) {
      throw new ConfigError(`unknown scene "${values.scene}"`, "scene");
    }
    options.scene = values.scene;
  }
  if (values.seed !== undefined) options.seed = values.seed;
  if (values.output !== undefined) options.output = values.output;

  return options;
}
