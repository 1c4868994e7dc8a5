#!/usr/bin/env node
import { parseOptions } from "./cli.js";
import { configManager } from "./config.js";
import { ConfigError } from "./errors.js";
import { toneMap } from "./display.js";
import { writePpm } from "./ppm.js";
import { Renderer } from "./renderer.js";
import { renderInfo } from "./stores/main.js";

async function main() {
  configManager.e.addEventListener("config-update", (options) => {
    console.log(
      `${options.scene}: ${options.width}x${options.height}, ${options.samples} spp, ` +
      `${options.workers} workers`,
    );
  });

  configManager.setStoreProperty(parseOptions(process.argv.slice(2)));

  let options = configManager.options;
  let renderer = new Renderer(options);

  let lastLogged = -1;
  let unsubscribe = renderInfo.subscribe(({ tilesDone, tilesTotal }) => {
    if (tilesTotal === 0) return;
    let percent = Math.floor((tilesDone / tilesTotal) * 100);
    if (percent % 10 === 0 && percent !== lastLogged) {
      lastLogged = percent;
      console.log(`${tilesDone} / ${tilesTotal} tiles (${percent}%)`);
    }
  });

  let result = await renderer.render();
  unsubscribe();

  await writePpm(options.output, result.width, result.height, toneMap(result));

  let { ms } = renderInfo;
  console.log(`wrote ${options.output} in ${(ms / 1000).toFixed(1)}s`);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  if (error instanceof Error && !(error instanceof ConfigError)) {
    console.error(error.stack);
  }
  process.exitCode = 1;
});
