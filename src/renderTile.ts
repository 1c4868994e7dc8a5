import type { Scene } from "./createScene.js";
import { UniformSampler } from "./samplers/uniform.js";
import { Tile, TileManager } from "./tile.js";
import { rayColor, type TraceOptions } from "./tracer.js";

export type RenderContext = {
  scene: Scene;
  width: number;
  height: number;
  seed: string;
  trace: TraceOptions;
};

// each tile owns its random stream, derived from the render seed and its position
export function tileSeed(seed: string, tile: Tile): string {
  return `${seed}:${tile.x}:${tile.y}`;
}

export function renderTile(tile: Tile, context: RenderContext): Tile {
  let { scene, width, height, trace } = context;
  let sampler = new UniformSampler(tileSeed(context.seed, tile));

  // recreating tile data here, a tile may be rendered more than once
  TileManager.resetTileData(tile);

  for (let j = 0; j < tile.height; j++) {
    for (let i = 0; i < tile.width; i++) {
      let x = tile.x + i;
      let y = tile.y + j;

      let index = (tile.width * j + i) * 3;

      for (let s = 0; s < tile.samples; s++) {
        let u = (x + sampler.get()) / width;
        let v = (y + sampler.get()) / height;

        let ray = scene.camera.getRay(u, v, sampler);
        let radiance = rayColor(ray, scene.world, scene.lights, trace, sampler);

        tile.data[index + 0] += radiance.x;
        tile.data[index + 1] += radiance.y;
        tile.data[index + 2] += radiance.z;
      }
    }
  }

  return tile;
}
