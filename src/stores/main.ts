import { availableParallelism } from 'node:os';
import { get, writable } from 'svelte/store';
import type { ConfigOptions } from '../config.js';

export const defaultConfigOptions: ConfigOptions = {
  width: 500,
  height: 500,
  samples: 100,
  maxDepth: 1000,
  tileHeight: 16,
  workers: Math.max(availableParallelism() - 1, 1),
  seed: 'seed-string',
  pdfEpsilon: 1e-8,
  scene: 'cornell-box',
  output: 'image.ppm'
};

export const configOptions = writable<ConfigOptions>({ ...defaultConfigOptions });

type RenderInfo = {
  tilesDone: number;
  tilesTotal: number;
  ms: number;
};
export const renderInfo = (function createRenderInfoStore() {
  let store = writable<RenderInfo>({
    tilesDone: 0,
    tilesTotal: 0,
    ms: 0
  });

  return {
    subscribe: store.subscribe,
    get ms() {
      return get(store).ms;
    },
    start: (tilesTotal: number) =>
      store.set({
        tilesDone: 0,
        tilesTotal,
        ms: 0
      }),
    setPerformance: (value: number) => {
      store.update((ri) => {
        ri.ms = value;
        return ri;
      });
    },
    increment: () =>
      store.update((ri) => {
        ri.tilesDone++;
        return ri;
      })
  };
})();
