import { describe, it, expect, vi } from 'vitest';
import type { ConfigOptions } from './config.js';
import { RethrownError } from './errors.js';
import { Renderer, type RenderResult, type WorkerFactory } from './renderer.js';
import { defaultConfigOptions } from './stores/main.js';
import { TileWorker } from './tileWorker.js';

function options(overrides: Partial<ConfigOptions>): ConfigOptions {
  return { ...defaultConfigOptions, workers: 0, maxDepth: 50, ...overrides };
}

// runs TileWorker on the calling thread; higher worker indices answer sooner,
// so tiles complete out of order
function inProcessPool(workersCount: number, terminated: number[]): WorkerFactory {
  return (workerIndex, { onMessage }) => {
    const worker = new TileWorker();
    return {
      postMessage(message) {
        setTimeout(() => onMessage(worker.handle(message)), (workersCount - workerIndex) * 5);
      },
      async terminate() {
        terminated.push(workerIndex);
        return 0;
      },
    };
  };
}

// mean of the first channel over a square block of pixels
function blockMean({ width, samples, radiance }: RenderResult, x0: number, y0: number, size: number): number {
  let sum = 0;
  for (let y = y0; y < y0 + size; y++) {
    for (let x = x0; x < x0 + size; x++) {
      sum += radiance[(y * width + x) * 3];
    }
  }
  return sum / (size * size * samples);
}

function total(result: RenderResult): number {
  return result.radiance.reduce((sum, v) => sum + v, 0);
}

describe('Renderer', () => {
  const sphereLight = options({ scene: 'sphere-light', width: 16, height: 16, samples: 16, tileHeight: 4 });

  it('renders a scene without lights as black', async () => {
    const result = await new Renderer(
      options({ scene: 'dark-box', width: 8, height: 8, samples: 2, tileHeight: 4 }),
    ).render();

    expect(result.radiance).toHaveLength(8 * 8 * 3);
    expect(result.radiance.every((v) => v === 0)).toBe(true);
  });

  it('lights the floor under the light more than the far corners', async () => {
    const result = await new Renderer(sphereLight).render();
    const center = blockMean(result, 7, 7, 2);

    for (const [x, y] of [[0, 0], [14, 0], [0, 14], [14, 14]]) {
      expect(center).toBeGreaterThan(2 * blockMean(result, x, y, 2));
    }
  });

  it('reproduces an image from the same seed', async () => {
    const a = await new Renderer(sphereLight).render();
    const b = await new Renderer(sphereLight).render();
    expect(Array.from(a.radiance)).toEqual(Array.from(b.radiance));
  });

  it('gives a different but similar image for another seed', async () => {
    const a = await new Renderer(sphereLight).render();
    const b = await new Renderer({ ...sphereLight, seed: 'another-seed' }).render();

    expect(Array.from(a.radiance)).not.toEqual(Array.from(b.radiance));
    expect(Math.abs(total(b) / total(a) - 1)).toBeLessThan(0.2);
  });

  it('reports every finished tile', async () => {
    const renderer = new Renderer(sphereLight);
    const listener = vi.fn();
    renderer.e.addEventListener('tile-complete', listener);

    await renderer.render();

    expect(listener).toHaveBeenCalledTimes(4);
    expect(listener).toHaveBeenLastCalledWith(
      expect.objectContaining({ workerIndex: 0, tilesDone: 4, tilesTotal: 4 }),
    );
  });

  it('renders the Cornell box with finite non-negative radiance', async () => {
    const result = await new Renderer(
      options({ scene: 'cornell-box', width: 8, height: 8, samples: 4, tileHeight: 8 }),
    ).render();

    expect(result.radiance.every((v) => Number.isFinite(v) && v >= 0)).toBe(true);
    expect(result.radiance.some((v) => v > 0)).toBe(true);
  });

  it('assembles the same image from a worker pool as in process', async () => {
    const pooled = options({ scene: 'sphere-light', width: 16, height: 16, samples: 4, tileHeight: 2 });
    const local = await new Renderer(pooled).render();

    const terminated: number[] = [];
    const renderer = new Renderer({ ...pooled, workers: 3 }, inProcessPool(3, terminated));
    const order: number[] = [];
    renderer.e.addEventListener('tile-complete', ({ tile }) => order.push(tile.y));

    const result = await renderer.render();

    expect(order).toHaveLength(8);
    expect(order).not.toEqual([...order].sort((a, b) => a - b));
    expect(Array.from(result.radiance)).toEqual(Array.from(local.radiance));
    expect(terminated.sort()).toEqual([0, 1, 2]);
  });

  it('rejects and stops every worker when one of them fails', async () => {
    const terminated: number[] = [];
    const pool = inProcessPool(2, terminated);
    const failing: WorkerFactory = (workerIndex, callbacks) => {
      const worker = pool(workerIndex, callbacks);
      if (workerIndex !== 1) return worker;
      return {
        postMessage() {
          setTimeout(() => callbacks.onError(new Error('out of memory')), 1);
        },
        terminate: () => worker.terminate(),
      };
    };

    const renderer = new Renderer(
      options({ scene: 'dark-box', width: 8, height: 8, samples: 1, tileHeight: 2, workers: 2 }),
      failing,
    );

    const result = renderer.render();
    await expect(result).rejects.toBeInstanceOf(RethrownError);
    await expect(result).rejects.toThrow('worker 1 crashed');
    expect(terminated.sort()).toEqual([0, 1]);
  });

  it('keeps earlier results when rendering again', async () => {
    const renderer = new Renderer(sphereLight);
    const first = await renderer.render();
    const copy = Array.from(first.radiance);

    const second = await renderer.render();

    expect(second.radiance).not.toBe(first.radiance);
    expect(Array.from(first.radiance)).toEqual(copy);
  });
});
