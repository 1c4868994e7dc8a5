import { describe, it, expect } from 'vitest';
import type { IWorkerResponse, RenderSettings } from './commonTypes.js';
import { TileWorker } from './tileWorker.js';

const settings: RenderSettings = {
  scene: 'sphere-light',
  width: 8,
  height: 8,
  seed: 'worker-test',
  maxDepth: 50,
  pdfEpsilon: 1e-8,
};

function resultData(response: IWorkerResponse): Float32Array {
  if (response.type !== 'computation-result') throw new Error(response.message);
  return response.tile.data;
}

describe('TileWorker', () => {
  it('refuses to render before the scene is set up', () => {
    const response = new TileWorker().handle({
      type: 'computation-request',
      tile: { x: 0, y: 0, width: 8, height: 2, samples: 1 },
    });

    expect(response).toMatchObject({
      type: 'computation-error',
      workerIndex: -1,
      message: 'computation requested before scene-setup',
    });
  });

  it('renders the first tile with the scene setup and later tiles on request', () => {
    const worker = new TileWorker();
    const first = worker.handle({
      type: 'scene-setup',
      workerIndex: 3,
      settings,
      tile: { x: 0, y: 0, width: 8, height: 2, samples: 2 },
    });

    expect(first.type).toBe('computation-result');
    expect(first.workerIndex).toBe(3);
    expect(resultData(first)).toHaveLength(8 * 2 * 3);

    const second = worker.handle({
      type: 'computation-request',
      tile: { x: 0, y: 2, width: 8, height: 4, samples: 2 },
    });
    expect(second).toMatchObject({ type: 'computation-result', tile: { y: 2, height: 4 } });
    expect(resultData(second)).toHaveLength(8 * 4 * 3);
  });

  it('renders the same tile identically on any worker', () => {
    const tile = { x: 0, y: 4, width: 8, height: 2, samples: 4 };
    const a = new TileWorker().handle({ type: 'scene-setup', workerIndex: 0, settings, tile });
    const b = new TileWorker().handle({ type: 'scene-setup', workerIndex: 1, settings, tile });

    expect(Array.from(resultData(a))).toEqual(Array.from(resultData(b)));
  });
});
