import { Worker } from "node:worker_threads";
import type { ComputationError, ComputationResult, IWorkerMessage, IWorkerResponse, RenderSettings, TileRequest } from "./commonTypes.js";
import type { ConfigOptions } from "./config.js";
import { RethrownError, toError } from "./errors.js";
import { EventHandler } from "./eventHandler.js";
import { renderInfo } from "./stores/main.js";
import { Tile, TileManager } from "./tile.js";
import { TileWorker } from "./tileWorker.js";

export type RenderResult = {
  width: number;
  height: number;
  samples: number;
  // summed linear radiance, 3 floats per pixel, row 0 is the bottom of the image
  radiance: Float32Array;
};

// the slice of a worker thread the pool talks to
export interface PoolWorker {
  postMessage(message: IWorkerMessage): void;
  terminate(): Promise<unknown>;
}

export type PoolWorkerCallbacks = {
  onMessage: (data: IWorkerResponse) => void;
  onError: (error: Error) => void;
  onExit: (code: number) => void;
};

export type WorkerFactory = (workerIndex: number, callbacks: PoolWorkerCallbacks) => PoolWorker;

export function threadWorkerFactory(entry: URL): WorkerFactory {
  return (workerIndex, { onMessage, onError, onExit }) => {
    const worker = new Worker(entry);
    worker.on("message", onMessage);
    worker.on("error", onError);
    worker.on("exit", onExit);
    return worker;
  };
}

type RendererEvents = {
  "tile-complete": { tile: TileRequest; workerIndex: number; tilesDone: number; tilesTotal: number };
};

export class Renderer {
  public e = new EventHandler<RendererEvents>();

  private settings: RenderSettings;
  private radianceData: Float32Array;
  private tilesDone = 0;
  private tilesTotal = 0;

  constructor(
    private options: ConfigOptions,
    private createWorker: WorkerFactory = threadWorkerFactory(new URL("./renderWorker.js", import.meta.url)),
  ) {
    this.settings = {
      scene: options.scene,
      width: options.width,
      height: options.height,
      seed: options.seed,
      maxDepth: options.maxDepth,
      pdfEpsilon: options.pdfEpsilon,
    };
    this.radianceData = new Float32Array(0);
  }

  async render(): Promise<RenderResult> {
    let { width, height, samples, tileHeight, workers } = this.options;
    let tiles = TileManager.partition(width, height, tileHeight, samples);

    // a fresh buffer per call, earlier results stay with their callers
    this.radianceData = new Float32Array(width * height * 3);
    this.tilesDone = 0;
    this.tilesTotal = tiles.length;
    renderInfo.start(tiles.length);

    let start = performance.now();

    if (workers === 0) {
      this.renderLocally(tiles);
    } else {
      await this.renderOnWorkers(tiles, Math.min(workers, tiles.length));
    }

    renderInfo.setPerformance(performance.now() - start);

    return {
      width,
      height,
      samples,
      radiance: this.radianceData,
    };
  }

  private renderLocally(tiles: Tile[]) {
    let worker = new TileWorker();

    tiles.forEach((tile, i) => {
      let message: IWorkerMessage = i === 0
        ? { type: "scene-setup", workerIndex: 0, settings: this.settings, tile: toRequest(tile) }
        : { type: "computation-request", tile: toRequest(tile) };

      let response = worker.handle(message);
      if (response.type === "computation-error") {
        throw new RethrownError("failed to render a tile", workerError(response));
      }
      this.onTileComplete(response);
    });
  }

  private renderOnWorkers(tiles: Tile[], workersCount: number): Promise<void> {
    let queue = tiles.slice();
    let workers: PoolWorker[] = [];

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      let finish = (error?: Error) => {
        if (settled) return;
        settled = true;

        Promise.all(workers.map((w) => w.terminate())).then(
          () => (error ? reject(error) : resolve()),
          (terminateError) => reject(toError(error ?? terminateError)),
        );
      };

      let onWorkerMessage = (data: IWorkerResponse) => {
        // late replies from a pool that is shutting down
        if (settled) return;

        if (data.type === "computation-error") {
          finish(new RethrownError(`worker ${data.workerIndex} failed to render a tile`, workerError(data)));
          return;
        }

        this.onTileComplete(data);

        if (this.tilesDone === this.tilesTotal) {
          finish();
          return;
        }

        // assign new block to worker and let it run again
        let next = queue.shift();
        if (next) {
          let request: IWorkerMessage = { type: "computation-request", tile: toRequest(next) };
          workers[data.workerIndex].postMessage(request);
        }
      };

      for (let i = 0; i < workersCount; i++) {
        let first = queue.shift();
        if (!first) break;

        const worker = this.createWorker(i, {
          onMessage: onWorkerMessage,
          onError: (error) => {
            finish(new RethrownError(`worker ${i} crashed`, error));
          },
          onExit: (code) => {
            if (code !== 0) finish(new Error(`worker ${i} exited with code ${code}`));
          },
        });
        workers.push(worker);

        let startMessage: IWorkerMessage = {
          type: "scene-setup",
          workerIndex: i,
          settings: this.settings,
          tile: toRequest(first),
        };
        worker.postMessage(startMessage);
      }
    });
  }

  private onTileComplete({ tile, workerIndex }: ComputationResult) {
    let finished = new Tile(tile.x, tile.y, tile.width, tile.height, tile.samples, tile.data);
    TileManager.addSample(this.radianceData, this.options.width, finished);

    this.tilesDone++;
    renderInfo.increment();

    this.e.fireEvent("tile-complete", {
      tile: toRequest(finished),
      workerIndex,
      tilesDone: this.tilesDone,
      tilesTotal: this.tilesTotal,
    });
  }
}

function workerError(response: ComputationError): Error {
  let error = new Error(response.message);
  error.stack = response.stack;
  return error;
}

function toRequest(tile: Tile): TileRequest {
  return {
    x: tile.x,
    y: tile.y,
    width: tile.width,
    height: tile.height,
    samples: tile.samples,
  };
}
