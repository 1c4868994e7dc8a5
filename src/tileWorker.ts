import type { IStartMessage, IWorkerMessage, IWorkerResponse, TileRequest } from "./commonTypes.js";
import { createScene } from "./createScene.js";
import { toError } from "./errors.js";
import { renderTile, type RenderContext } from "./renderTile.js";
import { Tile } from "./tile.js";

// worker side of the tile protocol, independent of the thread it runs on
export class TileWorker {
  private workerIndex = -1;
  private context: RenderContext | null = null;

  handle(data: IWorkerMessage): IWorkerResponse {
    try {
      if (data.type === "scene-setup") {
        this.setup(data);
      }
      return this.render(data.tile);
    } catch (error) {
      let err = toError(error);
      return {
        type: "computation-error",
        workerIndex: this.workerIndex,
        message: err.message,
        stack: err.stack,
      };
    }
  }

  private setup(data: IStartMessage) {
    let { settings } = data;
    this.workerIndex = data.workerIndex;
    this.context = {
      scene: createScene(settings.scene, settings.width / settings.height),
      width: settings.width,
      height: settings.height,
      seed: settings.seed,
      trace: {
        maxDepth: settings.maxDepth,
        pdfEpsilon: settings.pdfEpsilon,
      },
    };
  }

  private render(request: TileRequest): IWorkerResponse {
    if (!this.context) {
      throw new Error("computation requested before scene-setup");
    }

    let tile = renderTile(
      new Tile(request.x, request.y, request.width, request.height, request.samples),
      this.context,
    );

    return {
      type: "computation-result",
      workerIndex: this.workerIndex,
      tile: {
        x: tile.x,
        y: tile.y,
        width: tile.width,
        height: tile.height,
        samples: tile.samples,
        data: tile.data,
      },
    };
  }
}
