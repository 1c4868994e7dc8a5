import { parentPort } from "node:worker_threads";
import type { IWorkerMessage } from "./commonTypes.js";
import { TileWorker } from "./tileWorker.js";

if (!parentPort) {
  throw new Error("renderWorker must be started as a worker thread");
}

const port = parentPort;
const worker = new TileWorker();

port.on("message", (data: IWorkerMessage) => {
  port.postMessage(worker.handle(data));
});
