import type { SceneName } from "./createScene.js";

// everything a worker needs to rebuild the scene and render tiles on its own
export type RenderSettings = {
  scene: SceneName;
  width: number;
  height: number;
  seed: string;
  maxDepth: number;
  pdfEpsilon: number;
};

export type TileRequest = {
  x: number;
  y: number;
  width: number;
  height: number;
  samples: number;
};

export interface IStartMessage {
  type: "scene-setup";
  workerIndex: number;
  settings: RenderSettings;
  // the first tile to render, sent along to save a round trip
  tile: TileRequest;
}

export interface ComputationRequest {
  type: "computation-request";
  tile: TileRequest;
}

export interface ComputationResult {
  type: "computation-result";
  workerIndex: number;
  tile: TileRequest & { data: Float32Array };
}

export interface ComputationError {
  type: "computation-error";
  workerIndex: number;
  message: string;
  stack?: string;
}

export type IWorkerMessage = IStartMessage | ComputationRequest;
export type IWorkerResponse = ComputationResult | ComputationError;
