import type { Vector3 } from "three";
import type { UniformSampler } from "../samplers/uniform.js";

// a direction sampler paired with the density of the same distribution
export interface Pdf {
  value(direction: Vector3): number;
  generate(sampler: UniformSampler): Vector3;
}
