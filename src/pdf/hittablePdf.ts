import type { Vector3 } from "three";
import type { Hittable } from "../primitives/primitive.js";
import type { UniformSampler } from "../samplers/uniform.js";
import type { Pdf } from "./pdf.js";

// directions from `origin` towards points on a shape
export class HittablePdf implements Pdf {
  constructor(
    private shape: Hittable,
    private origin: Vector3,
  ) {}

  value(direction: Vector3): number {
    return this.shape.pdfValue(this.origin, direction);
  }

  generate(sampler: UniformSampler): Vector3 {
    return this.shape.random(this.origin, sampler);
  }
}
