import type { Vector3 } from "three";
import type { UniformSampler } from "../samplers/uniform.js";
import type { Pdf } from "./pdf.js";

// one-sample MIS: each child is picked with probability 1/2
export class MixturePdf implements Pdf {
  constructor(
    private p0: Pdf,
    private p1: Pdf,
  ) {}

  value(direction: Vector3): number {
    return 0.5 * this.p0.value(direction) + 0.5 * this.p1.value(direction);
  }

  generate(sampler: UniformSampler): Vector3 {
    if (sampler.get() < 0.5) return this.p0.generate(sampler);
    return this.p1.generate(sampler);
  }
}
