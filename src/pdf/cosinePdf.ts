import type { Vector3 } from "three";
import { Onb } from "../geometry/onb.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { randomCosineDirection } from "../utils.js";
import type { Pdf } from "./pdf.js";

export class CosinePdf implements Pdf {
  private uvw: Onb;

  constructor(normal: Vector3) {
    this.uvw = Onb.fromW(normal);
  }

  value(direction: Vector3): number {
    let cosine = direction.clone().normalize().dot(this.uvw.w);
    return Math.max(cosine, 0) / Math.PI;
  }

  generate(sampler: UniformSampler): Vector3 {
    return this.uvw.local(randomCosineDirection(sampler));
  }
}
