import { Vector3 } from "three";
import { Ray } from "./geometry/ray.js";
import { HittablePdf } from "./pdf/hittablePdf.js";
import { MixturePdf } from "./pdf/mixturePdf.js";
import type { Pdf } from "./pdf/pdf.js";
import type { HittableList } from "./primitives/hittableList.js";
import type { Hittable } from "./primitives/primitive.js";
import type { UniformSampler } from "./samplers/uniform.js";

// rays leave surfaces at t > T_MIN to avoid hitting the surface they left
export const T_MIN = 0.001;

export type TraceOptions = {
  maxDepth: number;
  // sampled directions with a smaller mixture density are dropped
  pdfEpsilon: number;
};

/**
 * Estimates the radiance arriving along `ray`.
 *
 * Diffuse events sample a 50/50 mixture of the light shapes and the material's
 * own distribution, specular events follow their single outgoing ray. The path
 * is walked iteratively: `throughput` is the product of every
 * `attenuation * scatteringPdf / pdfValue` so far, and each surface adds its
 * emission weighted by it.
 */
export function rayColor(
  ray: Ray,
  world: Hittable,
  lights: HittableList,
  options: TraceOptions,
  sampler: UniformSampler,
): Vector3 {
  let radiance = new Vector3(0, 0, 0);
  let throughput = new Vector3(1, 1, 1);

  for (let depth = 0; ; depth++) {
    let hit = world.hit(ray, T_MIN, Infinity);

    // the background is black
    if (!hit) break;

    let material = hit.material;
    let emitted = material.emitted(ray, hit);

    let scatter = depth < options.maxDepth ? material.scatter(ray, hit, sampler) : null;
    if (!scatter) {
      radiance.add(emitted.multiply(throughput));
      break;
    }

    if (scatter.kind === "specular") {
      throughput.multiply(scatter.attenuation);
      ray = scatter.ray;
      continue;
    }

    radiance.add(emitted.multiply(throughput));

    let pdf: Pdf = lights.isEmpty()
      ? scatter.pdf
      : new MixturePdf(new HittablePdf(lights, hit.p), scatter.pdf);

    let scattered = new Ray(hit.p, pdf.generate(sampler), ray.time);
    let pdfValue = pdf.value(scattered.direction);

    if (!(pdfValue > options.pdfEpsilon) || !Number.isFinite(pdfValue)) break;

    let scatteringPdf = material.scatteringPdf(ray, hit, scattered);
    if (scatteringPdf <= 0) break;

    throughput.multiply(scatter.attenuation).multiplyScalar(scatteringPdf / pdfValue);
    ray = scattered;
  }

  return radiance;
}
