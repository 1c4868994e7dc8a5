import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import type { Pdf } from "../pdf/pdf.js";
import type { UniformSampler } from "../samplers/uniform.js";

// specular events carry a single outgoing ray and skip light sampling
export type ScatterRecord =
    | { kind : "specular", ray : Ray, attenuation : Vector3 }
    | { kind : "scatter", pdf : Pdf, attenuation : Vector3 };

export abstract class Material {
    scatter(ray : Ray, hit : HitRecord, sampler : UniformSampler) : ScatterRecord | null {
        return null;
    }

    scatteringPdf(ray : Ray, hit : HitRecord, scattered : Ray) : number {
        return 1;
    }

    emitted(ray : Ray, hit : HitRecord) : Vector3 {
        return new Vector3(0, 0, 0);
    }
}
