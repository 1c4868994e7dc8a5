import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";

export abstract class Hittable {
    // nearest hit with tMin < t < tMax
    abstract hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null;

    // solid angle density of sampling `direction` towards this shape from `origin`
    pdfValue(origin : Vector3, direction : Vector3) : number {
        return 0;
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        return new Vector3(1, 0, 0);
    }
}
