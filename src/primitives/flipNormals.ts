import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { Hittable } from "./primitive.js";

export class FlipNormals extends Hittable {
    constructor(public readonly child : Hittable) {
        super();
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        let hit = this.child.hit(ray, tMin, tMax);
        if (!hit) return null;

        return hit.withNormal(hit.normal.clone().negate());
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        return this.child.pdfValue(origin, direction);
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        return this.child.random(origin, sampler);
    }
}
