import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { Hittable } from "./primitive.js";

export class Translate extends Hittable {
    constructor(
        public readonly child : Hittable,
        public readonly offset : Vector3,
    ) {
        super();
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        let moved = new Ray(ray.origin.clone().sub(this.offset), ray.direction, ray.time);
        let hit = this.child.hit(moved, tMin, tMax);
        if (!hit) return null;

        return hit.withPoint(hit.p.clone().add(this.offset));
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        return this.child.pdfValue(origin.clone().sub(this.offset), direction);
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        return this.child.random(origin.clone().sub(this.offset), sampler);
    }
}
