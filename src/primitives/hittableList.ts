import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { Hittable } from "./primitive.js";

export class HittableList extends Hittable {
    private objects : Hittable[] = [];

    constructor(objects : Hittable[] = []) {
        super();
        objects.forEach((o) => this.push(o));
    }

    push(object : Hittable) : void {
        this.objects.push(object);
    }

    isEmpty() : boolean {
        return this.objects.length === 0;
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        let closest : HitRecord | null = null;
        let closestSoFar = tMax;

        for (let i = 0; i < this.objects.length; i++) {
            let hit = this.objects[i].hit(ray, tMin, closestSoFar);
            if (hit) {
                closestSoFar = hit.t;
                closest = hit;
            }
        }

        return closest;
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        if (this.objects.length === 0) return 0;

        let weight = 1 / this.objects.length;
        let sum = 0;
        for (let i = 0; i < this.objects.length; i++) {
            sum += weight * this.objects[i].pdfValue(origin, direction);
        }

        return sum;
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        if (this.objects.length === 0) return super.random(origin, sampler);

        let index = Math.min(
            Math.floor(sampler.get() * this.objects.length),
            this.objects.length - 1,
        );
        return this.objects[index].random(origin, sampler);
    }
}
