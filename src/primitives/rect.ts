import { Vector3 } from "three";
import { HitRecord } from "../geometry/intersection.js";
import { Ray } from "../geometry/ray.js";
import type { Material } from "../materials/materials.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { Hittable } from "./primitive.js";

export enum Plane {
    XY = "XY",
    YZ = "YZ",
    ZX = "ZX",
}

// component indices of the two in-plane axes (a, b) and of the fixed axis k
const PLANE_AXES : Record<Plane, { a : number, b : number, k : number }> = {
    [Plane.XY]: { a: 0, b: 1, k: 2 },
    [Plane.YZ]: { a: 1, b: 2, k: 0 },
    [Plane.ZX]: { a: 2, b: 0, k: 1 },
};

export class AARect extends Hittable {
    private axes : { a : number, b : number, k : number };
    private normal : Vector3;

    constructor(
        public readonly plane : Plane,
        public readonly a0 : number,
        public readonly a1 : number,
        public readonly b0 : number,
        public readonly b1 : number,
        public readonly k : number,
        public readonly material : Material,
    ) {
        super();
        this.axes = PLANE_AXES[plane];
        this.normal = new Vector3().setComponent(this.axes.k, 1);
    }

    get area() : number {
        return (this.a1 - this.a0) * (this.b1 - this.b0);
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        let { a, b, k } = this.axes;
        let dk = ray.direction.getComponent(k);

        // parallel to the plane
        if (dk === 0) return null;

        let t = (this.k - ray.origin.getComponent(k)) / dk;
        if (!(t > tMin && t < tMax)) return null;

        let pa = ray.origin.getComponent(a) + t * ray.direction.getComponent(a);
        let pb = ray.origin.getComponent(b) + t * ray.direction.getComponent(b);
        if (pa < this.a0 || pa > this.a1 || pb < this.b0 || pb > this.b1) return null;

        let p = new Vector3()
            .setComponent(a, pa)
            .setComponent(b, pb)
            .setComponent(k, this.k);

        return new HitRecord(
            t,
            p,
            this.normal.clone(),
            (pa - this.a0) / (this.a1 - this.a0),
            (pb - this.b0) / (this.b1 - this.b0),
            this.material,
        );
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        let hit = this.hit(new Ray(origin, direction), 0.001, Infinity);
        if (!hit) return 0;

        let lengthSquared = direction.lengthSq();
        let distanceSquared = hit.t * hit.t * lengthSquared;
        let cosine = Math.abs(direction.dot(hit.normal)) / Math.sqrt(lengthSquared);

        return distanceSquared / (cosine * this.area);
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        let pa = this.a0 + sampler.get() * (this.a1 - this.a0);
        let pb = this.b0 + sampler.get() * (this.b1 - this.b0);

        return new Vector3()
            .setComponent(this.axes.a, pa)
            .setComponent(this.axes.b, pb)
            .setComponent(this.axes.k, this.k)
            .sub(origin);
    }
}
