import { Vector3 } from "three";
import { HitRecord } from "../geometry/intersection.js";
import { Onb } from "../geometry/onb.js";
import { Ray } from "../geometry/ray.js";
import type { Material } from "../materials/materials.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { randomToSphere, randomUnitVector } from "../utils.js";
import { Hittable } from "./primitive.js";

export class Sphere extends Hittable {
    constructor(
        public readonly center : Vector3,
        public readonly radius : number,
        public readonly material : Material,
    ) { 
        super();
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        let OC : Vector3 = ray.origin.clone().sub(this.center);

        let a = ray.direction.dot(ray.direction);
        let b = ray.direction.dot(OC);
        let c = OC.dot(OC) - this.radius * this.radius;
        let delta = b * b - a * c;

        if (delta <= 0) // No solution, or grazing
            return null;

        let sqrtDelta = Math.sqrt(delta);

        // a > 0, so the first root is the nearer one
        let t = (-b - sqrtDelta) / a;
        if (!(t > tMin && t < tMax)) {
            t = (-b + sqrtDelta) / a;
            if (!(t > tMin && t < tMax))
                return null;
        }

        let p = ray.at(t);
        let normal = p.clone().sub(this.center).divideScalar(this.radius);

        let phi = Math.atan2(normal.z, normal.x);
        let theta = Math.asin(Math.max(-1, Math.min(1, normal.y)));
        let u = 1 - (phi + Math.PI) / (2 * Math.PI);
        let v = (theta + Math.PI / 2) / Math.PI;

        return new HitRecord(t, p, normal, u, v, this.material);
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        if (!this.hit(new Ray(origin, direction), 0.001, Infinity))
            return 0;

        let distanceSquared = this.center.distanceToSquared(origin);
        let r2 = this.radius * this.radius;

        // from the inside every direction reaches the sphere
        if (distanceSquared <= r2)
            return 1 / (4 * Math.PI);

        let cosThetaMax = Math.sqrt(1 - r2 / distanceSquared);
        let solidAngle = 2 * Math.PI * (1 - cosThetaMax);

        return 1 / solidAngle;
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        let direction = this.center.clone().sub(origin);
        let distanceSquared = direction.lengthSq();

        if (distanceSquared <= this.radius * this.radius)
            return randomUnitVector(sampler);

        let uvw = Onb.fromW(direction);
        return uvw.local(randomToSphere(this.radius, distanceSquared, sampler));
    }
}
