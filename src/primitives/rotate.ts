import { Quaternion, Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { Hittable } from "./primitive.js";

export enum Axis {
    X = "X",
    Y = "Y",
    Z = "Z",
}

const AXIS_VECTORS : Record<Axis, Vector3> = {
    [Axis.X]: new Vector3(1, 0, 0),
    [Axis.Y]: new Vector3(0, 1, 0),
    [Axis.Z]: new Vector3(0, 0, 1),
};

export class Rotate extends Hittable {
    private toWorld : Quaternion;
    private toLocal : Quaternion;

    constructor(
        public readonly child : Hittable,
        public readonly axis : Axis,
        public readonly angleDegrees : number,
    ) {
        super();

        let radians = (angleDegrees / 180) * Math.PI;
        this.toWorld = new Quaternion().setFromAxisAngle(AXIS_VECTORS[axis], radians);
        this.toLocal = new Quaternion().setFromAxisAngle(AXIS_VECTORS[axis], -radians);
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        let local = new Ray(
            ray.origin.clone().applyQuaternion(this.toLocal),
            ray.direction.clone().applyQuaternion(this.toLocal),
            ray.time,
        );

        let hit = this.child.hit(local, tMin, tMax);
        if (!hit) return null;

        return hit
            .withPoint(hit.p.clone().applyQuaternion(this.toWorld))
            .withNormal(hit.normal.clone().applyQuaternion(this.toWorld));
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        return this.child.pdfValue(
            origin.clone().applyQuaternion(this.toLocal),
            direction.clone().applyQuaternion(this.toLocal),
        );
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        return this.child
            .random(origin.clone().applyQuaternion(this.toLocal), sampler)
            .applyQuaternion(this.toWorld);
    }
}
