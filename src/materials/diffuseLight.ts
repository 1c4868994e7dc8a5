import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import type { Texture } from "../textures/texture.js";
import { Material } from "./materials.js";

// one-sided area light: emits only towards the side its normal faces
export class DiffuseLight extends Material {

    constructor(
        public readonly emit : Texture,
    ) { 
        super();
    }

    emitted(ray : Ray, hit : HitRecord) : Vector3 {
        if (hit.normal.dot(ray.direction) < 0) {
            return this.emit.value(hit.u, hit.v, hit.p);
        }

        return new Vector3(0, 0, 0);
    }
}
