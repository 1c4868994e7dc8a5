import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { reflect, refract, schlick } from "../utils.js";
import { Material, type ScatterRecord } from "./materials.js";

export class Dielectric extends Material {

    constructor(
        public readonly refractionIndex : number,
    ) { 
        super();
    }

    scatter(ray : Ray, hit : HitRecord, sampler : UniformSampler) : ScatterRecord {
        let refractionIndex = this.refractionIndex;
        let attenuation = new Vector3(1, 1, 1);

        let dDotN = ray.direction.dot(hit.normal);
        let length = ray.direction.length();

        let outwardNormal : Vector3;
        let niOverNt : number;
        let cosine : number;

        if (dDotN > 0) {
            // leaving the medium
            outwardNormal = hit.normal.clone().negate();
            niOverNt = refractionIndex;
            cosine = refractionIndex * dDotN / length;
        } else {
            outwardNormal = hit.normal;
            niOverNt = 1 / refractionIndex;
            cosine = -dDotN / length;
        }

        let refracted = refract(ray.direction, outwardNormal, niOverNt);
        if (refracted && sampler.get() >= schlick(cosine, refractionIndex)) {
            return {
                kind: "specular",
                ray: new Ray(hit.p, refracted, ray.time),
                attenuation,
            };
        }

        return {
            kind: "specular",
            ray: new Ray(hit.p, reflect(ray.direction, hit.normal), ray.time),
            attenuation,
        };
    }
}
