import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import { Ray } from "../geometry/ray.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { randomInUnitSphere, reflect } from "../utils.js";
import { Material, type ScatterRecord } from "./materials.js";

export class Metal extends Material {
    public readonly fuzz : number;

    constructor(
        public readonly albedo : Vector3,
        fuzz : number = 0,
    ) { 
        super();
        this.fuzz = Math.min(fuzz, 1);
    }

    scatter(ray : Ray, hit : HitRecord, sampler : UniformSampler) : ScatterRecord | null {
        let reflected = reflect(ray.direction.clone().normalize(), hit.normal);
        if (this.fuzz > 0) {
            reflected.addScaledVector(randomInUnitSphere(sampler), this.fuzz);
        }

        // fuzzed below the surface, absorbed
        if (reflected.dot(hit.normal) <= 0) return null;

        return {
            kind: "specular",
            ray: new Ray(hit.p, reflected, ray.time),
            attenuation: this.albedo.clone(),
        };
    }
}
