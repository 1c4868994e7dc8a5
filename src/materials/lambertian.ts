import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import { CosinePdf } from "../pdf/cosinePdf.js";
import type { Texture } from "../textures/texture.js";
import { Material, type ScatterRecord } from "./materials.js";

export class Lambertian extends Material {

    constructor(
        public readonly albedo : Texture,
    ) { 
        super();
    }

    scatter(ray : Ray, hit : HitRecord) : ScatterRecord {
        return {
            kind: "scatter",
            pdf: new CosinePdf(hit.normal),
            attenuation: this.albedo.value(hit.u, hit.v, hit.p),
        };
    }

    scatteringPdf(ray : Ray, hit : HitRecord, scattered : Ray) : number {
        let cosine = hit.normal.dot(scattered.direction.clone().normalize());
        return Math.max(cosine, 0) / Math.PI;
    }
}
