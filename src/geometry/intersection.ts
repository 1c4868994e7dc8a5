import { Vector3 } from "three";
import type { Material } from "../materials/materials.js";

export class HitRecord {
    constructor(
        public t        : number,
        public p        : Vector3,
        public normal   : Vector3,
        public u        : number,
        public v        : number,
        public material : Material,
    ) { }

    withPoint(p : Vector3) : HitRecord {
        return new HitRecord(this.t, p, this.normal, this.u, this.v, this.material);
    }

    withNormal(normal : Vector3) : HitRecord {
        return new HitRecord(this.t, this.p, normal, this.u, this.v, this.material);
    }
}
