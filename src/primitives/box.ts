import { Vector3 } from "three";
import type { HitRecord } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import type { Material } from "../materials/materials.js";
import type { UniformSampler } from "../samplers/uniform.js";
import { FlipNormals } from "./flipNormals.js";
import { HittableList } from "./hittableList.js";
import { Hittable } from "./primitive.js";
import { AARect, Plane } from "./rect.js";

// axis-aligned box made of six rectangles, all normals facing outwards
export class Box extends Hittable {
    private faces : HittableList;

    constructor(
        public readonly pMin : Vector3,
        public readonly pMax : Vector3,
        public readonly material : Material,
    ) {
        super();

        let p0 = pMin;
        let p1 = pMax;

        this.faces = new HittableList([
            new AARect(Plane.XY, p0.x, p1.x, p0.y, p1.y, p1.z, material),
            new FlipNormals(new AARect(Plane.XY, p0.x, p1.x, p0.y, p1.y, p0.z, material)),
            new AARect(Plane.ZX, p0.z, p1.z, p0.x, p1.x, p1.y, material),
            new FlipNormals(new AARect(Plane.ZX, p0.z, p1.z, p0.x, p1.x, p0.y, material)),
            new AARect(Plane.YZ, p0.y, p1.y, p0.z, p1.z, p1.x, material),
            new FlipNormals(new AARect(Plane.YZ, p0.y, p1.y, p0.z, p1.z, p0.x, material)),
        ]);
    }

    hit(ray : Ray, tMin : number, tMax : number) : HitRecord | null {
        return this.faces.hit(ray, tMin, tMax);
    }

    pdfValue(origin : Vector3, direction : Vector3) : number {
        return this.faces.pdfValue(origin, direction);
    }

    random(origin : Vector3, sampler : UniformSampler) : Vector3 {
        return this.faces.random(origin, sampler);
    }
}
