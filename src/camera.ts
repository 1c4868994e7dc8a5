import { Vector3 } from "three";
import { Ray } from "./geometry/ray.js";
import type { UniformSampler } from "./samplers/uniform.js";
import { randomInUnitDisk } from "./utils.js";

export type CameraOptions = {
    lookFrom : Vector3,
    lookAt : Vector3,
    vup : Vector3,
    // vertical field of view, in degrees
    vfov : number,
    aspect : number,
    aperture : number,
    focusDistance : number,
    time0 : number,
    time1 : number,
};

// thin lens camera, shutter open between time0 and time1
export class Camera {
    private origin : Vector3;
    private lowerLeft : Vector3;
    private horizontal : Vector3;
    private vertical : Vector3;
    private u : Vector3;
    private v : Vector3;
    private lensRadius : number;
    private time0 : number;
    private time1 : number;

    constructor({ lookFrom, lookAt, vup, vfov, aspect, aperture, focusDistance, time0, time1 } : CameraOptions) {
        let theta = (vfov / 180) * Math.PI;
        let halfHeight = Math.tan(theta / 2);
        let halfWidth = aspect * halfHeight;

        let w = lookFrom.clone().sub(lookAt).normalize();
        this.u = new Vector3().crossVectors(vup, w).normalize();
        this.v = new Vector3().crossVectors(w, this.u);

        this.origin = lookFrom.clone();
        this.lensRadius = aperture / 2;
        this.time0 = time0;
        this.time1 = time1;

        this.horizontal = this.u.clone().multiplyScalar(2 * halfWidth * focusDistance);
        this.vertical = this.v.clone().multiplyScalar(2 * halfHeight * focusDistance);
        this.lowerLeft = this.origin.clone()
            .addScaledVector(this.u, -halfWidth * focusDistance)
            .addScaledVector(this.v, -halfHeight * focusDistance)
            .addScaledVector(w, -focusDistance);
    }

    // s, t in [0, 1], t = 0 is the bottom edge of the image
    getRay(s : number, t : number, sampler : UniformSampler) : Ray {
        let offset = new Vector3();
        if (this.lensRadius > 0) {
            let rd = randomInUnitDisk(sampler).multiplyScalar(this.lensRadius);
            offset.addScaledVector(this.u, rd.x).addScaledVector(this.v, rd.y);
        }

        let time = this.time0 + sampler.get() * (this.time1 - this.time0);
        let origin = this.origin.clone().add(offset);
        let direction = this.lowerLeft.clone()
            .addScaledVector(this.horizontal, s)
            .addScaledVector(this.vertical, t)
            .sub(origin);

        return new Ray(origin, direction, time);
    }
}
