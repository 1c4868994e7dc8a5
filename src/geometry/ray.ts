import { Vector3 } from "three";

export class Ray {
    constructor(
        public readonly origin : Vector3,
        public readonly direction : Vector3,
        public readonly time : number = 0,
    ) { }

    at(t : number) : Vector3 {
        return this.origin.clone().addScaledVector(this.direction, t);
    }
}
