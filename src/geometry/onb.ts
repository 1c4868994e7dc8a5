import { Vector3 } from "three";

// right-handed frame with w along the given direction
export class Onb {
    private constructor(
        public readonly u : Vector3,
        public readonly v : Vector3,
        public readonly w : Vector3,
    ) { }

    static fromW(n : Vector3) : Onb {
        let w = n.clone().normalize();
        let a = Math.abs(w.x) > 0.9 ? new Vector3(0, 1, 0) : new Vector3(1, 0, 0);
        let v = new Vector3().crossVectors(w, a).normalize();
        let u = new Vector3().crossVectors(v, w);
        return new Onb(u, v, w);
    }

    local(a : Vector3) : Vector3 {
        return new Vector3()
            .addScaledVector(this.u, a.x)
            .addScaledVector(this.v, a.y)
            .addScaledVector(this.w, a.z);
    }
}
