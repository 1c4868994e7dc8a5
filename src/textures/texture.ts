import { Vector3 } from "three";

export interface Texture {
  value(u: number, v: number, p: Vector3): Vector3;
}

export class ConstantTexture implements Texture {
  private color: Vector3;

  constructor(r: number, g: number, b: number) {
    this.color = new Vector3(r, g, b);
  }

  value(u: number, v: number, p: Vector3): Vector3 {
    return this.color.clone();
  }
}
