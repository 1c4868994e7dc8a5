import { Vector3 } from "three";
import type { RenderResult } from "./renderer.js";
import { clamp } from "./utils.js";

// maps an averaged linear channel to 8 bits with gamma 2
export function toByte(value: number): number {
  // NaN and negative radiance both show as black
  if (!(value > 0)) return 0;
  return Math.floor(255.99 * clamp(Math.sqrt(value), 0, 1));
}

/**
 * Averages the accumulated radiance and tone maps it to 8-bit RGB triples,
 * top row first.
 */
export function toneMap({ width, height, samples, radiance }: RenderResult): Uint8Array {
  let pixels = new Uint8Array(width * height * 3);
  let mappedColor = new Vector3();

  for (let i = 0; i < width * height; i++) {
    // the radiance buffer keeps row 0 at the bottom
    let y = height - 1 - Math.floor(i / width);
    let x = i % width;

    let index = (y * width + x) * 3;

    mappedColor.set(
      radiance[index + 0] / samples,
      radiance[index + 1] / samples,
      radiance[index + 2] / samples,
    );

    pixels[i * 3 + 0] = toByte(mappedColor.x);
    pixels[i * 3 + 1] = toByte(mappedColor.y);
    pixels[i * 3 + 2] = toByte(mappedColor.z);
  }

  return pixels;
}
