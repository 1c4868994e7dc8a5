import { writeFile } from "node:fs/promises";
import { RethrownError, toError } from "./errors.js";

// plain text pixel map: P3 header then one "r g b" line per pixel
export function encodePpm(width: number, height: number, pixels: Uint8Array): string {
  let lines = [`P3`, `${width} ${height}`, `255`];
  for (let i = 0; i < width * height; i++) {
    lines.push(`${pixels[i * 3]} ${pixels[i * 3 + 1]} ${pixels[i * 3 + 2]}`);
  }
  return lines.join("\n") + "\n";
}

export async function writePpm(path: string, width: number, height: number, pixels: Uint8Array): Promise<void> {
  try {
    await writeFile(path, encodePpm(width, height, pixels), "utf8");
  } catch (error) {
    throw new RethrownError(`Failed to write image: ${path}`, toError(error));
  }
}
