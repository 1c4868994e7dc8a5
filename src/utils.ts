import { Vector3 } from "three";
import type { UniformSampler } from "./samplers/uniform.js";

export function vec3(x: number, y: number, z: number) {
  return new Vector3(x, y, z);
}

export function clamp(val: number, low: number, high: number) {
  if (val < low) return low;
  else if (val > high) return high;
  else return val;
}

export function randomInUnitSphere(sampler: UniformSampler): Vector3 {
  let p = new Vector3();
  do {
    p.set(
      sampler.get() * 2 - 1,
      sampler.get() * 2 - 1,
      sampler.get() * 2 - 1,
    );
  } while (p.lengthSq() >= 1);
  return p;
}

export function randomInUnitDisk(sampler: UniformSampler): Vector3 {
  let p = new Vector3();
  do {
    p.set(sampler.get() * 2 - 1, sampler.get() * 2 - 1, 0);
  } while (p.lengthSq() >= 1);
  return p;
}

// cosine-weighted direction around +z
export function randomCosineDirection(sampler: UniformSampler): Vector3 {
  let r1 = sampler.get();
  let r2 = sampler.get();
  let phi = 2 * Math.PI * r1;
  let sqrtR2 = Math.sqrt(r2);

  return new Vector3(
    Math.cos(phi) * sqrtR2,
    Math.sin(phi) * sqrtR2,
    Math.sqrt(1 - r2),
  );
}

// direction around +z inside the cone subtended by a sphere of the given radius
export function randomToSphere(radius: number, distanceSquared: number, sampler: UniformSampler): Vector3 {
  let r1 = sampler.get();
  let r2 = sampler.get();
  let cosThetaMax = Math.sqrt(1 - (radius * radius) / distanceSquared);
  let z = 1 + r2 * (cosThetaMax - 1);
  let phi = 2 * Math.PI * r1;
  let sinTheta = Math.sqrt(1 - z * z);

  return new Vector3(Math.cos(phi) * sinTheta, Math.sin(phi) * sinTheta, z);
}

export function randomUnitVector(sampler: UniformSampler): Vector3 {
  let z = sampler.get() * 2 - 1;
  let phi = 2 * Math.PI * sampler.get();
  let r = Math.sqrt(1 - z * z);
  return new Vector3(r * Math.cos(phi), r * Math.sin(phi), z);
}

export function reflect(v: Vector3, n: Vector3): Vector3 {
  return v.clone().addScaledVector(n, -2 * v.dot(n));
}

export function refract(v: Vector3, n: Vector3, niOverNt: number): Vector3 | null {
  let uv = v.clone().normalize();
  let dt = uv.dot(n);
  let discriminant = 1.0 - niOverNt * niOverNt * (1.0 - dt * dt);
  if (discriminant > 0.0) {
    // niOverNt * (uv - n * dt) - n * sqrt(discriminant)
    return uv
      .addScaledVector(n, -dt)
      .multiplyScalar(niOverNt)
      .addScaledVector(n, -Math.sqrt(discriminant));
  }

  return null;
}

export function schlick(cosine: number, refIdx: number): number {
  let r0 = (1.0 - refIdx) / (1.0 + refIdx);
  r0 *= r0;
  return r0 + (1.0 - r0) * Math.pow(1.0 - cosine, 5.0);
}
