import { describe, it, expect } from 'vitest';
import { Vector3 } from 'three';
import type { HitRecord } from '../geometry/intersection.js';
import { Ray } from '../geometry/ray.js';
import { Lambertian } from '../materials/lambertian.js';
import { UniformSampler } from '../samplers/uniform.js';
import { ConstantTexture } from '../textures/texture.js';
import { Box } from './box.js';
import { FlipNormals } from './flipNormals.js';
import { AARect, Plane } from './rect.js';
import { Axis, Rotate } from './rotate.js';
import { Sphere } from './sphere.js';
import { Translate } from './translate.js';

const grey = new Lambertian(new ConstantTexture(0.5, 0.5, 0.5));
const cube = () => new Box(new Vector3(0, 0, 0), new Vector3(1, 1, 1), grey);

function expectSameHit(a: HitRecord | null, b: HitRecord | null) {
  expect(a === null).toBe(b === null);
  if (!a || !b) return;
  expect(a.t).toBeCloseTo(b.t, 9);
  expect(a.p.distanceTo(b.p)).toBeCloseTo(0, 9);
  expect(a.normal.distanceTo(b.normal)).toBeCloseTo(0, 9);
  expect(a.u).toBeCloseTo(b.u, 9);
  expect(a.v).toBeCloseTo(b.v, 9);
}

function randomRays(seed: string, count: number): Ray[] {
  const sampler = new UniformSampler(seed);
  const rays: Ray[] = [];
  for (let i = 0; i < count; i++) {
    const origin = new Vector3(sampler.get() * 8 - 4, sampler.get() * 8 - 4, sampler.get() * 8 - 4);
    const target = new Vector3(sampler.get(), sampler.get(), sampler.get());
    rays.push(new Ray(origin, target.sub(origin)));
  }
  return rays;
}

describe('Translate', () => {
  it('moves the hit point and keeps t and the normal', () => {
    const moved = new Translate(cube(), new Vector3(10, 0, 0));
    const hit = moved.hit(new Ray(new Vector3(10.5, 0.5, 5), new Vector3(0, 0, -1)), 0.001, Infinity);
    const reference = cube().hit(new Ray(new Vector3(0.5, 0.5, 5), new Vector3(0, 0, -1)), 0.001, Infinity);

    expect(hit?.t).toBeCloseTo(4);
    expect(hit?.t).toBe(reference?.t);
    expect(hit?.p.toArray()).toEqual([10.5, 0.5, 1]);
    expect(hit?.normal.toArray()).toEqual([0, 0, 1]);
  });

  it('misses where the untranslated shape was', () => {
    const moved = new Translate(cube(), new Vector3(10, 0, 0));
    expect(moved.hit(new Ray(new Vector3(0.5, 0.5, 5), new Vector3(0, 0, -1)), 0.001, Infinity)).toBeNull();
  });

  it('shifts light sampling queries', () => {
    const light = new AARect(Plane.ZX, -1, 1, -1, 1, 6, grey);
    const moved = new Translate(light, new Vector3(0, 0, 10));
    expect(moved.pdfValue(new Vector3(0, 0, 10), new Vector3(0, 1, 0))).toBeCloseTo(9);
  });
});

describe('Rotate', () => {
  it('matches the untransformed cube at 0 and 360 degrees', () => {
    for (const angle of [0, 360]) {
      for (const axis of [Axis.X, Axis.Y, Axis.Z]) {
        const rotated = new Rotate(cube(), axis, angle);
        for (const ray of randomRays(`rotate-${angle}-${axis}`, 100)) {
          expectSameHit(rotated.hit(ray, 0.001, Infinity), cube().hit(ray, 0.001, Infinity));
        }
      }
    }
  });

  it('matches a single translation when combined with a zero rotation', () => {
    const offset = new Vector3(2, -1, 3);
    const combined = new Translate(new Rotate(cube(), Axis.Y, 0), offset);
    const single = new Translate(cube(), offset);
    for (const ray of randomRays('translate-rotate', 100)) {
      const shifted = new Ray(ray.origin.clone().add(offset), ray.direction);
      expectSameHit(combined.hit(shifted, 0.001, Infinity), single.hit(shifted, 0.001, Infinity));
    }
  });

  it('turns a quarter about Y', () => {
    // the cube now spans x in [0, 1] and z in [-1, 0]
    const rotated = new Rotate(cube(), Axis.Y, 90);
    const hit = rotated.hit(new Ray(new Vector3(0.5, 0.5, 5), new Vector3(0, 0, -1)), 0.001, Infinity);

    expect(hit?.t).toBeCloseTo(5);
    expect(hit?.p.x).toBeCloseTo(0.5);
    expect(hit?.p.z).toBeCloseTo(0);
    expect(hit?.normal.x).toBeCloseTo(0);
    expect(hit?.normal.z).toBeCloseTo(1);

    expect(rotated.hit(new Ray(new Vector3(0.5, 0.5, 5), new Vector3(0, 0, -1)), 0.001, 4.9)).toBeNull();
  });

  it('rotates sampled directions back to world space', () => {
    const light = new AARect(Plane.ZX, -1, 1, -1, 1, 6, grey);
    const rotated = new Rotate(light, Axis.Z, 180);
    const sampler = new UniformSampler('rotate-random');
    const origin = new Vector3(0, 0, 0);

    // upside down, the light now sits at y = -6
    for (let i = 0; i < 20; i++) {
      const direction = rotated.random(origin, sampler);
      expect(direction.y).toBeCloseTo(-6);
    }
    expect(rotated.pdfValue(origin, new Vector3(0, -1, 0))).toBeCloseTo(9);
  });
});

describe('FlipNormals', () => {
  it('negates only the normal', () => {
    const shapes = [
      new Sphere(new Vector3(0, 0, -5), 1, grey),
      new AARect(Plane.XY, -2, 2, -2, 2, -4, grey),
      cube(),
    ];

    for (const shape of shapes) {
      const flipped = new FlipNormals(shape);
      for (const ray of randomRays('flip', 50)) {
        const a = shape.hit(ray, 0.001, Infinity);
        const b = flipped.hit(ray, 0.001, Infinity);
        expect(a === null).toBe(b === null);
        if (!a || !b) continue;

        expect(b.t).toBe(a.t);
        expect(b.p.equals(a.p)).toBe(true);
        expect(b.u).toBe(a.u);
        expect(b.v).toBe(a.v);
        expect(b.normal.x).toBe(-a.normal.x);
        expect(b.normal.y).toBe(-a.normal.y);
        expect(b.normal.z).toBe(-a.normal.z);
      }
    }
  });

  it('forwards light sampling to the wrapped shape', () => {
    const light = new AARect(Plane.ZX, -1, 1, -1, 1, 6, grey);
    const flipped = new FlipNormals(light);
    expect(flipped.pdfValue(new Vector3(0, 0, 0), new Vector3(0, 1, 0))).toBeCloseTo(9);
  });
});
