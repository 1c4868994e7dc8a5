import { Camera } from "./camera.js";
import { Dielectric } from "./materials/dielectric.js";
import { DiffuseLight } from "./materials/diffuseLight.js";
import { Lambertian } from "./materials/lambertian.js";
import type { Material } from "./materials/materials.js";
import { Metal } from "./materials/metal.js";
import { Box } from "./primitives/box.js";
import { FlipNormals } from "./primitives/flipNormals.js";
import { HittableList } from "./primitives/hittableList.js";
import type { Hittable } from "./primitives/primitive.js";
import { AARect, Plane } from "./primitives/rect.js";
import { Axis, Rotate } from "./primitives/rotate.js";
import { Sphere } from "./primitives/sphere.js";
import { Translate } from "./primitives/translate.js";
import { ConstantTexture } from "./textures/texture.js";
import { vec3 } from "./utils.js";

export type Scene = {
  world: Hittable;
  // shapes the light sampling pdf aims at
  lights: HittableList;
  camera: Camera;
};

export const sceneNames = ["cornell-box", "sphere-light", "dark-box"] as const;
export type SceneName = (typeof sceneNames)[number];

export function isSceneName(name: string): name is SceneName {
  return (sceneNames as readonly string[]).includes(name);
}

// scenes are built once per worker and never mutated afterwards
export function createScene(name: SceneName, aspect: number): Scene {
  switch (name) {
    case "cornell-box":
      return cornellBox(aspect);
    case "sphere-light":
      return sphereLight(aspect);
    case "dark-box":
      return darkBox(aspect);
  }
}

function cornellWalls(world: HittableList, white: Material): void {
  let red = new Lambertian(new ConstantTexture(0.65, 0.05, 0.05));
  let green = new Lambertian(new ConstantTexture(0.12, 0.45, 0.15));

  world.push(new FlipNormals(new AARect(Plane.YZ, 0, 555, 0, 555, 555, green)));
  world.push(new AARect(Plane.YZ, 0, 555, 0, 555, 0, red));
  world.push(new FlipNormals(new AARect(Plane.ZX, 0, 555, 0, 555, 555, white)));
  world.push(new AARect(Plane.ZX, 0, 555, 0, 555, 0, white));
  world.push(new FlipNormals(new AARect(Plane.XY, 0, 555, 0, 555, 555, white)));
}

function cornellCamera(aspect: number): Camera {
  return new Camera({
    lookFrom: vec3(278, 278, -800),
    lookAt: vec3(278, 278, 0),
    vup: vec3(0, 1, 0),
    vfov: 40,
    aspect,
    aperture: 0,
    focusDistance: 10,
    time0: 0,
    time1: 1,
  });
}

function cornellBox(aspect: number): Scene {
  let white = new Lambertian(new ConstantTexture(0.73, 0.73, 0.73));
  let light = new DiffuseLight(new ConstantTexture(15, 15, 15));
  let glass = new Dielectric(1.5);
  let aluminum = new Metal(vec3(0.8, 0.85, 0.88), 0);

  let lightShape = new AARect(Plane.ZX, 227, 332, 213, 343, 554, light);
  let glassSphere = new Sphere(vec3(190, 90, 190), 90, glass);

  let world = new HittableList();
  cornellWalls(world, white);
  // facing down into the box
  world.push(new FlipNormals(lightShape));
  world.push(glassSphere);
  world.push(
    new Translate(
      new Rotate(new Box(vec3(0, 0, 0), vec3(165, 330, 165), aluminum), Axis.Y, 15),
      vec3(265, 0, 295),
    ),
  );

  let lights = new HittableList([lightShape, glassSphere]);

  return { world, lights, camera: cornellCamera(aspect) };
}

// a diffuse sphere on a floor under one small area light, seen from just
// below the light looking straight down
function sphereLight(aspect: number): Scene {
  let grey = new Lambertian(new ConstantTexture(0.5, 0.5, 0.5));
  let orange = new Lambertian(new ConstantTexture(0.8, 0.4, 0.1));
  let light = new DiffuseLight(new ConstantTexture(10, 10, 10));

  let lightShape = new AARect(Plane.ZX, -1, 1, -1, 1, 6, light);

  let world = new HittableList();
  world.push(new AARect(Plane.ZX, -50, 50, -50, 50, 0, grey));
  world.push(new Sphere(vec3(2.5, 1, 0), 1, orange));
  world.push(new FlipNormals(lightShape));

  let camera = new Camera({
    lookFrom: vec3(0, 5, 0),
    lookAt: vec3(0, 0, 0),
    vup: vec3(0, 0, -1),
    vfov: 90,
    aspect,
    aperture: 0,
    focusDistance: 1,
    time0: 0,
    time1: 0,
  });

  return { world, lights: new HittableList([lightShape]), camera };
}

// the Cornell walls with nothing that emits
function darkBox(aspect: number): Scene {
  let white = new Lambertian(new ConstantTexture(0.73, 0.73, 0.73));

  let world = new HittableList();
  cornellWalls(world, white);
  world.push(new Sphere(vec3(278, 150, 278), 100, white));

  return { world, lights: new HittableList(), camera: cornellCamera(aspect) };
}

