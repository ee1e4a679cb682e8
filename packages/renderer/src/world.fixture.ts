/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Matrix, point } from '@umbra/math';
import { ShapeArena, type Sphere } from '@umbra/geometry';
import { Color, Material, PointLight, WHITE } from '@umbra/shading';
import { World } from './world.js';

export interface DefaultWorld {
  world: World;
  arena: ShapeArena;
  outer: Sphere;
  inner: Sphere;
}

/**
 * Two concentric spheres lit from the upper left front
 */
export function createDefaultWorld(): DefaultWorld {
  const arena = new ShapeArena();
  const outer = arena.sphere({
    material: new Material({ color: new Color(0.8, 1.0, 0.6), diffuse: 0.7, specular: 0.2 }),
  });
  const inner = arena.sphere({ transform: Matrix.scaling(0.5, 0.5, 0.5) });
  const world = new World([outer, inner], new PointLight(point(-10, 10, -10), WHITE));
  return { world, arena, outer, inner };
}
