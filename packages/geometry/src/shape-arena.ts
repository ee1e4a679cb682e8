/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shape factory handing out sequential identifiers
 *
 * Identity is scoped to an arena, not to the process: every shape of one scene is
 * created through the same arena, and two arenas never need to agree on ids.
 */

import type { Tuple } from '@umbra/math';
import { Cone, type ConeOptions } from './cone.js';
import { Cube } from './cube.js';
import { Cylinder, type CylinderOptions } from './cylinder.js';
import { Group } from './group.js';
import { Plane } from './plane.js';
import type { Shape, ShapeOptions } from './shape.js';
import { Sphere } from './sphere.js';
import { SmoothTriangle, Triangle } from './triangle.js';

export class ShapeArena {
  private nextId: number;

  constructor(firstId: number = 1) {
    this.nextId = firstId;
  }

  /**
   * Reserve the next identifier
   */
  allocate(): number {
    return this.nextId++;
  }

  /** Number of identifiers handed out so far */
  get allocated(): number {
    return this.nextId - 1;
  }

  sphere(options?: ShapeOptions): Sphere {
    return new Sphere(this.allocate(), options);
  }

  plane(options?: ShapeOptions): Plane {
    return new Plane(this.allocate(), options);
  }

  cube(options?: ShapeOptions): Cube {
    return new Cube(this.allocate(), options);
  }

  cylinder(options?: CylinderOptions): Cylinder {
    return new Cylinder(this.allocate(), options);
  }

  cone(options?: ConeOptions): Cone {
    return new Cone(this.allocate(), options);
  }

  triangle(p1: Tuple, p2: Tuple, p3: Tuple, options?: ShapeOptions): Triangle {
    return new Triangle(this.allocate(), p1, p2, p3, options);
  }

  smoothTriangle(
    p1: Tuple,
    p2: Tuple,
    p3: Tuple,
    n1: Tuple,
    n2: Tuple,
    n3: Tuple,
    options?: ShapeOptions
  ): SmoothTriangle {
    return new SmoothTriangle(this.allocate(), p1, p2, p3, n1, n2, n3, options);
  }

  group(children: Iterable<Shape> = [], options?: ShapeOptions): Group {
    return new Group(this.allocate(), options, children);
  }
}
