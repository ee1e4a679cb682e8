/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { EPSILON, point, vector, type Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape } from './shape.js';

const UP = vector(0, 1, 0);

/** The xz plane through the origin */
export class Plane extends Shape {
  localIntersections(ray: Ray): Intersection[] {
    if (Math.abs(ray.direction.y) < EPSILON) {
      return [];
    }
    return [new Intersection(-ray.origin.y / ray.direction.y, this)];
  }

  localNormal(): Tuple {
    return UP;
  }

  localBounds(): Bounds {
    return new Bounds(point(-Infinity, 0, -Infinity), point(Infinity, 0, Infinity));
  }
}
