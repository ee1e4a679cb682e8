/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { EPSILON, point, vector, type Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape } from './shape.js';

/**
 * Entry/exit `t` of a ray against the slab [-1, 1] on one axis. A direction close to 0
 * pushes the bounds to ±Infinity instead of dividing by it.
 */
function checkAxis(origin: number, direction: number): [number, number] {
  const tminNumerator = -1 - origin;
  const tmaxNumerator = 1 - origin;

  let tmin: number;
  let tmax: number;
  if (Math.abs(direction) >= EPSILON) {
    tmin = tminNumerator / direction;
    tmax = tmaxNumerator / direction;
  } else {
    // A zero numerator means the origin sits on a face: 0 × Infinity would be NaN
    tmin = tminNumerator === 0 ? -Infinity : tminNumerator * Infinity;
    tmax = tmaxNumerator === 0 ? Infinity : tmaxNumerator * Infinity;
  }

  return tmin > tmax ? [tmax, tmin] : [tmin, tmax];
}

/** Axis-aligned cube spanning [-1, 1] on every axis */
export class Cube extends Shape {
  localIntersections(ray: Ray): Intersection[] {
    const [xtmin, xtmax] = checkAxis(ray.origin.x, ray.direction.x);
    const [ytmin, ytmax] = checkAxis(ray.origin.y, ray.direction.y);
    const [ztmin, ztmax] = checkAxis(ray.origin.z, ray.direction.z);

    const tmin = Math.max(xtmin, ytmin, ztmin);
    const tmax = Math.min(xtmax, ytmax, ztmax);

    if (tmin > tmax) {
      return [];
    }
    return [new Intersection(tmin, this), new Intersection(tmax, this)];
  }

  localNormal(objectPoint: Tuple): Tuple {
    const ax = Math.abs(objectPoint.x);
    const ay = Math.abs(objectPoint.y);
    const az = Math.abs(objectPoint.z);
    const maxc = Math.max(ax, ay, az);

    if (maxc === ax) {
      return vector(objectPoint.x, 0, 0);
    }
    if (maxc === ay) {
      return vector(0, objectPoint.y, 0);
    }
    return vector(0, 0, objectPoint.z);
  }

  localBounds(): Bounds {
    return new Bounds(point(-1, -1, -1), point(1, 1, 1));
  }
}
