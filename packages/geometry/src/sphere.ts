/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { point, vector, type Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape } from './shape.js';

const ORIGIN = point(0, 0, 0);

/** Unit sphere centered at the origin */
export class Sphere extends Shape {
  localIntersections(ray: Ray): Intersection[] {
    const sphereToRay = ray.origin.subtract(ORIGIN);

    const a = ray.direction.dot(ray.direction);
    const b = 2 * ray.direction.dot(sphereToRay);
    const c = sphereToRay.dot(sphereToRay) - 1;

    const discriminant = b * b - 4 * a * c;
    if (discriminant < 0) {
      return [];
    }

    const root = Math.sqrt(discriminant);
    return [
      new Intersection((-b - root) / (2 * a), this),
      new Intersection((-b + root) / (2 * a), this),
    ];
  }

  localNormal(objectPoint: Tuple): Tuple {
    return vector(objectPoint.x, objectPoint.y, objectPoint.z);
  }

  localBounds(): Bounds {
    return new Bounds(point(-1, -1, -1), point(1, 1, 1));
  }
}
