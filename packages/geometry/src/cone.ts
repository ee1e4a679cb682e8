/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { EPSILON, point, vector, type Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { withinCap, type CylinderOptions } from './cylinder.js';
import { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape } from './shape.js';

export type ConeOptions = CylinderOptions;

/**
 * Double-napped cone x² + z² = y², optionally truncated and capped. The cap radius
 * at height y is |y|.
 */
export class Cone extends Shape {
  readonly minimum: number;
  readonly maximum: number;
  readonly closed: boolean;

  constructor(id: number, options: ConeOptions = {}) {
    super(id, options);
    this.minimum = options.minimum ?? -Infinity;
    this.maximum = options.maximum ?? Infinity;
    this.closed = options.closed ?? false;
  }

  localIntersections(ray: Ray): Intersection[] {
    const { origin, direction } = ray;
    const xs: Intersection[] = [];

    const a = direction.x * direction.x - direction.y * direction.y + direction.z * direction.z;
    const b = 2 * origin.x * direction.x - 2 * origin.y * direction.y + 2 * origin.z * direction.z;
    const c = origin.x * origin.x - origin.y * origin.y + origin.z * origin.z;

    const candidates: number[] = [];
    if (Math.abs(a) < EPSILON) {
      // Parallel to one nappe: a single hit on the other, unless b vanishes as well
      if (Math.abs(b) >= EPSILON) {
        candidates.push(-c / (2 * b));
      }
    } else {
      const discriminant = b * b - 4 * a * c;
      if (discriminant >= 0) {
        const root = Math.sqrt(discriminant);
        const t0 = (-b - root) / (2 * a);
        const t1 = (-b + root) / (2 * a);
        candidates.push(Math.min(t0, t1), Math.max(t0, t1));
      }
    }

    for (const t of candidates) {
      const y = origin.y + t * direction.y;
      if (this.minimum < y && y < this.maximum) {
        xs.push(new Intersection(t, this));
      }
    }

    this.intersectCaps(ray, xs);
    return xs;
  }

  localNormal(objectPoint: Tuple): Tuple {
    const distance = objectPoint.x * objectPoint.x + objectPoint.z * objectPoint.z;

    if (distance < this.maximum * this.maximum && objectPoint.y >= this.maximum - EPSILON) {
      return vector(0, 1, 0);
    }
    if (distance < this.minimum * this.minimum && objectPoint.y <= this.minimum + EPSILON) {
      return vector(0, -1, 0);
    }

    let y = Math.sqrt(distance);
    if (objectPoint.y > 0) {
      y = -y;
    }
    return vector(objectPoint.x, y, objectPoint.z);
  }

  localBounds(): Bounds {
    const limit = Math.max(Math.abs(this.minimum), Math.abs(this.maximum));
    return new Bounds(point(-limit, this.minimum, -limit), point(limit, this.maximum, limit));
  }

  private intersectCaps(ray: Ray, xs: Intersection[]): void {
    if (!this.closed || Math.abs(ray.direction.y) < EPSILON) {
      return;
    }

    for (const capY of [this.minimum, this.maximum]) {
      const t = (capY - ray.origin.y) / ray.direction.y;
      if (withinCap(ray, t, Math.abs(capY))) {
        xs.push(new Intersection(t, this));
      }
    }
  }
}
