/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { EPSILON, point, vector, type Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape, type ShapeOptions } from './shape.js';

export interface CylinderOptions extends ShapeOptions {
  /** Lower y bound, exclusive (default -Infinity) */
  minimum?: number;
  /** Upper y bound, exclusive (default Infinity) */
  maximum?: number;
  /** Whether the ends are capped (default false) */
  closed?: boolean;
}

/**
 * Radius-1 cylinder around the y axis, optionally truncated and capped
 */
export class Cylinder extends Shape {
  readonly minimum: number;
  readonly maximum: number;
  readonly closed: boolean;

  constructor(id: number, options: CylinderOptions = {}) {
    super(id, options);
    this.minimum = options.minimum ?? -Infinity;
    this.maximum = options.maximum ?? Infinity;
    this.closed = options.closed ?? false;
  }

  localIntersections(ray: Ray): Intersection[] {
    const { origin, direction } = ray;
    const xs: Intersection[] = [];

    const a = direction.x * direction.x + direction.z * direction.z;

    // Parallel to the y axis: no side hits, only caps
    if (Math.abs(a) >= EPSILON) {
      const b = 2 * origin.x * direction.x + 2 * origin.z * direction.z;
      const c = origin.x * origin.x + origin.z * origin.z - 1;
      const discriminant = b * b - 4 * a * c;

      if (discriminant < 0) {
        return [];
      }

      const root = Math.sqrt(discriminant);
      let t0 = (-b - root) / (2 * a);
      let t1 = (-b + root) / (2 * a);
      if (t0 > t1) {
        [t0, t1] = [t1, t0];
      }

      for (const t of [t0, t1]) {
        const y = origin.y + t * direction.y;
        if (this.minimum < y && y < this.maximum) {
          xs.push(new Intersection(t, this));
        }
      }
    }

    this.intersectCaps(ray, xs);
    return xs;
  }

  localNormal(objectPoint: Tuple): Tuple {
    const distance = objectPoint.x * objectPoint.x + objectPoint.z * objectPoint.z;

    if (distance < 1 && objectPoint.y >= this.maximum - EPSILON) {
      return vector(0, 1, 0);
    }
    if (distance < 1 && objectPoint.y <= this.minimum + EPSILON) {
      return vector(0, -1, 0);
    }
    return vector(objectPoint.x, 0, objectPoint.z);
  }

  localBounds(): Bounds {
    return new Bounds(point(-1, this.minimum, -1), point(1, this.maximum, 1));
  }

  private intersectCaps(ray: Ray, xs: Intersection[]): void {
    if (!this.closed || Math.abs(ray.direction.y) < EPSILON) {
      return;
    }

    for (const capY of [this.minimum, this.maximum]) {
      const t = (capY - ray.origin.y) / ray.direction.y;
      if (withinCap(ray, t, 1)) {
        xs.push(new Intersection(t, this));
      }
    }
  }
}

/**
 * Whether the ray at `t` lies inside a cap disk of the given radius
 */
export function withinCap(ray: Ray, t: number, radius: number): boolean {
  const x = ray.origin.x + t * ray.direction.x;
  const z = ray.origin.z + t * ray.direction.z;
  return x * x + z * z <= radius * radius;
}
