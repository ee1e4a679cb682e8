/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Axis-aligned bounding boxes
 *
 * Boxes may be infinite along some axes (planes, uncapped cylinders). An empty box has
 * min = +Infinity and max = -Infinity on every axis and is never hit.
 */

import { EPSILON, Tuple, point, type Matrix } from '@umbra/math';
import type { Ray } from './ray.js';

const AXES = ['x', 'y', 'z'] as const;

type Axis = (typeof AXES)[number];

function extendAxis(min: number, max: number, value: number): [number, number] {
  // NaN comes from Infinity - Infinity when an unbounded box is rotated: the axis is unbounded
  if (Number.isNaN(value)) {
    return [-Infinity, Infinity];
  }
  return [Math.min(min, value), Math.max(max, value)];
}

/**
 * Matrix × point where 0 × ±Infinity counts as 0, so that a transform which does not
 * mix an unbounded axis into another one keeps the other axes finite
 */
function transformCorner(matrix: Matrix, corner: Tuple): Tuple {
  const components = [corner.x, corner.y, corner.z, corner.w];
  const out = [0, 0, 0];
  for (let row = 0; row < 3; row++) {
    let sum = 0;
    for (let k = 0; k < 4; k++) {
      const coefficient = matrix.get(row, k);
      if (coefficient !== 0 && components[k] !== 0) {
        sum += coefficient * components[k];
      }
    }
    out[row] = sum;
  }
  return point(out[0], out[1], out[2]);
}

export class Bounds {
  constructor(
    readonly min: Tuple,
    readonly max: Tuple
  ) {}

  static empty(): Bounds {
    return new Bounds(point(Infinity, Infinity, Infinity), point(-Infinity, -Infinity, -Infinity));
  }

  static fromPoints(points: Iterable<Tuple>): Bounds {
    let bounds = Bounds.empty();
    for (const p of points) {
      bounds = bounds.include(p);
    }
    return bounds;
  }

  isEmpty(): boolean {
    return this.min.x > this.max.x || this.min.y > this.max.y || this.min.z > this.max.z;
  }

  include(p: Tuple): Bounds {
    const [minX, maxX] = extendAxis(this.min.x, this.max.x, p.x);
    const [minY, maxY] = extendAxis(this.min.y, this.max.y, p.y);
    const [minZ, maxZ] = extendAxis(this.min.z, this.max.z, p.z);
    return new Bounds(point(minX, minY, minZ), point(maxX, maxY, maxZ));
  }

  union(other: Bounds): Bounds {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;
    return this.include(other.min).include(other.max);
  }

  contains(p: Tuple): boolean {
    return AXES.every((axis) => p[axis] >= this.min[axis] && p[axis] <= this.max[axis]);
  }

  corners(): Tuple[] {
    const { min, max } = this;
    return [
      point(min.x, min.y, min.z),
      point(min.x, min.y, max.z),
      point(min.x, max.y, min.z),
      point(min.x, max.y, max.z),
      point(max.x, min.y, min.z),
      point(max.x, min.y, max.z),
      point(max.x, max.y, min.z),
      point(max.x, max.y, max.z),
    ];
  }

  /**
   * Enclosing box of the transformed corners. Transforming the eight corners (not just
   * min and max) keeps the result correct under rotation.
   */
  transform(matrix: Matrix): Bounds {
    if (this.isEmpty()) return this;
    return Bounds.fromPoints(this.corners().map((corner) => transformCorner(matrix, corner)));
  }

  /**
   * Slab test. Hits behind the ray origin count: callers keep negative intersections.
   */
  intersects(ray: Ray): boolean {
    if (this.isEmpty()) return false;

    const { origin, direction } = ray;
    let tmin = -Infinity;
    let tmax = Infinity;

    for (const axis of AXES) {
      const [t0, t1] = this.slab(axis, origin[axis], direction[axis]);
      if (t0 === null || t1 === null) {
        return false;
      }
      tmin = Math.max(tmin, t0);
      tmax = Math.min(tmax, t1);
      if (tmin > tmax) {
        return false;
      }
    }

    return true;
  }

  private slab(axis: Axis, origin: number, direction: number): [number, number] | [null, null] {
    const min = this.min[axis];
    const max = this.max[axis];

    if (Math.abs(direction) < EPSILON) {
      // Ray parallel to the slab
      if (origin < min || origin > max) {
        return [null, null];
      }
      return [-Infinity, Infinity];
    }

    const invD = 1.0 / direction;
    const t0 = (min - origin) * invD;
    const t1 = (max - origin) * invD;
    return t0 > t1 ? [t1, t0] : [t0, t1];
  }
}
