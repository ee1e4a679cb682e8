/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Triangles (flat and smooth), intersected with the Möller–Trumbore algorithm
 */

import { EPSILON, type Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape, type ShapeOptions } from './shape.js';

export class Triangle extends Shape {
  readonly e1: Tuple;
  readonly e2: Tuple;
  /** Face normal, precomputed from the edges */
  readonly faceNormal: Tuple;

  constructor(
    id: number,
    readonly p1: Tuple,
    readonly p2: Tuple,
    readonly p3: Tuple,
    options: ShapeOptions = {}
  ) {
    super(id, options);
    this.e1 = p2.subtract(p1);
    this.e2 = p3.subtract(p1);
    this.faceNormal = this.e2.cross(this.e1).normalize();
  }

  localIntersections(ray: Ray): Intersection[] {
    const dirCrossE2 = ray.direction.cross(this.e2);
    const det = this.e1.dot(dirCrossE2);

    // Ray parallel to the triangle plane, or degenerate triangle
    if (Math.abs(det) < EPSILON) {
      return [];
    }

    const f = 1.0 / det;
    const p1ToOrigin = ray.origin.subtract(this.p1);
    const u = f * p1ToOrigin.dot(dirCrossE2);
    if (u < 0 || u > 1) {
      return [];
    }

    const originCrossE1 = p1ToOrigin.cross(this.e1);
    const v = f * ray.direction.dot(originCrossE1);
    if (v < 0 || u + v > 1) {
      return [];
    }

    const t = f * this.e2.dot(originCrossE1);
    return [this.intersectionAt(t, u, v)];
  }

  localNormal(_objectPoint: Tuple, _hit: Intersection): Tuple {
    return this.faceNormal;
  }

  localBounds(): Bounds {
    return Bounds.fromPoints([this.p1, this.p2, this.p3]);
  }

  protected intersectionAt(t: number, _u: number, _v: number): Intersection {
    return new Intersection(t, this);
  }
}

/**
 * Triangle with per-vertex normals, interpolated at the hit's (u, v)
 */
export class SmoothTriangle extends Triangle {
  constructor(
    id: number,
    p1: Tuple,
    p2: Tuple,
    p3: Tuple,
    readonly n1: Tuple,
    readonly n2: Tuple,
    readonly n3: Tuple,
    options: ShapeOptions = {}
  ) {
    super(id, p1, p2, p3, options);
  }

  localNormal(_objectPoint: Tuple, hit: Intersection): Tuple {
    if (!hit.uv) {
      return this.faceNormal;
    }
    const { u, v } = hit.uv;
    return this.n2
      .scale(u)
      .add(this.n3.scale(v))
      .add(this.n1.scale(1 - u - v));
  }

  protected intersectionAt(t: number, u: number, v: number): Intersection {
    return new Intersection(t, this, { u, v });
  }
}
