/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Shape } from './shape.js';

/** Barycentric position of a hit on a triangle */
export interface SurfaceUv {
  u: number;
  v: number;
}

/**
 * A ray parameter at which a ray meets a shape. Negative values are valid: they are
 * kept for refraction bookkeeping and skipped by `hit`.
 */
export class Intersection {
  constructor(
    readonly t: number,
    readonly object: Shape,
    readonly uv?: SurfaceUv
  ) {}
}

/**
 * Ascending by `t`; the input is left untouched
 */
export function sortIntersections(intersections: readonly Intersection[]): Intersection[] {
  return [...intersections].sort((a, b) => a.t - b.t);
}

/**
 * Nearest intersection with positive `t`, or undefined if the ray sees nothing
 */
export function hit(intersections: readonly Intersection[]): Intersection | undefined {
  let nearest: Intersection | undefined;
  for (const intersection of intersections) {
    if (intersection.t > 0 && (nearest === undefined || intersection.t < nearest.t)) {
      nearest = intersection;
    }
  }
  return nearest;
}
