/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shading state derived from a hit
 */

import { SURFACE_OFFSET, type Tuple } from '@umbra/math';
import { REFRACTIVE_INDEX } from '@umbra/shading';
import type { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import type { Shape } from './shape.js';

export interface IntersectionState {
  t: number;
  object: Shape;
  hit: Intersection;
  point: Tuple;
  /** `point` nudged along the normal, origin for shadow and reflection rays */
  overPoint: Tuple;
  /** `point` nudged against the normal, origin for refraction rays */
  underPoint: Tuple;
  eyev: Tuple;
  /** Always faces the eye; flipped when the ray starts inside the object */
  normalv: Tuple;
  inside: boolean;
  reflectv: Tuple;
  /** Refractive index of the medium being exited */
  n1: number;
  /** Refractive index of the medium being entered */
  n2: number;
}

/**
 * Build the shading state for `hit`. `intersections` is the full, sorted list the hit
 * was chosen from; it determines the refractive indices on either side of the surface.
 */
export function prepareComputations(
  hit: Intersection,
  ray: Ray,
  intersections: readonly Intersection[] = [hit]
): IntersectionState {
  const point = ray.position(hit.t);
  const eyev = ray.direction.negate();
  let normalv = hit.object.normal(point, hit);

  let inside = false;
  if (normalv.dot(eyev) < 0) {
    inside = true;
    normalv = normalv.negate();
  }

  const offset = normalv.scale(SURFACE_OFFSET);
  const [n1, n2] = refractiveIndices(hit, intersections);

  return {
    t: hit.t,
    object: hit.object,
    hit,
    point,
    overPoint: point.add(offset),
    underPoint: point.subtract(offset),
    eyev,
    normalv,
    inside,
    reflectv: ray.direction.reflect(normalv),
    n1,
    n2,
  };
}

/**
 * Walk the intersections up to the hit, tracking which objects the ray is inside.
 * The last container before the hit gives n1, the last one after it gives n2.
 */
function refractiveIndices(hit: Intersection, intersections: readonly Intersection[]): [number, number] {
  const containers: Shape[] = [];
  let n1 = 1;
  let n2 = 1;

  for (const intersection of intersections) {
    if (intersection === hit) {
      n1 = containers.length > 0 ? containers[containers.length - 1].material.refractiveIndex : REFRACTIVE_INDEX.VACUUM;
    }

    const index = containers.findIndex((container) => container.includes(intersection.object));
    if (index >= 0) {
      containers.splice(index, 1);
    } else {
      containers.push(intersection.object);
    }

    if (intersection === hit) {
      n2 = containers.length > 0 ? containers[containers.length - 1].material.refractiveIndex : REFRACTIVE_INDEX.VACUUM;
      break;
    }
  }

  return [n1, n2];
}

/**
 * Schlick's approximation of the Fresnel reflectance at the hit
 */
export function schlick(state: IntersectionState): number {
  let cos = state.eyev.dot(state.normalv);

  if (state.n1 > state.n2) {
    const ratio = state.n1 / state.n2;
    const sin2t = ratio * ratio * (1 - cos * cos);
    if (sin2t > 1) {
      // Total internal reflection
      return 1;
    }
    cos = Math.sqrt(1 - sin2t);
  }

  const r0 = ((state.n1 - state.n2) / (state.n1 + state.n2)) ** 2;
  return r0 + (1 - r0) * (1 - cos) ** 5;
}
