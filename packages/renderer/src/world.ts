/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * World - top-level shapes plus one point light
 *
 * Shading follows a fixed bounce budget: every reflected or refracted ray consumes one
 * unit, and a budget of 0 contributes black without recursing.
 */

import type { Tuple } from '@umbra/math';
import {
  hit,
  prepareComputations,
  Ray,
  schlick,
  sortIntersections,
  type Intersection,
  type IntersectionState,
  type Shape,
} from '@umbra/geometry';
import { BLACK, type Color, type PointLight } from '@umbra/shading';
import { MAX_REFLECTIONS } from './constants.js';

export class World {
  readonly objects: Shape[];
  light: PointLight | undefined;

  constructor(objects: Iterable<Shape> = [], light?: PointLight) {
    this.objects = [...objects];
    this.light = light;
  }

  /**
   * Every intersection of the ray with every top-level shape, ascending by `t`
   */
  intersections(ray: Ray): Intersection[] {
    return sortIntersections(this.collect(ray));
  }

  /**
   * Color seen along a ray, black when nothing is hit
   */
  colorAt(ray: Ray, remaining: number = MAX_REFLECTIONS): Color {
    const xs = this.intersections(ray);
    const nearest = hit(xs);
    if (nearest === undefined) {
      return BLACK;
    }
    return this.shadeHit(prepareComputations(nearest, ray, xs), remaining);
  }

  /**
   * Local lighting plus reflected and refracted contributions. Materials that are both
   * reflective and transparent mix the two by Schlick reflectance.
   */
  shadeHit(state: IntersectionState, remaining: number = MAX_REFLECTIONS): Color {
    if (this.light === undefined) {
      return BLACK;
    }

    const shadowed = this.isShadowed(state.overPoint);
    const surface = state.object.lighting(this.light, state.overPoint, state.eyev, state.normalv, shadowed);
    const reflected = this.reflectedColor(state, remaining);
    const refracted = this.refractedColor(state, remaining);

    const material = state.object.material;
    if (material.reflective > 0 && material.transparency > 0) {
      const reflectance = schlick(state);
      return surface.add(reflected.scale(reflectance)).add(refracted.scale(1 - reflectance));
    }
    return surface.add(reflected).add(refracted);
  }

  /**
   * Whether something that casts shadows sits strictly between the point and the light
   */
  isShadowed(worldPoint: Tuple): boolean {
    if (this.light === undefined) {
      return true;
    }

    const toLight = this.light.position.subtract(worldPoint);
    const distance = toLight.magnitude();
    const ray = new Ray(worldPoint, toLight.normalize());

    return this.collect(ray).some((x) => x.t > 0 && x.t < distance && x.object.castsShadow);
  }

  reflectedColor(state: IntersectionState, remaining: number): Color {
    const reflective = state.object.material.reflective;
    if (remaining <= 0 || reflective === 0) {
      return BLACK;
    }

    const reflectRay = new Ray(state.overPoint, state.reflectv);
    return this.colorAt(reflectRay, remaining - 1).scale(reflective);
  }

  refractedColor(state: IntersectionState, remaining: number): Color {
    const transparency = state.object.material.transparency;
    if (remaining <= 0 || transparency === 0) {
      return BLACK;
    }

    // Snell's law
    const ratio = state.n1 / state.n2;
    const cosI = state.eyev.dot(state.normalv);
    const sin2t = ratio * ratio * (1 - cosI * cosI);
    if (sin2t > 1) {
      // Total internal reflection
      return BLACK;
    }

    const cosT = Math.sqrt(1 - sin2t);
    const direction = state.normalv.scale(ratio * cosI - cosT).subtract(state.eyev.scale(ratio));
    const refractRay = new Ray(state.underPoint, direction);
    return this.colorAt(refractRay, remaining - 1).scale(transparency);
  }

  private collect(ray: Ray): Intersection[] {
    const xs: Intersection[] = [];
    for (const object of this.objects) {
      for (const intersection of object.intersections(ray)) {
        xs.push(intersection);
      }
    }
    return xs;
  }
}
