/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Base shape
 *
 * Variants implement the three object-space primitives (`localIntersections`,
 * `localNormal`, `localBounds`). Everything expressed in world space is derived here
 * once: ray and point conversion, normal conversion, bounds and lighting.
 */

import { Matrix, type Tuple } from '@umbra/math';
import { Material, type Color, type PointLight } from '@umbra/shading';
import type { Bounds } from './bounds.js';
import { SceneGraphError } from './errors.js';
import type { Intersection } from './intersection.js';
import type { Ray } from './ray.js';

export interface ShapeOptions {
  /** Object space → parent space */
  transform?: Matrix;
  material?: Material;
  /** Whether the shape blocks light in shadow tests (default true) */
  castsShadow?: boolean;
}

export abstract class Shape {
  readonly id: number;
  material: Material;
  castsShadow: boolean;
  private currentTransform: Matrix;
  private currentParent: Shape | undefined;

  constructor(id: number, options: ShapeOptions = {}) {
    this.id = id;
    this.currentTransform = options.transform ?? Matrix.identity();
    this.material = options.material ?? new Material();
    this.castsShadow = options.castsShadow ?? true;
  }

  get transform(): Matrix {
    return this.currentTransform;
  }

  set transform(transform: Matrix) {
    this.currentTransform = transform;
    this.currentParent?.invalidateBounds();
  }

  /**
   * Enclosing group, if any. Only used to walk outward through coordinate spaces.
   */
  get parent(): Shape | undefined {
    return this.currentParent;
  }

  /**
   * Record the group that owns this shape. Called by `Group.addChild` only.
   */
  attachTo(parent: Shape): void {
    if (this.currentParent !== undefined) {
      throw new SceneGraphError(
        `Shape #${this.id} already belongs to group #${this.currentParent.id}`
      );
    }
    this.currentParent = parent;
  }

  /**
   * Intersections with a ray in this shape's own (untransformed) space. Results need
   * not be sorted.
   */
  abstract localIntersections(ray: Ray): Intersection[];

  /**
   * Surface normal at an object-space point. The intersection is passed for shapes
   * that interpolate normals (smooth triangles).
   */
  abstract localNormal(objectPoint: Tuple, hit: Intersection): Tuple;

  /**
   * Axis-aligned box enclosing the shape in its own space
   */
  abstract localBounds(): Bounds;

  intersections(ray: Ray): Intersection[] {
    return this.localIntersections(ray.transform(this.transform.inverse()));
  }

  /**
   * World space → this shape's object space, passing through every enclosing group
   */
  worldToObject(worldPoint: Tuple): Tuple {
    const parentPoint = this.parent ? this.parent.worldToObject(worldPoint) : worldPoint;
    return this.transform.inverse().multiplyTuple(parentPoint);
  }

  /**
   * Object-space normal → world space, passing through every enclosing group
   */
  normalToWorld(objectNormal: Tuple): Tuple {
    const normal = this.transform
      .inverse()
      .transpose()
      .multiplyTuple(objectNormal)
      .withW(0)
      .normalize();
    return this.parent ? this.parent.normalToWorld(normal) : normal;
  }

  normal(worldPoint: Tuple, hit: Intersection): Tuple {
    const objectPoint = this.worldToObject(worldPoint);
    return this.normalToWorld(this.localNormal(objectPoint, hit));
  }

  /**
   * Bounds in the parent's space
   */
  bounds(): Bounds {
    return this.localBounds().transform(this.transform);
  }

  /**
   * Whether `shape` is this shape (groups also answer for their descendants)
   */
  includes(shape: Shape): boolean {
    return this.id === shape.id;
  }

  equals(other: Shape): boolean {
    return this.id === other.id;
  }

  /**
   * Drop cached bounds here and in every enclosing group
   */
  invalidateBounds(): void {
    this.currentParent?.invalidateBounds();
  }

  /**
   * Phong lighting with the pattern evaluated in object space, so a shape's transform
   * also moves its pattern.
   */
  lighting(
    light: PointLight,
    worldPoint: Tuple,
    eyev: Tuple,
    normalv: Tuple,
    inShadow: boolean
  ): Color {
    const objectPoint = this.worldToObject(worldPoint);
    return this.material.lighting(light, objectPoint, worldPoint, eyev, normalv, inShadow);
  }
}
