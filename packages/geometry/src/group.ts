/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Composite shape: an ordered list of children sharing one transform
 */

import type { Tuple } from '@umbra/math';
import { Bounds } from './bounds.js';
import { SceneGraphError } from './errors.js';
import type { Intersection } from './intersection.js';
import type { Ray } from './ray.js';
import { Shape, type ShapeOptions } from './shape.js';

export class Group extends Shape {
  private readonly members: Shape[] = [];
  private cachedBounds: Bounds | undefined;

  constructor(id: number, options: ShapeOptions = {}, children: Iterable<Shape> = []) {
    super(id, options);
    for (const child of children) {
      this.addChild(child);
    }
  }

  get children(): readonly Shape[] {
    return this.members;
  }

  isEmpty(): boolean {
    return this.members.length === 0;
  }

  /**
   * Take ownership of a shape. A shape belongs to at most one group, and a group
   * cannot contain itself.
   */
  addChild(child: Shape): this {
    if (child.includes(this) || child.equals(this)) {
      throw new SceneGraphError(`Group #${this.id} cannot contain itself`, `child #${child.id}`);
    }
    child.attachTo(this);
    this.members.push(child);
    this.invalidateBounds();
    return this;
  }

  /**
   * Rejects the ray on the group bounds first; otherwise the concatenated, unsorted
   * intersections of every child.
   */
  localIntersections(ray: Ray): Intersection[] {
    if (!this.localBounds().intersects(ray)) {
      return [];
    }

    const xs: Intersection[] = [];
    for (const child of this.members) {
      for (const intersection of child.intersections(ray)) {
        xs.push(intersection);
      }
    }
    return xs;
  }

  localNormal(_objectPoint: Tuple, hit: Intersection): Tuple {
    throw new SceneGraphError(
      `Group #${this.id} has no surface of its own`,
      `normal requested for a hit on #${hit.object.id}`
    );
  }

  /**
   * Union of the children's bounds in this group's space. Cached until a child is
   * added or a descendant's transform changes.
   */
  localBounds(): Bounds {
    if (this.cachedBounds === undefined) {
      let bounds = Bounds.empty();
      for (const child of this.members) {
        bounds = bounds.union(child.bounds());
      }
      this.cachedBounds = bounds;
    }
    return this.cachedBounds;
  }

  /**
   * Whether `shape` is a descendant, at any depth. A group does not include itself.
   */
  includes(shape: Shape): boolean {
    return this.members.some((child) => child.equals(shape) || child.includes(shape));
  }

  invalidateBounds(): void {
    this.cachedBounds = undefined;
    super.invalidateBounds();
  }
}
