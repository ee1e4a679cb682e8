/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Procedural patterns
 *
 * A pattern is evaluated at an object-space point, moved into pattern space by the
 * pattern's own transform. Any color slot may hold another pattern, which is then
 * evaluated at the same pattern-space point (and applies its own transform on top).
 */

import { EPSILON, Matrix, type Tuple } from '@umbra/math';
import { Color } from './color.js';

export type PatternSlot = Color | Pattern;

/**
 * Floor that snaps values sitting within EPSILON of an integer onto that integer,
 * so that surfaces lying exactly on a stripe boundary do not flicker between colors.
 */
export function denoisedFloor(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value - rounded) < EPSILON ? rounded : Math.floor(value);
}

function isEven(value: number): boolean {
  return ((value % 2) + 2) % 2 === 0;
}

export abstract class Pattern {
  transform: Matrix;

  constructor(transform: Matrix = Matrix.identity()) {
    this.transform = transform;
  }

  /**
   * Color at a point in the owning shape's object space
   */
  colorAt(objectPoint: Tuple): Color {
    const patternPoint = this.transform.inverse().multiplyTuple(objectPoint);
    return this.localColorAt(patternPoint);
  }

  protected resolve(slot: PatternSlot, patternPoint: Tuple): Color {
    return slot instanceof Pattern ? slot.colorAt(patternPoint) : slot;
  }

  protected abstract localColorAt(patternPoint: Tuple): Color;
}

export class SolidPattern extends Pattern {
  constructor(
    readonly color: Color,
    transform?: Matrix
  ) {
    super(transform);
  }

  protected localColorAt(): Color {
    return this.color;
  }
}

/** Alternates `a` and `b` on unit bands along x */
export class StripePattern extends Pattern {
  constructor(
    readonly a: PatternSlot,
    readonly b: PatternSlot,
    transform?: Matrix
  ) {
    super(transform);
  }

  protected localColorAt(p: Tuple): Color {
    return this.resolve(isEven(denoisedFloor(p.x)) ? this.a : this.b, p);
  }
}

/** Linear blend from `a` to `b` across each unit of x */
export class GradientPattern extends Pattern {
  constructor(
    readonly a: PatternSlot,
    readonly b: PatternSlot,
    transform?: Matrix
  ) {
    super(transform);
  }

  protected localColorAt(p: Tuple): Color {
    const from = this.resolve(this.a, p);
    const to = this.resolve(this.b, p);
    const fraction = p.x - Math.floor(p.x);
    return from.add(to.subtract(from).scale(fraction));
  }
}

/** Concentric rings around the y axis */
export class RingPattern extends Pattern {
  constructor(
    readonly a: PatternSlot,
    readonly b: PatternSlot,
    transform?: Matrix
  ) {
    super(transform);
  }

  protected localColorAt(p: Tuple): Color {
    const distance = Math.sqrt(p.x * p.x + p.z * p.z);
    return this.resolve(isEven(denoisedFloor(distance)) ? this.a : this.b, p);
  }
}

/** 3D checkerboard of unit cubes */
export class CheckersPattern extends Pattern {
  constructor(
    readonly a: PatternSlot,
    readonly b: PatternSlot,
    transform?: Matrix
  ) {
    super(transform);
  }

  protected localColorAt(p: Tuple): Color {
    const sum = denoisedFloor(p.x) + denoisedFloor(p.y) + denoisedFloor(p.z);
    return this.resolve(isEven(sum) ? this.a : this.b, p);
  }
}

/** Average of two patterns */
export class BlendPattern extends Pattern {
  constructor(
    readonly a: PatternSlot,
    readonly b: PatternSlot,
    transform?: Matrix
  ) {
    super(transform);
  }

  protected localColorAt(p: Tuple): Color {
    return this.resolve(this.a, p).add(this.resolve(this.b, p)).scale(0.5);
  }
}
