/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Matrix, Tuple } from '@umbra/math';

export class Ray {
  constructor(
    readonly origin: Tuple,
    readonly direction: Tuple
  ) {}

  /**
   * Point at distance `t` along the ray
   */
  position(t: number): Tuple {
    return this.origin.add(this.direction.scale(t));
  }

  /**
   * Same ray expressed in the space `matrix` maps into
   */
  transform(matrix: Matrix): Ray {
    return new Ray(matrix.multiplyTuple(this.origin), matrix.multiplyTuple(this.direction));
  }
}
