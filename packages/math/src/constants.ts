/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Numeric tolerances shared by every package.
 */

/** Tolerance for float equality and for "parallel" / "degenerate" geometric tests */
export const EPSILON = 1e-5;

/** Distance a hit point is nudged along its normal for shadow and refraction rays */
export const SURFACE_OFFSET = 1e-4;

export function approximatelyEqual(a: number, b: number, epsilon: number = EPSILON): boolean {
  // Handles matching infinities, which the subtraction below turns into NaN
  if (a === b) return true;
  return Math.abs(a - b) < epsilon;
}
