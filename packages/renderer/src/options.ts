/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { RENDER_DEFAULTS } from './constants.js';
import { RenderConfigError } from './errors.js';

export interface RenderOptions {
  /** Remaining reflection/refraction bounces for each camera ray */
  maxReflections: number;
  /** Worker threads used by parallel renders */
  workers: number;
  /** Rows per unit of work */
  bandHeight: number;
}

const MINIMUMS: ReadonlyArray<[keyof RenderOptions, number]> = [
  ['maxReflections', 0],
  ['workers', 1],
  ['bandHeight', 1],
];

/**
 * Merge overrides onto RENDER_DEFAULTS. Undefined overrides keep the default.
 */
export function resolveRenderOptions(overrides: Partial<RenderOptions> = {}): RenderOptions {
  const resolved: RenderOptions = {
    maxReflections: overrides.maxReflections ?? RENDER_DEFAULTS.maxReflections,
    workers: overrides.workers ?? RENDER_DEFAULTS.workers,
    bandHeight: overrides.bandHeight ?? RENDER_DEFAULTS.bandHeight,
  };

  for (const [key, minimum] of MINIMUMS) {
    const value = resolved[key];
    if (!Number.isInteger(value) || value < minimum) {
      throw new RenderConfigError(
        `${key} must be an integer >= ${minimum}, got ${value}`,
        key
      );
    }
  }

  return resolved;
}
