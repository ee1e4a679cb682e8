/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Renderer constants
 */

import { availableParallelism } from 'node:os';

/** Reflection/refraction bounces allowed per camera ray */
export const MAX_REFLECTIONS = 5;

export const RENDER_DEFAULTS = {
  maxReflections: MAX_REFLECTIONS,
  /** One worker per core the process may use */
  workers: availableParallelism(),
  /** Rows handed to a worker at a time */
  bandHeight: 8,
} as const;

/** Channels stored per pixel in band buffers (red, green, blue) */
export const CHANNELS = 3;
