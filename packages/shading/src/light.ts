/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Tuple } from '@umbra/math';
import type { Color } from './color.js';

/**
 * Light source with no size, emitting `intensity` from `position`
 */
export class PointLight {
  constructor(
    readonly position: Tuple,
    readonly intensity: Color
  ) {}
}
