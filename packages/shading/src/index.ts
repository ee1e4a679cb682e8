/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @umbra/shading - colors, lights, patterns and materials
 */

export { Color, BLACK, WHITE } from './color.js';
export { PointLight } from './light.js';
export {
  Pattern,
  SolidPattern,
  StripePattern,
  GradientPattern,
  RingPattern,
  CheckersPattern,
  BlendPattern,
  denoisedFloor,
} from './pattern.js';
export type { PatternSlot } from './pattern.js';
export { Material, MATERIAL_DEFAULTS, REFRACTIVE_INDEX } from './material.js';
export type { MaterialOptions } from './material.js';
