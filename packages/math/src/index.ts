/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @umbra/math - tuples, matrices and transforms
 */

export { EPSILON, SURFACE_OFFSET, approximatelyEqual } from './constants.js';
export { MatrixError } from './errors.js';
export { Tuple, point, vector, POINT_W, VECTOR_W } from './tuple.js';
export { Matrix } from './matrix.js';
export type { Axis } from './matrix.js';
