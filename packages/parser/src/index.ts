/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @umbra/parser - Wavefront OBJ importer
 */

export { parseObj, ObjModel, DEFAULT_GROUP } from './obj-parser.js';
export type { ObjFace } from './obj-parser.js';
export { ObjParseError } from './errors.js';
