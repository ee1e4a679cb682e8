/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { SceneError } from './errors.js';
import { parseSceneDescription } from './scene-parser.js';
import type { SceneDescription } from './types.js';

/**
 * What a render worker receives at startup. Each worker rebuilds the scene from it.
 */
export interface RenderWorkerData {
  scene: SceneDescription;
  baseDir: string;
}

export function readWorkerData(value: unknown): RenderWorkerData {
  if (typeof value !== 'object' || value === null || !('scene' in value) || !('baseDir' in value)) {
    throw new SceneError('worker started without a scene');
  }
  if (typeof value.baseDir !== 'string') {
    throw new SceneError('expected a string', 'baseDir');
  }
  return { scene: parseSceneDescription(value.scene), baseDir: value.baseDir };
}
