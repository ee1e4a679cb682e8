/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @umbra/scene - JSON scene descriptions and parallel scene rendering
 */

export { SceneError } from './errors.js';
export { parseSceneDescription } from './scene-parser.js';
export {
  buildScene,
  buildCamera,
  buildMaterial,
  buildPattern,
  buildTransform,
  degreesToRadians,
} from './scene-builder.js';
export type { BuildOptions, BuiltScene } from './scene-builder.js';
export { createInProcessWorker } from './in-process-worker.js';
export { spawnRenderWorker, workerExecArgv } from './node-worker.js';
export { readWorkerData } from './worker-data.js';
export type { RenderWorkerData } from './worker-data.js';
export { renderScene } from './render-scene.js';
export type { RenderSceneOptions, SpawnRenderWorker } from './render-scene.js';
export type {
  CameraDescription,
  CylinderLikeDescription,
  GroupDescription,
  LightDescription,
  MaterialDescription,
  ObjectDescription,
  ObjectType,
  ObjFileDescription,
  PatternDescription,
  PatternSlot,
  PatternType,
  SceneDescription,
  SimpleShapeDescription,
  SmoothTriangleDescription,
  TransformStep,
  TriangleDescription,
  Vec3,
} from './types.js';
