/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Canvas, RenderPool, resolveRenderOptions, type RenderOptions, type RenderWorker } from '@umbra/renderer';
import { createInProcessWorker } from './in-process-worker.js';
import { spawnRenderWorker } from './node-worker.js';
import { buildScene } from './scene-builder.js';
import type { SceneDescription } from './types.js';
import type { RenderWorkerData } from './worker-data.js';

export type SpawnRenderWorker = (data: RenderWorkerData, index: number) => RenderWorker;

export interface RenderSceneOptions extends Partial<RenderOptions> {
  /** Directory that OBJ paths are relative to (default: current directory) */
  baseDir?: string;
  /** Replaces the worker-thread factory */
  spawn?: SpawnRenderWorker;
}

/**
 * Render a scene description across worker threads.
 *
 * The scene is built once on the calling thread first, so description errors are
 * reported before any worker starts. With `workers: 1` no thread is started.
 */
export async function renderScene(description: SceneDescription, options: RenderSceneOptions = {}): Promise<Canvas> {
  const { baseDir = process.cwd(), spawn, ...overrides } = options;
  const renderOptions = resolveRenderOptions(overrides);
  const built = buildScene(description, { baseDir });
  const data: RenderWorkerData = { scene: description, baseDir };

  const createWorker = (index: number): RenderWorker => {
    if (spawn) return spawn(data, index);
    return renderOptions.workers === 1 ? createInProcessWorker(built) : spawnRenderWorker(data, index);
  };

  const pool = new RenderPool(createWorker, renderOptions);
  return pool.render(built.camera.hsize, built.camera.vsize);
}
