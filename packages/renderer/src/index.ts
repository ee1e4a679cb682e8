/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @umbra/renderer - world shading, camera and parallel band rendering
 */

export { MAX_REFLECTIONS, RENDER_DEFAULTS, CHANNELS } from './constants.js';
export { RenderConfigError, RenderWorkerError } from './errors.js';
export { resolveRenderOptions } from './options.js';
export type { RenderOptions } from './options.js';
export { Canvas } from './canvas.js';
export type { ImageFactory } from './canvas.js';
export { World } from './world.js';
export { Camera } from './camera.js';
export { createBandHandler, isBandRequest, isBandResponse } from './render-protocol.js';
export type { BandRequest, BandResponse } from './render-protocol.js';
export { RenderPool, splitIntoBands } from './render-pool.js';
export type { Band, RenderWorker, RenderWorkerFactory } from './render-pool.js';
