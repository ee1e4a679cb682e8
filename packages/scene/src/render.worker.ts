/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Render worker entry point
 *
 * Builds the scene from workerData once, then answers BandRequests. Pixel buffers
 * are transferred back, not copied.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { createLogger } from '@umbra/diagnostics';
import { createBandHandler, isBandRequest } from '@umbra/renderer';
import { buildScene } from './scene-builder.js';
import { readWorkerData } from './worker-data.js';

const log = createLogger('RenderWorker');

if (!parentPort) {
  throw new Error('render.worker must run in a worker thread');
}

const port = parentPort;
const { scene, baseDir } = readWorkerData(workerData);
const { camera, world } = buildScene(scene, { baseDir });
const handle = createBandHandler(camera, world);

port.on('message', (message: unknown) => {
  if (!isBandRequest(message)) {
    log.warn('Ignoring malformed band request', { operation: 'message' });
    return;
  }

  const response = handle(message);
  if (response.ok) {
    const { buffer } = response.pixels;
    port.postMessage(response, buffer instanceof ArrayBuffer ? [buffer] : []);
  } else {
    port.postMessage(response);
  }
});
