/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  createBandHandler,
  type BandRequest,
  type BandResponse,
  type Camera,
  type RenderWorker,
  type World,
} from '@umbra/renderer';

/**
 * RenderWorker that renders on the calling thread, one band per event-loop turn.
 * Used for single-worker renders and in tests.
 */
export function createInProcessWorker(scene: { camera: Camera; world: World }): RenderWorker {
  const handle = createBandHandler(scene.camera, scene.world);
  const responseListeners: Array<(response: BandResponse) => void> = [];
  let terminated = false;

  return {
    send(request: BandRequest): void {
      setImmediate(() => {
        if (terminated) return;
        const response = handle(request);
        for (const listener of responseListeners) listener(response);
      });
    },
    onResponse(listener) {
      responseListeners.push(listener);
    },
    // Errors surface as `ok: false` responses; there is no thread to lose
    onFailure() {},
    async terminate() {
      terminated = true;
    },
  };
}
