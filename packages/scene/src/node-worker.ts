/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * RenderWorker over a `worker_threads` Worker running render.worker
 */

import { Worker } from 'node:worker_threads';
import { createLogger } from '@umbra/diagnostics';
import { isBandResponse, RenderWorkerError, type RenderWorker } from '@umbra/renderer';
import type { RenderWorkerData } from './worker-data.js';

const log = createLogger('RenderWorker');

const FROM_SOURCES = import.meta.url.endsWith('.ts');

const WORKER_URL = new URL(FROM_SOURCES ? './render.worker.ts' : './render.worker.js', import.meta.url);

/**
 * Node options for a render worker. Running from .ts sources, the worker registers
 * the tsx loader itself: the parent's loader (tsx, Vitest) does not carry over to
 * worker threads.
 */
export function workerExecArgv(parentExecArgv: readonly string[], fromSources: boolean = FROM_SOURCES): string[] {
  if (!fromSources || parentExecArgv.some((arg, i) => arg === 'tsx' && parentExecArgv[i - 1] === '--import')) {
    return [...parentExecArgv];
  }
  return [...parentExecArgv, '--import', 'tsx'];
}

export function spawnRenderWorker(data: RenderWorkerData, index: number): RenderWorker {
  const worker = new Worker(WORKER_URL, { workerData: data, execArgv: workerExecArgv(process.execArgv) });
  let terminating = false;
  log.debug(`Started worker ${index}`, { threadId: worker.threadId }, { operation: 'spawn' });

  return {
    send(request) {
      worker.postMessage(request);
    },
    onResponse(listener) {
      worker.on('message', (message: unknown) => {
        if (isBandResponse(message)) {
          listener(message);
        } else {
          log.warn(`Ignoring unexpected message from worker ${index}`, { operation: 'onResponse' });
        }
      });
    },
    onFailure(listener) {
      worker.on('error', (error: Error) => {
        listener(new RenderWorkerError(`Worker ${index} failed: ${error.message}`, error.stack));
      });
      worker.on('exit', (code: number) => {
        if (!terminating && code !== 0) {
          listener(new RenderWorkerError(`Worker ${index} exited with code ${code}`));
        }
      });
    },
    async terminate() {
      terminating = true;
      await worker.terminate();
    },
  };
}
