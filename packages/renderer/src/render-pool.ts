/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * RenderPool - fixed set of workers rendering row bands in parallel
 *
 * Each worker takes the next unrendered band as soon as it is idle. Bands come back
 * as packed pixels and are written into the canvas on this thread only, so the canvas
 * has a single writer.
 */

import { createLogger } from '@umbra/diagnostics';
import { Canvas } from './canvas.js';
import { RenderWorkerError } from './errors.js';
import type { RenderOptions } from './options.js';
import type { BandRequest, BandResponse } from './render-protocol.js';

/**
 * What the pool needs from a worker. Implemented over `worker_threads` for real
 * renders and in-process for tests.
 */
export interface RenderWorker {
  send(request: BandRequest): void;
  onResponse(listener: (response: BandResponse) => void): void;
  onFailure(listener: (error: Error) => void): void;
  terminate(): Promise<void>;
}

export type RenderWorkerFactory = (index: number) => RenderWorker;

export interface Band {
  startRow: number;
  endRow: number;
}

/**
 * Split [0, height) into consecutive bands of at most `bandHeight` rows
 */
export function splitIntoBands(height: number, bandHeight: number): Band[] {
  const bands: Band[] = [];
  for (let startRow = 0; startRow < height; startRow += bandHeight) {
    bands.push({ startRow, endRow: Math.min(startRow + bandHeight, height) });
  }
  return bands;
}

interface PendingBand {
  band: Band;
  resolve: (pixels: Float64Array) => void;
  reject: (error: Error) => void;
}

/** One worker with at most one band in flight */
class WorkerSlot {
  private pending: Map<number, PendingBand> = new Map();

  constructor(
    readonly index: number,
    readonly worker: RenderWorker
  ) {
    worker.onResponse((response) => this.settle(response));
    worker.onFailure((error) => this.failAll(error));
  }

  request(id: number, band: Band, maxReflections: number): Promise<Float64Array> {
    return new Promise((resolve, reject) => {
      this.pending.set(id, { band, resolve, reject });
      this.worker.send({ id, startRow: band.startRow, endRow: band.endRow, maxReflections });
    });
  }

  private settle(response: BandResponse): void {
    const entry = this.pending.get(response.id);
    if (!entry) return;
    this.pending.delete(response.id);

    const { band } = entry;
    if (!response.ok) {
      entry.reject(new RenderWorkerError(response.error, `worker ${this.index}, rows ${band.startRow}..${band.endRow}`));
      return;
    }
    if (response.startRow !== band.startRow || response.endRow !== band.endRow) {
      entry.reject(
        new RenderWorkerError(
          `Worker answered rows ${response.startRow}..${response.endRow} for request ${response.id}`,
          `expected rows ${band.startRow}..${band.endRow}`
        )
      );
      return;
    }
    entry.resolve(response.pixels);
  }

  private failAll(error: Error): void {
    for (const entry of this.pending.values()) {
      entry.reject(new RenderWorkerError(error.message, `worker ${this.index}, rows ${entry.band.startRow}..${entry.band.endRow}`));
    }
    this.pending.clear();
  }
}

export class RenderPool {
  private readonly log = createLogger('RenderPool');
  private nextRequestId = 1;

  constructor(
    private readonly createWorker: RenderWorkerFactory,
    private readonly options: RenderOptions
  ) {}

  /**
   * Render a `width`×`height` image. Workers are started for this call and terminated
   * before it settles, whether it succeeds or not.
   */
  async render(width: number, height: number): Promise<Canvas> {
    const canvas = new Canvas(width, height);
    const bands = splitIntoBands(height, this.options.bandHeight);
    const workerCount = Math.min(this.options.workers, bands.length);
    const started = Date.now();

    this.log.info(`Rendering ${width}x${height} as ${bands.length} bands on ${workerCount} workers`, {
      operation: 'render',
    });

    const slots: WorkerSlot[] = [];
    for (let index = 0; index < workerCount; index++) {
      slots.push(new WorkerSlot(index, this.createWorker(index)));
    }

    let nextBand = 0;
    let failed = false;

    const drain = async (slot: WorkerSlot): Promise<void> => {
      while (!failed && nextBand < bands.length) {
        const band = bands[nextBand++];
        try {
          const pixels = await slot.request(this.nextRequestId++, band, this.options.maxReflections);
          canvas.writeBand(band.startRow, pixels);
        } catch (error) {
          failed = true;
          throw error;
        }
        this.log.debug(`Band ${band.startRow}..${band.endRow} done`, { worker: slot.index }, { operation: 'render' });
      }
    };

    try {
      await Promise.all(slots.map(drain));
    } finally {
      await Promise.all(slots.map((slot) => slot.worker.terminate()));
    }

    this.log.info(`Rendered ${width}x${height} in ${Date.now() - started}ms`, { operation: 'render' });
    return canvas;
  }
}
