/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Messages exchanged between the render pool and its workers
 *
 * A worker owns a read-only copy of the scene; it receives row ranges and answers with
 * the packed pixels of those rows. Pixel buffers are transferred, not copied.
 */

import type { Camera } from './camera.js';
import type { World } from './world.js';

export interface BandRequest {
  id: number;
  startRow: number;
  /** Exclusive */
  endRow: number;
  maxReflections: number;
}

export type BandResponse =
  | { id: number; ok: true; startRow: number; endRow: number; pixels: Float64Array }
  | { id: number; ok: false; error: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isBandRequest(value: unknown): value is BandRequest {
  return (
    isObject(value) &&
    typeof value.id === 'number' &&
    typeof value.startRow === 'number' &&
    typeof value.endRow === 'number' &&
    typeof value.maxReflections === 'number'
  );
}

export function isBandResponse(value: unknown): value is BandResponse {
  if (!isObject(value) || typeof value.id !== 'number') {
    return false;
  }
  if (value.ok === true) {
    return (
      typeof value.startRow === 'number' &&
      typeof value.endRow === 'number' &&
      value.pixels instanceof Float64Array
    );
  }
  return value.ok === false && typeof value.error === 'string';
}

/**
 * Worker-side request handler for one scene. Errors become `ok: false` responses so
 * the pool can report which band failed.
 */
export function createBandHandler(camera: Camera, world: World): (request: BandRequest) => BandResponse {
  return (request) => {
    const { id, startRow, endRow, maxReflections } = request;
    try {
      const pixels = camera.renderRows(world, startRow, endRow, maxReflections);
      return { id, ok: true, startRow, endRow, pixels };
    } catch (error) {
      return { id, ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  };
}
