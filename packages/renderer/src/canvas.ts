/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Rendered pixel buffer
 *
 * Colors are stored as packed RGB doubles so that a band rendered elsewhere (a worker
 * thread) can be copied in with a single `set`.
 */

import { BLACK, Color } from '@umbra/shading';
import { CHANNELS } from './constants.js';

/**
 * Conversion contract for image sinks: build an image representation from pixel rows
 */
export interface ImageFactory<T> {
  fromPixels(rows: readonly (readonly Color[])[], width: number, height: number): T;
}

export class Canvas {
  private readonly data: Float64Array;

  constructor(
    readonly width: number,
    readonly height: number,
    fill: Color = BLACK
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Canvas size must be positive integers, got ${width}x${height}`);
    }
    this.data = new Float64Array(width * height * CHANNELS);
    if (fill !== BLACK) {
      for (let i = 0; i < width * height; i++) {
        this.data.set(fill.toArray(), i * CHANNELS);
      }
    }
  }

  writePixel(x: number, y: number, color: Color): void {
    this.data.set(color.toArray(), this.offset(x, y));
  }

  pixelAt(x: number, y: number): Color {
    const offset = this.offset(x, y);
    return new Color(this.data[offset], this.data[offset + 1], this.data[offset + 2]);
  }

  /**
   * Copy a band of whole rows starting at `startRow`, packed as in `Camera.renderRows`
   */
  writeBand(startRow: number, pixels: Float64Array): void {
    const rowLength = this.width * CHANNELS;
    if (pixels.length % rowLength !== 0) {
      throw new RangeError(`Band of ${pixels.length} values is not a whole number of ${this.width}-pixel rows`);
    }
    const rows = pixels.length / rowLength;
    if (!Number.isInteger(startRow) || startRow < 0 || startRow + rows > this.height) {
      throw new RangeError(`Band rows ${startRow}..${startRow + rows} outside canvas height ${this.height}`);
    }
    this.data.set(pixels, startRow * rowLength);
  }

  /**
   * Pixel grid, row-major from the top row
   */
  rows(): Color[][] {
    const rows: Color[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: Color[] = [];
      for (let x = 0; x < this.width; x++) {
        row.push(this.pixelAt(x, y));
      }
      rows.push(row);
    }
    return rows;
  }

  toImage<T>(factory: ImageFactory<T>): T {
    return factory.fromPixels(this.rows(), this.width, this.height);
  }

  private offset(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} canvas`);
    }
    return (y * this.width + x) * CHANNELS;
  }
}
