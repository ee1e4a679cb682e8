/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Plain (ASCII) PPM exporter
 *
 * Channels are clamped to [0, 1] and scaled to 0..maxColorValue. Each image row starts
 * on a new line; long rows wrap so that no line exceeds the line limit.
 */

import type { ImageFactory } from '@umbra/renderer';
import type { Color } from '@umbra/shading';

export interface PpmExportOptions {
  /** Longest line in the pixel data (default 70, the limit of the format) */
  maxLineLength?: number;
  /** Largest channel value (default 255) */
  maxColorValue?: number;
}

export class PpmExporter implements ImageFactory<string> {
  private readonly maxLineLength: number;
  private readonly maxColorValue: number;

  constructor(options: PpmExportOptions = {}) {
    this.maxLineLength = options.maxLineLength ?? 70;
    this.maxColorValue = options.maxColorValue ?? 255;
  }

  fromPixels(rows: readonly (readonly Color[])[], width: number, height: number): string {
    if (rows.length !== height || rows.some((row) => row.length !== width)) {
      throw new RangeError(`Pixel rows do not form a ${width}x${height} image`);
    }

    const lines = ['P3', `${width} ${height}`, `${this.maxColorValue}`];
    for (const row of rows) {
      this.appendRow(lines, row);
    }
    return `${lines.join('\n')}\n`;
  }

  private appendRow(lines: string[], row: readonly Color[]): void {
    let line = '';
    for (const color of row) {
      for (const channel of color.toArray()) {
        const value = String(this.scale(channel));
        if (line === '') {
          line = value;
        } else if (line.length + 1 + value.length > this.maxLineLength) {
          lines.push(line);
          line = value;
        } else {
          line += ` ${value}`;
        }
      }
    }
    lines.push(line);
  }

  private scale(channel: number): number {
    const clamped = Math.min(Math.max(channel, 0), 1);
    return Math.round(clamped * this.maxColorValue);
  }
}
