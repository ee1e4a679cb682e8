/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Pinhole camera
 *
 * The canvas sits one unit in front of the eye (z = -1 in camera space). The field of
 * view spans the longer image side, so pixels stay square whatever the aspect ratio.
 */

import { Matrix, point } from '@umbra/math';
import { Ray } from '@umbra/geometry';
import { Canvas, type ImageFactory } from './canvas.js';
import { CHANNELS, MAX_REFLECTIONS } from './constants.js';
import { RenderConfigError } from './errors.js';
import type { World } from './world.js';

export class Camera {
  readonly pixelSize: number;
  readonly halfWidth: number;
  readonly halfHeight: number;
  private currentTransform: Matrix;
  private inverseTransform: Matrix;

  constructor(
    readonly hsize: number,
    readonly vsize: number,
    readonly fieldOfView: number,
    transform: Matrix = Matrix.identity()
  ) {
    if (!Number.isInteger(hsize) || !Number.isInteger(vsize) || hsize < 1 || vsize < 1) {
      throw new RenderConfigError(`Camera size must be positive integers, got ${hsize}x${vsize}`, 'size');
    }
    if (!(fieldOfView > 0 && fieldOfView < Math.PI)) {
      throw new RenderConfigError(`Field of view must be in (0, π), got ${fieldOfView}`, 'fieldOfView');
    }

    const halfView = Math.tan(fieldOfView / 2);
    const aspect = hsize / vsize;
    if (aspect >= 1) {
      this.halfWidth = halfView;
      this.halfHeight = halfView / aspect;
    } else {
      this.halfWidth = halfView * aspect;
      this.halfHeight = halfView;
    }
    this.pixelSize = (this.halfWidth * 2) / hsize;

    this.currentTransform = transform;
    this.inverseTransform = transform.inverse();
  }

  /** World → camera (view) transform */
  get transform(): Matrix {
    return this.currentTransform;
  }

  set transform(transform: Matrix) {
    this.inverseTransform = transform.inverse();
    this.currentTransform = transform;
  }

  /**
   * Ray from the eye through the centre of pixel (px, py)
   */
  rayForPixel(px: number, py: number): Ray {
    const xOffset = (px + 0.5) * this.pixelSize;
    const yOffset = (py + 0.5) * this.pixelSize;

    // The camera looks toward -z, so +x is to the left
    const worldX = this.halfWidth - xOffset;
    const worldY = this.halfHeight - yOffset;

    const pixel = this.inverseTransform.multiplyTuple(point(worldX, worldY, -1));
    const origin = this.inverseTransform.multiplyTuple(point(0, 0, 0));
    return new Ray(origin, pixel.subtract(origin).normalize());
  }

  /**
   * Render rows [startRow, endRow) into packed RGB values, row-major
   */
  renderRows(world: World, startRow: number, endRow: number, maxReflections: number = MAX_REFLECTIONS): Float64Array {
    if (!Number.isInteger(startRow) || !Number.isInteger(endRow) || startRow < 0 || endRow > this.vsize || startRow >= endRow) {
      throw new RangeError(`Rows ${startRow}..${endRow} outside image height ${this.vsize}`);
    }

    const pixels = new Float64Array((endRow - startRow) * this.hsize * CHANNELS);
    let offset = 0;
    for (let y = startRow; y < endRow; y++) {
      for (let x = 0; x < this.hsize; x++) {
        const color = world.colorAt(this.rayForPixel(x, y), maxReflections);
        pixels[offset++] = color.red;
        pixels[offset++] = color.green;
        pixels[offset++] = color.blue;
      }
    }
    return pixels;
  }

  /**
   * Single-threaded render of the whole image
   */
  render(world: World, maxReflections: number = MAX_REFLECTIONS): Canvas {
    const canvas = new Canvas(this.hsize, this.vsize);
    canvas.writeBand(0, this.renderRows(world, 0, this.vsize, maxReflections));
    return canvas;
  }

  renderImage<T>(world: World, factory: ImageFactory<T>, maxReflections: number = MAX_REFLECTIONS): T {
    return this.render(world, maxReflections).toImage(factory);
  }
}
