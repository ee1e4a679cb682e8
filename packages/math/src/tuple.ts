/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Homogeneous 4-component tuples: points (w = 1) and vectors (w = 0)
 */

import { EPSILON, approximatelyEqual } from './constants.js';

export const POINT_W = 1;
export const VECTOR_W = 0;

export class Tuple {
  constructor(
    readonly x: number,
    readonly y: number,
    readonly z: number,
    readonly w: number
  ) {}

  static point(x: number, y: number, z: number): Tuple {
    return new Tuple(x, y, z, POINT_W);
  }

  static vector(x: number, y: number, z: number): Tuple {
    return new Tuple(x, y, z, VECTOR_W);
  }

  isPoint(): boolean {
    return this.w === POINT_W;
  }

  isVector(): boolean {
    return this.w === VECTOR_W;
  }

  add(other: Tuple): Tuple {
    return new Tuple(this.x + other.x, this.y + other.y, this.z + other.z, this.w + other.w);
  }

  subtract(other: Tuple): Tuple {
    return new Tuple(this.x - other.x, this.y - other.y, this.z - other.z, this.w - other.w);
  }

  negate(): Tuple {
    return new Tuple(-this.x, -this.y, -this.z, -this.w);
  }

  scale(factor: number): Tuple {
    return new Tuple(this.x * factor, this.y * factor, this.z * factor, this.w * factor);
  }

  divide(divisor: number): Tuple {
    return new Tuple(this.x / divisor, this.y / divisor, this.z / divisor, this.w / divisor);
  }

  /**
   * Euclidean norm over all four components
   */
  magnitude(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z + this.w * this.w);
  }

  /**
   * Unit-length copy. A zero tuple has no direction: the result is NaN-filled,
   * so callers check the magnitude first where that can happen.
   */
  normalize(): Tuple {
    return this.divide(this.magnitude());
  }

  dot(other: Tuple): number {
    return this.x * other.x + this.y * other.y + this.z * other.z + this.w * other.w;
  }

  /**
   * 3-component cross product; w is ignored and the result is a vector
   */
  cross(other: Tuple): Tuple {
    return Tuple.vector(
      this.y * other.z - this.z * other.y,
      this.z * other.x - this.x * other.z,
      this.x * other.y - this.y * other.x
    );
  }

  /**
   * Reflect this vector about a normal: v - n * 2 * dot(v, n)
   */
  reflect(normal: Tuple): Tuple {
    return this.subtract(normal.scale(2 * this.dot(normal)));
  }

  /** Copy with a different w (used to drop the translation part of transformed normals) */
  withW(w: number): Tuple {
    return new Tuple(this.x, this.y, this.z, w);
  }

  component(index: number): number {
    switch (index) {
      case 0: return this.x;
      case 1: return this.y;
      case 2: return this.z;
      case 3: return this.w;
      default:
        throw new RangeError(`Tuple component index out of range: ${index}`);
    }
  }

  equals(other: Tuple, epsilon: number = EPSILON): boolean {
    return (
      approximatelyEqual(this.x, other.x, epsilon) &&
      approximatelyEqual(this.y, other.y, epsilon) &&
      approximatelyEqual(this.z, other.z, epsilon) &&
      approximatelyEqual(this.w, other.w, epsilon)
    );
  }

  toArray(): [number, number, number, number] {
    return [this.x, this.y, this.z, this.w];
  }

  toString(): string {
    const kind = this.isPoint() ? 'point' : this.isVector() ? 'vector' : 'tuple';
    return `${kind}(${this.x}, ${this.y}, ${this.z}${kind === 'tuple' ? `, ${this.w}` : ''})`;
  }
}

export function point(x: number, y: number, z: number): Tuple {
  return Tuple.point(x, y, z);
}

export function vector(x: number, y: number, z: number): Tuple {
  return Tuple.vector(x, y, z);
}
