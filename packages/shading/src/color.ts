/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Linear RGB color. Channels are unbounded until export.
 */

import { EPSILON, approximatelyEqual } from '@umbra/math';

export class Color {
  constructor(
    readonly red: number,
    readonly green: number,
    readonly blue: number
  ) {}

  add(other: Color): Color {
    return new Color(this.red + other.red, this.green + other.green, this.blue + other.blue);
  }

  subtract(other: Color): Color {
    return new Color(this.red - other.red, this.green - other.green, this.blue - other.blue);
  }

  scale(factor: number): Color {
    return new Color(this.red * factor, this.green * factor, this.blue * factor);
  }

  /**
   * Hadamard (component-wise) product
   */
  multiply(other: Color): Color {
    return new Color(this.red * other.red, this.green * other.green, this.blue * other.blue);
  }

  equals(other: Color, epsilon: number = EPSILON): boolean {
    return (
      approximatelyEqual(this.red, other.red, epsilon) &&
      approximatelyEqual(this.green, other.green, epsilon) &&
      approximatelyEqual(this.blue, other.blue, epsilon)
    );
  }

  toArray(): [number, number, number] {
    return [this.red, this.green, this.blue];
  }

  toString(): string {
    return `color(${this.red}, ${this.green}, ${this.blue})`;
  }
}

export const BLACK = new Color(0, 0, 0);
export const WHITE = new Color(1, 1, 1);
