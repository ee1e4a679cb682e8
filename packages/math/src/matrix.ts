/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Square matrices and affine transform builders
 *
 * Values are stored row-major. Scene transforms are always order 4; smaller orders
 * only appear as submatrices during cofactor expansion.
 *
 * Chaining convention: builder methods apply in reading order.
 * `Matrix.identity().scale(2, 2, 2).translate(1, 0, 0)` scales first, then translates,
 * i.e. it equals `translation(1, 0, 0) × scaling(2, 2, 2)`.
 */

import { EPSILON, approximatelyEqual } from './constants.js';
import { MatrixError } from './errors.js';
import { Tuple } from './tuple.js';

export type Axis = 'x' | 'y' | 'z';

export class Matrix {
  readonly order: number;
  private readonly values: Float64Array;

  private constructor(order: number, values: Float64Array) {
    this.order = order;
    this.values = values;
  }

  /**
   * Build a matrix from a flat row-major value list; the length must be a perfect square
   */
  static fromValues(values: ArrayLike<number>): Matrix {
    const order = Math.round(Math.sqrt(values.length));
    if (values.length === 0 || order * order !== values.length) {
      throw new MatrixError(
        'Number of source values is not a square value',
        `got ${values.length} values`
      );
    }
    return new Matrix(order, Float64Array.from(values));
  }

  static fromRows(rows: ReadonlyArray<ReadonlyArray<number>>): Matrix {
    for (const [index, row] of rows.entries()) {
      if (row.length !== rows.length) {
        throw new MatrixError(
          'Matrix rows must form a square',
          `row ${index} has ${row.length} values, expected ${rows.length}`
        );
      }
    }
    return Matrix.fromValues(rows.flat());
  }

  static identity(order: number = 4): Matrix {
    const values = new Float64Array(order * order);
    for (let i = 0; i < order; i++) {
      values[i * order + i] = 1;
    }
    return new Matrix(order, values);
  }

  static translation(x: number, y: number, z: number): Matrix {
    return Matrix.fromValues([
      1, 0, 0, x,
      0, 1, 0, y,
      0, 0, 1, z,
      0, 0, 0, 1,
    ]);
  }

  static scaling(x: number, y: number, z: number): Matrix {
    return Matrix.fromValues([
      x, 0, 0, 0,
      0, y, 0, 0,
      0, 0, z, 0,
      0, 0, 0, 1,
    ]);
  }

  /**
   * Rotation about an axis, in radians (left-handed, as seen looking down the positive axis)
   */
  static rotation(axis: Axis, radians: number): Matrix {
    const c = Math.cos(radians);
    const s = Math.sin(radians);

    switch (axis) {
      case 'x':
        return Matrix.fromValues([
          1, 0, 0, 0,
          0, c, -s, 0,
          0, s, c, 0,
          0, 0, 0, 1,
        ]);
      case 'y':
        return Matrix.fromValues([
          c, 0, s, 0,
          0, 1, 0, 0,
          -s, 0, c, 0,
          0, 0, 0, 1,
        ]);
      case 'z':
        return Matrix.fromValues([
          c, -s, 0, 0,
          s, c, 0, 0,
          0, 0, 1, 0,
          0, 0, 0, 1,
        ]);
    }
  }

  /**
   * Shearing: each coefficient moves one component in proportion to another
   * (`xy` moves x in proportion to y, and so on)
   */
  static shearing(xy: number, xz: number, yx: number, yz: number, zx: number, zy: number): Matrix {
    return Matrix.fromValues([
      1, xy, xz, 0,
      yx, 1, yz, 0,
      zx, zy, 1, 0,
      0, 0, 0, 1,
    ]);
  }

  /**
   * Orient the world relative to an eye at `from` looking at `to`
   */
  static viewTransform(from: Tuple, to: Tuple, up: Tuple): Matrix {
    const forward = to.subtract(from).normalize();
    const left = forward.cross(up.normalize());
    const trueUp = left.cross(forward);

    const orientation = Matrix.fromValues([
      left.x, left.y, left.z, 0,
      trueUp.x, trueUp.y, trueUp.z, 0,
      -forward.x, -forward.y, -forward.z, 0,
      0, 0, 0, 1,
    ]);

    return orientation.multiply(Matrix.translation(-from.x, -from.y, -from.z));
  }

  // Chainable builders: `transform` is applied after everything already in `this`.

  apply(transform: Matrix): Matrix {
    return transform.multiply(this);
  }

  translate(x: number, y: number, z: number): Matrix {
    return this.apply(Matrix.translation(x, y, z));
  }

  scale(x: number, y: number, z: number): Matrix {
    return this.apply(Matrix.scaling(x, y, z));
  }

  equiscale(factor: number): Matrix {
    return this.apply(Matrix.scaling(factor, factor, factor));
  }

  rotate(axis: Axis, radians: number): Matrix {
    return this.apply(Matrix.rotation(axis, radians));
  }

  shear(xy: number, xz: number, yx: number, yz: number, zx: number, zy: number): Matrix {
    return this.apply(Matrix.shearing(xy, xz, yx, yz, zx, zy));
  }

  get(row: number, col: number): number {
    if (row < 0 || row >= this.order || col < 0 || col >= this.order) {
      throw new RangeError(`Matrix index (${row}, ${col}) out of range for order ${this.order}`);
    }
    return this.values[row * this.order + col];
  }

  multiply(other: Matrix): Matrix {
    if (other.order !== this.order) {
      throw new MatrixError(
        'Cannot multiply matrices of different order',
        `${this.order} x ${other.order}`
      );
    }

    const n = this.order;
    const out = new Float64Array(n * n);
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        let sum = 0;
        for (let k = 0; k < n; k++) {
          sum += this.values[row * n + k] * other.values[k * n + col];
        }
        out[row * n + col] = sum;
      }
    }
    return new Matrix(n, out);
  }

  multiplyTuple(tuple: Tuple): Tuple {
    if (this.order !== 4) {
      throw new MatrixError(
        'Only matrices of order 4 are allowed to be multiplied by a Tuple',
        `order ${this.order}`
      );
    }

    const m = this.values;
    const { x, y, z, w } = tuple;
    return new Tuple(
      m[0] * x + m[1] * y + m[2] * z + m[3] * w,
      m[4] * x + m[5] * y + m[6] * z + m[7] * w,
      m[8] * x + m[9] * y + m[10] * z + m[11] * w,
      m[12] * x + m[13] * y + m[14] * z + m[15] * w
    );
  }

  transpose(): Matrix {
    const n = this.order;
    const out = new Float64Array(n * n);
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        out[col * n + row] = this.values[row * n + col];
      }
    }
    return new Matrix(n, out);
  }

  /**
   * Copy with one row and one column removed
   */
  submatrix(row: number, col: number): Matrix {
    if (this.order < 2) {
      throw new MatrixError('Cannot take a submatrix of an order-1 matrix');
    }

    const n = this.order;
    const out = new Float64Array((n - 1) * (n - 1));
    let index = 0;
    for (let r = 0; r < n; r++) {
      if (r === row) continue;
      for (let c = 0; c < n; c++) {
        if (c === col) continue;
        out[index++] = this.values[r * n + c];
      }
    }
    return new Matrix(n - 1, out);
  }

  minor(row: number, col: number): number {
    return this.submatrix(row, col).determinant();
  }

  cofactor(row: number, col: number): number {
    const minor = this.minor(row, col);
    return (row + col) % 2 === 0 ? minor : -minor;
  }

  determinant(): number {
    const m = this.values;
    if (this.order === 1) {
      return m[0];
    }
    if (this.order === 2) {
      return m[0] * m[3] - m[1] * m[2];
    }

    let det = 0;
    for (let col = 0; col < this.order; col++) {
      det += m[col] * this.cofactor(0, col);
    }
    return det;
  }

  isInvertible(): boolean {
    return this.determinant() !== 0;
  }

  /**
   * Adjugate over determinant. Computed on every call; a singular matrix is fatal.
   */
  inverse(): Matrix {
    const det = this.determinant();
    if (det === 0) {
      throw new MatrixError('The matrix has zero determinant', this.toString());
    }

    const n = this.order;
    const out = new Float64Array(n * n);
    for (let row = 0; row < n; row++) {
      for (let col = 0; col < n; col++) {
        // Transposed store: cofactor(row, col) lands at (col, row)
        out[col * n + row] = this.cofactor(row, col) / det;
      }
    }
    return new Matrix(n, out);
  }

  equals(other: Matrix, epsilon: number = EPSILON): boolean {
    if (other.order !== this.order) return false;
    for (let i = 0; i < this.values.length; i++) {
      if (!approximatelyEqual(this.values[i], other.values[i], epsilon)) {
        return false;
      }
    }
    return true;
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < this.order; row++) {
      rows.push(Array.from(this.values.subarray(row * this.order, (row + 1) * this.order)));
    }
    return rows;
  }

  toString(): string {
    return this.toRows().map((row) => row.join(' ')).join('\n');
  }
}
