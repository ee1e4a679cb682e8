/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Matrix } from './matrix.js';
import { MatrixError } from './errors.js';
import { Tuple, point, vector } from './tuple.js';

const HALF_SQRT2 = Math.SQRT2 / 2;

describe('Matrix', () => {
  describe('construction', () => {
    it('reads values row-major', () => {
      const m = Matrix.fromValues([
        1, 2, 3, 4,
        5.5, 6.5, 7.5, 8.5,
        9, 10, 11, 12,
        13.5, 14.5, 15.5, 16.5,
      ]);
      expect(m.order).toBe(4);
      expect(m.get(0, 3)).toBe(4);
      expect(m.get(1, 2)).toBe(7.5);
      expect(m.get(3, 0)).toBe(13.5);
    });

    it('rejects value counts that are not perfect squares', () => {
      expect(() => Matrix.fromValues([1, 2, 3])).toThrow(MatrixError);
      expect(() => Matrix.fromValues([])).toThrow(MatrixError);
    });

    it('rejects ragged rows', () => {
      expect(() => Matrix.fromRows([[1, 2, 3], [4]])).toThrow(MatrixError);
    });

    it('builds identity of any order', () => {
      expect(Matrix.identity(3).equals(Matrix.fromValues([1, 0, 0, 0, 1, 0, 0, 0, 1]))).toBe(true);
    });
  });

  describe('multiplication', () => {
    it('multiplies two matrices', () => {
      const a = Matrix.fromValues([1, 2, 3, 4, 5, 6, 7, 8, 9, 8, 7, 6, 5, 4, 3, 2]);
      const b = Matrix.fromValues([-2, 1, 2, 3, 3, 2, 1, -1, 4, 3, 6, 5, 1, 2, 7, 8]);
      const expected = Matrix.fromValues([
        20, 22, 50, 48,
        44, 54, 114, 108,
        40, 58, 110, 102,
        16, 26, 46, 42,
      ]);
      expect(a.multiply(b).equals(expected)).toBe(true);
    });

    it('multiplies a matrix by a tuple', () => {
      const a = Matrix.fromValues([1, 2, 3, 4, 2, 4, 4, 2, 8, 6, 4, 1, 0, 0, 0, 1]);
      expect(a.multiplyTuple(new Tuple(1, 2, 3, 1)).equals(new Tuple(18, 24, 33, 1))).toBe(true);
    });

    it('only lets order-4 matrices multiply tuples', () => {
      expect(() => Matrix.identity(3).multiplyTuple(point(1, 2, 3))).toThrow(MatrixError);
    });

    it('leaves a matrix unchanged when multiplied by identity', () => {
      const a = Matrix.fromValues([0, 1, 2, 4, 1, 2, 4, 8, 2, 4, 8, 16, 4, 8, 16, 32]);
      expect(a.multiply(Matrix.identity()).equals(a)).toBe(true);
    });
  });

  it('transposes', () => {
    const a = Matrix.fromValues([0, 9, 3, 0, 9, 8, 0, 8, 1, 8, 5, 3, 0, 0, 5, 8]);
    const expected = Matrix.fromValues([0, 9, 1, 0, 9, 8, 8, 0, 3, 0, 5, 5, 0, 8, 3, 8]);
    expect(a.transpose().equals(expected)).toBe(true);
    expect(Matrix.identity().transpose().equals(Matrix.identity())).toBe(true);
  });

  describe('determinants', () => {
    it('uses the closed form for 2x2', () => {
      expect(Matrix.fromValues([1, 5, -3, 2]).determinant()).toBe(17);
    });

    it('removes a row and column for submatrices', () => {
      const a = Matrix.fromValues([1, 5, 0, -3, 2, 7, 0, 6, -3]);
      expect(a.submatrix(0, 2).equals(Matrix.fromValues([-3, 2, 0, 6]))).toBe(true);
    });

    it('computes minors and signed cofactors', () => {
      const a = Matrix.fromValues([3, 5, 0, 2, -1, -7, 6, -1, 5]);
      expect(a.minor(0, 0)).toBe(-12);
      expect(a.cofactor(0, 0)).toBe(-12);
      expect(a.minor(1, 0)).toBe(25);
      expect(a.cofactor(1, 0)).toBe(-25);
    });

    it('expands 3x3 along the first row', () => {
      const a = Matrix.fromValues([1, 2, 6, -5, 8, -4, 2, 6, 4]);
      expect(a.cofactor(0, 0)).toBe(56);
      expect(a.cofactor(0, 1)).toBe(12);
      expect(a.cofactor(0, 2)).toBe(-46);
      expect(a.determinant()).toBe(-196);
    });

    it('expands 4x4 along the first row', () => {
      const a = Matrix.fromValues([-2, -8, 3, 5, -3, 1, 7, 3, 1, 2, -9, 6, -6, 7, 7, -9]);
      expect(a.cofactor(0, 0)).toBe(690);
      expect(a.cofactor(0, 1)).toBe(447);
      expect(a.cofactor(0, 2)).toBe(210);
      expect(a.cofactor(0, 3)).toBe(51);
      expect(a.determinant()).toBe(-4071);
    });
  });

  describe('inverse', () => {
    const a = Matrix.fromValues([-5, 2, 6, -8, 1, -5, 1, 8, 7, 7, -6, -7, 1, -3, 7, 4]);

    it('divides transposed cofactors by the determinant', () => {
      const b = a.inverse();
      expect(a.determinant()).toBe(532);
      expect(b.get(3, 2)).toBeCloseTo(-160 / 532, 10);
      expect(b.get(2, 3)).toBeCloseTo(105 / 532, 10);
      const expected = Matrix.fromValues([
        0.21805, 0.45113, 0.2406, -0.04511,
        -0.80827, -1.45677, -0.44361, 0.52068,
        -0.07895, -0.22368, -0.05263, 0.19737,
        -0.52256, -0.81391, -0.30075, 0.30639,
      ]);
      expect(b.equals(expected, 1e-4)).toBe(true);
    });

    it('fails on a singular matrix', () => {
      const singular = Matrix.fromValues([-4, 2, -2, -3, 9, 6, 2, 6, 0, -5, 1, -5, 0, 0, 0, 0]);
      expect(singular.isInvertible()).toBe(false);
      expect(() => singular.inverse()).toThrow(MatrixError);
    });

    it('round-trips through a double inverse', () => {
      expect(a.inverse().inverse().equals(a)).toBe(true);
    });

    it('multiplies with its inverse to identity', () => {
      const samples = [
        a,
        Matrix.fromValues([8, -5, 9, 2, 7, 5, 6, 1, -6, 0, 9, 6, -3, 0, -9, -4]),
        Matrix.fromValues([9, 3, 0, 9, -5, -2, -6, -3, -4, 9, 6, 4, -7, 6, 6, 2]),
        Matrix.identity().rotate('y', 0.7).translate(1, -2, 3).scale(2, 0.5, 4),
      ];
      for (const m of samples) {
        expect(m.multiply(m.inverse()).equals(Matrix.identity())).toBe(true);
      }
    });

    it('undoes a product', () => {
      const b = Matrix.fromValues([8, 2, 2, 2, 3, -1, 7, 0, 7, 0, 5, 4, 6, -2, 0, 5]);
      const c = a.multiply(b);
      expect(c.multiply(b.inverse()).equals(a)).toBe(true);
    });
  });

  describe('transforms', () => {
    it('translates points but not vectors', () => {
      const t = Matrix.translation(5, -3, 2);
      expect(t.multiplyTuple(point(-3, 4, 5)).equals(point(2, 1, 7))).toBe(true);
      expect(t.inverse().multiplyTuple(point(-3, 4, 5)).equals(point(-8, 7, 3))).toBe(true);
      expect(t.multiplyTuple(vector(-3, 4, 5)).equals(vector(-3, 4, 5))).toBe(true);
    });

    it('scales points and vectors', () => {
      const s = Matrix.scaling(2, 3, 4);
      expect(s.multiplyTuple(point(-4, 6, 8)).equals(point(-8, 18, 32))).toBe(true);
      expect(s.multiplyTuple(vector(-4, 6, 8)).equals(vector(-8, 18, 32))).toBe(true);
      expect(s.inverse().multiplyTuple(vector(-4, 6, 8)).equals(vector(-2, 2, 2))).toBe(true);
    });

    it('rotates around x', () => {
      const p = point(0, 1, 0);
      expect(Matrix.rotation('x', Math.PI / 4).multiplyTuple(p).equals(point(0, HALF_SQRT2, HALF_SQRT2))).toBe(true);
      expect(Matrix.rotation('x', Math.PI / 2).multiplyTuple(p).equals(point(0, 0, 1))).toBe(true);
    });

    it('rotates around y and z', () => {
      expect(Matrix.rotation('y', Math.PI / 4).multiplyTuple(point(0, 0, 1)).equals(point(HALF_SQRT2, 0, HALF_SQRT2))).toBe(true);
      expect(Matrix.rotation('z', Math.PI / 4).multiplyTuple(point(0, 1, 0)).equals(point(-HALF_SQRT2, HALF_SQRT2, 0))).toBe(true);
    });

    it('shears components in proportion to each other', () => {
      expect(Matrix.shearing(1, 0, 0, 0, 0, 0).multiplyTuple(point(2, 3, 4)).equals(point(5, 3, 4))).toBe(true);
      expect(Matrix.shearing(0, 0, 0, 0, 0, 1).multiplyTuple(point(2, 3, 4)).equals(point(2, 3, 7))).toBe(true);
    });

    it('chains builders in reading order', () => {
      const chained = Matrix.identity()
        .rotate('x', Math.PI / 2)
        .scale(5, 5, 5)
        .translate(10, 5, 7);
      expect(chained.multiplyTuple(point(1, 0, 1)).equals(point(15, 0, 7))).toBe(true);

      const explicit = Matrix.translation(10, 5, 7)
        .multiply(Matrix.scaling(5, 5, 5))
        .multiply(Matrix.rotation('x', Math.PI / 2));
      expect(chained.equals(explicit)).toBe(true);
    });
  });

  describe('viewTransform', () => {
    it('is identity for the default orientation', () => {
      const t = Matrix.viewTransform(point(0, 0, 0), point(0, 0, -1), vector(0, 1, 0));
      expect(t.equals(Matrix.identity())).toBe(true);
    });

    it('mirrors when looking down positive z', () => {
      const t = Matrix.viewTransform(point(0, 0, 0), point(0, 0, 1), vector(0, 1, 0));
      expect(t.equals(Matrix.scaling(-1, 1, -1))).toBe(true);
    });

    it('moves the world, not the eye', () => {
      const t = Matrix.viewTransform(point(0, 0, 8), point(0, 0, 0), vector(0, 1, 0));
      expect(t.equals(Matrix.translation(0, 0, -8))).toBe(true);
    });

    it('handles an arbitrary orientation', () => {
      const t = Matrix.viewTransform(point(1, 3, 2), point(4, -2, 8), vector(1, 1, 0));
      const expected = Matrix.fromValues([
        -0.50709, 0.50709, 0.67612, -2.36643,
        0.76772, 0.60609, 0.12122, -2.82843,
        -0.35857, 0.59761, -0.71714, 0,
        0, 0, 0, 1,
      ]);
      expect(t.equals(expected, 1e-4)).toBe(true);
    });
  });
});
