/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { Matrix, point, vector } from '@umbra/math';
import { Intersection } from './intersection.js';
import { Ray } from './ray.js';
import { ShapeArena } from './shape-arena.js';

const ts = (xs: Intersection[]): number[] => xs.map((x) => x.t);

describe('Sphere', () => {
  const arena = new ShapeArena();

  it('intersects at two points', () => {
    const s = arena.sphere();
    const xs = s.intersections(new Ray(point(0, 0, -5), vector(0, 0, 1)));
    expect(ts(xs)).toEqual([4, 6]);
    expect(xs[0].object).toBe(s);
    expect(xs[1].object).toBe(s);
  });

  it('reports a tangent hit twice', () => {
    expect(ts(arena.sphere().intersections(new Ray(point(0, 1, -5), vector(0, 0, 1))))).toEqual([5, 5]);
  });

  it('misses', () => {
    expect(arena.sphere().intersections(new Ray(point(0, 2, -5), vector(0, 0, 1)))).toEqual([]);
  });

  it('keeps the hit behind a ray that starts inside', () => {
    expect(ts(arena.sphere().intersections(new Ray(point(0, 0, 0), vector(0, 0, 1))))).toEqual([-1, 1]);
  });

  it('keeps hits when the sphere is behind the ray', () => {
    expect(ts(arena.sphere().intersections(new Ray(point(0, 0, 5), vector(0, 0, 1))))).toEqual([-6, -4]);
  });

  it('intersects a scaled sphere', () => {
    const s = arena.sphere({ transform: Matrix.scaling(2, 2, 2) });
    expect(ts(s.intersections(new Ray(point(0, 0, -5), vector(0, 0, 1))))).toEqual([3, 7]);
  });

  it('misses a translated sphere', () => {
    const s = arena.sphere({ transform: Matrix.translation(5, 0, 0) });
    expect(s.intersections(new Ray(point(0, 0, -5), vector(0, 0, 1)))).toEqual([]);
  });

  it('computes normals', () => {
    const s = arena.sphere();
    const at = (x: number, y: number, z: number) => s.normal(point(x, y, z), new Intersection(1, s));
    expect(at(1, 0, 0).equals(vector(1, 0, 0))).toBe(true);
    expect(at(0, 1, 0).equals(vector(0, 1, 0))).toBe(true);
    expect(at(0, 0, 1).equals(vector(0, 0, 1))).toBe(true);

    const third = Math.sqrt(3) / 3;
    const n = at(third, third, third);
    expect(n.equals(vector(third, third, third))).toBe(true);
    expect(n.equals(n.normalize())).toBe(true);
  });

  it('computes the normal on a scaled sphere', () => {
    const s = arena.sphere({ transform: Matrix.scaling(1, 0.5, 1).multiply(Matrix.rotation('z', Math.PI / 5)) });
    const n = s.normal(point(0, Math.SQRT2 / 2, -Math.SQRT2 / 2), new Intersection(1, s));
    expect(n.equals(vector(0, 0.97014, -0.24254))).toBe(true);
  });

  it('is bounded by the unit cube', () => {
    const box = arena.sphere().localBounds();
    expect(box.min.equals(point(-1, -1, -1))).toBe(true);
    expect(box.max.equals(point(1, 1, 1))).toBe(true);
  });
});
