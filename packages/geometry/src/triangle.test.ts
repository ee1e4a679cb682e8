/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { point, vector } from '@umbra/math';
import { Intersection } from './intersection.js';
import { prepareComputations } from './intersection-state.js';
import { Ray } from './ray.js';
import { ShapeArena } from './shape-arena.js';

describe('Triangle', () => {
  const arena = new ShapeArena();
  const tri = arena.triangle(point(0, 1, 0), point(-1, 0, 0), point(1, 0, 0));

  it('precomputes edges and normal', () => {
    expect(tri.e1.equals(vector(-1, -1, 0))).toBe(true);
    expect(tri.e2.equals(vector(1, -1, 0))).toBe(true);
    expect(tri.faceNormal.equals(vector(0, 0, -1))).toBe(true);
  });

  it('uses the face normal everywhere', () => {
    for (const at of [point(0, 0.5, 0), point(-0.5, 0.75, 0), point(0.5, 0.25, 0)]) {
      expect(tri.localNormal(at, new Intersection(1, tri))).toBe(tri.faceNormal);
    }
  });

  it('ignores a parallel ray', () => {
    expect(tri.localIntersections(new Ray(point(0, -1, -2), vector(0, 1, 0)))).toEqual([]);
  });

  it('is missed past each edge', () => {
    expect(tri.localIntersections(new Ray(point(1, 1, -2), vector(0, 0, 1)))).toEqual([]);
    expect(tri.localIntersections(new Ray(point(-1, 1, -2), vector(0, 0, 1)))).toEqual([]);
    expect(tri.localIntersections(new Ray(point(0, -1, -2), vector(0, 0, 1)))).toEqual([]);
  });

  it('is struck inside', () => {
    const xs = tri.localIntersections(new Ray(point(0, 0.5, -2), vector(0, 0, 1)));
    expect(xs.map((x) => x.t)).toEqual([2]);
    expect(xs[0].uv).toBeUndefined();
  });

  it('is bounded by its vertices', () => {
    const box = tri.localBounds();
    expect(box.min.equals(point(-1, 0, 0))).toBe(true);
    expect(box.max.equals(point(1, 1, 0))).toBe(true);
  });
});

describe('SmoothTriangle', () => {
  const arena = new ShapeArena();
  const tri = arena.smoothTriangle(
    point(0, 1, 0),
    point(-1, 0, 0),
    point(1, 0, 0),
    vector(0, 1, 0),
    vector(-1, 0, 0),
    vector(1, 0, 0)
  );

  it('records where the ray struck', () => {
    const [x] = tri.localIntersections(new Ray(point(-0.2, 0.3, -2), vector(0, 0, 1)));
    expect(x.uv?.u).toBeCloseTo(0.45, 10);
    expect(x.uv?.v).toBeCloseTo(0.25, 10);
  });

  it('interpolates the normal', () => {
    const n = tri.normal(point(0, 0, 0), new Intersection(1, tri, { u: 0.45, v: 0.25 }));
    expect(n.equals(vector(-0.5547, 0.83205, 0), 1e-4)).toBe(true);
  });

  it('falls back to the face normal without barycentrics', () => {
    expect(tri.localNormal(point(0, 0, 0), new Intersection(1, tri)).equals(vector(0, 0, -1))).toBe(true);
  });

  it('feeds the interpolated normal into the shading state', () => {
    const i = new Intersection(1, tri, { u: 0.45, v: 0.25 });
    const state = prepareComputations(i, new Ray(point(-0.2, 0.3, -3), vector(0, 0, 1)), [i]);
    expect(state.normalv.equals(vector(-0.5547, 0.83205, 0), 1e-4)).toBe(true);
  });
});
