/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { point, vector } from '@umbra/math';
import { Intersection } from './intersection.js';
import { Ray } from './ray.js';
import { ShapeArena } from './shape-arena.js';

type Triple = [number, number, number];

describe('Cube', () => {
  const arena = new ShapeArena();
  const c = arena.cube();

  const hits: Array<[string, Triple, Triple, number, number]> = [
    ['+x', [5, 0.5, 0], [-1, 0, 0], 4, 6],
    ['-x', [-5, 0.5, 0], [1, 0, 0], 4, 6],
    ['+y', [0.5, 5, 0], [0, -1, 0], 4, 6],
    ['-y', [0.5, -5, 0], [0, 1, 0], 4, 6],
    ['+z', [0.5, 0, 5], [0, 0, -1], 4, 6],
    ['-z', [0.5, 0, -5], [0, 0, 1], 4, 6],
    ['inside', [0, 0.5, 0], [0, 0, 1], -1, 1],
  ];

  for (const [face, origin, direction, t1, t2] of hits) {
    it(`is hit from ${face}`, () => {
      const xs = c.localIntersections(new Ray(point(...origin), vector(...direction)));
      expect(xs).toHaveLength(2);
      expect(xs[0].t).toBeCloseTo(t1, 10);
      expect(xs[1].t).toBeCloseTo(t2, 10);
    });
  }

  const misses: Array<[Triple, Triple]> = [
    [[-2, 0, 0], [0.2673, 0.5345, 0.8018]],
    [[0, -2, 0], [0.8018, 0.2673, 0.5345]],
    [[0, 0, -2], [0.5345, 0.8018, 0.2673]],
    [[2, 0, 2], [0, 0, -1]],
    [[0, 2, 2], [0, -1, 0]],
    [[2, 2, 0], [-1, 0, 0]],
  ];

  for (const [origin, direction] of misses) {
    it(`is missed by a ray from (${origin.join(', ')})`, () => {
      expect(c.localIntersections(new Ray(point(...origin), vector(...direction)))).toEqual([]);
    });
  }

  it('is grazed by a ray running along a face', () => {
    const xs = c.localIntersections(new Ray(point(-1, 0, -5), vector(0, 0, 1)));
    expect(xs.map((x) => x.t)).toEqual([4, 6]);
  });

  const normals: Array<[Triple, Triple]> = [
    [[1, 0.5, -0.8], [1, 0, 0]],
    [[-1, -0.2, 0.9], [-1, 0, 0]],
    [[-0.4, 1, -0.1], [0, 1, 0]],
    [[0.3, -1, -0.7], [0, -1, 0]],
    [[-0.6, 0.3, 1], [0, 0, 1]],
    [[0.4, 0.4, -1], [0, 0, -1]],
    [[1, 1, 1], [1, 0, 0]],
    [[-1, -1, -1], [-1, 0, 0]],
  ];

  for (const [at, expected] of normals) {
    it(`has normal (${expected.join(', ')}) at (${at.join(', ')})`, () => {
      const n = c.normal(point(...at), new Intersection(1, c));
      expect(n.equals(vector(...expected))).toBe(true);
    });
  }
});
