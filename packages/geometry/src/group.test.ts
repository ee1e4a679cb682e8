/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi } from 'vitest';
import { Matrix, point, vector } from '@umbra/math';
import { SceneGraphError } from './errors.js';
import { Intersection, sortIntersections } from './intersection.js';
import { Ray } from './ray.js';
import { ShapeArena } from './shape-arena.js';

describe('Group', () => {
  it('starts empty', () => {
    const g = new ShapeArena().group();
    expect(g.isEmpty()).toBe(true);
    expect(g.children).toEqual([]);
    expect(g.transform.equals(Matrix.identity())).toBe(true);
  });

  it('becomes the parent of added children', () => {
    const arena = new ShapeArena();
    const g = arena.group();
    const s = arena.sphere();
    g.addChild(s);
    expect(g.isEmpty()).toBe(false);
    expect(g.children).toEqual([s]);
    expect(s.parent).toBe(g);
  });

  it('is never hit when empty', () => {
    const g = new ShapeArena().group();
    expect(g.localIntersections(new Ray(point(0, 0, 0), vector(0, 0, 1)))).toEqual([]);
  });

  it('collects the hits of every child', () => {
    const arena = new ShapeArena();
    const s1 = arena.sphere();
    const s2 = arena.sphere({ transform: Matrix.translation(0, 0, -3) });
    const s3 = arena.sphere({ transform: Matrix.translation(5, 0, 0) });
    const g = arena.group([s1, s2, s3]);

    const xs = g.localIntersections(new Ray(point(0, 0, -5), vector(0, 0, 1)));
    expect(xs).toHaveLength(4);

    const sorted = sortIntersections(xs);
    expect(sorted.map((x) => x.object)).toEqual([s2, s2, s1, s1]);
    expect(sorted.map((x) => x.t)).toEqual([1, 3, 4, 6]);
  });

  it('applies its own transform and the child one', () => {
    const arena = new ShapeArena();
    const s = arena.sphere({ transform: Matrix.translation(5, 0, 0) });
    const g = arena.group([s], { transform: Matrix.scaling(2, 2, 2) });
    expect(g.intersections(new Ray(point(10, 0, -10), vector(0, 0, 1)))).toHaveLength(2);
  });

  it('skips children when the ray misses its bounds', () => {
    const arena = new ShapeArena();
    const s = arena.sphere();
    const g = arena.group([s]);
    const spy = vi.spyOn(s, 'intersections');

    expect(g.intersections(new Ray(point(0, 5, -5), vector(0, 0, 1)))).toEqual([]);
    expect(spy).not.toHaveBeenCalled();

    g.intersections(new Ray(point(0, 0, -5), vector(0, 0, 1)));
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('bounds the union of its children', () => {
    const arena = new ShapeArena();
    const s = arena.sphere({
      transform: Matrix.translation(2, 5, -3).multiply(Matrix.scaling(2, 2, 2)),
    });
    const c = arena.cylinder({
      minimum: -2,
      maximum: 2,
      transform: Matrix.translation(-4, -1, 4).multiply(Matrix.scaling(0.5, 1, 0.5)),
    });
    const box = arena.group([s, c]).localBounds();
    expect(box.min.equals(point(-4.5, -3, -5))).toBe(true);
    expect(box.max.equals(point(4, 7, 4.5))).toBe(true);
  });

  it('recomputes bounds after a child moves', () => {
    const arena = new ShapeArena();
    const s = arena.sphere();
    const inner = arena.group([s]);
    const outer = arena.group([inner]);
    expect(outer.localBounds().max.x).toBe(1);

    s.transform = Matrix.translation(5, 0, 0);
    expect(inner.localBounds().max.x).toBe(6);
    expect(outer.localBounds().max.x).toBe(6);
  });

  it('includes its descendants but not itself', () => {
    const arena = new ShapeArena();
    const s = arena.sphere();
    const inner = arena.group([s]);
    const outer = arena.group([inner]);
    const stranger = arena.sphere();

    expect(outer.includes(s)).toBe(true);
    expect(outer.includes(inner)).toBe(true);
    expect(outer.includes(stranger)).toBe(false);
    expect(outer.includes(outer)).toBe(false);
  });

  it('refuses to contain itself', () => {
    const arena = new ShapeArena();
    const inner = arena.group();
    const outer = arena.group([inner]);
    expect(() => outer.addChild(outer)).toThrow(SceneGraphError);
    expect(() => inner.addChild(outer)).toThrow(SceneGraphError);
  });

  it('leaves both groups untouched when adding an ancestor fails', () => {
    const arena = new ShapeArena();
    const inner = arena.group();
    const outer = arena.group([inner]);

    expect(() => inner.addChild(outer)).toThrow(SceneGraphError);
    expect(inner.children).toHaveLength(0);
    expect(outer.parent).toBeUndefined();
    expect(outer.children).toEqual([inner]);
  });

  it('refuses a group that already holds it deeper down', () => {
    const arena = new ShapeArena();
    const leaf = arena.group();
    const middle = arena.group([leaf]);
    const top = arena.group([middle]);

    expect(top.includes(leaf)).toBe(true);
    expect(() => leaf.addChild(top)).toThrow(SceneGraphError);
    expect(leaf.isEmpty()).toBe(true);
  });

  it('has no normal of its own', () => {
    const arena = new ShapeArena();
    const g = arena.group();
    expect(() => g.localNormal(point(0, 0, 0), new Intersection(1, g))).toThrow(SceneGraphError);
  });
});
