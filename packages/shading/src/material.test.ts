/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { point, vector } from '@umbra/math';
import { BLACK, Color, WHITE } from './color.js';
import { PointLight } from './light.js';
import { Material, REFRACTIVE_INDEX } from './material.js';
import { StripePattern } from './pattern.js';

const HALF_SQRT2 = Math.SQRT2 / 2;

describe('Material', () => {
  it('has Phong defaults', () => {
    const m = new Material();
    expect(m.color).toBe(WHITE);
    expect(m.ambient).toBe(0.1);
    expect(m.diffuse).toBe(0.9);
    expect(m.specular).toBe(0.9);
    expect(m.shininess).toBe(200);
    expect(m.reflective).toBe(0);
    expect(m.transparency).toBe(0);
    expect(m.refractiveIndex).toBe(1);
    expect(m.pattern).toBeUndefined();
  });

  it('builds a glass preset', () => {
    const glass = Material.glass();
    expect(glass.transparency).toBe(1);
    expect(glass.refractiveIndex).toBe(1.5);
  });

  it('takes its indices from the refractive index table', () => {
    expect(new Material().refractiveIndex).toBe(REFRACTIVE_INDEX.VACUUM);
    expect(Material.glass().refractiveIndex).toBe(REFRACTIVE_INDEX.GLASS);
    expect(Material.glass({ refractiveIndex: REFRACTIVE_INDEX.DIAMOND }).refractiveIndex).toBe(2.417);
  });

  describe('lighting', () => {
    const m = new Material();
    const position = point(0, 0, 0);
    const normalv = vector(0, 0, -1);

    it('lights fully with the eye between light and surface', () => {
      const light = new PointLight(point(0, 0, -10), WHITE);
      const result = m.lighting(light, position, position, vector(0, 0, -1), normalv, false);
      expect(result.equals(new Color(1.9, 1.9, 1.9))).toBe(true);
    });

    it('drops specular with the eye offset 45 degrees', () => {
      const light = new PointLight(point(0, 0, -10), WHITE);
      const eyev = vector(0, HALF_SQRT2, -HALF_SQRT2);
      const result = m.lighting(light, position, position, eyev, normalv, false);
      expect(result.equals(new Color(1, 1, 1))).toBe(true);
    });

    it('reduces diffuse with the light offset 45 degrees', () => {
      const light = new PointLight(point(0, 10, -10), WHITE);
      const result = m.lighting(light, position, position, vector(0, 0, -1), normalv, false);
      expect(result.equals(new Color(0.7364, 0.7364, 0.7364), 1e-4)).toBe(true);
    });

    it('peaks specular with the eye in the reflection path', () => {
      const light = new PointLight(point(0, 10, -10), WHITE);
      const eyev = vector(0, -HALF_SQRT2, -HALF_SQRT2);
      const result = m.lighting(light, position, position, eyev, normalv, false);
      expect(result.equals(new Color(1.6364, 1.6364, 1.6364), 1e-4)).toBe(true);
    });

    it('keeps only ambient with the light behind the surface', () => {
      const light = new PointLight(point(0, 0, 10), WHITE);
      const result = m.lighting(light, position, position, vector(0, 0, -1), normalv, false);
      expect(result.equals(new Color(0.1, 0.1, 0.1))).toBe(true);
    });

    it('keeps only ambient in shadow', () => {
      const light = new PointLight(point(0, 0, -10), WHITE);
      const result = m.lighting(light, position, position, vector(0, 0, -1), normalv, true);
      expect(result.equals(new Color(0.1, 0.1, 0.1))).toBe(true);
    });

    it('samples the pattern at the object point', () => {
      const striped = new Material({
        pattern: new StripePattern(WHITE, BLACK),
        ambient: 1,
        diffuse: 0,
        specular: 0,
      });
      const light = new PointLight(point(0, 0, -10), WHITE);
      const eyev = vector(0, 0, -1);
      const c1 = striped.lighting(light, point(0.9, 0, 0), point(0.9, 0, 0), eyev, normalv, false);
      const c2 = striped.lighting(light, point(1.1, 0, 0), point(1.1, 0, 0), eyev, normalv, false);
      expect(c1.equals(WHITE)).toBe(true);
      expect(c2.equals(BLACK)).toBe(true);
    });
  });
});
