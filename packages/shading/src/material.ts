/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Surface material and Phong reflection model
 */

import type { Tuple } from '@umbra/math';
import { BLACK, Color, WHITE } from './color.js';
import type { PointLight } from './light.js';
import type { Pattern } from './pattern.js';

export interface MaterialOptions {
  color: Color;
  ambient: number;
  diffuse: number;
  specular: number;
  shininess: number;
  reflective: number;
  transparency: number;
  refractiveIndex: number;
  pattern?: Pattern;
}

/** Common refractive indices */
export const REFRACTIVE_INDEX = {
  VACUUM: 1,
  AIR: 1.00029,
  WATER: 1.333,
  GLASS: 1.5,
  DIAMOND: 2.417,
} as const;

export const MATERIAL_DEFAULTS: Readonly<MaterialOptions> = {
  color: WHITE,
  ambient: 0.1,
  diffuse: 0.9,
  specular: 0.9,
  shininess: 200,
  reflective: 0,
  transparency: 0,
  refractiveIndex: REFRACTIVE_INDEX.VACUUM,
};

export class Material implements MaterialOptions {
  color: Color;
  ambient: number;
  diffuse: number;
  specular: number;
  shininess: number;
  reflective: number;
  transparency: number;
  refractiveIndex: number;
  pattern?: Pattern;

  constructor(options: Partial<MaterialOptions> = {}) {
    const resolved = { ...MATERIAL_DEFAULTS, ...options };
    this.color = resolved.color;
    this.ambient = resolved.ambient;
    this.diffuse = resolved.diffuse;
    this.specular = resolved.specular;
    this.shininess = resolved.shininess;
    this.reflective = resolved.reflective;
    this.transparency = resolved.transparency;
    this.refractiveIndex = resolved.refractiveIndex;
    this.pattern = resolved.pattern;
  }

  /**
   * Glass-like preset: fully transparent, index 1.5
   */
  static glass(options: Partial<MaterialOptions> = {}): Material {
    return new Material({ transparency: 1, refractiveIndex: REFRACTIVE_INDEX.GLASS, ...options });
  }

  /**
   * Phong shading at a surface point.
   *
   * The pattern (if any) is sampled at `objectPoint`; light direction is computed
   * from `worldPoint`. A shadowed point only receives the ambient term.
   */
  lighting(
    light: PointLight,
    objectPoint: Tuple,
    worldPoint: Tuple,
    eyev: Tuple,
    normalv: Tuple,
    inShadow: boolean
  ): Color {
    const surface = this.pattern ? this.pattern.colorAt(objectPoint) : this.color;
    const effectiveColor = surface.multiply(light.intensity);
    const ambient = effectiveColor.scale(this.ambient);

    if (inShadow) {
      return ambient;
    }

    const lightv = light.position.subtract(worldPoint).normalize();
    const lightDotNormal = lightv.dot(normalv);

    // Light on the other side of the surface
    if (lightDotNormal < 0) {
      return ambient;
    }

    const diffuse = effectiveColor.scale(this.diffuse * lightDotNormal);

    const reflectv = lightv.negate().reflect(normalv);
    const reflectDotEye = reflectv.dot(eyev);

    let specular = BLACK;
    if (reflectDotEye > 0) {
      const factor = Math.pow(reflectDotEye, this.shininess);
      specular = light.intensity.scale(this.specular * factor);
    }

    return ambient.add(diffuse).add(specular);
  }
}
