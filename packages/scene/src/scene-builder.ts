/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene builder - turns a validated SceneDescription into a World and a Camera
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { createLogger } from '@umbra/diagnostics';
import { ShapeArena, type Shape, type ShapeOptions } from '@umbra/geometry';
import { Matrix, point, vector } from '@umbra/math';
import { ObjParseError, parseObj } from '@umbra/parser';
import { Camera, World } from '@umbra/renderer';
import {
  BlendPattern,
  CheckersPattern,
  Color,
  GradientPattern,
  Material,
  PointLight,
  RingPattern,
  SolidPattern,
  StripePattern,
  WHITE,
  type MaterialOptions,
  type Pattern,
  type PatternSlot as ShadingSlot,
} from '@umbra/shading';
import { SceneError } from './errors.js';
import type {
  CameraDescription,
  MaterialDescription,
  ObjectDescription,
  PatternDescription,
  PatternSlot,
  SceneDescription,
  TransformStep,
  Vec3,
} from './types.js';

const log = createLogger('SceneBuilder');

export interface BuildOptions {
  /** Directory that OBJ file paths are relative to (default: current directory) */
  baseDir?: string;
}

export interface BuiltScene {
  world: World;
  camera: Camera;
  arena: ShapeArena;
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function color([r, g, b]: Vec3): Color {
  return new Color(r, g, b);
}

/**
 * Compose transform steps so that the first listed step is applied first
 */
export function buildTransform(steps: readonly TransformStep[] = []): Matrix {
  let matrix = Matrix.identity();
  for (const step of steps) {
    if ('translate' in step) {
      matrix = matrix.translate(...step.translate);
    } else if ('scale' in step) {
      matrix = matrix.scale(...step.scale);
    } else if ('rotate' in step) {
      matrix = matrix.rotate(step.rotate.axis, degreesToRadians(step.rotate.degrees));
    } else {
      matrix = matrix.shear(...step.shear);
    }
  }
  return matrix;
}

function buildSlot(slot: PatternSlot): ShadingSlot {
  return Array.isArray(slot) ? color(slot) : buildPattern(slot);
}

export function buildPattern(description: PatternDescription): Pattern {
  const transform = buildTransform(description.transform);
  switch (description.type) {
    case 'solid':
      return new SolidPattern(color(description.color), transform);
    case 'stripe':
      return new StripePattern(buildSlot(description.a), buildSlot(description.b), transform);
    case 'gradient':
      return new GradientPattern(buildSlot(description.a), buildSlot(description.b), transform);
    case 'ring':
      return new RingPattern(buildSlot(description.a), buildSlot(description.b), transform);
    case 'checkers':
      return new CheckersPattern(buildSlot(description.a), buildSlot(description.b), transform);
    case 'blend':
      return new BlendPattern(buildSlot(description.a), buildSlot(description.b), transform);
  }
}

export function buildMaterial(description: MaterialDescription = {}): Material {
  const options: Partial<MaterialOptions> = {};
  if (description.color) options.color = color(description.color);
  if (description.ambient !== undefined) options.ambient = description.ambient;
  if (description.diffuse !== undefined) options.diffuse = description.diffuse;
  if (description.specular !== undefined) options.specular = description.specular;
  if (description.shininess !== undefined) options.shininess = description.shininess;
  if (description.reflective !== undefined) options.reflective = description.reflective;
  if (description.transparency !== undefined) options.transparency = description.transparency;
  if (description.refractiveIndex !== undefined) options.refractiveIndex = description.refractiveIndex;
  if (description.pattern) options.pattern = buildPattern(description.pattern);

  return description.preset === 'glass' ? Material.glass(options) : new Material(options);
}

export function buildCamera(description: CameraDescription): Camera {
  const { width, height, fieldOfView, from, to, up } = description;
  return new Camera(
    width,
    height,
    degreesToRadians(fieldOfView),
    Matrix.viewTransform(point(...from), point(...to), vector(...up))
  );
}

class SceneBuilder {
  readonly arena = new ShapeArena();

  constructor(private readonly baseDir: string) {}

  build(description: ObjectDescription, path: string): Shape {
    const options: ShapeOptions = {
      transform: buildTransform(description.transform),
      material: buildMaterial(description.material),
      castsShadow: description.castsShadow,
    };

    switch (description.type) {
      case 'sphere':
        return this.arena.sphere(options);
      case 'plane':
        return this.arena.plane(options);
      case 'cube':
        return this.arena.cube(options);
      case 'cylinder':
      case 'cone': {
        const { minimum, maximum, closed } = description;
        return description.type === 'cylinder'
          ? this.arena.cylinder({ ...options, minimum, maximum, closed })
          : this.arena.cone({ ...options, minimum, maximum, closed });
      }
      case 'triangle': {
        const [p1, p2, p3] = description.points.map((p) => point(...p));
        return this.arena.triangle(p1, p2, p3, options);
      }
      case 'smooth-triangle': {
        const [p1, p2, p3] = description.points.map((p) => point(...p));
        const [n1, n2, n3] = description.normals.map((n) => vector(...n));
        return this.arena.smoothTriangle(p1, p2, p3, n1, n2, n3, options);
      }
      case 'group': {
        const children = description.children.map((child, i) => this.build(child, `${path}.children[${i}]`));
        return this.arena.group(children, { transform: options.transform, castsShadow: options.castsShadow });
      }
      case 'obj':
        return this.loadObj(description.file, options, path);
    }
  }

  /**
   * Triangles read from an OBJ file carry the object's material; the transform
   * goes on the enclosing group.
   */
  private loadObj(file: string, options: ShapeOptions, path: string): Shape {
    const filePath = resolve(this.baseDir, file);
    let source: string;
    try {
      source = readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new SceneError(
        `cannot read OBJ file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        `${path}.file`
      );
    }

    try {
      const model = parseObj(source);
      log.debug(`Loaded ${model.faceCount} faces from ${filePath}`, undefined, { operation: 'loadObj' });
      return model.toGroup(
        this.arena,
        { transform: options.transform, castsShadow: options.castsShadow },
        { material: options.material, castsShadow: options.castsShadow }
      );
    } catch (error) {
      if (error instanceof ObjParseError || error instanceof RangeError) {
        throw new SceneError(`${filePath}: ${error.message}`, `${path}.file`);
      }
      throw error;
    }
  }
}

/**
 * Build the world and camera for a scene. Building is deterministic: every call with
 * the same description yields shapes with the same identifiers.
 */
export function buildScene(description: SceneDescription, options: BuildOptions = {}): BuiltScene {
  const builder = new SceneBuilder(options.baseDir ?? process.cwd());
  const objects = description.objects.map((object, i) => builder.build(object, `objects[${i}]`));

  const light = description.light
    ? new PointLight(
        point(...description.light.position),
        description.light.intensity ? color(description.light.intensity) : WHITE
      )
    : undefined;
  if (!light) {
    log.warn('Scene has no light: every pixel will be black', { operation: 'buildScene' });
  }

  log.info(`Built ${builder.arena.allocated} shapes`, { operation: 'buildScene' });
  return { world: new World(objects, light), camera: buildCamera(description.camera), arena: builder.arena };
}
