/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene description validation
 *
 * Turns untrusted JSON into a SceneDescription. Every failure is a SceneError naming
 * the path of the bad value. Unknown keys are ignored.
 */

import type { Axis } from '@umbra/math';
import { SceneError } from './errors.js';
import type {
  CameraDescription,
  LightDescription,
  MaterialDescription,
  ObjectDescription,
  ObjectType,
  PatternDescription,
  PatternSlot,
  PatternType,
  SceneDescription,
  TransformStep,
  Vec3,
} from './types.js';

type JsonObject = Record<string, unknown>;

const OBJECT_TYPES: readonly ObjectType[] = [
  'sphere',
  'plane',
  'cube',
  'cylinder',
  'cone',
  'triangle',
  'smooth-triangle',
  'group',
  'obj',
];
const PATTERN_TYPES: readonly PatternType[] = ['solid', 'stripe', 'gradient', 'ring', 'checkers', 'blend'];
const AXES: readonly Axis[] = ['x', 'y', 'z'];
const PRESETS: readonly ['glass'] = ['glass'];

interface NumberConstraints {
  min?: number;
  max?: number;
  /** Reject the bounds themselves */
  exclusive?: boolean;
  integer?: boolean;
}

function field(path: string, key: string): string {
  return path === '' ? key : `${path}.${key}`;
}

function item(path: string, index: number): string {
  return `${path}[${index}]`;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new SceneError('expected an object', path || undefined);
  }
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SceneError('expected an array', path);
  }
  return value;
}

function expectNumber(value: unknown, path: string, constraints: NumberConstraints = {}): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SceneError('expected a finite number', path);
  }
  const { min, max, exclusive = false, integer = false } = constraints;
  if (integer && !Number.isInteger(value)) {
    throw new SceneError(`expected an integer, got ${value}`, path);
  }
  if (min !== undefined && (exclusive ? value <= min : value < min)) {
    throw new SceneError(`must be ${exclusive ? '>' : '>='} ${min}, got ${value}`, path);
  }
  if (max !== undefined && (exclusive ? value >= max : value > max)) {
    throw new SceneError(`must be ${exclusive ? '<' : '<='} ${max}, got ${value}`, path);
  }
  return value;
}

function optionalNumber(
  source: JsonObject,
  key: string,
  path: string,
  constraints?: NumberConstraints
): number | undefined {
  const value = source[key];
  return value === undefined ? undefined : expectNumber(value, field(path, key), constraints);
}

function optionalBoolean(source: JsonObject, key: string, path: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new SceneError('expected true or false', field(path, key));
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value === '') {
    throw new SceneError('expected a non-empty string', path);
  }
  return value;
}

function expectOneOf<T extends string>(value: unknown, allowed: readonly T[], path: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new SceneError(`expected one of ${allowed.join(', ')}, got ${JSON.stringify(value)}`, path);
  }
  return match;
}

function expectVec3(value: unknown, path: string): Vec3 {
  const values = expectArray(value, path);
  if (values.length !== 3) {
    throw new SceneError(`expected 3 numbers, got ${values.length}`, path);
  }
  return [expectNumber(values[0], item(path, 0)), expectNumber(values[1], item(path, 1)), expectNumber(values[2], item(path, 2))];
}

function expectVec3Triple(value: unknown, path: string): [Vec3, Vec3, Vec3] {
  const values = expectArray(value, path);
  if (values.length !== 3) {
    throw new SceneError(`expected 3 entries, got ${values.length}`, path);
  }
  return [expectVec3(values[0], item(path, 0)), expectVec3(values[1], item(path, 1)), expectVec3(values[2], item(path, 2))];
}

function parseTransformStep(value: unknown, path: string): TransformStep {
  const step = expectObject(value, path);
  const keys = Object.keys(step);
  if (keys.length !== 1) {
    throw new SceneError('expected exactly one of translate, scale, rotate, shear', path);
  }

  const [kind] = keys;
  const argument = step[kind];
  switch (kind) {
    case 'translate':
      return { translate: expectVec3(argument, field(path, kind)) };
    case 'scale': {
      if (typeof argument === 'number') {
        const factor = expectNumber(argument, field(path, kind));
        return { scale: [factor, factor, factor] };
      }
      return { scale: expectVec3(argument, field(path, kind)) };
    }
    case 'rotate': {
      const rotatePath = field(path, kind);
      const rotation = expectObject(argument, rotatePath);
      return {
        rotate: {
          axis: expectOneOf(rotation.axis, AXES, field(rotatePath, 'axis')),
          degrees: expectNumber(rotation.degrees, field(rotatePath, 'degrees')),
        },
      };
    }
    case 'shear': {
      const shearPath = field(path, kind);
      const values = expectArray(argument, shearPath);
      if (values.length !== 6) {
        throw new SceneError(`expected 6 numbers, got ${values.length}`, shearPath);
      }
      const [xy, xz, yx, yz, zx, zy] = values.map((v, i) => expectNumber(v, item(shearPath, i)));
      return { shear: [xy, xz, yx, yz, zx, zy] };
    }
    default:
      throw new SceneError(`unknown transform "${kind}"`, path);
  }
}

function parseTransform(source: JsonObject, path: string): TransformStep[] | undefined {
  const value = source.transform;
  if (value === undefined) return undefined;
  const transformPath = field(path, 'transform');
  return expectArray(value, transformPath).map((step, i) => parseTransformStep(step, item(transformPath, i)));
}

function parsePatternSlot(value: unknown, path: string): PatternSlot {
  return Array.isArray(value) ? expectVec3(value, path) : parsePattern(value, path);
}

function parsePattern(value: unknown, path: string): PatternDescription {
  const pattern = expectObject(value, path);
  const type = expectOneOf(pattern.type, PATTERN_TYPES, field(path, 'type'));
  const transform = parseTransform(pattern, path);

  if (type === 'solid') {
    return { type, color: expectVec3(pattern.color, field(path, 'color')), transform };
  }
  return {
    type,
    a: parsePatternSlot(pattern.a, field(path, 'a')),
    b: parsePatternSlot(pattern.b, field(path, 'b')),
    transform,
  };
}

function parseMaterial(value: unknown, path: string): MaterialDescription {
  const material = expectObject(value, path);
  const unit = { min: 0, max: 1 };
  return {
    preset: material.preset === undefined ? undefined : expectOneOf(material.preset, PRESETS, field(path, 'preset')),
    color: material.color === undefined ? undefined : expectVec3(material.color, field(path, 'color')),
    ambient: optionalNumber(material, 'ambient', path, { min: 0 }),
    diffuse: optionalNumber(material, 'diffuse', path, { min: 0 }),
    specular: optionalNumber(material, 'specular', path, { min: 0 }),
    shininess: optionalNumber(material, 'shininess', path, { min: 0 }),
    reflective: optionalNumber(material, 'reflective', path, unit),
    transparency: optionalNumber(material, 'transparency', path, unit),
    refractiveIndex: optionalNumber(material, 'refractiveIndex', path, { min: 0, exclusive: true }),
    pattern: material.pattern === undefined ? undefined : parsePattern(material.pattern, field(path, 'pattern')),
  };
}

function parseObject(value: unknown, path: string): ObjectDescription {
  const source = expectObject(value, path);
  const type = expectOneOf(source.type, OBJECT_TYPES, field(path, 'type'));
  const base = {
    name: source.name === undefined ? undefined : expectString(source.name, field(path, 'name')),
    transform: parseTransform(source, path),
    material: source.material === undefined ? undefined : parseMaterial(source.material, field(path, 'material')),
    castsShadow: optionalBoolean(source, 'castsShadow', path),
  };

  switch (type) {
    case 'sphere':
    case 'plane':
    case 'cube':
      return { type, ...base };

    case 'cylinder':
    case 'cone': {
      const minimum = optionalNumber(source, 'minimum', path);
      const maximum = optionalNumber(source, 'maximum', path);
      if (minimum !== undefined && maximum !== undefined && minimum >= maximum) {
        throw new SceneError(`minimum ${minimum} must be below maximum ${maximum}`, path);
      }
      return { type, ...base, minimum, maximum, closed: optionalBoolean(source, 'closed', path) };
    }

    case 'triangle':
      return { type, ...base, points: expectVec3Triple(source.points, field(path, 'points')) };

    case 'smooth-triangle':
      return {
        type,
        ...base,
        points: expectVec3Triple(source.points, field(path, 'points')),
        normals: expectVec3Triple(source.normals, field(path, 'normals')),
      };

    case 'group': {
      const childrenPath = field(path, 'children');
      const children = expectArray(source.children ?? [], childrenPath);
      return { type, ...base, children: children.map((child, i) => parseObject(child, item(childrenPath, i))) };
    }

    case 'obj':
      return { type, ...base, file: expectString(source.file, field(path, 'file')) };
  }
}

function parseCamera(value: unknown, path: string): CameraDescription {
  const camera = expectObject(value, path);
  return {
    width: expectNumber(camera.width, field(path, 'width'), { min: 1, integer: true }),
    height: expectNumber(camera.height, field(path, 'height'), { min: 1, integer: true }),
    fieldOfView: expectNumber(camera.fieldOfView, field(path, 'fieldOfView'), { min: 0, max: 180, exclusive: true }),
    from: expectVec3(camera.from, field(path, 'from')),
    to: expectVec3(camera.to, field(path, 'to')),
    up: expectVec3(camera.up ?? [0, 1, 0], field(path, 'up')),
  };
}

function parseLight(value: unknown, path: string): LightDescription {
  const light = expectObject(value, path);
  return {
    position: expectVec3(light.position, field(path, 'position')),
    intensity: light.intensity === undefined ? undefined : expectVec3(light.intensity, field(path, 'intensity')),
  };
}

/**
 * Validate a parsed JSON value as a scene description
 */
export function parseSceneDescription(value: unknown): SceneDescription {
  const scene = expectObject(value, '');
  return {
    camera: parseCamera(scene.camera, 'camera'),
    light: scene.light === undefined ? undefined : parseLight(scene.light, 'light'),
    objects: expectArray(scene.objects, 'objects').map((object, i) => parseObject(object, item('objects', i))),
  };
}
