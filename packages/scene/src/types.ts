/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene description types
 *
 * A scene is plain data (JSON): it can be stored in a file, validated once, and sent
 * to render workers as is. Angles are in degrees.
 */

import type { Axis } from '@umbra/math';

export type Vec3 = [number, number, number];

export type TransformStep =
  | { translate: Vec3 }
  | { scale: Vec3 }
  | { rotate: { axis: Axis; degrees: number } }
  | { shear: [number, number, number, number, number, number] };

export type PatternSlot = Vec3 | PatternDescription;

export type PatternDescription =
  | { type: 'solid'; color: Vec3; transform?: TransformStep[] }
  | {
      type: 'stripe' | 'gradient' | 'ring' | 'checkers' | 'blend';
      a: PatternSlot;
      b: PatternSlot;
      transform?: TransformStep[];
    };

export type PatternType = PatternDescription['type'];

export interface MaterialDescription {
  /** Start from a named preset; explicit fields override it */
  preset?: 'glass';
  color?: Vec3;
  ambient?: number;
  diffuse?: number;
  specular?: number;
  shininess?: number;
  reflective?: number;
  transparency?: number;
  refractiveIndex?: number;
  pattern?: PatternDescription;
}

interface ObjectBase {
  /** Label used in log output only */
  name?: string;
  /** Applied in reading order: the first step is applied first */
  transform?: TransformStep[];
  material?: MaterialDescription;
  castsShadow?: boolean;
}

export interface CylinderLikeDescription extends ObjectBase {
  type: 'cylinder' | 'cone';
  minimum?: number;
  maximum?: number;
  closed?: boolean;
}

export interface TriangleDescription extends ObjectBase {
  type: 'triangle';
  points: [Vec3, Vec3, Vec3];
}

export interface SmoothTriangleDescription extends ObjectBase {
  type: 'smooth-triangle';
  points: [Vec3, Vec3, Vec3];
  normals: [Vec3, Vec3, Vec3];
}

export interface GroupDescription extends ObjectBase {
  type: 'group';
  children: ObjectDescription[];
}

export interface ObjFileDescription extends ObjectBase {
  type: 'obj';
  /** Path to a Wavefront OBJ file, relative to the scene's base directory */
  file: string;
}

export interface SimpleShapeDescription extends ObjectBase {
  type: 'sphere' | 'plane' | 'cube';
}

export type ObjectDescription =
  | SimpleShapeDescription
  | CylinderLikeDescription
  | TriangleDescription
  | SmoothTriangleDescription
  | GroupDescription
  | ObjFileDescription;

export type ObjectType = ObjectDescription['type'];

export interface CameraDescription {
  width: number;
  height: number;
  /** Degrees, across the longer image side */
  fieldOfView: number;
  from: Vec3;
  to: Vec3;
  up: Vec3;
}

export interface LightDescription {
  position: Vec3;
  /** Defaults to white */
  intensity?: Vec3;
}

export interface SceneDescription {
  camera: CameraDescription;
  light?: LightDescription;
  objects: ObjectDescription[];
}
