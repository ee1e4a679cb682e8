/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wavefront OBJ importer
 *
 * Reads vertices (`v`), vertex normals (`vn`), faces (`f`) and named groups (`g`).
 * Polygons are fan-triangulated around their first vertex. Faces whose every vertex
 * carries a normal become smooth triangles. Anything else (texture coordinates,
 * materials, smoothing groups, garbage) is skipped and counted.
 *
 * Indices are 1-based as in the file; negative indices count back from the most
 * recently declared element.
 */

import { createLogger } from '@umbra/diagnostics';
import { point, vector, type Tuple } from '@umbra/math';
import type { Group, ShapeArena, ShapeOptions, Triangle } from '@umbra/geometry';
import { ObjParseError } from './errors.js';

const log = createLogger('ObjParser');

export const DEFAULT_GROUP = 'default';

type Triple<T> = [T, T, T];

export interface ObjFace {
  vertices: Triple<Tuple>;
  /** Present when every corner of the source face named a normal */
  normals?: Triple<Tuple>;
  /** Source line, for diagnostics */
  line: number;
}

interface FaceCorner {
  vertex: Tuple;
  normal: Tuple | undefined;
}

export class ObjModel {
  readonly vertices: Tuple[] = [];
  readonly normals: Tuple[] = [];
  /** Faces by group name, in order of first appearance; the default group is first */
  readonly groups: Map<string, ObjFace[]> = new Map([[DEFAULT_GROUP, []]]);
  ignoredLines = 0;

  /** 1-based, as written in the file */
  vertex(index: number): Tuple {
    return lookup(this.vertices, index, 'vertex');
  }

  /** 1-based, as written in the file */
  normal(index: number): Tuple {
    return lookup(this.normals, index, 'normal');
  }

  group(name: string = DEFAULT_GROUP): ObjFace[] {
    return this.groups.get(name) ?? [];
  }

  get faceCount(): number {
    let count = 0;
    for (const faces of this.groups.values()) {
      count += faces.length;
    }
    return count;
  }

  /**
   * Build a shape tree: a root group holding one group per OBJ group, in file order.
   * `options` apply to the root group; every triangle shares `triangleOptions`.
   */
  toGroup(arena: ShapeArena, options: ShapeOptions = {}, triangleOptions: ShapeOptions = {}): Group {
    const root = arena.group([], options);
    for (const [name, faces] of this.groups) {
      const triangles = faces.map((face) => toTriangle(arena, face, triangleOptions));
      root.addChild(arena.group(triangles));
      log.debug(`Group "${name}" has ${triangles.length} triangles`, undefined, { operation: 'toGroup' });
    }
    return root;
  }
}

function lookup(list: readonly Tuple[], index: number, kind: string): Tuple {
  const item = list[index - 1];
  if (item === undefined) {
    throw new RangeError(`No ${kind} ${index}: ${list.length} declared`);
  }
  return item;
}

function toTriangle(arena: ShapeArena, face: ObjFace, options: ShapeOptions): Triangle {
  const [p1, p2, p3] = face.vertices;
  if (face.normals) {
    const [n1, n2, n3] = face.normals;
    return arena.smoothTriangle(p1, p2, p3, n1, n2, n3, options);
  }
  return arena.triangle(p1, p2, p3, options);
}

function parseNumbers(tokens: readonly string[]): number[] | undefined {
  const numbers = tokens.map(Number);
  if (tokens.some((token) => token === '') || numbers.some((n) => !Number.isFinite(n))) {
    return undefined;
  }
  return numbers;
}

/**
 * Resolve a 1-based (or negative, relative) OBJ index against `count` declared items
 */
function resolveIndex(token: string, count: number, kind: string, line: number): number {
  const index = Number(token);
  if (!Number.isInteger(index) || token === '') {
    throw new ObjParseError(`Invalid ${kind} index "${token}"`, line);
  }
  const resolved = index < 0 ? count + index + 1 : index;
  if (resolved < 1 || resolved > count) {
    throw new ObjParseError(`${kind} index ${index} out of range`, line, `${count} declared so far`);
  }
  return resolved;
}

function parseCorner(model: ObjModel, token: string, line: number): FaceCorner {
  // v, v/vt, v//vn, v/vt/vn
  const [vertexToken, , normalToken] = token.split('/');
  const vertex = model.vertex(resolveIndex(vertexToken, model.vertices.length, 'vertex', line));
  if (normalToken === undefined || normalToken === '') {
    return { vertex, normal: undefined };
  }
  const normal = model.normal(resolveIndex(normalToken, model.normals.length, 'normal', line));
  return { vertex, normal };
}

function fanTriangulate(corners: readonly FaceCorner[], line: number): ObjFace[] {
  const normals = corners.map((corner) => corner.normal).filter((n): n is Tuple => n !== undefined);
  const smooth = normals.length === corners.length;
  const faces: ObjFace[] = [];

  for (let i = 1; i < corners.length - 1; i++) {
    const face: ObjFace = {
      vertices: [corners[0].vertex, corners[i].vertex, corners[i + 1].vertex],
      line,
    };
    if (smooth) {
      face.normals = [normals[0], normals[i], normals[i + 1]];
    }
    faces.push(face);
  }
  return faces;
}

export function parseObj(source: string): ObjModel {
  const model = new ObjModel();
  let currentGroup = model.group(DEFAULT_GROUP);

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const text = lines[i].trim();
    if (text === '' || text.startsWith('#')) {
      continue;
    }

    const [keyword, ...args] = text.split(/\s+/);
    switch (keyword) {
      case 'v':
      case 'vn': {
        const numbers = args.length >= 3 ? parseNumbers(args.slice(0, 3)) : undefined;
        if (numbers === undefined) {
          ignore(model, lineNumber, text);
          break;
        }
        const [x, y, z] = numbers;
        if (keyword === 'v') {
          model.vertices.push(point(x, y, z));
        } else {
          model.normals.push(vector(x, y, z));
        }
        break;
      }

      case 'f': {
        if (args.length < 3) {
          throw new ObjParseError(`Face needs at least 3 vertices, got ${args.length}`, lineNumber);
        }
        const corners = args.map((token) => parseCorner(model, token, lineNumber));
        currentGroup.push(...fanTriangulate(corners, lineNumber));
        break;
      }

      case 'g': {
        const name = args.length > 0 ? args.join(' ') : DEFAULT_GROUP;
        const existing = model.groups.get(name);
        if (existing) {
          currentGroup = existing;
        } else {
          currentGroup = [];
          model.groups.set(name, currentGroup);
        }
        break;
      }

      default:
        ignore(model, lineNumber, text);
    }
  }

  log.info(
    `Parsed ${model.vertices.length} vertices, ${model.faceCount} triangles in ${model.groups.size} groups` +
      ` (${model.ignoredLines} lines ignored)`,
    { operation: 'parseObj' }
  );
  return model;
}

function ignore(model: ObjModel, line: number, text: string): void {
  model.ignoredLines++;
  log.debug('Ignoring line', text, { operation: 'parseObj', line });
}
