/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @umbra/geometry - shapes and ray intersection
 */

export { Ray } from './ray.js';
export { Bounds } from './bounds.js';
export { SceneGraphError } from './errors.js';
export { Intersection, hit, sortIntersections } from './intersection.js';
export type { SurfaceUv } from './intersection.js';
export { prepareComputations, schlick } from './intersection-state.js';
export type { IntersectionState } from './intersection-state.js';
export { Shape } from './shape.js';
export type { ShapeOptions } from './shape.js';
export { Sphere } from './sphere.js';
export { Plane } from './plane.js';
export { Cube } from './cube.js';
export { Cylinder } from './cylinder.js';
export type { CylinderOptions } from './cylinder.js';
export { Cone } from './cone.js';
export type { ConeOptions } from './cone.js';
export { Triangle, SmoothTriangle } from './triangle.js';
export { Group } from './group.js';
export { ShapeArena } from './shape-arena.js';
