/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshlink/scene
 *
 * Build meshcat scene objects and keep a mirror of the remote scene tree.
 *
 * ```ts
 * import { sceneObject, torusGeometry, isometry } from '@meshlink/scene';
 *
 * const torus = sceneObject()
 *   .geometry(torusGeometry(0.5, 0.2))
 *   .material({ color: 0x00ff00 })
 *   .pose(isometry([0, 2, 0]))
 *   .build();
 * ```
 */

export type { Vec3, Quat, Mat4, Isometry, Geometry } from './types.js';
export { SceneBuildError } from './errors.js';
export {
  MathUtils,
  identityIsometry,
  isometry,
  multiplyIsometry,
  isometryToMatrix,
  isIsometry,
} from './math.js';
export {
  boxGeometry,
  sphereGeometry,
  cylinderGeometry,
  coneGeometry,
  circleGeometry,
  ringGeometry,
  planeGeometry,
  torusGeometry,
  tetrahedronGeometry,
  octahedronGeometry,
  dodecahedronGeometry,
  icosahedronGeometry,
  bufferGeometry,
  meshFileGeometry,
  createGeometry,
  isGeometry,
  toGeometryDocument,
} from './geometry.js';
export type { ArcOptions, CylinderOptions, BufferGeometryInput } from './geometry.js';
export {
  createMaterial,
  parseHexColor,
  textTexture,
  imageTexture,
  isTextTexture,
  createImage,
} from './material.js';
export type { MaterialOptions } from './material.js';
export { fileExtension, loadMesh, loadPngImage } from './files.js';
export { SceneObjectBuilder, sceneObject, sceneText } from './object-builder.js';
export type { SceneTextOptions } from './object-builder.js';
export { SceneTree } from './scene-tree.js';
export type { SceneNode } from './scene-tree.js';
