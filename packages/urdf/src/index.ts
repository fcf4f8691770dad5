/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshlink/urdf
 *
 * Parse URDF robot descriptions and publish them to meshcat-server.
 *
 * ```ts
 * const client = createClient();
 * const file = 'robots/arm.urdf';
 * await publishUrdf(client, loadUrdfFile(file), { baseDir: dirname(file) });
 * ```
 */

export type {
  Rgba,
  UrdfOrigin,
  UrdfGeometry,
  UrdfGeometryType,
  UrdfMaterial,
  UrdfVisual,
  UrdfCollision,
  UrdfElement,
  UrdfLink,
  UrdfJointType,
  UrdfJoint,
  UrdfRobot,
} from './types.js';
export { UrdfParseError, UnsupportedGeometryError } from './errors.js';
export { parseUrdf, loadUrdfFile } from './parser.js';
export { createMeshResolver, shapeFromUrdf, geometryFromUrdf } from './geometry.js';
export type { MeshResolver, MeshResolverOptions } from './geometry.js';
export { urdfPaths, publishUrdf, linkMaterial } from './publish.js';
export type { UrdfPaths, PublishUrdfOptions, PublishUrdfResult } from './publish.js';
