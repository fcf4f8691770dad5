/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createLogger, type GeometryShape } from '@meshlink/protocol';
import {
  boxGeometry,
  createGeometry,
  cylinderGeometry,
  isometry,
  loadMesh,
  SceneBuildError,
  sphereGeometry,
  type Geometry,
} from '@meshlink/scene';
import { UnsupportedGeometryError } from './errors.js';
import type { UrdfElement, UrdfGeometry } from './types.js';

const log = createLogger('Urdf');

const PACKAGE_SCHEME = 'package://';

/** Maps a URDF mesh filename to a path on disk */
export type MeshResolver = (filename: string) => string;

export interface MeshResolverOptions {
  /** Directory holding the packages that package:// URIs name */
  packageRoot?: string;
  /** Directory relative filenames are resolved against (default: cwd) */
  baseDir?: string;
}

export function createMeshResolver(options: MeshResolverOptions = {}): MeshResolver {
  return (filename) => {
    if (filename.startsWith(PACKAGE_SCHEME)) {
      if (options.packageRoot === undefined) {
        throw new SceneBuildError(`Cannot resolve ${filename} without a package root`);
      }
      return join(options.packageRoot, filename.slice(PACKAGE_SCHEME.length));
    }
    if (filename.startsWith('file://')) {
      return fileURLToPath(filename);
    }
    if (isAbsolute(filename)) {
      return filename;
    }
    return resolve(options.baseDir ?? process.cwd(), filename);
  };
}

export function shapeFromUrdf(geometry: UrdfGeometry, resolveMesh: MeshResolver): GeometryShape {
  switch (geometry.type) {
    case 'box':
      return boxGeometry(geometry.size[0], geometry.size[1], geometry.size[2]);
    case 'cylinder':
      return cylinderGeometry(geometry.radius, geometry.length);
    case 'sphere':
      return sphereGeometry(geometry.radius);
    case 'capsule':
      throw new UnsupportedGeometryError('Capsule');
    case 'mesh': {
      if (geometry.scale && geometry.scale.some((s) => s !== 1)) {
        log.warn(`Scale ${geometry.scale.join(' ')} of ${geometry.filename} is not applied`);
      }
      return loadMesh(resolveMesh(geometry.filename));
    }
  }
}

/**
 * Geometry of a visual or collision element, placed at its origin
 */
export function geometryFromUrdf(element: UrdfElement, resolveMesh: MeshResolver): Geometry {
  return createGeometry(
    shapeFromUrdf(element.geometry, resolveMesh),
    isometry(element.origin.xyz, element.origin.rpy)
  );
}
