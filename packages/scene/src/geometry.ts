/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geometry factories.
 *
 * Each factory returns a bare shape; createGeometry() gives it a uuid and
 * an origin so it can be placed inside a multi-geometry object.
 * https://threejs.org/docs/#api/en/geometries/
 */

import { randomUUID } from 'node:crypto';
import type {
  BoxShape,
  BufferAttribute,
  BufferShape,
  CircleShape,
  ConeShape,
  CylinderShape,
  GeometryDocument,
  GeometryShape,
  MeshFileShape,
  PlaneShape,
  PolyhedronShape,
  RingShape,
  SphereShape,
  TorusShape,
} from '@meshlink/protocol';
import { SceneBuildError } from './errors.js';
import { identityIsometry } from './math.js';
import type { Geometry, Isometry } from './types.js';

const FULL_TURN = 2 * Math.PI;

// ============================================================================
// Validation
// ============================================================================

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new SceneBuildError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

function finite(name: string, value: number): number {
  if (!Number.isFinite(value)) {
    throw new SceneBuildError(`${name} must be finite, got ${value}`);
  }
  return value;
}

function segments(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new SceneBuildError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function detailLevel(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new SceneBuildError(`detail must be a non-negative integer, got ${value}`);
  }
  return value;
}

// ============================================================================
// Primitive shapes
// ============================================================================

export interface ArcOptions {
  thetaStart?: number;
  thetaLength?: number;
}

export function boxGeometry(width: number, height: number, depth: number): BoxShape {
  return {
    type: 'BoxGeometry',
    width: positive('width', width),
    height: positive('height', height),
    depth: positive('depth', depth),
  };
}

export function sphereGeometry(radius: number, widthSegments = 32, heightSegments = 16): SphereShape {
  return {
    type: 'SphereGeometry',
    radius: positive('radius', radius),
    widthSegments: segments('widthSegments', widthSegments),
    heightSegments: segments('heightSegments', heightSegments),
  };
}

export interface CylinderOptions extends ArcOptions {
  /** Defaults to the top radius */
  radiusBottom?: number;
  radialSegments?: number;
  heightSegments?: number;
}

/** Long axis along +Y, as three.js builds it */
export function cylinderGeometry(radius: number, height: number, options: CylinderOptions = {}): CylinderShape {
  return {
    type: 'CylinderGeometry',
    radiusTop: positive('radiusTop', radius),
    radiusBottom: positive('radiusBottom', options.radiusBottom ?? radius),
    height: positive('height', height),
    radialSegments: segments('radialSegments', options.radialSegments ?? 32),
    heightSegments: segments('heightSegments', options.heightSegments ?? 1),
    thetaStart: finite('thetaStart', options.thetaStart ?? 0),
    thetaLength: positive('thetaLength', options.thetaLength ?? FULL_TURN),
  };
}

export function coneGeometry(
  radius: number,
  height: number,
  options: Omit<CylinderOptions, 'radiusBottom'> = {}
): ConeShape {
  return {
    type: 'ConeGeometry',
    radius: positive('radius', radius),
    height: positive('height', height),
    radialSegments: segments('radialSegments', options.radialSegments ?? 32),
    heightSegments: segments('heightSegments', options.heightSegments ?? 1),
    thetaStart: finite('thetaStart', options.thetaStart ?? 0),
    thetaLength: positive('thetaLength', options.thetaLength ?? FULL_TURN),
  };
}

export function circleGeometry(radius: number, options: ArcOptions & { segments?: number } = {}): CircleShape {
  return {
    type: 'CircleGeometry',
    radius: positive('radius', radius),
    segments: segments('segments', options.segments ?? 32),
    thetaStart: finite('thetaStart', options.thetaStart ?? 0),
    thetaLength: positive('thetaLength', options.thetaLength ?? FULL_TURN),
  };
}

export function ringGeometry(
  innerRadius: number,
  outerRadius: number,
  options: ArcOptions & { thetaSegments?: number; phiSegments?: number } = {}
): RingShape {
  if (!(outerRadius > innerRadius)) {
    throw new SceneBuildError(`outerRadius (${outerRadius}) must exceed innerRadius (${innerRadius})`);
  }
  return {
    type: 'RingGeometry',
    innerRadius: positive('innerRadius', innerRadius),
    outerRadius: positive('outerRadius', outerRadius),
    thetaSegments: segments('thetaSegments', options.thetaSegments ?? 32),
    phiSegments: segments('phiSegments', options.phiSegments ?? 1),
    thetaStart: finite('thetaStart', options.thetaStart ?? 0),
    thetaLength: positive('thetaLength', options.thetaLength ?? FULL_TURN),
  };
}

export function planeGeometry(
  width: number,
  height: number,
  options: { widthSegments?: number; heightSegments?: number } = {}
): PlaneShape {
  return {
    type: 'PlaneGeometry',
    width: positive('width', width),
    height: positive('height', height),
    widthSegments: segments('widthSegments', options.widthSegments ?? 1),
    heightSegments: segments('heightSegments', options.heightSegments ?? 1),
  };
}

export function torusGeometry(
  radius: number,
  tube: number,
  options: { radialSegments?: number; tubularSegments?: number } = {}
): TorusShape {
  return {
    type: 'TorusGeometry',
    radius: positive('radius', radius),
    tube: positive('tube', tube),
    radialSegments: segments('radialSegments', options.radialSegments ?? 12),
    tubularSegments: segments('tubularSegments', options.tubularSegments ?? 48),
  };
}

function polyhedron(type: PolyhedronShape['type'], radius: number, detail: number): PolyhedronShape {
  return { type, radius: positive('radius', radius), detail: detailLevel(detail) };
}

export const tetrahedronGeometry = (radius: number, detail = 0) => polyhedron('TetrahedronGeometry', radius, detail);
export const octahedronGeometry = (radius: number, detail = 0) => polyhedron('OctahedronGeometry', radius, detail);
export const dodecahedronGeometry = (radius: number, detail = 0) => polyhedron('DodecahedronGeometry', radius, detail);
export const icosahedronGeometry = (radius: number, detail = 0) => polyhedron('IcosahedronGeometry', radius, detail);

// ============================================================================
// Buffer and mesh-file geometry
// ============================================================================

export interface BufferGeometryInput {
  /** Flat x,y,z triplets */
  position: ArrayLike<number>;
  /** Flat r,g,b triplets in 0-1, one per vertex */
  color: ArrayLike<number>;
  normal?: ArrayLike<number>;
  /** Flat u,v pairs */
  uv?: ArrayLike<number>;
}

function attribute(name: string, values: ArrayLike<number>, itemSize: number, vertexCount: number): BufferAttribute {
  if (values.length % itemSize !== 0) {
    throw new SceneBuildError(`${name} length ${values.length} is not a multiple of ${itemSize}`);
  }
  if (values.length / itemSize !== vertexCount) {
    throw new SceneBuildError(
      `${name} describes ${values.length / itemSize} vertices, position describes ${vertexCount}`
    );
  }
  return { itemSize, type: 'Float32Array', array: Float32Array.from(values), normalized: false };
}

/**
 * Point cloud / vertex-colored geometry
 */
export function bufferGeometry(input: BufferGeometryInput): BufferShape {
  if (input.position.length % 3 !== 0) {
    throw new SceneBuildError(`position length ${input.position.length} is not a multiple of 3`);
  }
  const vertexCount = input.position.length / 3;
  return {
    type: 'BufferGeometry',
    data: {
      attributes: {
        position: attribute('position', input.position, 3, vertexCount),
        color: attribute('color', input.color, 3, vertexCount),
        ...(input.normal ? { normal: attribute('normal', input.normal, 3, vertexCount) } : {}),
        ...(input.uv ? { uv: attribute('uv', input.uv, 2, vertexCount) } : {}),
      },
    },
  };
}

export function meshFileGeometry(format: string, data: string | Uint8Array): MeshFileShape {
  return { type: '_meshfile_geometry', format: format.toLowerCase(), data };
}

// ============================================================================
// Geometry with identity
// ============================================================================

export function createGeometry<S extends GeometryShape>(shape: S, origin: Isometry = identityIsometry()): Geometry<S> {
  return { uuid: randomUUID(), shape, origin };
}

export function isGeometry(value: GeometryShape | Geometry): value is Geometry {
  return 'shape' in value;
}

export function toGeometryDocument(geometry: Geometry): GeometryDocument {
  return { uuid: geometry.uuid, ...geometry.shape };
}
