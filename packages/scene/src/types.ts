/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene types for meshlink
 */

import type { GeometryShape } from '@meshlink/protocol';

export type Vec3 = [number, number, number];

/** Unit quaternion as [x, y, z, w] */
export type Quat = [number, number, number, number];

export interface Mat4 {
  m: Float64Array; // 16 elements, column-major
}

/** Rigid transform: rotation followed by translation */
export interface Isometry {
  translation: Vec3;
  rotation: Quat;
}

export interface Geometry<S extends GeometryShape = GeometryShape> {
  uuid: string;
  shape: S;
  /** Pose of this geometry inside its object; never sent on its own */
  origin: Isometry;
}
