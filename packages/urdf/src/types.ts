/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * URDF robot description types
 * http://wiki.ros.org/urdf/XML
 */

import type { Vec3 } from '@meshlink/scene';

export type Rgba = [r: number, g: number, b: number, a: number];

export interface UrdfOrigin {
  xyz: Vec3;
  /** Fixed-axis roll, pitch, yaw in radians */
  rpy: Vec3;
}

export type UrdfGeometry =
  | { type: 'box'; size: Vec3 }
  | { type: 'cylinder'; radius: number; length: number }
  | { type: 'capsule'; radius: number; length: number }
  | { type: 'sphere'; radius: number }
  | { type: 'mesh'; filename: string; scale?: Vec3 };

export type UrdfGeometryType = UrdfGeometry['type'];

export interface UrdfMaterial {
  name?: string;
  color?: Rgba;
}

export interface UrdfVisual {
  name?: string;
  origin: UrdfOrigin;
  geometry: UrdfGeometry;
  material?: UrdfMaterial;
}

export interface UrdfCollision {
  name?: string;
  origin: UrdfOrigin;
  geometry: UrdfGeometry;
}

/** Anything that carries a geometry at an origin */
export type UrdfElement = UrdfVisual | UrdfCollision;

export interface UrdfLink {
  name: string;
  visuals: UrdfVisual[];
  collisions: UrdfCollision[];
}

export type UrdfJointType = 'revolute' | 'continuous' | 'prismatic' | 'fixed' | 'floating' | 'planar';

export interface UrdfJoint {
  name: string;
  type: UrdfJointType;
  parent: string;
  child: string;
  origin: UrdfOrigin;
  axis: Vec3;
}

export interface UrdfRobot {
  name: string;
  links: UrdfLink[];
  joints: UrdfJoint[];
  /** Robot-level named materials */
  materials: Map<string, UrdfMaterial>;
}
