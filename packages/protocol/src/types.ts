/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wire types shared by the scene builders and the client.
 *
 * Object payloads follow the three.js JSON Object Scene format 4.5, with
 * the two meshcat extensions `_meshfile_geometry` and `_text`.
 * https://github.com/mrdoob/three.js/wiki/JSON-Object-Scene-format-4
 */

// ============================================================================
// Protocol Constants
// ============================================================================

export const OBJECT_FORMAT_VERSION = 4.5 as const;

/** Double-sided rendering (THREE.DoubleSide) */
export const DOUBLE_SIDE = 2 as const;

/** THREE.ClampToEdgeWrapping */
export const CLAMP_TO_EDGE_WRAPPING = 1001 as const;

// ============================================================================
// Geometry
// ============================================================================

export interface BoxShape {
  type: 'BoxGeometry';
  width: number;
  height: number;
  depth: number;
}

export interface CircleShape {
  type: 'CircleGeometry';
  radius: number;
  segments: number;
  thetaStart: number;
  thetaLength: number;
}

export interface ConeShape {
  type: 'ConeGeometry';
  radius: number;
  height: number;
  radialSegments: number;
  heightSegments: number;
  thetaStart: number;
  thetaLength: number;
}

export interface CylinderShape {
  type: 'CylinderGeometry';
  radiusTop: number;
  radiusBottom: number;
  height: number;
  radialSegments: number;
  heightSegments: number;
  thetaStart: number;
  thetaLength: number;
}

export interface PolyhedronShape {
  type: 'DodecahedronGeometry' | 'IcosahedronGeometry' | 'OctahedronGeometry' | 'TetrahedronGeometry';
  radius: number;
  detail: number;
}

export interface PlaneShape {
  type: 'PlaneGeometry';
  width: number;
  height: number;
  widthSegments: number;
  heightSegments: number;
}

export interface RingShape {
  type: 'RingGeometry';
  innerRadius: number;
  outerRadius: number;
  thetaSegments: number;
  phiSegments: number;
  thetaStart: number;
  thetaLength: number;
}

export interface SphereShape {
  type: 'SphereGeometry';
  radius: number;
  widthSegments: number;
  heightSegments: number;
}

export interface TorusShape {
  type: 'TorusGeometry';
  radius: number;
  tube: number;
  radialSegments: number;
  tubularSegments: number;
}

export interface BufferAttribute {
  itemSize: number;
  type: 'Float32Array';
  array: Float32Array;
  normalized: boolean;
}

export interface BufferShape {
  type: 'BufferGeometry';
  data: {
    attributes: {
      position: BufferAttribute;
      color: BufferAttribute;
      normal?: BufferAttribute;
      uv?: BufferAttribute;
    };
  };
}

/** Mesh file shipped as-is; the viewer parses it */
export interface MeshFileShape {
  type: '_meshfile_geometry';
  format: string;
  /** Text for obj/dae, raw bytes for stl */
  data: string | Uint8Array;
}

export type GeometryShape =
  | BoxShape
  | CircleShape
  | ConeShape
  | CylinderShape
  | PolyhedronShape
  | PlaneShape
  | RingShape
  | SphereShape
  | TorusShape
  | BufferShape
  | MeshFileShape;

export type GeometryType = GeometryShape['type'];

export type GeometryDocument = GeometryShape & { uuid: string };

// ============================================================================
// Material / Texture / Image
// ============================================================================

export type MaterialType =
  | 'MeshBasicMaterial'
  | 'MeshPhongMaterial'
  | 'MeshLambertMaterial'
  | 'MeshToonMaterial'
  | 'LineBasicMaterial'
  | 'PointsMaterial';

export interface MaterialDocument {
  uuid: string;
  type: MaterialType;
  /** Point size, PointsMaterial only */
  size?: number;
  /** 24-bit RGB, e.g. 0x00ff00 */
  color?: number;
  linewidth?: number;
  opacity?: number;
  reflectivity?: number;
  side?: number;
  transparent?: boolean;
  vertexColors?: boolean;
  wireframe?: boolean;
  wireframeLineWidth?: number;
  /** uuid of the texture used as color map */
  map?: string;
}

export interface TextTextureDocument {
  uuid: string;
  type: '_text';
  text: string;
  font_size: number;
  font_face: string;
}

export interface ImageTextureDocument {
  uuid: string;
  image?: string;
  repeat: [number, number];
  wrap: [number, number];
}

export type TextureDocument = TextTextureDocument | ImageTextureDocument;

export interface ImageDocument {
  uuid: string;
  /** data: URL */
  url: string;
}

// ============================================================================
// Object tree
// ============================================================================

export type ObjectType = 'Mesh' | 'Points' | 'LineSegments';

export interface ObjectDocument {
  uuid: string;
  type: ObjectType;
  /** Column-major homogeneous transform, 16 numbers */
  matrix: number[];
  material: string;
  geometry?: string;
  children?: ObjectDocument[];
}

export interface SceneObjectDocument {
  metadata: { type: 'Object'; version: typeof OBJECT_FORMAT_VERSION };
  geometries: GeometryDocument[];
  materials: [MaterialDocument];
  textures?: [TextureDocument];
  images?: [ImageDocument];
  object: ObjectDocument;
}

// ============================================================================
// Properties
// ============================================================================

/** Value type for each settable property */
export interface PropertyValues {
  visible: boolean;
  position: [number, number, number];
  quaternion: [number, number, number, number];
  scale: [number, number, number];
  color: [number, number, number, number];
  opacity: number;
  modulated_opacity: number;
  top_color: [number, number, number];
  bottom_color: [number, number, number];
}

export type PropertyName = keyof PropertyValues;

// ============================================================================
// Commands
// ============================================================================

export interface SetObjectCommand {
  type: 'set_object';
  path: string;
  object: SceneObjectDocument;
}

export interface SetTransformCommand {
  type: 'set_transform';
  path: string;
  matrix: number[];
}

export interface DeleteCommand {
  type: 'delete';
  path: string;
}

export interface SetPropertyCommand<K extends PropertyName = PropertyName> {
  type: 'set_property';
  path: string;
  property: K;
  value: PropertyValues[K];
}

/** Every command that mutates the viewer's scene */
export type SceneCommand = SetObjectCommand | SetTransformCommand | DeleteCommand | SetPropertyCommand;

export type SceneCommandType = SceneCommand['type'];
