/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * SceneObjectBuilder — bundle geometries, a material and an optional
 * texture/image into one set_object payload.
 *
 * The root object carries the material and the pose; every geometry
 * becomes a child object placed at the geometry's origin:
 *
 * ```ts
 * const doc = sceneObject()
 *   .geometry(boxGeometry(0.5, 0.5, 0.5))
 *   .geometry(cylinderGeometry(0.1, 1), isometry([0, 0, 0.5]))
 *   .material({ color: 0xff00ff })
 *   .pose(isometry([0, 1, 0]))
 *   .build();
 * ```
 */

import { randomUUID } from 'node:crypto';
import {
  OBJECT_FORMAT_VERSION,
  type GeometryShape,
  type ImageDocument,
  type MaterialDocument,
  type ObjectDocument,
  type ObjectType,
  type SceneObjectDocument,
  type TextureDocument,
} from '@meshlink/protocol';
import { SceneBuildError } from './errors.js';
import { createGeometry, isGeometry, planeGeometry, toGeometryDocument } from './geometry.js';
import { createMaterial, isTextTexture, textTexture, type MaterialOptions } from './material.js';
import { identityIsometry, isIsometry, isometry, isometryToMatrix, MathUtils, multiplyIsometry } from './math.js';
import type { Geometry, Isometry, Mat4 } from './types.js';

/** meshcat cylinders are y-up; robot descriptions put the axis on z */
const CYLINDER_CORRECTION: Isometry = isometry([0, 0, 0], [Math.PI / 2, 0, 0]);

function isMaterialDocument(material: MaterialDocument | MaterialOptions): material is MaterialDocument {
  return 'uuid' in material && typeof material.uuid === 'string';
}

export class SceneObjectBuilder {
  private geometries: Geometry[] = [];
  private materialDoc: MaterialDocument | null = null;
  private textureDoc: TextureDocument | null = null;
  private imageDoc: ImageDocument | null = null;
  private objectType: ObjectType = 'Mesh';
  private objectPose: Isometry | Mat4 = identityIsometry();

  /**
   * Add a geometry. A bare shape is placed at `origin` (identity by default).
   */
  geometry(geometry: GeometryShape | Geometry, origin?: Isometry): this {
    if (isGeometry(geometry)) {
      this.geometries.push(origin ? { ...geometry, origin } : geometry);
    } else {
      this.geometries.push(createGeometry(geometry, origin));
    }
    return this;
  }

  material(material: MaterialDocument | MaterialOptions): this {
    this.materialDoc = isMaterialDocument(material) ? material : createMaterial(material);
    return this;
  }

  texture(texture: TextureDocument): this {
    this.textureDoc = texture;
    return this;
  }

  image(image: ImageDocument): this {
    this.imageDoc = image;
    return this;
  }

  type(type: ObjectType): this {
    this.objectType = type;
    return this;
  }

  pose(pose: Isometry | Mat4): this {
    this.objectPose = pose;
    return this;
  }

  build(): SceneObjectDocument {
    if (this.geometries.length === 0) {
      throw new SceneBuildError('A scene object needs at least one geometry');
    }

    let texture: TextureDocument | null = this.textureDoc ? { ...this.textureDoc } : null;
    const image = this.imageDoc;
    if (image && texture && !isTextTexture(texture)) {
      texture = { ...texture, image: image.uuid };
    }

    const material: MaterialDocument = { ...(this.materialDoc ?? createMaterial()) };
    if (texture) {
      material.map = texture.uuid;
    }

    const children: ObjectDocument[] = this.geometries.map((geometry) => {
      const pose = geometry.shape.type === 'CylinderGeometry'
        ? multiplyIsometry(geometry.origin, CYLINDER_CORRECTION)
        : geometry.origin;
      return {
        uuid: randomUUID(),
        type: this.objectType,
        matrix: MathUtils.toArray(isometryToMatrix(pose)),
        material: material.uuid,
        geometry: geometry.uuid,
      };
    });

    const matrix = isIsometry(this.objectPose) ? isometryToMatrix(this.objectPose) : this.objectPose;

    const doc: SceneObjectDocument = {
      metadata: { type: 'Object', version: OBJECT_FORMAT_VERSION },
      geometries: this.geometries.map(toGeometryDocument),
      materials: [material],
      object: {
        uuid: randomUUID(),
        type: this.objectType,
        matrix: MathUtils.toArray(matrix),
        material: material.uuid,
        children,
      },
    };
    if (texture) {
      doc.textures = [texture];
    }
    if (image) {
      doc.images = [image];
    }
    return doc;
  }
}

export function sceneObject(): SceneObjectBuilder {
  return new SceneObjectBuilder();
}

export interface SceneTextOptions {
  fontSize?: number;
  fontFace?: string;
  /** Plane size in scene units */
  width?: number;
  height?: number;
}

/**
 * Text rendered onto a transparent plane
 */
export function sceneText(text: string, options: SceneTextOptions = {}): SceneObjectDocument {
  return sceneObject()
    .texture(textTexture(text, options.fontSize ?? 100, options.fontFace ?? 'sans-serif'))
    .geometry(planeGeometry(options.width ?? 10, options.height ?? 10))
    .material({ type: 'MeshPhongMaterial', transparent: true })
    .build();
}
