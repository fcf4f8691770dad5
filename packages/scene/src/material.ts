/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Materials, textures and images
 * https://threejs.org/docs/index.html#api/en/materials/Material
 */

import { randomUUID } from 'node:crypto';
import {
  CLAMP_TO_EDGE_WRAPPING,
  DOUBLE_SIDE,
  type ImageDocument,
  type ImageTextureDocument,
  type MaterialDocument,
  type TextTextureDocument,
  type TextureDocument,
} from '@meshlink/protocol';
import { SceneBuildError } from './errors.js';

export type MaterialOptions = Partial<Omit<MaterialDocument, 'uuid' | 'map'>>;

/**
 * Create a material. Defaults to a double-sided MeshPhongMaterial.
 */
export function createMaterial(options: MaterialOptions = {}): MaterialDocument {
  const { type = 'MeshPhongMaterial', side = DOUBLE_SIDE, ...rest } = options;

  if (type === 'PointsMaterial' && rest.size === undefined) {
    throw new SceneBuildError('PointsMaterial requires a point size');
  }
  if (rest.size !== undefined && !(rest.size > 0)) {
    throw new SceneBuildError(`Point size must be positive, got ${rest.size}`);
  }
  if (rest.color !== undefined && (!Number.isInteger(rest.color) || rest.color < 0 || rest.color > 0xffffff)) {
    throw new SceneBuildError(`Color must be a 24-bit RGB integer, got ${rest.color}`);
  }
  if (rest.opacity !== undefined && !(rest.opacity >= 0 && rest.opacity <= 1)) {
    throw new SceneBuildError(`Opacity must be within [0, 1], got ${rest.opacity}`);
  }

  return { uuid: randomUUID(), type, side, ...rest };
}

/**
 * Parse '#rrggbb', 'rrggbb' or '0xrrggbb' into a 24-bit color
 */
export function parseHexColor(value: string): number {
  const hex = value.trim().replace(/^(#|0x)/i, '');
  if (!/^[0-9a-f]{6}$/i.test(hex)) {
    throw new SceneBuildError(`Invalid hex color "${value}"`);
  }
  return parseInt(hex, 16);
}

// ============================================================================
// Textures
// ============================================================================

export function textTexture(text: string, fontSize = 100, fontFace = 'sans-serif'): TextTextureDocument {
  if (!Number.isInteger(fontSize) || fontSize <= 0) {
    throw new SceneBuildError(`Font size must be a positive integer, got ${fontSize}`);
  }
  return { uuid: randomUUID(), type: '_text', text, font_size: fontSize, font_face: fontFace };
}

/** Image texture; its image uuid is filled in when the object is built */
export function imageTexture(): ImageTextureDocument {
  return {
    uuid: randomUUID(),
    repeat: [1, 1],
    wrap: [CLAMP_TO_EDGE_WRAPPING, CLAMP_TO_EDGE_WRAPPING],
  };
}

export function isTextTexture(texture: TextureDocument): texture is TextTextureDocument {
  return 'type' in texture && texture.type === '_text';
}

export function createImage(url: string): ImageDocument {
  if (!url.startsWith('data:')) {
    throw new SceneBuildError('Image url must be a data: URL');
  }
  return { uuid: randomUUID(), url };
}
