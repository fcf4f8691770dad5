/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Mesh and image files read from disk and shipped as-is. The viewer does
 * the parsing.
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import type { ImageDocument, MeshFileShape } from '@meshlink/protocol';
import { SceneBuildError } from './errors.js';
import { meshFileGeometry } from './geometry.js';
import { createImage } from './material.js';

const TEXT_MESH_FORMATS = new Set(['obj', 'dae']);
const BINARY_MESH_FORMATS = new Set(['stl']);

/** Lower-case extension without the dot */
export function fileExtension(file: string): string {
  const ext = extname(file).slice(1).toLowerCase();
  if (!ext) {
    throw new SceneBuildError(`File has no extension: ${file}`);
  }
  return ext;
}

function read(file: string): Buffer {
  try {
    return readFileSync(file);
  } catch (error) {
    throw new SceneBuildError(`Unable to load file '${file}'`, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}

export function loadMesh(file: string): MeshFileShape {
  const format = fileExtension(file);
  if (TEXT_MESH_FORMATS.has(format)) {
    return meshFileGeometry(format, read(file).toString('utf-8'));
  }
  if (BINARY_MESH_FORMATS.has(format)) {
    return meshFileGeometry(format, new Uint8Array(read(file)));
  }
  throw new SceneBuildError(`Unsupported mesh format "${format}"`, file);
}

export function loadPngImage(file: string): ImageDocument {
  const format = fileExtension(file);
  if (format !== 'png') {
    throw new SceneBuildError(`Unsupported image type "${format}"`, file);
  }
  return createImage(`data:image/png;base64,${read(file).toString('base64')}`);
}
