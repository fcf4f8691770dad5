/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SceneBuildError } from './errors.js';
import { fileExtension, loadMesh, loadPngImage } from './files.js';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'meshlink-scene-'));
  writeFileSync(join(dir, 'part.obj'), 'v 0 0 0\n');
  writeFileSync(join(dir, 'PART.STL'), Buffer.from([1, 2, 3]));
  writeFileSync(join(dir, 'part.ply'), 'ply\n');
  writeFileSync(join(dir, 'logo.png'), Buffer.from([0x89, 0x50]));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('fileExtension', () => {
  it('lower-cases the extension', () => {
    expect(fileExtension('/meshes/Link.DAE')).toBe('dae');
  });

  it('rejects files without one', () => {
    expect(() => fileExtension('/meshes/link')).toThrow('File has no extension: /meshes/link');
  });
});

describe('loadMesh', () => {
  it('reads text formats as strings', () => {
    expect(loadMesh(join(dir, 'part.obj'))).toEqual({ type: '_meshfile_geometry', format: 'obj', data: 'v 0 0 0\n' });
  });

  it('reads stl as bytes', () => {
    const shape = loadMesh(join(dir, 'PART.STL'));
    expect(shape.format).toBe('stl');
    expect(shape.data).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('rejects unknown formats', () => {
    expect(() => loadMesh(join(dir, 'part.ply'))).toThrow('Unsupported mesh format "ply"');
  });

  it('wraps read failures', () => {
    expect(() => loadMesh(join(dir, 'missing.obj'))).toThrow(SceneBuildError);
  });
});

describe('loadPngImage', () => {
  it('embeds the file as a data url', () => {
    expect(loadPngImage(join(dir, 'logo.png')).url).toBe('data:image/png;base64,iVA=');
  });

  it('only accepts png', () => {
    expect(() => loadPngImage(join(dir, 'part.obj'))).toThrow('Unsupported image type "obj"');
  });
});
