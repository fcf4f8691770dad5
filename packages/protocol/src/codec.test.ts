/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { decodeBody, decodeCommand, encodeBody, encodeCommand, encodeUrlRequest } from './codec.js';
import { deleteCommand, setObjectCommand, setPropertyCommand } from './commands.js';
import { ProtocolError } from './errors.js';
import type { SceneObjectDocument } from './types.js';

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
const text = new TextDecoder();

function pointCloud(): SceneObjectDocument {
  return {
    metadata: { type: 'Object', version: 4.5 },
    geometries: [
      {
        uuid: 'geometry-1',
        type: 'BufferGeometry',
        data: {
          attributes: {
            position: { itemSize: 3, type: 'Float32Array', array: new Float32Array([0, 0, 0, 1, 2, 3]), normalized: false },
            color: { itemSize: 3, type: 'Float32Array', array: new Float32Array([1, 0, 0, 0, 1, 0]), normalized: false },
          },
        },
      },
    ],
    materials: [{ uuid: 'material-1', type: 'PointsMaterial', size: 0.01, vertexColors: true, side: 2 }],
    object: {
      uuid: 'object-1',
      type: 'Points',
      matrix: IDENTITY,
      material: 'material-1',
      children: [{ uuid: 'object-2', type: 'Points', matrix: IDENTITY, material: 'material-1', geometry: 'geometry-1' }],
    },
  };
}

describe('encodeCommand', () => {
  it('writes type and path frames ahead of the body', () => {
    const [type, path, body] = encodeCommand(deleteCommand('/head_1'));
    expect(text.decode(type)).toBe('delete');
    expect(text.decode(path)).toBe('/head_1');
    expect(decodeBody(body)).toEqual({ type: 'delete', path: '/head_1' });
  });

  it('encodes Float32Array as extension 0x17 with little-endian bytes', () => {
    const bytes = encodeBody(new Float32Array([1, 2]));
    expect(Array.from(bytes)).toEqual([0xd7, 0x17, 0x00, 0x00, 0x80, 0x3f, 0x00, 0x00, 0x00, 0x40]);
  });

  it('encodes Int32Array as extension 0x15', () => {
    expect(Array.from(encodeBody(new Int32Array([-1])))).toEqual([0xd6, 0x15, 0xff, 0xff, 0xff, 0xff]);
  });

  it('reads integer index buffers back as typed arrays', () => {
    const signed = decodeBody(encodeBody(new Int32Array([-2, 0, 7])));
    expect(signed).toBeInstanceOf(Int32Array);
    expect(Array.from(signed instanceof Int32Array ? signed : [])).toEqual([-2, 0, 7]);

    const unsigned = decodeBody(encodeBody({ index: new Uint32Array([0, 1, 2, 4294967295]) }));
    expect(unsigned).toEqual({ index: new Uint32Array([0, 1, 2, 4294967295]) });
  });

  it('reads extension 0x12 as plain bytes', () => {
    const decoded = decodeBody(new Uint8Array([0xc7, 0x03, 0x12, 1, 2, 3]));
    expect(decoded).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('drops undefined fields', () => {
    expect(decodeBody(encodeBody({ color: 0xff0000, opacity: undefined }))).toEqual({ color: 0xff0000 });
  });

  it('keeps plain bytes as binary', () => {
    const decoded = decodeBody(encodeBody(new Uint8Array([1, 2, 3])));
    expect(decoded).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('encodes the url request as a single frame', () => {
    const frames = encodeUrlRequest();
    expect(frames).toHaveLength(1);
    expect(text.decode(frames[0])).toBe('url');
  });
});

describe('decodeCommand', () => {
  it('restores a set_object command with typed vertex buffers', () => {
    const command = setObjectCommand('/point_cloud', pointCloud());
    const decoded = decodeCommand(encodeCommand(command));
    expect(decoded.type).toBe('set_object');
    if (decoded.type !== 'set_object') return;
    const geometry = decoded.object.geometries[0];
    expect(geometry.type).toBe('BufferGeometry');
    if (geometry.type !== 'BufferGeometry') return;
    expect(geometry.data.attributes.position.array).toBeInstanceOf(Float32Array);
    expect(Array.from(geometry.data.attributes.position.array)).toEqual([0, 0, 0, 1, 2, 3]);
  });

  it('restores a set_property command', () => {
    const command = setPropertyCommand('/torus', 'scale', [2, 2, 2]);
    expect(decodeCommand(encodeCommand(command))).toEqual(command);
  });

  it('rejects frames whose header disagrees with the body', () => {
    const [, , body] = encodeCommand(deleteCommand('/a'));
    const frames = [new TextEncoder().encode('delete'), new TextEncoder().encode('/b'), body];
    expect(() => decodeCommand(frames)).toThrow(ProtocolError);
  });

  it('rejects the wrong frame count', () => {
    expect(() => decodeCommand(encodeUrlRequest())).toThrow('Expected 3 frames, got 1');
  });

  it('rejects unknown properties', () => {
    const encoder = new TextEncoder();
    const frames = [
      encoder.encode('set_property'),
      encoder.encode('/a'),
      encodeBody({ type: 'set_property', path: '/a', property: 'zoom', value: 2 }),
    ];
    expect(() => decodeCommand(frames)).toThrow('Unknown property "zoom"');
  });
});
