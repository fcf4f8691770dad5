/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Wire codec for meshcat-server.
 *
 * A command travels as a three-frame ZeroMQ multipart message:
 *
 *   [ type (utf-8) | path (utf-8) | msgpack(command) ]
 *
 * The msgpack body is the full command encoded as a map. Typed arrays use
 * the extension codes the meshcat viewer registers, so vertex buffers
 * cross the wire as raw little-endian bytes instead of element lists.
 */

import { decode, encode, ExtensionCodec } from '@msgpack/msgpack';
import {
  assertPropertyValue,
  deleteCommand,
  isPropertyName,
  setObjectCommand,
  setPropertyCommand,
  setTransformCommand,
} from './commands.js';
import { ProtocolError } from './errors.js';
import type { SceneCommand, SceneObjectDocument } from './types.js';

// ============================================================================
// Extension types
// ============================================================================

export const EXT_UINT8_ARRAY = 0x12;
export const EXT_INT32_ARRAY = 0x15;
export const EXT_UINT32_ARRAY = 0x16;
export const EXT_FLOAT32_ARRAY = 0x17;

/** Copy the payload out of the decode buffer so the typed view is aligned */
function alignedBuffer(data: Uint8Array) {
  return data.slice().buffer;
}

function viewBytes(array: ArrayBufferView): Uint8Array {
  return new Uint8Array(array.buffer, array.byteOffset, array.byteLength);
}

export const extensionCodec = new ExtensionCodec();

extensionCodec.register({
  type: EXT_FLOAT32_ARRAY,
  encode: (input: unknown) => (input instanceof Float32Array ? viewBytes(input) : null),
  decode: (data: Uint8Array) => new Float32Array(alignedBuffer(data)),
});

extensionCodec.register({
  type: EXT_UINT32_ARRAY,
  encode: (input: unknown) => (input instanceof Uint32Array ? viewBytes(input) : null),
  decode: (data: Uint8Array) => new Uint32Array(alignedBuffer(data)),
});

extensionCodec.register({
  type: EXT_INT32_ARRAY,
  encode: (input: unknown) => (input instanceof Int32Array ? viewBytes(input) : null),
  decode: (data: Uint8Array) => new Int32Array(alignedBuffer(data)),
});

// Plain Uint8Array goes out as msgpack bin; the code is only read back
extensionCodec.register({
  type: EXT_UINT8_ARRAY,
  encode: () => null,
  decode: (data: Uint8Array) => data.slice(),
});

// ============================================================================
// Frames
// ============================================================================

export type CommandFrames = [type: Uint8Array, path: Uint8Array, body: Uint8Array];

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export function encodeBody(value: unknown): Uint8Array {
  return encode(value, { extensionCodec, ignoreUndefined: true });
}

export function decodeBody(body: Uint8Array): unknown {
  return decode(body, { extensionCodec });
}

export function encodeCommand(command: SceneCommand): CommandFrames {
  return [textEncoder.encode(command.type), textEncoder.encode(command.path), encodeBody(command)];
}

/** The `url` request asks the server for the viewer address */
export function encodeUrlRequest(): [Uint8Array] {
  return [textEncoder.encode('url')];
}

/**
 * Decode a three-frame message back into a validated command.
 */
export function decodeCommand(frames: readonly Uint8Array[]): SceneCommand {
  if (frames.length !== 3) {
    throw new ProtocolError(`Expected 3 frames, got ${frames.length}`);
  }
  const type = textDecoder.decode(frames[0]);
  const path = textDecoder.decode(frames[1]);

  let body: unknown;
  try {
    body = decodeBody(frames[2]);
  } catch (error) {
    throw new ProtocolError('Malformed msgpack body', path, { cause: error });
  }
  if (!isRecord(body)) {
    throw new ProtocolError('Command body is not a map', path);
  }
  if (body.type !== type || body.path !== path) {
    throw new ProtocolError(
      `Frame header (${type} ${path}) does not match body (${String(body.type)} ${String(body.path)})`,
      path
    );
  }

  switch (type) {
    case 'set_object':
      if (!isSceneObjectDocument(body.object)) {
        throw new ProtocolError('set_object body has no valid object document', path);
      }
      return setObjectCommand(path, body.object);
    case 'set_transform':
      if (!isNumberArray(body.matrix)) {
        throw new ProtocolError('set_transform body has no numeric matrix', path);
      }
      return setTransformCommand(path, body.matrix);
    case 'delete':
      return deleteCommand(path);
    case 'set_property': {
      const property = body.property;
      if (typeof property !== 'string' || !isPropertyName(property)) {
        throw new ProtocolError(`Unknown property "${String(property)}"`, path);
      }
      const value = body.value;
      assertPropertyValue(path, property, value);
      return setPropertyCommand(path, property, value);
    }
    default:
      throw new ProtocolError(`Unknown command type "${type}"`, path);
  }
}

// ============================================================================
// Guards
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function isSceneObjectDocument(value: unknown): value is SceneObjectDocument {
  return (
    isRecord(value) &&
    isRecord(value.metadata) &&
    value.metadata.type === 'Object' &&
    Array.isArray(value.geometries) &&
    Array.isArray(value.materials) &&
    value.materials.length === 1 &&
    isRecord(value.object) &&
    typeof value.object.uuid === 'string'
  );
}
