/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshlink/protocol
 *
 * Command types, scene paths and the msgpack wire codec spoken by
 * meshcat-server.
 *
 * ```ts
 * import { setPropertyCommand, encodeCommand } from '@meshlink/protocol';
 *
 * const frames = encodeCommand(setPropertyCommand('/Axes', 'visible', false));
 * ```
 */

export * from './types.js';
export { ProtocolError } from './errors.js';
export { ROOT_PATH, normalizePath, splitPath, joinPath, parentPath, isDescendantPath } from './path.js';
export {
  PROPERTY_NAMES,
  isPropertyName,
  setObjectCommand,
  setTransformCommand,
  deleteCommand,
  setPropertyCommand,
  assertPropertyValue,
  normalizeCommand,
} from './commands.js';
export {
  EXT_UINT8_ARRAY,
  EXT_INT32_ARRAY,
  EXT_UINT32_ARRAY,
  EXT_FLOAT32_ARRAY,
  extensionCodec,
  encodeBody,
  decodeBody,
  encodeCommand,
  encodeUrlRequest,
  decodeCommand,
} from './codec.js';
export type { CommandFrames } from './codec.js';
export { createLogger } from './logger.js';
export type { Logger, LogContext } from './logger.js';
