/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when a path, command or wire message is malformed */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}
