/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when parsing an invalid robot description */
export class UrdfParseError extends Error {
  constructor(
    message: string,
    public details?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UrdfParseError';
  }
}

/** Geometry kinds the viewer has no primitive for */
export class UnsupportedGeometryError extends Error {
  constructor(public readonly geometryType: string) {
    super(`${geometryType} geometry is not supported by meshcat`);
    this.name = 'UnsupportedGeometryError';
  }
}
