/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when a geometry, material or object cannot be built */
export class SceneBuildError extends Error {
  constructor(
    message: string,
    public details?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SceneBuildError';
  }
}
