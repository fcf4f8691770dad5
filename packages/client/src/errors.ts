/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Invalid option or environment value */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Socket failure other than a lost reply */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly timeout: number,
    public readonly attempts: number,
  ) {
    super(`No reply from ${endpoint} within ${timeout}ms after ${attempts} attempt(s)`);
    this.name = 'RequestTimeoutError';
  }
}

export class ClientClosedError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Client is closed', options);
    this.name = 'ClientClosedError';
  }
}
