/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { ConfigError } from './errors.js';
import type { ClientConfig, ResolvedClientConfig } from './types.js';

export const DEFAULT_ENDPOINT = 'tcp://127.0.0.1:6000';
export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_RETRIES = 0;

export const ENV_ENDPOINT = 'MESHLINK_ENDPOINT';
export const ENV_TIMEOUT = 'MESHLINK_TIMEOUT_MS';
export const ENV_RETRIES = 'MESHLINK_RETRIES';

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parseInteger(key: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`, key);
  }
  return Number(raw);
}

function checkEndpoint(endpoint: string): string {
  if (!/^[a-z]+:\/\/\S+$/i.test(endpoint)) {
    throw new ConfigError(`Invalid endpoint "${endpoint}", expected e.g. ${DEFAULT_ENDPOINT}`, 'endpoint');
  }
  return endpoint;
}

/**
 * Merge explicit options, then MESHLINK_* environment variables, then defaults.
 */
export function resolveClientConfig(
  options: ClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedClientConfig {
  const envTimeout = fromEnv(env, ENV_TIMEOUT);
  const envRetries = fromEnv(env, ENV_RETRIES);

  const endpoint = checkEndpoint(options.endpoint ?? fromEnv(env, ENV_ENDPOINT) ?? DEFAULT_ENDPOINT);
  const timeout = options.timeout ?? (envTimeout !== undefined ? parseInteger(ENV_TIMEOUT, envTimeout) : DEFAULT_TIMEOUT_MS);
  const retries = options.retries ?? (envRetries !== undefined ? parseInteger(ENV_RETRIES, envRetries) : DEFAULT_RETRIES);

  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`timeout must be a positive integer, got ${timeout}`, 'timeout');
  }
  if (!Number.isInteger(retries) || retries < 0) {
    throw new ConfigError(`retries must be a non-negative integer, got ${retries}`, 'retries');
  }

  return { endpoint, timeout, retries, mirror: options.mirror ?? true };
}
