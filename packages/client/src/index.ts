/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @meshlink/client
 *
 * Ordered request client for meshcat-server over ZeroMQ.
 */

export { MeshcatClient, createClient } from './client.js';
export type { MeshcatClientOptions } from './client.js';
export { ZmqTransport } from './zmq-transport.js';
export type { ZmqTransportOptions } from './zmq-transport.js';
export {
  resolveClientConfig,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RETRIES,
  ENV_ENDPOINT,
  ENV_TIMEOUT,
  ENV_RETRIES,
} from './config.js';
export { ConfigError, TransportError, RequestTimeoutError, ClientClosedError } from './errors.js';
export type { ClientConfig, ResolvedClientConfig, Transport } from './types.js';
