/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Client configuration.
 */
export interface ClientConfig {
  /** ZeroMQ endpoint of meshcat-server (default: tcp://127.0.0.1:6000) */
  endpoint?: string;
  /** Milliseconds to wait for a reply before the request counts as lost (default: 5000) */
  timeout?: number;
  /** Extra attempts after a lost reply (default: 0) */
  retries?: number;
  /** Keep a local SceneTree of everything acknowledged (default: true) */
  mirror?: boolean;
}

export type ResolvedClientConfig = Required<ClientConfig>;

/**
 * Request/reply channel to the server. One request is in flight at a time;
 * the reply is the server's text acknowledgement.
 */
export interface Transport {
  request(frames: readonly Uint8Array[]): Promise<string>;
  close(): Promise<void>;
}
