/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ZmqTransport — REQ socket talking to meshcat-server.
 *
 * A REQ socket that lost a reply is stuck: it refuses to send again until
 * it receives. On timeout the socket is thrown away and a fresh one is
 * connected before the next attempt.
 */

import { Request } from 'zeromq';
import { createLogger } from '@meshlink/protocol';
import { ClientClosedError, RequestTimeoutError, TransportError } from './errors.js';
import type { ResolvedClientConfig, Transport } from './types.js';

const log = createLogger('ZmqTransport');

export type ZmqTransportOptions = Pick<ResolvedClientConfig, 'endpoint' | 'timeout' | 'retries'>;

function isTimeout(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EAGAIN';
}

export class ZmqTransport implements Transport {
  private socket: Request | null = null;
  private closed = false;

  constructor(private readonly options: ZmqTransportOptions) {}

  get endpoint(): string {
    return this.options.endpoint;
  }

  async request(frames: readonly Uint8Array[]): Promise<string> {
    const { endpoint, timeout, retries } = this.options;

    for (let attempt = 1; ; attempt++) {
      const socket = this.connect();
      try {
        await socket.send([...frames]);
        const [reply] = await socket.receive();
        return reply === undefined ? '' : reply.toString('utf-8');
      } catch (error) {
        this.reset();
        if (this.closed) {
          throw new ClientClosedError({ cause: error });
        }
        if (!isTimeout(error)) {
          const message = error instanceof Error ? error.message : String(error);
          throw new TransportError(`Request to ${endpoint} failed: ${message}`, endpoint, { cause: error });
        }
        if (attempt > retries) {
          throw new RequestTimeoutError(endpoint, timeout, attempt);
        }
        log.caught(`Attempt ${attempt} timed out`, error, { operation: 'request' });
        log.warn(`No reply within ${timeout}ms, reconnecting (retry ${attempt}/${retries})`, {
          operation: 'request',
        });
      }
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.reset();
  }

  private connect(): Request {
    if (this.closed) {
      throw new ClientClosedError();
    }
    if (this.socket) {
      return this.socket;
    }
    const { endpoint, timeout } = this.options;
    const socket = new Request({ receiveTimeout: timeout, sendTimeout: timeout, linger: 0 });
    try {
      socket.connect(endpoint);
    } catch (error) {
      socket.close();
      throw new TransportError(`Unable to connect to ${endpoint}`, endpoint, { cause: error });
    }
    log.info(`Connected to ${endpoint}`, { operation: 'connect' });
    this.socket = socket;
    return socket;
  }

  private reset(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }
}
