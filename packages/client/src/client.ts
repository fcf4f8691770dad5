/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  createLogger,
  deleteCommand,
  encodeCommand,
  encodeUrlRequest,
  normalizeCommand,
  setObjectCommand,
  setPropertyCommand,
  setTransformCommand,
  type PropertyName,
  type PropertyValues,
  type SceneCommand,
  type SceneObjectDocument,
} from '@meshlink/protocol';
import {
  isIsometry,
  isometryToMatrix,
  MathUtils,
  SceneObjectBuilder,
  SceneTree,
  type Isometry,
  type Mat4,
} from '@meshlink/scene';
import { resolveClientConfig } from './config.js';
import { ClientClosedError } from './errors.js';
import type { ClientConfig, Transport } from './types.js';
import { ZmqTransport } from './zmq-transport.js';

const log = createLogger('Client');

export interface MeshcatClientOptions {
  /** Mirror acknowledged commands into `scene` (default: true) */
  mirror?: boolean;
}

/**
 * Client for a running meshcat-server.
 *
 * @example
 * ```typescript
 * const client = createClient({ endpoint: 'tcp://127.0.0.1:6000' });
 *
 * await client.setObject('/box', sceneObject().geometry(boxGeometry(1, 1, 1)));
 * await client.setTransform('/box', isometry([0, 0, 1]));
 * await client.setProperty('/box', 'opacity', 0.5);
 *
 * console.log(client.scene.paths());
 * await client.close();
 * ```
 *
 * Calls are sent one at a time, in the order they were made, whether or
 * not the caller awaits them.
 */
export class MeshcatClient {
  /** What the server has acknowledged so far */
  readonly scene = new SceneTree();

  private readonly mirror: boolean;
  private queue: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;

  constructor(
    private readonly transport: Transport,
    options: MeshcatClientOptions = {},
  ) {
    this.mirror = options.mirror ?? true;
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  async setObject(path: string, object: SceneObjectDocument | SceneObjectBuilder): Promise<string> {
    const doc = object instanceof SceneObjectBuilder ? object.build() : object;
    return this.send(setObjectCommand(path, doc));
  }

  async setTransform(path: string, transform: Mat4 | Isometry): Promise<string> {
    const matrix = isIsometry(transform) ? isometryToMatrix(transform) : transform;
    return this.send(setTransformCommand(path, MathUtils.toArray(matrix)));
  }

  async setProperty<K extends PropertyName>(path: string, property: K, value: PropertyValues[K]): Promise<string> {
    return this.send(setPropertyCommand(path, property, value));
  }

  async delete(path: string): Promise<string> {
    return this.send(deleteCommand(path));
  }

  /**
   * Send a prepared command. The path is normalized and the payload checked
   * again before encoding. Resolves with the server's reply once it
   * arrives; the mirror is updated at the same moment.
   */
  async send(prepared: SceneCommand): Promise<string> {
    const command = normalizeCommand(prepared);
    const frames = encodeCommand(command);
    return this.enqueue(async () => {
      try {
        const reply = await this.transport.request(frames);
        log.info(`Server replied "${reply}"`, { operation: command.type, path: command.path });
        if (this.mirror) {
          this.scene.apply(command);
        }
        return reply;
      } catch (error) {
        log.error('Request failed', error, { operation: command.type, path: command.path });
        throw error;
      }
    });
  }

  /** Web URL of the viewer served by meshcat-server */
  async url(): Promise<string> {
    return this.enqueue(() => this.transport.request(encodeUrlRequest()));
  }

  /**
   * Wait for queued requests, then close the transport. Safe to call twice.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.queue.then(() => this.transport.close());
    }
    return this.closing;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (this.closing) {
      return Promise.reject(new ClientClosedError());
    }
    const result = this.queue.then(task);
    // the chain only tracks completion; callers see the outcome through `result`
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Create a client over a ZeroMQ transport. Options fall back to the
 * MESHLINK_* environment variables, then to the defaults.
 */
export function createClient(config: ClientConfig = {}, env: NodeJS.ProcessEnv = process.env): MeshcatClient {
  const resolved = resolveClientConfig(config, env);
  log.debug('Resolved config', resolved);
  return new MeshcatClient(new ZmqTransport(resolved), { mirror: resolved.mirror });
}
