/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { decodeCommand, setPropertyCommand } from '@meshlink/protocol';
import { boxGeometry, isometry, sceneObject } from '@meshlink/scene';
import { MeshcatClient } from './client.js';
import { ClientClosedError, TransportError } from './errors.js';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

/** Transport whose replies are released by the test */
function manualTransport() {
  const replies: Array<{ resolve: (reply: string) => void; reject: (error: Error) => void }> = [];
  const request = vi.fn(
    (_frames: readonly Uint8Array[]) =>
      new Promise<string>((resolve, reject) => {
        replies.push({ resolve, reject });
      })
  );
  const close = vi.fn(async () => {});
  return { transport: { request, close }, replies };
}

function sentPath(frames: readonly Uint8Array[]): string {
  return decodeCommand(frames).path;
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('MeshcatClient', () => {
  it('sends one request at a time, in call order', async () => {
    const { transport, replies } = manualTransport();
    const client = new MeshcatClient(transport);

    const first = client.delete('/a');
    const second = client.delete('/b');
    await flush();
    expect(transport.request).toHaveBeenCalledTimes(1);

    replies[0].resolve('ok');
    await expect(first).resolves.toBe('ok');
    await flush();
    expect(transport.request).toHaveBeenCalledTimes(2);

    replies[1].resolve('ok');
    await expect(second).resolves.toBe('ok');
    expect(transport.request.mock.calls.map(([frames]) => sentPath(frames))).toEqual(['/a', '/b']);
  });

  it('updates the mirror only after the reply', async () => {
    const { transport, replies } = manualTransport();
    const client = new MeshcatClient(transport);

    const pending = client.setObject('/box', sceneObject().geometry(boxGeometry(1, 1, 1)));
    await flush();
    expect(client.scene.has('/box')).toBe(false);

    replies[0].resolve('ok');
    await pending;
    expect(client.scene.get('/box')?.object?.geometries[0]).toMatchObject({ type: 'BoxGeometry' });
  });

  it('sends transforms as column-major arrays', async () => {
    const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'ok');
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });

    await client.setTransform('/robot', isometry([1, 2, 3]));

    expect(decodeCommand(request.mock.calls[0][0])).toEqual({
      type: 'set_transform',
      path: '/robot',
      matrix: [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 1, 2, 3, 1],
    });
    expect(client.scene.get('/robot')?.matrix?.slice(12)).toEqual([1, 2, 3, 1]);
  });

  it('keeps going after a failed request', async () => {
    const request = vi
      .fn(async (_frames: readonly Uint8Array[]) => 'ok')
      .mockRejectedValueOnce(new TransportError('Request to tcp://test failed: boom', 'tcp://test'));
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });

    const failed = client.setProperty('/a', 'visible', false);
    const next = client.setProperty('/b', 'visible', true);

    await expect(failed).rejects.toBeInstanceOf(TransportError);
    await expect(next).resolves.toBe('ok');
    expect(client.scene.has('/a')).toBe(false);
    expect(client.scene.get('/b')?.properties).toEqual({ visible: true });
  });

  it('rejects invalid commands without sending them', async () => {
    const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'ok');
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });

    await expect(client.setProperty('/a', 'opacity', Number.NaN)).rejects.toThrow(
      'Property "opacity" expects a finite number'
    );
    expect(request).not.toHaveBeenCalled();
  });

  it('normalizes prepared commands before sending them', async () => {
    const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'ok');
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });

    await client.send({ type: 'set_property', path: 'a//b', property: 'visible', value: false });

    expect(sentPath(request.mock.calls[0][0])).toBe('/a/b');
    expect(client.scene.get('/a/b')?.properties).toEqual({ visible: false });
  });

  it('rejects malformed prepared commands without sending them', async () => {
    const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'ok');
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });

    await expect(client.send({ type: 'set_transform', path: 'a//b', matrix: [1] })).rejects.toThrow(
      'Transform matrix must have 16 elements, got 1'
    );
    expect(request).not.toHaveBeenCalled();
    expect(client.scene.size).toBe(0);
  });

  it('leaves the mirror alone when mirroring is off', async () => {
    const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'ok');
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) }, { mirror: false });

    await client.send(setPropertyCommand('/a', 'scale', [2, 2, 2]));
    expect(client.scene.size).toBe(0);
  });

  it('asks for the viewer url', async () => {
    const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'http://127.0.0.1:7000/static/');
    const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });

    await expect(client.url()).resolves.toBe('http://127.0.0.1:7000/static/');
    const [frames] = request.mock.calls[0];
    expect(frames.map((frame) => new TextDecoder().decode(frame))).toEqual(['url']);
    expect(client.scene.size).toBe(0);
  });

  it('drains the queue before closing', async () => {
    const { transport, replies } = manualTransport();
    const client = new MeshcatClient(transport);

    const pending = client.delete('/a');
    const closing = client.close();
    await flush();
    expect(transport.close).not.toHaveBeenCalled();

    replies[0].resolve('ok');
    await pending;
    await closing;
    expect(transport.close).toHaveBeenCalledTimes(1);

    await client.close();
    expect(transport.close).toHaveBeenCalledTimes(1);
    expect(client.closed).toBe(true);
    await expect(client.delete('/b')).rejects.toBeInstanceOf(ClientClosedError);
    await expect(client.url()).rejects.toBeInstanceOf(ClientClosedError);
  });
});
