/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi } from 'vitest';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { MeshcatClient } from '@meshlink/client';
import { decodeCommand } from '@meshlink/protocol';
import { UrdfParseError } from './errors.js';
import { loadUrdfFile } from './parser.js';
import { publishUrdf, urdfPaths } from './publish.js';
import type { UrdfRobot } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const robot = loadUrdfFile(join(__dirname, '..', 'test-data', 'arm.urdf'));

function recordingClient() {
  const request = vi.fn(async (_frames: readonly Uint8Array[]) => 'ok');
  const client = new MeshcatClient({ request, close: vi.fn(async () => {}) });
  const sent = () => request.mock.calls.map(([frames]) => decodeCommand(frames));
  return { client, sent };
}

describe('urdfPaths', () => {
  it('nests joints and links along the kinematic tree', () => {
    const paths = urdfPaths(robot);
    expect(Object.fromEntries(paths.links)).toEqual({
      base: '/base',
      upper_arm: '/base/shoulder/upper_arm',
      tool: '/base/shoulder/upper_arm/wrist/tool',
    });
    expect(Object.fromEntries(paths.joints)).toEqual({
      shoulder: '/base/shoulder',
      wrist: '/base/shoulder/upper_arm/wrist',
    });
  });

  it('places root links under the prefix', () => {
    const paths = urdfPaths(robot, 'robots/arm/');
    expect(paths.links.get('base')).toBe('/robots/arm/base');
    expect(paths.joints.get('wrist')).toBe('/robots/arm/base/shoulder/upper_arm/wrist');
  });

  it('does not depend on joint order', () => {
    const reversed: UrdfRobot = { ...robot, joints: [...robot.joints].reverse() };
    expect(urdfPaths(reversed).links.get('tool')).toBe('/base/shoulder/upper_arm/wrist/tool');
  });

  it('rejects joint cycles', () => {
    const cyclic: UrdfRobot = {
      ...robot,
      joints: [...robot.joints, { ...robot.joints[1], name: 'back', parent: 'tool', child: 'base' }],
    };
    expect(() => urdfPaths(cyclic)).toThrow(UrdfParseError);
  });
});

describe('publishUrdf', () => {
  it('clears the old robot, then sends links and joint poses', async () => {
    const { client, sent } = recordingClient();

    const result = await publishUrdf(client, robot);

    expect(result.published).toEqual(['base', 'upper_arm']);
    expect(sent().map((command) => `${command.type} ${command.path}`)).toEqual([
      'delete /base',
      'delete /base/shoulder/upper_arm',
      'delete /base/shoulder/upper_arm/wrist/tool',
      'delete /base/shoulder',
      'delete /base/shoulder/upper_arm/wrist',
      'set_object /base',
      'set_object /base/shoulder/upper_arm',
      'set_transform /base/shoulder',
      'set_transform /base/shoulder/upper_arm/wrist',
    ]);
  });

  it('carries visual colors into the material', async () => {
    const { client } = recordingClient();
    await publishUrdf(client, robot);

    expect(client.scene.get('/base')?.object?.materials[0]).toMatchObject({ color: 0x0000ff });
    expect(client.scene.get('/base/shoulder/upper_arm')?.object?.materials[0]).toMatchObject({
      color: 0xff0000,
      opacity: 0.5,
      transparent: true,
    });
    expect(client.scene.get('/base/shoulder/upper_arm/wrist')?.matrix?.slice(12)).toEqual([0, 0, 0.4, 1]);
  });

  it('publishes collision geometry on request', async () => {
    const { client } = recordingClient();
    const result = await publishUrdf(client, robot, { useCollision: true, prefix: '/collision' });

    expect(result.published).toEqual(['base']);
    const object = client.scene.get('/collision/base')?.object;
    expect(object?.geometries.map((geometry) => geometry.type)).toEqual(['CylinderGeometry']);
    expect(object?.materials[0].color).toBeUndefined();
  });
});
