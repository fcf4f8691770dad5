/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Demo scene: every primitive shape, a point cloud and a text label,
 * followed by a short animation.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { MeshcatClient } from '@meshlink/client';
import type { GeometryShape, SceneObjectDocument } from '@meshlink/protocol';
import {
  boxGeometry,
  bufferGeometry,
  circleGeometry,
  coneGeometry,
  createMaterial,
  cylinderGeometry,
  dodecahedronGeometry,
  icosahedronGeometry,
  isometry,
  MathUtils,
  octahedronGeometry,
  planeGeometry,
  ringGeometry,
  sceneObject,
  sceneText,
  sphereGeometry,
  tetrahedronGeometry,
  torusGeometry,
  type Vec3,
} from '@meshlink/scene';

export type DemoObject = [path: string, object: SceneObjectDocument];

function shape(geometry: GeometryShape, at: Vec3, color?: number): SceneObjectDocument {
  const builder = sceneObject().geometry(geometry).pose(isometry(at));
  if (color !== undefined) {
    builder.material({ color });
  }
  return builder.build();
}

export function pointCloud(count: number, random: () => number = Math.random): SceneObjectDocument {
  const position = Float32Array.from({ length: count * 3 }, () => random());
  return sceneObject()
    .geometry(bufferGeometry({ position, color: position }))
    .material(createMaterial({ type: 'PointsMaterial', size: 0.001, vertexColors: true }))
    .type('Points')
    .pose(isometry([2, -2, 0]))
    .build();
}

export function demoScene(points = 10_000): DemoObject[] {
  return [
    ['/torus', shape(torusGeometry(0.5, 0.2), [0, 2, 0], 0x00ff00)],
    ['/tetrahedron', shape(tetrahedronGeometry(0.5), [1, 0, 0], 0xff0000)],
    ['/ring', shape(ringGeometry(0.5, 1), [2, 2, 0], 0x0000ff)],
    ['/plane', shape(planeGeometry(0.25, 0.25), [2, 2, 0])],
    ['/octahedron', shape(octahedronGeometry(0.5), [-1, -1, 0])],
    ['/icosahedron', shape(icosahedronGeometry(0.5), [-2, -2, 0])],
    ['/dodecahedron', shape(dodecahedronGeometry(0.5), [-3, -3, 0])],
    ['/cylinder', shape(cylinderGeometry(0.5, 1), [0, -1, 0], 0x00ffff)],
    ['/circle', shape(circleGeometry(0.5), [0, -2, 0])],
    ['/cone', shape(coneGeometry(0.5, 1), [0, -3, 0], 0x00ffff)],
    ['/sphere', shape(sphereGeometry(0.5, 12, 12), [-2, 2, 0], 0x0000ff)],
    ['/box', shape(boxGeometry(0.5, 0.5, 0.5), [0, 1, 0], 0xff00ff)],
    ['/point_cloud', pointCloud(points)],
    ['/text', sceneText('Hello, meshcat!')],
  ];
}

export interface DemoOptions {
  frames?: number;
  /** Milliseconds between frames */
  interval?: number;
  points?: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function runDemo(client: MeshcatClient, options: DemoOptions = {}): Promise<void> {
  const frames = options.frames ?? 100;
  const interval = options.interval ?? 100;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));

  for (const [path, object] of demoScene(options.points)) {
    await client.setObject(path, object);
  }
  await client.setProperty('/Background', 'top_color', [0.5, 0.8, 0.5]);
  await client.setProperty('/Background', 'bottom_color', [0.6, 0, 0.5]);

  let angle = 0;
  for (let frame = 0; frame < frames; frame++) {
    angle += 0.1;
    const s = 1 + Math.sin(angle) ** 2;
    await client.setTransform('/box', isometry([0, 1, 0], [0, 0, angle]));
    await client.setProperty('/torus', 'scale', [s, s, s]);
    await client.setProperty('/torus', 'position', [0, 2, Math.sin(angle)]);
    await client.setProperty('/torus', 'quaternion', MathUtils.quatFromEuler(0, angle, 0));
    if (frame < frames - 1) {
      await sleep(interval);
    }
  }
}
