/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Publishing a robot to the viewer.
 *
 * Links and joints are laid out as a path tree that mirrors the kinematic
 * tree, so moving a joint path moves everything below it:
 *
 * ```
 * /base                       link
 * /base/shoulder              joint (transform from its origin)
 * /base/shoulder/upper_arm    link
 * ```
 */

import type { MeshcatClient } from '@meshlink/client';
import { createLogger, joinPath, normalizePath, type MaterialDocument } from '@meshlink/protocol';
import { createMaterial, isometry, sceneObject, type MaterialOptions } from '@meshlink/scene';
import { UrdfParseError } from './errors.js';
import { createMeshResolver, geometryFromUrdf, type MeshResolver, type MeshResolverOptions } from './geometry.js';
import type { Rgba, UrdfElement, UrdfJoint, UrdfLink, UrdfRobot } from './types.js';

const log = createLogger('Urdf');

export interface UrdfPaths {
  links: Map<string, string>;
  joints: Map<string, string>;
}

/**
 * Scene paths of every link and joint. Root links sit directly under
 * `prefix`; a joint sits under its parent link and its child under it.
 */
export function urdfPaths(robot: UrdfRobot, prefix = '/'): UrdfPaths {
  const base = normalizePath(prefix);
  const parentJoint = new Map<string, UrdfJoint>();
  for (const joint of robot.joints) {
    parentJoint.set(joint.child, joint);
  }

  const links = new Map<string, string>();
  const joints = new Map<string, string>();

  const linkPath = (name: string, visiting: Set<string>): string => {
    const known = links.get(name);
    if (known !== undefined) return known;
    if (visiting.has(name)) {
      throw new UrdfParseError(`Joint cycle through link "${name}"`);
    }
    visiting.add(name);

    const joint = parentJoint.get(name);
    let path: string;
    if (joint) {
      const jointPath = joinPath(linkPath(joint.parent, visiting), joint.name);
      joints.set(joint.name, jointPath);
      path = joinPath(jointPath, name);
    } else {
      path = joinPath(base, name);
    }
    links.set(name, path);
    return path;
  };

  for (const joint of robot.joints) {
    linkPath(joint.parent, new Set());
    linkPath(joint.child, new Set());
  }
  for (const link of robot.links) {
    linkPath(link.name, new Set());
  }
  return { links, joints };
}

export interface PublishUrdfOptions extends MeshResolverOptions {
  /** Path the robot is published under (default: /) */
  prefix?: string;
  /** Publish collision geometry instead of visuals */
  useCollision?: boolean;
  /** Overrides packageRoot/baseDir resolution */
  resolveMesh?: MeshResolver;
}

export interface PublishUrdfResult {
  paths: UrdfPaths;
  /** Links that got an object */
  published: string[];
}

type UrdfTarget = Pick<MeshcatClient, 'delete' | 'setObject' | 'setTransform'>;

/**
 * Replace whatever is at the robot's paths with its links and joint poses.
 */
export async function publishUrdf(
  client: UrdfTarget,
  robot: UrdfRobot,
  options: PublishUrdfOptions = {}
): Promise<PublishUrdfResult> {
  const paths = urdfPaths(robot, options.prefix);
  const resolveMesh = options.resolveMesh ?? createMeshResolver(options);

  for (const path of [...paths.links.values(), ...paths.joints.values()]) {
    await client.delete(path);
  }

  const published: string[] = [];
  for (const link of robot.links) {
    const elements: UrdfElement[] = options.useCollision ? link.collisions : link.visuals;
    if (elements.length === 0) continue;

    const path = paths.links.get(link.name) ?? joinPath(options.prefix ?? '/', link.name);
    const builder = sceneObject();
    for (const element of elements) {
      builder.geometry(geometryFromUrdf(element, resolveMesh));
    }
    builder.material(linkMaterial(robot, link, options.useCollision ?? false));
    await client.setObject(path, builder);
    published.push(link.name);
  }

  for (const joint of robot.joints) {
    const path = paths.joints.get(joint.name);
    if (path === undefined) continue;
    await client.setTransform(path, isometry(joint.origin.xyz, joint.origin.rpy));
  }

  log.info(`Published ${robot.name}: ${published.length} links, ${robot.joints.length} joints`);
  return { paths, published };
}

/**
 * Material from the first visual color, looked up by name in the robot's
 * materials when the visual only names one
 */
export function linkMaterial(robot: UrdfRobot, link: UrdfLink, useCollision: boolean): MaterialDocument {
  const color = useCollision ? undefined : firstColor(robot, link);
  if (!color) {
    return createMaterial();
  }
  const [r, g, b, a] = color;
  const options: MaterialOptions = { color: rgbToHex(r, g, b) };
  if (a < 1) {
    options.opacity = a;
    options.transparent = true;
  }
  return createMaterial(options);
}

function firstColor(robot: UrdfRobot, link: UrdfLink): Rgba | undefined {
  for (const visual of link.visuals) {
    const material = visual.material;
    if (!material) continue;
    const color = material.color ?? (material.name ? robot.materials.get(material.name)?.color : undefined);
    if (color) return color;
  }
  return undefined;
}

function rgbToHex(r: number, g: number, b: number): number {
  const channel = (v: number) => Math.round(Math.min(Math.max(v, 0), 1) * 255);
  return (channel(r) << 16) | (channel(g) << 8) | channel(b);
}
