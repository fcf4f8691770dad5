/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * URDF XML Parser
 */

import { readFileSync } from 'fs';
import { DOMParser } from '@xmldom/xmldom';
import { createLogger } from '@meshlink/protocol';
import type { Vec3 } from '@meshlink/scene';
import { UrdfParseError } from './errors.js';
import type {
  Rgba,
  UrdfCollision,
  UrdfGeometry,
  UrdfJoint,
  UrdfJointType,
  UrdfLink,
  UrdfMaterial,
  UrdfOrigin,
  UrdfRobot,
  UrdfVisual,
} from './types.js';

const log = createLogger('Urdf');

const ELEMENT_NODE = 1;

const JOINT_TYPES: readonly UrdfJointType[] = ['revolute', 'continuous', 'prismatic', 'fixed', 'floating', 'planar'];

/**
 * Parse URDF XML content into a UrdfRobot
 */
export function parseUrdf(xmlContent: string | ArrayBuffer): UrdfRobot {
  const xmlString = typeof xmlContent === 'string' ? xmlContent : new TextDecoder().decode(xmlContent);

  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: (level: string, message: unknown) => {
      if (level === 'warning') {
        log.debug('XML warning', message);
      } else {
        errors.push(String(message).trim());
      }
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xmlString, 'text/xml');
  } catch (error) {
    throw new UrdfParseError('Invalid XML format', error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
  if (errors.length > 0) {
    throw new UrdfParseError('Invalid XML format', errors.join('\n'));
  }

  const root = doc.documentElement;
  if (!root || root.tagName !== 'robot') {
    throw new UrdfParseError(`Invalid root element: expected "robot", got "${root?.tagName ?? 'nothing'}"`);
  }

  const materials = new Map<string, UrdfMaterial>();
  for (const el of getChildElements(root, 'material')) {
    const material = parseMaterial(el);
    if (material.name) {
      materials.set(material.name, material);
    }
  }

  const links = getChildElements(root, 'link').map(parseLink);
  const joints = getChildElements(root, 'joint').map(parseJoint);
  checkTree(links, joints);

  return { name: requireAttribute(root, 'name'), links, joints, materials };
}

/**
 * Read and parse a URDF file
 */
export function loadUrdfFile(file: string): UrdfRobot {
  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new UrdfParseError(`Unable to read '${file}'`, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
  return parseUrdf(content);
}

// ============================================================================
// Elements
// ============================================================================

function parseLink(el: Element): UrdfLink {
  return {
    name: requireAttribute(el, 'name'),
    visuals: getChildElements(el, 'visual').map(parseVisual),
    collisions: getChildElements(el, 'collision').map(parseCollision),
  };
}

function parseVisual(el: Element): UrdfVisual {
  const visual: UrdfVisual = {
    origin: parseOrigin(getChildElement(el, 'origin')),
    geometry: parseGeometry(el),
  };
  const name = optionalAttribute(el, 'name');
  if (name !== undefined) visual.name = name;
  const material = getChildElement(el, 'material');
  if (material) visual.material = parseMaterial(material);
  return visual;
}

function parseCollision(el: Element): UrdfCollision {
  const collision: UrdfCollision = {
    origin: parseOrigin(getChildElement(el, 'origin')),
    geometry: parseGeometry(el),
  };
  const name = optionalAttribute(el, 'name');
  if (name !== undefined) collision.name = name;
  return collision;
}

function parseMaterial(el: Element): UrdfMaterial {
  const material: UrdfMaterial = {};
  const name = optionalAttribute(el, 'name');
  if (name !== undefined) material.name = name;
  const color = getChildElement(el, 'color');
  if (color) {
    const [r, g, b, a] = parseNumbers(color, 'rgba', 4);
    const rgba: Rgba = [r, g, b, a];
    material.color = rgba;
  }
  return material;
}

function parseOrigin(el: Element | null): UrdfOrigin {
  if (!el) {
    return { xyz: [0, 0, 0], rpy: [0, 0, 0] };
  }
  return {
    xyz: optionalVec3(el, 'xyz') ?? [0, 0, 0],
    rpy: optionalVec3(el, 'rpy') ?? [0, 0, 0],
  };
}

/**
 * Parse the single shape inside <geometry>
 */
function parseGeometry(parent: Element): UrdfGeometry {
  const geometry = getChildElement(parent, 'geometry');
  if (!geometry) {
    throw new UrdfParseError(`<${parent.tagName}> has no <geometry>`);
  }
  const [shape] = getChildElements(geometry);
  if (!shape) {
    throw new UrdfParseError('<geometry> is empty');
  }

  switch (shape.tagName) {
    case 'box':
      return { type: 'box', size: requireVec3(shape, 'size') };
    case 'cylinder':
      return { type: 'cylinder', radius: requireNumber(shape, 'radius'), length: requireNumber(shape, 'length') };
    case 'capsule':
      return { type: 'capsule', radius: requireNumber(shape, 'radius'), length: requireNumber(shape, 'length') };
    case 'sphere':
      return { type: 'sphere', radius: requireNumber(shape, 'radius') };
    case 'mesh': {
      const filename = requireAttribute(shape, 'filename');
      const scale = optionalVec3(shape, 'scale');
      return scale ? { type: 'mesh', filename, scale } : { type: 'mesh', filename };
    }
    default:
      throw new UrdfParseError(`Unknown geometry <${shape.tagName}>`);
  }
}

function parseJoint(el: Element): UrdfJoint {
  const name = requireAttribute(el, 'name');
  const type = requireAttribute(el, 'type');
  if (!isJointType(type)) {
    throw new UrdfParseError(`Joint "${name}" has unknown type "${type}"`);
  }
  return {
    name,
    type,
    parent: requireLinkRef(el, 'parent', name),
    child: requireLinkRef(el, 'child', name),
    origin: parseOrigin(getChildElement(el, 'origin')),
    axis: optionalVec3(getChildElement(el, 'axis'), 'xyz') ?? [1, 0, 0],
  };
}

function requireLinkRef(joint: Element, tag: 'parent' | 'child', jointName: string): string {
  const el = getChildElement(joint, tag);
  if (!el) {
    throw new UrdfParseError(`Joint "${jointName}" has no <${tag}>`);
  }
  return requireAttribute(el, 'link');
}

function isJointType(value: string): value is UrdfJointType {
  return JOINT_TYPES.some((type) => type === value);
}

/**
 * Link and joint names are unique, every joint connects known links, and
 * each link has at most one parent joint
 */
function checkTree(links: UrdfLink[], joints: UrdfJoint[]): void {
  const names = new Set<string>();
  for (const link of links) {
    if (names.has(link.name)) {
      throw new UrdfParseError(`Duplicate link "${link.name}"`);
    }
    names.add(link.name);
  }
  const jointNames = new Set<string>();
  const parented = new Set<string>();
  for (const joint of joints) {
    if (jointNames.has(joint.name)) {
      throw new UrdfParseError(`Duplicate joint "${joint.name}"`);
    }
    jointNames.add(joint.name);
    for (const link of [joint.parent, joint.child]) {
      if (!names.has(link)) {
        throw new UrdfParseError(`Joint "${joint.name}" references unknown link "${link}"`);
      }
    }
    if (parented.has(joint.child)) {
      throw new UrdfParseError(`Link "${joint.child}" has more than one parent joint`);
    }
    parented.add(joint.child);
  }
}

// ============================================================================
// Attribute helpers
// ============================================================================

function requireAttribute(el: Element, name: string): string {
  const value = optionalAttribute(el, name);
  if (value === undefined) {
    throw new UrdfParseError(`<${el.tagName}> is missing the "${name}" attribute`);
  }
  return value;
}

function optionalAttribute(el: Element, name: string): string | undefined {
  return el.hasAttribute(name) ? (el.getAttribute(name) ?? undefined) : undefined;
}

function parseNumbers(el: Element, name: string, count: number): number[] {
  const raw = requireAttribute(el, name).trim();
  const values = raw.split(/\s+/).map(Number);
  if (values.length !== count || !values.every(Number.isFinite)) {
    throw new UrdfParseError(`<${el.tagName}> ${name}="${raw}" must be ${count} numbers`);
  }
  return values;
}

function requireNumber(el: Element, name: string): number {
  return parseNumbers(el, name, 1)[0];
}

function requireVec3(el: Element, name: string): Vec3 {
  const [x, y, z] = parseNumbers(el, name, 3);
  return [x, y, z];
}

function optionalVec3(el: Element | null, name: string): Vec3 | undefined {
  if (!el || !el.hasAttribute(name)) return undefined;
  return requireVec3(el, name);
}

// ============================================================================
// Child element helpers
// ============================================================================

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function getChildElements(parent: Element, tagName?: string): Element[] {
  const elements: Element[] = [];
  for (const child of Array.from(parent.childNodes)) {
    if (isElement(child) && (tagName === undefined || child.tagName === tagName)) {
      elements.push(child);
    }
  }
  return elements;
}

function getChildElement(parent: Element, tagName: string): Element | null {
  return getChildElements(parent, tagName)[0] ?? null;
}
