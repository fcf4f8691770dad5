/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * SceneTree — local mirror of the viewer's scene graph.
 *
 * Every acknowledged command is applied here so callers can inspect what
 * the server holds without asking it. Like the viewer, setting anything
 * on `/a/b/c` creates `/a` and `/a/b` if they do not exist yet. Nodes go
 * away only through delete().
 */

import {
  ROOT_PATH,
  normalizePath,
  splitPath,
  type PropertyName,
  type PropertyValues,
  type SceneCommand,
  type SceneObjectDocument,
} from '@meshlink/protocol';

export interface SceneNode {
  readonly path: string;
  readonly name: string;
  object?: SceneObjectDocument;
  /** Column-major transform last sent with set_transform */
  matrix?: number[];
  properties: Partial<PropertyValues>;
  readonly children: Map<string, SceneNode>;
}

function createNode(path: string, name: string): SceneNode {
  return { path, name, properties: {}, children: new Map() };
}

export class SceneTree {
  private readonly root: SceneNode = createNode(ROOT_PATH, '');

  get(path: string): SceneNode | undefined {
    let node: SceneNode | undefined = this.root;
    for (const segment of splitPath(path)) {
      node = node.children.get(segment);
      if (!node) return undefined;
    }
    return node;
  }

  has(path: string): boolean {
    return this.get(path) !== undefined;
  }

  children(path: string): SceneNode[] {
    const node = this.get(path);
    return node ? Array.from(node.children.values()) : [];
  }

  /**
   * All node paths below the root, depth-first in insertion order
   */
  paths(): string[] {
    const result: string[] = [];
    const visit = (node: SceneNode) => {
      for (const child of node.children.values()) {
        result.push(child.path);
        visit(child);
      }
    };
    visit(this.root);
    return result;
  }

  get size(): number {
    return this.paths().length;
  }

  setObject(path: string, object: SceneObjectDocument): SceneNode {
    const node = this.ensure(path);
    node.object = object;
    return node;
  }

  setTransform(path: string, matrix: ArrayLike<number>): SceneNode {
    const node = this.ensure(path);
    node.matrix = Array.from(matrix);
    return node;
  }

  setProperty<K extends PropertyName>(path: string, property: K, value: PropertyValues[K]): SceneNode {
    const node = this.ensure(path);
    node.properties[property] = value;
    return node;
  }

  /**
   * Remove a node and its subtree. Deleting the root clears the scene.
   * Returns false when nothing was there.
   */
  delete(path: string): boolean {
    const segments = splitPath(path);
    if (segments.length === 0) {
      const hadChildren = this.root.children.size > 0;
      this.clear();
      return hadChildren;
    }
    const parent = this.get(ROOT_PATH + segments.slice(0, -1).join('/'));
    return parent ? parent.children.delete(segments[segments.length - 1]) : false;
  }

  clear(): void {
    this.root.children.clear();
    this.root.object = undefined;
    this.root.matrix = undefined;
    this.root.properties = {};
  }

  apply(command: SceneCommand): void {
    switch (command.type) {
      case 'set_object':
        this.setObject(command.path, command.object);
        break;
      case 'set_transform':
        this.setTransform(command.path, command.matrix);
        break;
      case 'set_property':
        this.setProperty(command.path, command.property, command.value);
        break;
      case 'delete':
        this.delete(command.path);
        break;
    }
  }

  private ensure(path: string): SceneNode {
    let node = this.root;
    let current = '';
    for (const segment of splitPath(normalizePath(path))) {
      current += `/${segment}`;
      let child = node.children.get(segment);
      if (!child) {
        child = createNode(current, segment);
        node.children.set(segment, child);
      }
      node = child;
    }
    return node;
  }
}
