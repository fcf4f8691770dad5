/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene path helpers.
 *
 * Paths address nodes in the viewer's scene tree: `/robot/base_link`.
 * Every path that crosses the wire goes through normalizePath first, so
 * two spellings of the same node (`robot//base/`, `/robot/base`) always
 * end up on the same node.
 */

import { ProtocolError } from './errors.js';

export const ROOT_PATH = '/';

export function normalizePath(path: string): string {
  if (typeof path !== 'string') {
    throw new ProtocolError(`Scene path must be a string, got ${typeof path}`);
  }
  const segments = path.trim().split('/').filter((segment) => segment.length > 0);
  for (const segment of segments) {
    if (segment === '.' || segment === '..') {
      throw new ProtocolError(`Invalid path segment "${segment}"`, path);
    }
  }
  return ROOT_PATH + segments.join('/');
}

export function splitPath(path: string): string[] {
  const normalized = normalizePath(path);
  return normalized === ROOT_PATH ? [] : normalized.slice(1).split('/');
}

export function joinPath(...segments: string[]): string {
  return normalizePath(segments.join('/'));
}

/**
 * Parent of a path; `null` for the root.
 */
export function parentPath(path: string): string | null {
  const segments = splitPath(path);
  if (segments.length === 0) return null;
  return ROOT_PATH + segments.slice(0, -1).join('/');
}

/** True when `path` is `ancestor` itself or lies below it */
export function isDescendantPath(path: string, ancestor: string): boolean {
  const p = normalizePath(path);
  const a = normalizePath(ancestor);
  if (a === ROOT_PATH) return true;
  return p === a || p.startsWith(`${a}/`);
}
