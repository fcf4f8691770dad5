/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Command factories. Each one normalizes the path and validates the
 * payload, so a command that reaches the encoder is always well formed.
 */

import { ProtocolError } from './errors.js';
import { normalizePath } from './path.js';
import type {
  DeleteCommand,
  PropertyName,
  PropertyValues,
  SceneCommand,
  SceneObjectDocument,
  SetObjectCommand,
  SetPropertyCommand,
  SetTransformCommand,
} from './types.js';

/** Tuple length per vector property; scalars and booleans are absent */
const PROPERTY_ARITY: Partial<Record<PropertyName, number>> = {
  position: 3,
  quaternion: 4,
  scale: 3,
  color: 4,
  top_color: 3,
  bottom_color: 3,
};

export const PROPERTY_NAMES: readonly PropertyName[] = [
  'visible',
  'position',
  'quaternion',
  'scale',
  'color',
  'opacity',
  'modulated_opacity',
  'top_color',
  'bottom_color',
];

export function isPropertyName(name: string): name is PropertyName {
  return PROPERTY_NAMES.some((property) => property === name);
}

export function setObjectCommand(path: string, object: SceneObjectDocument): SetObjectCommand {
  const normalized = normalizePath(path);
  if (object.geometries.length === 0) {
    throw new ProtocolError('Scene object has no geometries', normalized);
  }
  return { type: 'set_object', path: normalized, object };
}

export function setTransformCommand(path: string, matrix: ArrayLike<number>): SetTransformCommand {
  const normalized = normalizePath(path);
  if (matrix.length !== 16) {
    throw new ProtocolError(`Transform matrix must have 16 elements, got ${matrix.length}`, normalized);
  }
  const values = Array.from(matrix);
  if (!values.every(Number.isFinite)) {
    throw new ProtocolError('Transform matrix contains a non-finite value', normalized);
  }
  return { type: 'set_transform', path: normalized, matrix: values };
}

export function deleteCommand(path: string): DeleteCommand {
  return { type: 'delete', path: normalizePath(path) };
}

export function setPropertyCommand<K extends PropertyName>(
  path: string,
  property: K,
  value: PropertyValues[K]
): SetPropertyCommand<K> {
  const normalized = normalizePath(path);
  assertPropertyValue(normalized, property, value);
  return { type: 'set_property', path: normalized, property, value };
}

/**
 * Run a command built elsewhere back through its factory.
 */
export function normalizeCommand(command: SceneCommand): SceneCommand {
  switch (command.type) {
    case 'set_object':
      return setObjectCommand(command.path, command.object);
    case 'set_transform':
      return setTransformCommand(command.path, command.matrix);
    case 'delete':
      return deleteCommand(command.path);
    case 'set_property':
      return setPropertyCommand(command.path, command.property, command.value);
  }
}

/**
 * Check a property value against the shape its property expects.
 */
export function assertPropertyValue<K extends PropertyName>(
  path: string,
  property: K,
  value: unknown
): asserts value is PropertyValues[K] {
  if (!isPropertyName(property)) {
    throw new ProtocolError(`Unknown property "${String(property)}"`, path);
  }
  if (property === 'visible') {
    if (typeof value !== 'boolean') {
      throw new ProtocolError('Property "visible" expects a boolean', path);
    }
    return;
  }
  const arity = PROPERTY_ARITY[property];
  if (arity === undefined) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ProtocolError(`Property "${property}" expects a finite number`, path);
    }
    return;
  }
  if (!Array.isArray(value) || value.length !== arity) {
    throw new ProtocolError(`Property "${property}" expects ${arity} numbers`, path);
  }
  if (!value.every((v) => typeof v === 'number' && Number.isFinite(v))) {
    throw new ProtocolError(`Property "${property}" contains a non-finite value`, path);
  }
}
