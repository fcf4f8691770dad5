/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { InvalidArgumentError } from 'commander';
import {
  assertPropertyValue,
  isPropertyName,
  PROPERTY_NAMES,
  type PropertyName,
  type PropertyValues,
} from '@meshlink/protocol';
import { parseHexColor } from '@meshlink/scene';

export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

export function parseColor(value: string): number {
  try {
    return parseHexColor(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export interface PropertyArgs {
  property: PropertyName;
  value: PropertyValues[PropertyName];
}

/**
 * Turn `<name> <values...>` into a property and a typed value.
 * A single value is a scalar, more than one a vector.
 */
export function parsePropertyArgs(path: string, name: string, values: string[]): PropertyArgs {
  if (!isPropertyName(name)) {
    throw new InvalidArgumentError(`Unknown property "${name}". Expected one of: ${PROPERTY_NAMES.join(', ')}`);
  }

  let value: unknown;
  if (name === 'visible') {
    if (values.length !== 1 || (values[0] !== 'true' && values[0] !== 'false')) {
      throw new InvalidArgumentError('visible expects true or false');
    }
    value = values[0] === 'true';
  } else {
    const numbers = values.map(Number);
    value = numbers.length === 1 ? numbers[0] : numbers;
  }

  assertPropertyValue(path, name, value);
  return { property: name, value };
}
