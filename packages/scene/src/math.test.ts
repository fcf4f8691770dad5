/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { isometry, isometryToMatrix, MathUtils, multiplyIsometry } from './math.js';
import type { Vec3 } from './types.js';

function expectVecClose(actual: readonly number[], expected: readonly number[]) {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, 10));
}

describe('MathUtils', () => {
  it('builds roll quaternions about X', () => {
    const half = Math.SQRT1_2;
    expectVecClose(MathUtils.quatFromEuler(Math.PI / 2, 0, 0), [half, 0, 0, half]);
  });

  it('rotates vectors by quaternions', () => {
    const roll = MathUtils.quatFromEuler(Math.PI / 2, 0, 0);
    expectVecClose(MathUtils.rotate(roll, [0, 1, 0]), [0, 0, 1]);
    const yaw = MathUtils.quatFromEuler(0, 0, Math.PI / 2);
    expectVecClose(MathUtils.rotate(yaw, [1, 0, 0]), [0, 1, 0]);
  });

  it('composes translation and rotation', () => {
    const m = MathUtils.compose([1, 0, 0], MathUtils.quatFromEuler(0, 0, Math.PI / 2));
    expectVecClose(MathUtils.transformPoint(m, [1, 0, 0]), [1, 1, 0]);
    expectVecClose(MathUtils.toArray(m).slice(12), [1, 0, 0, 1]);
  });

  it('multiplies matrices', () => {
    const m = MathUtils.multiply(MathUtils.translation(1, 0, 0), MathUtils.translation(0, 2, 0));
    expectVecClose(MathUtils.toArray(m), [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 1, 2, 0, 1]);
  });

  it('returns a column-major identity', () => {
    expect(MathUtils.toArray(MathUtils.identity())).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]);
  });
});

describe('isometry', () => {
  it('chains rigid transforms', () => {
    const a = isometry([1, 0, 0], [0, 0, Math.PI / 2]);
    const b = isometry([1, 0, 0]);
    const ab = multiplyIsometry(a, b);
    expectVecClose(ab.translation, [1, 1, 0]);
    expectVecClose(ab.rotation, a.rotation);
  });

  it('agrees with the matrix product', () => {
    const a = isometry([0.5, -1, 2], [0.1, 0.2, 0.3]);
    const b = isometry([1, 2, 3], [-0.3, 0.4, 0.1]);
    const point: Vec3 = [0.25, 0.5, -0.75];
    const viaIsometry = MathUtils.transformPoint(isometryToMatrix(multiplyIsometry(a, b)), point);
    const viaMatrix = MathUtils.transformPoint(MathUtils.multiply(isometryToMatrix(a), isometryToMatrix(b)), point);
    expectVecClose(viaIsometry, viaMatrix);
  });
});
