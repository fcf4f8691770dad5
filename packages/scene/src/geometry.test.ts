/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { SceneBuildError } from './errors.js';
import {
  boxGeometry,
  bufferGeometry,
  createGeometry,
  cylinderGeometry,
  icosahedronGeometry,
  ringGeometry,
  sphereGeometry,
  toGeometryDocument,
} from './geometry.js';
import { createMaterial, parseHexColor } from './material.js';

describe('primitive geometry', () => {
  it('builds boxes', () => {
    expect(boxGeometry(1, 2, 3)).toEqual({ type: 'BoxGeometry', width: 1, height: 2, depth: 3 });
  });

  it('fills in segment defaults', () => {
    expect(sphereGeometry(0.5)).toEqual({ type: 'SphereGeometry', radius: 0.5, widthSegments: 32, heightSegments: 16 });
    expect(cylinderGeometry(0.2, 0.5)).toEqual({
      type: 'CylinderGeometry',
      radiusTop: 0.2,
      radiusBottom: 0.2,
      height: 0.5,
      radialSegments: 32,
      heightSegments: 1,
      thetaStart: 0,
      thetaLength: 2 * Math.PI,
    });
    expect(icosahedronGeometry(0.5)).toEqual({ type: 'IcosahedronGeometry', radius: 0.5, detail: 0 });
  });

  it('rejects bad dimensions', () => {
    expect(() => boxGeometry(0, 1, 1)).toThrow('width must be a positive number, got 0');
    expect(() => sphereGeometry(1, 2.5)).toThrow('widthSegments must be a positive integer, got 2.5');
    expect(() => ringGeometry(1, 0.5)).toThrow(SceneBuildError);
  });
});

describe('bufferGeometry', () => {
  it('stores attributes as Float32Array', () => {
    const shape = bufferGeometry({ position: [0, 0, 0, 1, 1, 1], color: [1, 0, 0, 0, 0, 1], uv: [0, 0, 1, 1] });
    expect(shape.data.attributes.position).toEqual({
      itemSize: 3,
      type: 'Float32Array',
      array: new Float32Array([0, 0, 0, 1, 1, 1]),
      normalized: false,
    });
    expect(shape.data.attributes.uv?.itemSize).toBe(2);
    expect(shape.data.attributes.normal).toBeUndefined();
  });

  it('requires one color per vertex', () => {
    expect(() => bufferGeometry({ position: [0, 0, 0, 1, 1, 1], color: [1, 0, 0] })).toThrow(
      'color describes 1 vertices, position describes 2'
    );
  });
});

describe('createGeometry', () => {
  it('assigns a uuid and identity origin', () => {
    const geometry = createGeometry(boxGeometry(1, 1, 1));
    expect(geometry.uuid).toMatch(/^[0-9a-f-]{36}$/);
    expect(geometry.origin).toEqual({ translation: [0, 0, 0], rotation: [0, 0, 0, 1] });
    expect(toGeometryDocument(geometry)).toEqual({
      uuid: geometry.uuid,
      type: 'BoxGeometry',
      width: 1,
      height: 1,
      depth: 1,
    });
  });
});

describe('createMaterial', () => {
  it('defaults to a double-sided phong material', () => {
    const material = createMaterial();
    expect(material.type).toBe('MeshPhongMaterial');
    expect(material.side).toBe(2);
    expect(Object.keys(material).sort()).toEqual(['side', 'type', 'uuid']);
  });

  it('validates options', () => {
    expect(() => createMaterial({ type: 'PointsMaterial' })).toThrow('PointsMaterial requires a point size');
    expect(() => createMaterial({ color: 0x1000000 })).toThrow(SceneBuildError);
    expect(() => createMaterial({ opacity: 1.5 })).toThrow('Opacity must be within [0, 1], got 1.5');
  });

  it('parses hex colors', () => {
    expect(parseHexColor('#00ff00')).toBe(0x00ff00);
    expect(parseHexColor('0xFF00FF')).toBe(0xff00ff);
    expect(() => parseHexColor('green')).toThrow('Invalid hex color "green"');
  });
});
