/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export { createProgram, VERSION } from './program.js';
export type { ProgramDeps } from './program.js';
export { demoScene, pointCloud, runDemo } from './demo.js';
export type { DemoObject, DemoOptions } from './demo.js';
export { parseColor, parseInteger, parsePropertyArgs } from './parse.js';
export type { PropertyArgs } from './parse.js';
