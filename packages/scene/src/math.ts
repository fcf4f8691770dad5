/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Math utilities for rigid transforms
 */

import type { Isometry, Mat4, Quat, Vec3 } from './types.js';

export class MathUtils {
    /**
     * Create identity matrix
     */
    static identity(): Mat4 {
        const m = new Float64Array(16);
        m[0] = 1; m[5] = 1; m[10] = 1; m[15] = 1;
        return { m };
    }

    static translation(x: number, y: number, z: number): Mat4 {
        const { m } = MathUtils.identity();
        m[12] = x; m[13] = y; m[14] = z;
        return { m };
    }

    /**
     * Multiply matrices (a * b)
     */
    static multiply(a: Mat4, b: Mat4): Mat4 {
        const out = new Float64Array(16);
        for (let col = 0; col < 4; col++) {
            for (let row = 0; row < 4; row++) {
                let sum = 0;
                for (let k = 0; k < 4; k++) {
                    sum += a.m[k * 4 + row] * b.m[col * 4 + k];
                }
                out[col * 4 + row] = sum;
            }
        }
        return { m: out };
    }

    /**
     * Quaternion from roll/pitch/yaw, applied about fixed X, then Y, then Z
     */
    static quatFromEuler(roll: number, pitch: number, yaw: number): Quat {
        const sr = Math.sin(roll * 0.5), cr = Math.cos(roll * 0.5);
        const sp = Math.sin(pitch * 0.5), cp = Math.cos(pitch * 0.5);
        const sy = Math.sin(yaw * 0.5), cy = Math.cos(yaw * 0.5);
        return [
            sr * cp * cy - cr * sp * sy,
            cr * sp * cy + sr * cp * sy,
            cr * cp * sy - sr * sp * cy,
            cr * cp * cy + sr * sp * sy,
        ];
    }

    /**
     * Hamilton product a * b
     */
    static multiplyQuat(a: Quat, b: Quat): Quat {
        const [ax, ay, az, aw] = a;
        const [bx, by, bz, bw] = b;
        return [
            aw * bx + ax * bw + ay * bz - az * by,
            aw * by - ax * bz + ay * bw + az * bx,
            aw * bz + ax * by - ay * bx + az * bw,
            aw * bw - ax * bx - ay * by - az * bz,
        ];
    }

    static rotate(q: Quat, v: Vec3): Vec3 {
        const [qx, qy, qz, qw] = q;
        const [vx, vy, vz] = v;
        // t = 2 * cross(q.xyz, v)
        const tx = 2 * (qy * vz - qz * vy);
        const ty = 2 * (qz * vx - qx * vz);
        const tz = 2 * (qx * vy - qy * vx);
        return [
            vx + qw * tx + (qy * tz - qz * ty),
            vy + qw * ty + (qz * tx - qx * tz),
            vz + qw * tz + (qx * ty - qy * tx),
        ];
    }

    /**
     * Compose translation, rotation and scale into a homogeneous matrix
     */
    static compose(t: Vec3, q: Quat, s: Vec3 = [1, 1, 1]): Mat4 {
        const [x, y, z, w] = q;
        const x2 = x + x, y2 = y + y, z2 = z + z;
        const xx = x * x2, xy = x * y2, xz = x * z2;
        const yy = y * y2, yz = y * z2, zz = z * z2;
        const wx = w * x2, wy = w * y2, wz = w * z2;
        const [sx, sy, sz] = s;

        const m = new Float64Array(16);
        m[0] = (1 - (yy + zz)) * sx; m[1] = (xy + wz) * sx; m[2] = (xz - wy) * sx; m[3] = 0;
        m[4] = (xy - wz) * sy; m[5] = (1 - (xx + zz)) * sy; m[6] = (yz + wx) * sy; m[7] = 0;
        m[8] = (xz + wy) * sz; m[9] = (yz - wx) * sz; m[10] = (1 - (xx + yy)) * sz; m[11] = 0;
        m[12] = t[0]; m[13] = t[1]; m[14] = t[2]; m[15] = 1;
        return { m };
    }

    /**
     * Transform vec3 by matrix (as point, w=1)
     */
    static transformPoint(m: Mat4, p: Vec3): Vec3 {
        const x = m.m[0] * p[0] + m.m[4] * p[1] + m.m[8] * p[2] + m.m[12];
        const y = m.m[1] * p[0] + m.m[5] * p[1] + m.m[9] * p[2] + m.m[13];
        const z = m.m[2] * p[0] + m.m[6] * p[1] + m.m[10] * p[2] + m.m[14];
        const w = m.m[3] * p[0] + m.m[7] * p[1] + m.m[11] * p[2] + m.m[15];
        return [x / w, y / w, z / w];
    }

    static toArray(m: Mat4): number[] {
        return Array.from(m.m);
    }
}

export function identityIsometry(): Isometry {
    return { translation: [0, 0, 0], rotation: [0, 0, 0, 1] };
}

/**
 * Isometry from a translation and roll/pitch/yaw angles
 */
export function isometry(translation: Vec3 = [0, 0, 0], rpy: Vec3 = [0, 0, 0]): Isometry {
    return {
        translation: [...translation],
        rotation: MathUtils.quatFromEuler(rpy[0], rpy[1], rpy[2]),
    };
}

/** a * b: apply b first, then a */
export function multiplyIsometry(a: Isometry, b: Isometry): Isometry {
    const rotated = MathUtils.rotate(a.rotation, b.translation);
    return {
        translation: [
            a.translation[0] + rotated[0],
            a.translation[1] + rotated[1],
            a.translation[2] + rotated[2],
        ],
        rotation: MathUtils.multiplyQuat(a.rotation, b.rotation),
    };
}

export function isometryToMatrix(iso: Isometry): Mat4 {
    return MathUtils.compose(iso.translation, iso.rotation);
}

export function isIsometry(value: Isometry | Mat4): value is Isometry {
    return 'rotation' in value;
}
