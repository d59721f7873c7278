import type { Point } from "@lanewatch/types";

import { NonInvertibleTransformError } from "./errors.ts";

/** Row-major 3×3 projective matrix. */
export type Matrix3 = [number, number, number, number, number, number, number, number, number];

const SINGULAR_EPSILON = 1e-12;

export function identityMatrix(): Matrix3 {
  return [1, 0, 0, 0, 1, 0, 0, 0, 1];
}

export function multiplyMatrices(left: Matrix3, right: Matrix3): Matrix3 {
  const result = identityMatrix();
  for (let row = 0; row < 3; row += 1) {
    for (let column = 0; column < 3; column += 1) {
      result[row * 3 + column] =
        left[row * 3] * right[column] +
        left[row * 3 + 1] * right[3 + column] +
        left[row * 3 + 2] * right[6 + column];
    }
  }
  return result;
}

export function invertMatrix(matrix: Matrix3): Matrix3 {
  const [a, b, c, d, e, f, g, h, i] = matrix;

  const A = e * i - f * h;
  const B = f * g - d * i;
  const C = d * h - e * g;

  const det = a * A + b * B + c * C;
  const scale = Math.max(...matrix.map((value) => Math.abs(value)));
  if (!Number.isFinite(det) || scale === 0 || Math.abs(det) < SINGULAR_EPSILON * scale ** 3) {
    throw new NonInvertibleTransformError();
  }

  const invDet = 1 / det;
  return [
    A * invDet,
    (c * h - b * i) * invDet,
    (b * f - c * e) * invDet,
    B * invDet,
    (a * i - c * g) * invDet,
    (c * d - a * f) * invDet,
    C * invDet,
    (b * g - a * h) * invDet,
    (a * e - b * d) * invDet,
  ];
}

/** Scales the matrix so that its bottom-right entry is 1, when that entry is usable. */
export function normalizeMatrix(matrix: Matrix3): Matrix3 {
  const last = matrix[8];
  if (Math.abs(last) < SINGULAR_EPSILON) {
    return [...matrix];
  }
  return [
    matrix[0] / last,
    matrix[1] / last,
    matrix[2] / last,
    matrix[3] / last,
    matrix[4] / last,
    matrix[5] / last,
    matrix[6] / last,
    matrix[7] / last,
    1,
  ];
}

export function projectPoint(matrix: Matrix3, point: Point): Point {
  const [h11, h12, h13, h21, h22, h23, h31, h32, h33] = matrix;
  const w = h31 * point.x + h32 * point.y + h33;
  return {
    x: (h11 * point.x + h12 * point.y + h13) / w,
    y: (h21 * point.x + h22 * point.y + h23) / w,
  };
}

export function matricesClose(left: Matrix3, right: Matrix3, tolerance = 1e-9): boolean {
  const a = normalizeMatrix(left);
  const b = normalizeMatrix(right);
  return a.every((value, index) => Math.abs(value - b[index]) <= tolerance);
}
