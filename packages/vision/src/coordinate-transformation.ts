import type { Point } from "@lanewatch/types";

import { identityMatrix, invertMatrix, projectPoint, type Matrix3 } from "./matrix.ts";

/**
 * Converts points between the current frame ("relative") and the first reference frame ("absolute").
 *
 * The wrapped matrix maps absolute coordinates onto the current frame, so relative → absolute goes
 * through its inverse. Both are computed once, at construction.
 */
export class CoordinateTransformation {
  readonly matrix: Matrix3;
  readonly inverse: Matrix3;

  constructor(matrix: Matrix3) {
    this.matrix = [...matrix];
    this.inverse = invertMatrix(matrix);
  }

  static identity() {
    return new CoordinateTransformation(identityMatrix());
  }

  relativeToAbsolute(points: Point[]): Point[] {
    return points.map((point) => projectPoint(this.inverse, point));
  }

  absoluteToRelative(points: Point[]): Point[] {
    return points.map((point) => projectPoint(this.matrix, point));
  }
}
