import assert from "node:assert/strict";
import test from "node:test";

import type { Point } from "@lanewatch/types";

import { DegenerateCorrespondencesError, InsufficientCorrespondencesError, MotionEstimationError } from "./errors.ts";
import { estimateTransform, findHomography, HomographyEstimator } from "./homography.ts";
import { invertMatrix, matricesClose, multiplyMatrices, projectPoint, type Matrix3 } from "./matrix.ts";
import { loadOpenCv } from "./opencv.ts";

const H: Matrix3 = [1.02, 0.01, 4, -0.015, 0.99, -3, 0.00002, -0.00001, 1];

function grid(): Point[] {
  const points: Point[] = [];
  for (let y = 20; y <= 200; y += 45) {
    for (let x = 30; x <= 300; x += 54) {
      points.push({ x, y });
    }
  }
  return points;
}

test("invertMatrix undoes multiplyMatrices", () => {
  const product = multiplyMatrices(H, invertMatrix(H));
  assert.ok(matricesClose(product, [1, 0, 0, 0, 1, 0, 0, 0, 1], 1e-9));
});

test("invertMatrix rejects a singular matrix", () => {
  assert.throws(() => invertMatrix([1, 2, 3, 2, 4, 6, 0, 0, 1]), MotionEstimationError);
});

test("findHomography recovers an exact projective mapping", async () => {
  const opencv = await loadOpenCv();
  const src = grid();
  const dst = src.map((point) => projectPoint(H, point));

  const fit = findHomography(opencv, src, dst);

  assert.equal(fit.inlierCount, src.length);
  assert.ok(fit.inliers.every(Boolean));
  assert.ok(matricesClose(fit.matrix, H, 1e-3));
});

test("findHomography needs four correspondences", async () => {
  const opencv = await loadOpenCv();
  const src = [
    { x: 0, y: 0 },
    { x: 10, y: 0 },
    { x: 0, y: 10 },
  ];

  assert.throws(
    () => findHomography(opencv, src, src),
    (error: unknown) =>
      error instanceof InsufficientCorrespondencesError &&
      error.code === "insufficient_correspondences" &&
      error.correspondences === 3,
  );
});

test("findHomography reports collinear correspondences as degenerate", async () => {
  const opencv = await loadOpenCv();
  const src = [10, 40, 70, 100, 130, 160, 190, 220].map((x) => ({ x, y: 50 }));
  const dst = src.map((point) => ({ x: point.x + 2, y: point.y }));

  assert.throws(
    () => findHomography(opencv, src, dst),
    (error: unknown) => error instanceof DegenerateCorrespondencesError && error.code === "degenerate_correspondences",
  );
});

test("findHomography ignores displaced outliers", async () => {
  const opencv = await loadOpenCv();
  const src = grid();
  const dst = src.map((point, index) => {
    const projected = projectPoint(H, point);
    return index % 5 === 0 ? { x: projected.x + 50, y: projected.y + 50 } : projected;
  });

  const fit = findHomography(opencv, src, dst);

  assert.equal(fit.inlierCount, src.length - Math.ceil(src.length / 5));
  assert.equal(fit.inliers[0], false);
  assert.equal(fit.inliers[1], true);
  assert.ok(matricesClose(fit.matrix, H, 1e-3));
});

test("estimateTransform composes the fit onto the accumulated matrix and flags renewal", async () => {
  const opencv = await loadOpenCv();
  const prevPoints = grid();
  const accumulated: Matrix3 = [1, 0, 10, 0, 1, 5, 0, 0, 1];
  const currPoints = prevPoints.map((point, index) => {
    const projected = projectPoint(H, point);
    return index % 5 === 0 ? { x: projected.x - 40, y: projected.y + 60 } : projected;
  });

  const estimate = estimateTransform(opencv, { currPoints, prevPoints, accumulated }, { proportionThreshold: 0.9 });

  assert.equal(estimate.correspondences, 30);
  assert.equal(estimate.inlierCount, 24);
  assert.equal(estimate.inlierRatio, 0.8);
  assert.equal(estimate.renewReference, true);
  assert.ok(matricesClose(estimate.fitted, H, 1e-3));
  assert.ok(matricesClose(estimate.matrix, multiplyMatrices(H, accumulated), 1e-3));
});

test("HomographyEstimator keeps the reference when every point agrees", async () => {
  const opencv = await loadOpenCv();
  const prevPoints = grid();
  const currPoints = prevPoints.map((point) => projectPoint(H, point));

  const estimate = new HomographyEstimator(opencv).estimate(currPoints, prevPoints, null);

  assert.equal(estimate.inlierRatio, 1);
  assert.equal(estimate.renewReference, false);
  assert.ok(matricesClose(estimate.matrix, H, 1e-3));
});
