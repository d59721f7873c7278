import assert from "node:assert/strict";
import test from "node:test";

import type { Point } from "@lanewatch/types";

import { createFrame, createMask, toGrayscale, type GrayImage } from "./image.ts";
import { loadOpenCv } from "./opencv.ts";
import { calcOpticalFlowPyrLK, detectCorners, sampleAndTrack } from "./optical-flow.ts";

function squareImage(): GrayImage {
  const frame = createFrame(40, 40, 1);
  for (let y = 10; y < 30; y += 1) {
    for (let x = 10; x < 30; x += 1) {
      frame.data[y * 40 + x] = 255;
    }
  }
  return toGrayscale(frame);
}

function texturedImage(shiftX: number, shiftY: number): GrayImage {
  const frame = createFrame(160, 120, 1);
  for (let y = 0; y < frame.height; y += 1) {
    for (let x = 0; x < frame.width; x += 1) {
      const sx = x - shiftX;
      const sy = y - shiftY;
      frame.data[y * frame.width + x] = 128 + 60 * Math.sin(sx / 7) * Math.cos(sy / 5) + 40 * Math.sin((sx + 2 * sy) / 11);
    }
  }
  return toGrayscale(frame);
}

function near(point: Point, expected: Point, tolerance: number) {
  return Math.abs(point.x - expected.x) <= tolerance && Math.abs(point.y - expected.y) <= tolerance;
}

const squareCorners = [
  { x: 9.5, y: 9.5 },
  { x: 29.5, y: 9.5 },
  { x: 9.5, y: 29.5 },
  { x: 29.5, y: 29.5 },
];

test("detectCorners finds the four corners of a bright square", async () => {
  const opencv = await loadOpenCv();
  const corners = detectCorners(opencv, squareImage(), { maxPoints: 10, minDistance: 5 });

  assert.equal(corners.length, 4);
  for (const expected of squareCorners) {
    assert.ok(
      corners.some((corner) => near(corner, expected, 2.5)),
      `no corner near (${expected.x}, ${expected.y})`,
    );
  }
});

test("detectCorners skips masked-out regions", async () => {
  const opencv = await loadOpenCv();
  const mask = createMask(40, 40, 1);
  for (let y = 0; y < 40; y += 1) {
    mask.data.fill(0, y * 40, y * 40 + 20);
  }

  const corners = detectCorners(opencv, squareImage(), { maxPoints: 10, minDistance: 5, mask });

  assert.equal(corners.length, 2);
  assert.ok(corners.every((corner) => corner.x >= 20));
});

test("detectCorners returns nothing for a flat image", async () => {
  const opencv = await loadOpenCv();
  const flat = createFrame(20, 20, 1);
  flat.data.fill(77);
  assert.deepEqual(detectCorners(opencv, toGrayscale(flat)), []);
});

test("detectCorners rejects a mask of another size", async () => {
  const opencv = await loadOpenCv();
  assert.throws(
    () => detectCorners(opencv, squareImage(), { mask: createMask(20, 20) }),
    /Mask 20x20 does not match image 40x40/,
  );
});

test("calcOpticalFlowPyrLK follows a translated texture", async () => {
  const opencv = await loadOpenCv();
  const points = [
    { x: 60, y: 50 },
    { x: 90, y: 70 },
  ];

  const tracked = calcOpticalFlowPyrLK(opencv, texturedImage(0, 0), texturedImage(3, 2), points, { maxLevel: 1 });

  assert.equal(tracked.length, 2);
  tracked.forEach((result, index) => {
    assert.equal(result.ok, true);
    assert.ok(near(result.point, { x: points[index].x + 3, y: points[index].y + 2 }, 0.2), JSON.stringify(result.point));
  });
});

test("calcOpticalFlowPyrLK rejects images of different sizes", async () => {
  const opencv = await loadOpenCv();
  assert.throws(
    () => calcOpticalFlowPyrLK(opencv, squareImage(), texturedImage(0, 0), [{ x: 1, y: 1 }]),
    /Optical flow needs equally sized images, got 40x40 and 160x120/,
  );
});

test("calcOpticalFlowPyrLK with no points tracks nothing", async () => {
  const opencv = await loadOpenCv();
  assert.deepEqual(calcOpticalFlowPyrLK(opencv, squareImage(), squareImage(), []), []);
});

test("sampleAndTrack drops points that cannot be tracked", async () => {
  const opencv = await loadOpenCv();
  const flat = createFrame(40, 40, 1);
  flat.data.fill(50);
  const gray = toGrayscale(flat);

  const pairs = sampleAndTrack(opencv, { reference: gray, current: gray, referencePoints: [{ x: 20, y: 20 }] });

  assert.deepEqual(pairs, { currPoints: [], prevPoints: [] });
});

test("sampleAndTrack pairs sampled corners with their tracked positions", async () => {
  const opencv = await loadOpenCv();
  const interior = createMask(160, 120, 0);
  for (let y = 20; y < 100; y += 1) {
    interior.data.fill(1, y * 160 + 20, y * 160 + 140);
  }

  const pairs = sampleAndTrack(opencv, {
    reference: texturedImage(0, 0),
    current: texturedImage(3, 2),
    mask: interior,
    maxPoints: 20,
    minDistance: 10,
    flow: { maxLevel: 1 },
  });

  assert.ok(pairs.prevPoints.length > 0);
  assert.ok(pairs.prevPoints.every((point) => point.x >= 20 && point.x < 140 && point.y >= 20 && point.y < 100));
  assert.equal(pairs.currPoints.length, pairs.prevPoints.length);
  pairs.prevPoints.forEach((previous, index) => {
    const current = pairs.currPoints[index];
    assert.ok(near(current, { x: previous.x + 3, y: previous.y + 2 }, 0.5), JSON.stringify({ previous, current }));
  });
});
