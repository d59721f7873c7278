import type { Point } from "@lanewatch/types";

import { assertMaskMatches, type GrayImage, type OccupancyMask } from "./image.ts";
import { grayToMat, maskToMat, matToPoints, pointsToMat, release, type Mat, type OpenCv } from "./opencv.ts";

export type CornerOptions = {
  maxPoints: number;
  qualityLevel: number;
  minDistance: number;
  blockSize: number;
  mask?: OccupancyMask | null;
};

export const DEFAULT_CORNER_OPTIONS: CornerOptions = {
  maxPoints: 200,
  qualityLevel: 0.01,
  minDistance: 15,
  blockSize: 3,
};

export type LucasKanadeOptions = {
  windowSize: number;
  maxLevel: number;
  maxIterations: number;
  epsilon: number;
  minEigenThreshold: number;
};

export const DEFAULT_LUCAS_KANADE_OPTIONS: LucasKanadeOptions = {
  windowSize: 21,
  maxLevel: 3,
  maxIterations: 30,
  epsilon: 0.01,
  minEigenThreshold: 1e-4,
};

export type TrackedPoint = {
  point: Point;
  ok: boolean;
};

export type FlowPairs = {
  currPoints: Point[];
  prevPoints: Point[];
};

export type SampleAndTrackInput = {
  reference: GrayImage;
  current: GrayImage;
  referencePoints?: Point[] | null;
  mask?: OccupancyMask | null;
} & Partial<Omit<CornerOptions, "mask">> & {
    flow?: Partial<LucasKanadeOptions>;
  };

/** Shi-Tomasi corners of the image, strongest first; mask pixels set to 0 are never sampled. */
export function detectCorners(opencv: OpenCv, image: GrayImage, options: Partial<CornerOptions> = {}): Point[] {
  const maxPoints = options.maxPoints ?? DEFAULT_CORNER_OPTIONS.maxPoints;
  const qualityLevel = options.qualityLevel ?? DEFAULT_CORNER_OPTIONS.qualityLevel;
  const minDistance = options.minDistance ?? DEFAULT_CORNER_OPTIONS.minDistance;
  const blockSize = options.blockSize ?? DEFAULT_CORNER_OPTIONS.blockSize;
  const mask = options.mask ?? null;
  if (mask) {
    assertMaskMatches(mask, image);
  }

  let source: Mat | null = null;
  let maskMat: Mat | null = null;
  let corners: Mat | null = null;
  try {
    source = grayToMat(opencv, image);
    maskMat = maskToMat(opencv, mask);
    corners = new opencv.Mat();
    opencv.goodFeaturesToTrack(source, corners, maxPoints, qualityLevel, minDistance, maskMat, blockSize, false, 0.04);
    return corners.rows > 0 ? matToPoints(corners) : [];
  } finally {
    release(source, maskMat, corners);
  }
}

/** Pyramidal Lucas-Kanade tracking of `points` from `previous` into `next`. */
export function calcOpticalFlowPyrLK(
  opencv: OpenCv,
  previous: GrayImage,
  next: GrayImage,
  points: Point[],
  options: Partial<LucasKanadeOptions> = {},
): TrackedPoint[] {
  if (previous.width !== next.width || previous.height !== next.height) {
    throw new Error(
      `Optical flow needs equally sized images, got ${previous.width}x${previous.height} and ${next.width}x${next.height}`,
    );
  }
  if (points.length === 0) {
    return [];
  }

  const windowSize = options.windowSize ?? DEFAULT_LUCAS_KANADE_OPTIONS.windowSize;
  const maxLevel = options.maxLevel ?? DEFAULT_LUCAS_KANADE_OPTIONS.maxLevel;
  const maxIterations = options.maxIterations ?? DEFAULT_LUCAS_KANADE_OPTIONS.maxIterations;
  const epsilon = options.epsilon ?? DEFAULT_LUCAS_KANADE_OPTIONS.epsilon;
  const minEigenThreshold = options.minEigenThreshold ?? DEFAULT_LUCAS_KANADE_OPTIONS.minEigenThreshold;

  let previousMat: Mat | null = null;
  let nextMat: Mat | null = null;
  let p0: Mat | null = null;
  let p1: Mat | null = null;
  let status: Mat | null = null;
  let err: Mat | null = null;
  try {
    previousMat = grayToMat(opencv, previous);
    nextMat = grayToMat(opencv, next);
    p0 = pointsToMat(opencv, points);
    p1 = new opencv.Mat();
    status = new opencv.Mat();
    err = new opencv.Mat();

    const criteria = new opencv.TermCriteria(
      opencv.TermCriteria_EPS | opencv.TermCriteria_COUNT,
      maxIterations,
      epsilon,
    );
    opencv.calcOpticalFlowPyrLK(
      previousMat,
      nextMat,
      p0,
      p1,
      status,
      err,
      new opencv.Size(windowSize, windowSize),
      maxLevel,
      criteria,
      0,
      minEigenThreshold,
    );

    const tracked = matToPoints(p1);
    const found = status.data;
    return points.map((_, index) => {
      const point = tracked[index] ?? { x: Number.NaN, y: Number.NaN };
      const inside = point.x >= 0 && point.y >= 0 && point.x < next.width && point.y < next.height;
      return { point, ok: found[index] === 1 && inside };
    });
  } finally {
    release(previousMat, nextMat, p0, p1, status, err);
  }
}

/**
 * Samples corners on the reference (unless points are given) and tracks them into the current frame.
 * Only successfully tracked pairs are returned, index-aligned.
 */
export function sampleAndTrack(opencv: OpenCv, input: SampleAndTrackInput): FlowPairs {
  const referencePoints =
    input.referencePoints ??
    detectCorners(opencv, input.reference, {
      maxPoints: input.maxPoints,
      minDistance: input.minDistance,
      blockSize: input.blockSize,
      qualityLevel: input.qualityLevel,
      mask: input.mask,
    });

  const tracked = calcOpticalFlowPyrLK(opencv, input.reference, input.current, referencePoints, input.flow);
  const currPoints: Point[] = [];
  const prevPoints: Point[] = [];

  tracked.forEach((result, index) => {
    if (result.ok) {
      currPoints.push(result.point);
      prevPoints.push(referencePoints[index]);
    }
  });

  return { currPoints, prevPoints };
}
