import type { Point } from "@lanewatch/types";

import { DegenerateCorrespondencesError, InsufficientCorrespondencesError } from "./errors.ts";
import { multiplyMatrices, normalizeMatrix, type Matrix3 } from "./matrix.ts";
import { pointsToMat, release, type Mat, type OpenCv } from "./opencv.ts";

export type HomographyOptions = {
  reprojectionThreshold: number;
  maxIterations: number;
  confidence: number;
  proportionThreshold: number;
};

export const DEFAULT_HOMOGRAPHY_OPTIONS: HomographyOptions = {
  reprojectionThreshold: 3,
  maxIterations: 2000,
  confidence: 0.995,
  proportionThreshold: 0.9,
};

export const MIN_CORRESPONDENCES = 4;

export type HomographyFit = {
  matrix: Matrix3;
  inliers: boolean[];
  inlierCount: number;
};

export type EstimateTransformInput = {
  currPoints: Point[];
  prevPoints: Point[];
  accumulated: Matrix3 | null;
};

export type TransformEstimate = {
  renewReference: boolean;
  /** Fitted homography composed onto the accumulated one. */
  matrix: Matrix3;
  /** Homography fitted on this call alone (reference → current). */
  fitted: Matrix3;
  inlierRatio: number;
  inlierCount: number;
  correspondences: number;
};

export interface TransformationEstimator {
  estimate(currPoints: Point[], prevPoints: Point[], accumulated: Matrix3 | null): TransformEstimate;
}

function resolveOptions(options: Partial<HomographyOptions>): HomographyOptions {
  return {
    reprojectionThreshold: options.reprojectionThreshold ?? DEFAULT_HOMOGRAPHY_OPTIONS.reprojectionThreshold,
    maxIterations: options.maxIterations ?? DEFAULT_HOMOGRAPHY_OPTIONS.maxIterations,
    confidence: options.confidence ?? DEFAULT_HOMOGRAPHY_OPTIONS.confidence,
    proportionThreshold: options.proportionThreshold ?? DEFAULT_HOMOGRAPHY_OPTIONS.proportionThreshold,
  };
}

function toMatrix3(mat: Mat): Matrix3 {
  const h = mat.data64F;
  return [h[0], h[1], h[2], h[3], h[4], h[5], h[6], h[7], h[8]];
}

/** RANSAC homography mapping src onto dst, with the inlier flag of every correspondence. */
export function findHomography(
  opencv: OpenCv,
  src: Point[],
  dst: Point[],
  options: Partial<HomographyOptions> = {},
): HomographyFit {
  if (src.length !== dst.length) {
    throw new Error(`Point sets differ in length (${src.length} vs ${dst.length})`);
  }
  if (src.length < MIN_CORRESPONDENCES) {
    throw new InsufficientCorrespondencesError(src.length);
  }

  const { reprojectionThreshold, maxIterations, confidence } = resolveOptions(options);

  let srcMat: Mat | null = null;
  let dstMat: Mat | null = null;
  let mask: Mat | null = null;
  let homography: Mat | null = null;
  try {
    srcMat = pointsToMat(opencv, src);
    dstMat = pointsToMat(opencv, dst);
    mask = new opencv.Mat();
    homography = opencv.findHomography(
      srcMat,
      dstMat,
      opencv.RANSAC,
      reprojectionThreshold,
      mask,
      maxIterations,
      confidence,
    );

    if (homography.empty()) {
      throw new DegenerateCorrespondencesError();
    }

    const flags = mask.data;
    return {
      matrix: normalizeMatrix(toMatrix3(homography)),
      inliers: src.map((_, index) => flags[index] !== 0),
      inlierCount: opencv.countNonZero(mask),
    };
  } finally {
    release(srcMat, dstMat, mask, homography);
  }
}

/**
 * Fits the reference → current homography and composes it onto the accumulated chain.
 * A low inlier ratio asks the caller to renew its reference frame.
 */
export function estimateTransform(
  opencv: OpenCv,
  input: EstimateTransformInput,
  options: Partial<HomographyOptions> = {},
): TransformEstimate {
  const resolved = resolveOptions(options);
  const fit = findHomography(opencv, input.prevPoints, input.currPoints, resolved);
  const correspondences = input.prevPoints.length;
  const inlierRatio = fit.inlierCount / correspondences;

  return {
    renewReference: inlierRatio < resolved.proportionThreshold,
    matrix: input.accumulated ? normalizeMatrix(multiplyMatrices(fit.matrix, input.accumulated)) : fit.matrix,
    fitted: fit.matrix,
    inlierRatio,
    inlierCount: fit.inlierCount,
    correspondences,
  };
}

export class HomographyEstimator implements TransformationEstimator {
  private readonly opencv: OpenCv;
  private readonly options: HomographyOptions;

  constructor(opencv: OpenCv, options: Partial<HomographyOptions> = {}) {
    this.opencv = opencv;
    this.options = resolveOptions(options);
  }

  estimate(currPoints: Point[], prevPoints: Point[], accumulated: Matrix3 | null): TransformEstimate {
    return estimateTransform(this.opencv, { currPoints, prevPoints, accumulated }, this.options);
  }
}
