import type { MotionFailureCode, Point } from "@lanewatch/types";

import { CoordinateTransformation } from "./coordinate-transformation.ts";
import { MotionEstimationError } from "./errors.ts";
import {
  HomographyEstimator,
  type HomographyOptions,
  type TransformEstimate,
  type TransformationEstimator,
} from "./homography.ts";
import { assertMaskMatches, toGrayscale, type GrayImage, type ImageFrame, type OccupancyMask, type Rgb } from "./image.ts";
import type { Matrix3 } from "./matrix.ts";
import type { OpenCv } from "./opencv.ts";
import { DEFAULT_CORNER_OPTIONS, sampleAndTrack, type FlowPairs, type LucasKanadeOptions } from "./optical-flow.ts";
import { COLORS, drawArrowedLine } from "./overlay.ts";

type Logger = Pick<Console, "info" | "warn" | "error">;

export type ReferenceFrame = {
  gray: GrayImage;
  mask: OccupancyMask | null;
};

export type MotionState =
  | { status: "uninitialized" }
  | {
      status: "active";
      reference: ReferenceFrame;
      /** Points sampled from the reference; null forces a fresh sample on the next step. */
      referencePoints: Point[] | null;
      /** Reference chain since the first frame, updated only on renewal. */
      accumulated: Matrix3 | null;
      lastTransformation: CoordinateTransformation;
    };

export type MotionOutcome =
  | { kind: "initialized" }
  | { kind: "estimated" | "renewed"; inlierRatio: number; correspondences: number }
  | { kind: "fallback"; reason: MotionFailureCode; message: string; correspondences: number };

export type FlowEngineInput = {
  reference: GrayImage;
  current: GrayImage;
  referencePoints: Point[] | null;
  mask: OccupancyMask | null;
};

export type FlowEngine = (input: FlowEngineInput) => FlowPairs;

export type MotionDependencies = {
  flow: FlowEngine;
  estimator: TransformationEstimator;
};

export type MotionStep = {
  state: MotionState;
  transformation: CoordinateTransformation;
  outcome: MotionOutcome;
  flow: FlowPairs;
};

export const INITIAL_MOTION_STATE: MotionState = { status: "uninitialized" };

const NO_FLOW: FlowPairs = { currPoints: [], prevPoints: [] };

export type SparseFlowOptions = {
  maxPoints: number;
  minDistance: number;
  blockSize: number;
  qualityLevel: number;
  lucasKanade?: Partial<LucasKanadeOptions>;
};

export function createSparseFlowEngine(opencv: OpenCv, options: Partial<SparseFlowOptions> = {}): FlowEngine {
  const maxPoints = options.maxPoints ?? DEFAULT_CORNER_OPTIONS.maxPoints;
  const minDistance = options.minDistance ?? DEFAULT_CORNER_OPTIONS.minDistance;
  const blockSize = options.blockSize ?? DEFAULT_CORNER_OPTIONS.blockSize;
  const qualityLevel = options.qualityLevel ?? DEFAULT_CORNER_OPTIONS.qualityLevel;

  return (input) =>
    sampleAndTrack(opencv, {
      reference: input.reference,
      current: input.current,
      referencePoints: input.referencePoints,
      mask: input.mask,
      maxPoints,
      minDistance,
      blockSize,
      qualityLevel,
      flow: options.lucasKanade,
    });
}

type EstimateAttempt =
  | { ok: true; estimate: TransformEstimate; transformation: CoordinateTransformation }
  | { ok: false; error: MotionEstimationError };

function attemptEstimate(
  estimator: TransformationEstimator,
  flow: FlowPairs,
  accumulated: Matrix3 | null,
): EstimateAttempt {
  try {
    const estimate = estimator.estimate(flow.currPoints, flow.prevPoints, accumulated);
    return { ok: true, estimate, transformation: new CoordinateTransformation(estimate.matrix) };
  } catch (error) {
    if (error instanceof MotionEstimationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Advances the motion state by one grayscale frame.
 * Estimation failures keep the previous transformation and report a fallback outcome.
 */
export function stepMotion(
  state: MotionState,
  input: { gray: GrayImage; mask: OccupancyMask | null },
  dependencies: MotionDependencies,
): MotionStep {
  if (state.status === "uninitialized") {
    const transformation = CoordinateTransformation.identity();
    return {
      state: {
        status: "active",
        reference: { gray: input.gray, mask: input.mask },
        referencePoints: null,
        accumulated: null,
        lastTransformation: transformation,
      },
      transformation,
      outcome: { kind: "initialized" },
      flow: NO_FLOW,
    };
  }

  const flow = dependencies.flow({
    reference: state.reference.gray,
    current: input.gray,
    referencePoints: state.referencePoints,
    mask: state.reference.mask,
  });

  if (flow.currPoints.length !== flow.prevPoints.length) {
    throw new Error(
      `Flow engine returned ${flow.currPoints.length} current and ${flow.prevPoints.length} reference points`,
    );
  }

  const attempt = attemptEstimate(dependencies.estimator, flow, state.accumulated);
  if (!attempt.ok) {
    return {
      state: { ...state, referencePoints: null },
      transformation: state.lastTransformation,
      outcome: {
        kind: "fallback",
        reason: attempt.error.code,
        message: attempt.error.message,
        correspondences: flow.prevPoints.length,
      },
      flow,
    };
  }

  const { estimate, transformation } = attempt;
  const inlierRatio = estimate.inlierRatio;
  const correspondences = flow.prevPoints.length;

  if (estimate.renewReference) {
    return {
      state: {
        status: "active",
        reference: { gray: input.gray, mask: input.mask },
        referencePoints: null,
        accumulated: estimate.matrix,
        lastTransformation: transformation,
      },
      transformation,
      outcome: { kind: "renewed", inlierRatio, correspondences },
      flow,
    };
  }

  return {
    state: { ...state, referencePoints: flow.prevPoints, lastTransformation: transformation },
    transformation,
    outcome: { kind: "estimated", inlierRatio, correspondences },
    flow,
  };
}

export type MotionEstimatorOptions = Partial<SparseFlowOptions> & {
  /** Runtime behind the default flow engine and estimator; see loadOpenCv. */
  opencv?: OpenCv;
  homography?: Partial<HomographyOptions>;
  /** Replaces the default RANSAC homography estimator. */
  estimator?: TransformationEstimator;
  /** Replaces the default corner sampling + Lucas-Kanade flow. */
  flowEngine?: FlowEngine;
  drawFlow?: boolean;
  flowColor?: Rgb;
  logger?: Logger | null;
};

function requireOpenCv(opencv: OpenCv | undefined, role: string): OpenCv {
  if (!opencv) {
    throw new Error(`MotionEstimator needs an OpenCV runtime for its default ${role}`);
  }
  return opencv;
}

/**
 * Estimates camera motion frame by frame against a fixed reference frame,
 * renewing the reference when too few points still agree with the fitted homography.
 */
export class MotionEstimator {
  private state: MotionState = INITIAL_MOTION_STATE;
  private outcome: MotionOutcome | null = null;
  private frameCount = 0;
  private readonly dependencies: MotionDependencies;
  private readonly drawFlow: boolean;
  private readonly flowColor: Rgb;
  private readonly logger: Logger | null;

  constructor(options: MotionEstimatorOptions = {}) {
    this.dependencies = {
      flow: options.flowEngine ?? createSparseFlowEngine(requireOpenCv(options.opencv, "flow engine"), options),
      estimator:
        options.estimator ?? new HomographyEstimator(requireOpenCv(options.opencv, "estimator"), options.homography),
    };
    this.drawFlow = options.drawFlow ?? false;
    this.flowColor = options.flowColor ?? COLORS.blue;
    this.logger = options.logger ?? null;
  }

  get lastOutcome(): MotionOutcome | null {
    return this.outcome;
  }

  get currentState(): MotionState {
    return this.state;
  }

  /**
   * Returns the transformation between this frame and the first reference frame.
   * The mask (1 = usable, 0 = ignore) keeps corner sampling off moving objects or static overlays.
   */
  update(frame: ImageFrame, mask: OccupancyMask | null = null): CoordinateTransformation {
    const gray = toGrayscale(frame);
    if (mask) {
      assertMaskMatches(mask, gray);
    }

    this.frameCount += 1;
    const step = stepMotion(this.state, { gray, mask }, this.dependencies);
    this.state = step.state;
    this.outcome = step.outcome;

    if (this.drawFlow) {
      step.flow.currPoints.forEach((current, index) => {
        drawArrowedLine(frame, current, step.flow.prevPoints[index], this.flowColor, 2, 0.5);
      });
    }

    if (step.outcome.kind === "fallback") {
      this.logger?.warn(
        `[motion] frame ${this.frameCount}: keeping previous transform (${step.outcome.reason}: ${step.outcome.message})`,
      );
    } else if (step.outcome.kind === "renewed") {
      this.logger?.info(
        `[motion] frame ${this.frameCount}: reference renewed, inlier ratio ${step.outcome.inlierRatio.toFixed(3)}`,
      );
    }

    return step.transformation;
  }
}
