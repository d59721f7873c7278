import type { MotionFailureCode } from "@lanewatch/types";

export class MotionEstimationError extends Error {
  readonly code: MotionFailureCode;

  constructor(code: MotionFailureCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InsufficientCorrespondencesError extends MotionEstimationError {
  readonly correspondences: number;

  constructor(correspondences: number, required = 4) {
    super(
      "insufficient_correspondences",
      `Homography needs at least ${required} correspondences, got ${correspondences}`,
    );
    this.correspondences = correspondences;
  }
}

export class DegenerateCorrespondencesError extends MotionEstimationError {
  constructor(message = "No non-degenerate sample of correspondences was found") {
    super("degenerate_correspondences", message);
  }
}

export class NonInvertibleTransformError extends MotionEstimationError {
  constructor(message = "Transform matrix is not invertible") {
    super("non_invertible_transform", message);
  }
}

export class ZoneConfigurationError extends Error {
  readonly code = "malformed_zone_configuration";

  constructor(message: string) {
    super(message);
    this.name = "ZoneConfigurationError";
  }
}
