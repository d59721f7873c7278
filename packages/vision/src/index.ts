export * from "./coordinate-transformation.ts";
export * from "./errors.ts";
export * from "./homography.ts";
export * from "./image.ts";
export * from "./mask.ts";
export * from "./matrix.ts";
export * from "./motion-estimator.ts";
export * from "./opencv.ts";
export * from "./optical-flow.ts";
export * from "./overlay.ts";
export * from "./path-history.ts";
export * from "./tracked-object.ts";
export * from "./zone-counter.ts";
