import cv from "@techstark/opencv-js";

import type { Point } from "@lanewatch/types";

import type { GrayImage, OccupancyMask } from "./image.ts";

export type OpenCv = typeof cv;
export type Mat = cv.Mat;

let runtime: Promise<OpenCv> | null = null;

async function initialize(): Promise<OpenCv> {
  // Some builds export a promise of the module, others the module before its wasm is ready.
  const loaded = await Promise.resolve(cv);
  if (typeof loaded.Mat !== "function") {
    await new Promise<void>((resolve) => {
      Object.assign(loaded, { onRuntimeInitialized: () => resolve() });
    });
  }
  return loaded;
}

/** Resolves once the OpenCV.js runtime can be called; every caller shares the same runtime. */
export function loadOpenCv(): Promise<OpenCv> {
  runtime ??= initialize();
  return runtime;
}

export function grayToMat(opencv: OpenCv, image: GrayImage): Mat {
  return opencv.matFromArray(image.height, image.width, opencv.CV_8UC1, image.data);
}

export function maskToMat(opencv: OpenCv, mask: OccupancyMask | null | undefined): Mat {
  return mask ? opencv.matFromArray(mask.height, mask.width, opencv.CV_8UC1, mask.data) : new opencv.Mat();
}

/** Packs points into an N×1 two-channel float matrix. */
export function pointsToMat(opencv: OpenCv, points: Point[]): Mat {
  const flat: number[] = [];
  points.forEach((point) => flat.push(point.x, point.y));
  return opencv.matFromArray(points.length, 1, opencv.CV_32FC2, flat);
}

export function matToPoints(mat: Mat): Point[] {
  const data = mat.data32F;
  const points: Point[] = [];
  for (let index = 0; index + 1 < data.length; index += 2) {
    points.push({ x: data[index], y: data[index + 1] });
  }
  return points;
}

/** Deletes every matrix, ignoring the ones that were never allocated. */
export function release(...mats: Array<Mat | null>) {
  mats.forEach((mat) => mat?.delete());
}
