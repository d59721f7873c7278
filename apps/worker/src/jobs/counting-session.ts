import type { FrameSize, TrackId, ZoneCounts, ZoneSet } from "@lanewatch/types";
import {
  AbsolutePathHistory,
  buildObjectMask,
  drawTrackedObjects,
  loadOpenCv,
  MotionEstimator,
  ZoneCounter,
  type CoordinateTransformation,
  type ImageFrame,
  type MotionOutcome,
  type ObjectRegistration,
  type OpenCv,
} from "@lanewatch/vision";

import type { SessionFrame } from "../sources/track-replay.ts";

type Logger = Pick<Console, "info" | "warn" | "error">;

export type CountingSessionConfig = {
  zonesPath: string;
  replayPath: string | null;
  frameWidth: number;
  frameHeight: number;
  maxPoints: number;
  minDistance: number;
  blockSize: number;
  qualityLevel: number;
  reprojectionThreshold: number;
  maxIterations: number;
  confidence: number;
  proportionThreshold: number;
  drawFlow: boolean;
  drawPaths: boolean;
  drawObjects: boolean;
  maskObjects: boolean;
  pathHistory: number;
  logEveryFrames: number;
};

export type CountingSessionResult = {
  frame_count: number;
  counts: ZoneCounts;
  initialized_count: number;
  estimated_count: number;
  renewal_count: number;
  fallback_count: number;
  skipped_object_count: number;
};

export type AnnotatedFrame = {
  index: number;
  image: ImageFrame;
  transformation: CoordinateTransformation;
  outcome: MotionOutcome | null;
  counts: ZoneCounts;
  registered: ObjectRegistration[];
  skipped: TrackId[];
};

export type FrameSource = AsyncIterable<SessionFrame> | Iterable<SessionFrame>;

const DEFAULT_ZONES_PATH = "config/zones.json";
const DEFAULT_FRAME_WIDTH = 1280;
const DEFAULT_FRAME_HEIGHT = 720;
const DEFAULT_MAX_POINTS = 900;
const DEFAULT_MIN_DISTANCE = 14;
const DEFAULT_BLOCK_SIZE = 3;
const DEFAULT_QUALITY_LEVEL = 0.01;
const DEFAULT_REPROJECTION_THRESHOLD = 3;
const DEFAULT_MAX_ITERATIONS = 2000;
const DEFAULT_CONFIDENCE = 0.995;
const DEFAULT_PROPORTION_THRESHOLD = 0.9;
const DEFAULT_PATH_HISTORY = 70;
const DEFAULT_LOG_EVERY_FRAMES = 100;

function parseBoolean(input: string | undefined, fallback = false) {
  if (!input) {
    return fallback;
  }

  const normalized = input.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parsePositiveInt(input: string | undefined, fallback: number, max: number) {
  const parsed = Number(input);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.min(Math.floor(parsed), max);
}

function parsePositiveNumber(input: string | undefined, fallback: number, max: number) {
  const parsed = Number(input);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.min(parsed, max);
}

export function parseCountingSessionConfig(env: NodeJS.ProcessEnv = process.env): CountingSessionConfig {
  return {
    zonesPath: env.LANEWATCH_ZONES_PATH?.trim() || DEFAULT_ZONES_PATH,
    replayPath: env.LANEWATCH_REPLAY_PATH?.trim() || null,
    frameWidth: parsePositiveInt(env.LANEWATCH_FRAME_WIDTH, DEFAULT_FRAME_WIDTH, 8192),
    frameHeight: parsePositiveInt(env.LANEWATCH_FRAME_HEIGHT, DEFAULT_FRAME_HEIGHT, 8192),
    maxPoints: parsePositiveInt(env.LANEWATCH_MAX_POINTS, DEFAULT_MAX_POINTS, 5000),
    minDistance: parsePositiveNumber(env.LANEWATCH_MIN_DISTANCE, DEFAULT_MIN_DISTANCE, 1000),
    blockSize: parsePositiveInt(env.LANEWATCH_BLOCK_SIZE, DEFAULT_BLOCK_SIZE, 31),
    qualityLevel: parsePositiveNumber(env.LANEWATCH_QUALITY_LEVEL, DEFAULT_QUALITY_LEVEL, 1),
    reprojectionThreshold: parsePositiveNumber(
      env.LANEWATCH_REPROJECTION_THRESHOLD,
      DEFAULT_REPROJECTION_THRESHOLD,
      100,
    ),
    maxIterations: parsePositiveInt(env.LANEWATCH_MAX_ITERATIONS, DEFAULT_MAX_ITERATIONS, 100_000),
    confidence: parsePositiveNumber(env.LANEWATCH_CONFIDENCE, DEFAULT_CONFIDENCE, 0.999999),
    proportionThreshold: parsePositiveNumber(env.LANEWATCH_PROPORTION_THRESHOLD, DEFAULT_PROPORTION_THRESHOLD, 1),
    drawFlow: parseBoolean(env.LANEWATCH_DRAW_FLOW, false),
    drawPaths: parseBoolean(env.LANEWATCH_DRAW_PATHS, true),
    drawObjects: parseBoolean(env.LANEWATCH_DRAW_OBJECTS, true),
    maskObjects: parseBoolean(env.LANEWATCH_MASK_OBJECTS, true),
    pathHistory: parsePositiveInt(env.LANEWATCH_PATH_HISTORY, DEFAULT_PATH_HISTORY, 1000),
    logEveryFrames: parsePositiveInt(env.LANEWATCH_LOG_EVERY_FRAMES, DEFAULT_LOG_EVERY_FRAMES, 1_000_000),
  };
}

export function frameSizeOf(config: CountingSessionConfig): FrameSize {
  return { width: config.frameWidth, height: config.frameHeight };
}

function formatCounts(counts: ZoneCounts) {
  return `left in ${counts.leftEntry}, left out ${counts.leftExit}, right in ${counts.rightEntry}, right out ${counts.rightExit}`;
}

/**
 * Runs motion compensation and zone counting over one frame source.
 * Each call owns its estimator, counter and path history; frames are handled strictly in order.
 */
export async function runCountingSession(input: {
  config: CountingSessionConfig;
  zones: ZoneSet;
  source: FrameSource;
  logger?: Logger;
  onFrame?: (frame: AnnotatedFrame) => void | Promise<void>;
  opencv?: OpenCv;
}): Promise<CountingSessionResult> {
  const { config } = input;
  const logger = input.logger ?? console;
  const frameSize = frameSizeOf(config);

  const motion = new MotionEstimator({
    opencv: input.opencv ?? (await loadOpenCv()),
    maxPoints: config.maxPoints,
    minDistance: config.minDistance,
    blockSize: config.blockSize,
    qualityLevel: config.qualityLevel,
    homography: {
      reprojectionThreshold: config.reprojectionThreshold,
      maxIterations: config.maxIterations,
      confidence: config.confidence,
      proportionThreshold: config.proportionThreshold,
    },
    drawFlow: config.drawFlow,
    logger,
  });
  const counter = new ZoneCounter(input.zones, { frameSize });
  const paths = config.drawPaths ? new AbsolutePathHistory({ maxHistory: config.pathHistory }) : null;

  const result: CountingSessionResult = {
    frame_count: 0,
    counts: counter.counts(),
    initialized_count: 0,
    estimated_count: 0,
    renewal_count: 0,
    fallback_count: 0,
    skipped_object_count: 0,
  };

  for await (const frame of input.source) {
    const { image, objects } = frame;
    if (image.width !== frameSize.width || image.height !== frameSize.height) {
      throw new Error(
        `Frame ${frame.index} is ${image.width}x${image.height}, expected ${frameSize.width}x${frameSize.height}`,
      );
    }

    const mask = config.maskObjects ? buildObjectMask(image.width, image.height, objects) : null;
    const transformation = motion.update(image, mask);
    const outcome = motion.lastOutcome;

    switch (outcome?.kind) {
      case "initialized":
        result.initialized_count += 1;
        break;
      case "estimated":
        result.estimated_count += 1;
        break;
      case "renewed":
        result.renewal_count += 1;
        break;
      case "fallback":
        result.fallback_count += 1;
        break;
    }

    if (config.drawObjects) {
      drawTrackedObjects(image, objects);
    }
    paths?.draw(image, objects, transformation);

    const registration = counter.processFrame(objects, image);
    result.frame_count += 1;
    result.skipped_object_count += registration.skipped.length;

    for (const skipped of registration.skipped) {
      logger.warn(`[counting-session] frame ${frame.index}: skipped object ${skipped} with malformed extent`);
    }

    if (input.onFrame) {
      await input.onFrame({
        index: frame.index,
        image: registration.frame,
        transformation,
        outcome,
        counts: counter.counts(),
        registered: registration.registered,
        skipped: registration.skipped,
      });
    }

    if (result.frame_count % config.logEveryFrames === 0) {
      logger.info(`[counting-session] processed ${result.frame_count} frames (${formatCounts(counter.counts())})`);
    }
  }

  result.counts = counter.counts();
  logger.info(`[counting-session] finished after ${result.frame_count} frames (${formatCounts(result.counts)})`);
  return result;
}
