import { z } from "zod";

export const pointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Point = z.infer<typeof pointSchema>;

export const pointTupleSchema = z.tuple([z.number(), z.number()]);
export type PointTuple = z.infer<typeof pointTupleSchema>;

export const frameSizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type FrameSize = z.infer<typeof frameSizeSchema>;

export const zoneIdSchema = z.enum(["leftEntry", "leftExit", "rightEntry", "rightExit"]);
export type ZoneId = z.infer<typeof zoneIdSchema>;

export const ZONE_IDS = zoneIdSchema.options;

export const zoneSideSchema = z.enum(["left", "right"]);
export type ZoneSide = z.infer<typeof zoneSideSchema>;

export const zoneDirectionSchema = z.enum(["entry", "exit"]);
export type ZoneDirection = z.infer<typeof zoneDirectionSchema>;

export const zoneSchema = z.object({
  id: zoneIdSchema,
  side: zoneSideSchema,
  direction: zoneDirectionSchema,
  start: pointSchema,
  end: pointSchema,
  bandHalfWidth: z.number().nonnegative().default(1),
});

export type Zone = z.output<typeof zoneSchema>;
export type ZoneInput = z.input<typeof zoneSchema>;

export const zoneSetSchema = z.object({
  leftEntry: zoneSchema.omit({ id: true, side: true, direction: true }),
  leftExit: zoneSchema.omit({ id: true, side: true, direction: true }),
  rightEntry: zoneSchema.omit({ id: true, side: true, direction: true }),
  rightExit: zoneSchema.omit({ id: true, side: true, direction: true }),
});

export type ZoneSetInput = z.input<typeof zoneSetSchema>;
export type ZoneSet = Record<ZoneId, Zone>;

const zoneLabels: Record<ZoneId, { side: ZoneSide; direction: ZoneDirection }> = {
  leftEntry: { side: "left", direction: "entry" },
  leftExit: { side: "left", direction: "exit" },
  rightEntry: { side: "right", direction: "entry" },
  rightExit: { side: "right", direction: "exit" },
};

type ZoneGeometry = z.output<typeof zoneSetSchema>[ZoneId];

function toZone(id: ZoneId, geometry: ZoneGeometry): Zone {
  return { id, ...zoneLabels[id], ...geometry };
}

export function toZoneSet(input: z.output<typeof zoneSetSchema>): ZoneSet {
  return {
    leftEntry: toZone("leftEntry", input.leftEntry),
    leftExit: toZone("leftExit", input.leftExit),
    rightEntry: toZone("rightEntry", input.rightEntry),
    rightExit: toZone("rightExit", input.rightExit),
  };
}

export const trackIdSchema = z.union([z.string().min(1), z.number().int()]);
export type TrackId = z.infer<typeof trackIdSchema>;

export const trackedObjectSchema = z.object({
  id: trackIdSchema,
  points: z.array(pointTupleSchema),
});

export type TrackedObjectRecord = z.infer<typeof trackedObjectSchema>;

export const trackReplayRecordSchema = z.object({
  frame: z.number().int().nonnegative(),
  objects: z.array(trackedObjectSchema),
});

export type TrackReplayRecord = z.infer<typeof trackReplayRecordSchema>;

export const zoneCountsSchema = z.object({
  leftEntry: z.number().int().nonnegative(),
  leftExit: z.number().int().nonnegative(),
  rightEntry: z.number().int().nonnegative(),
  rightExit: z.number().int().nonnegative(),
});

export type ZoneCounts = z.infer<typeof zoneCountsSchema>;

export const motionOutcomeKindSchema = z.enum(["initialized", "estimated", "renewed", "fallback"]);
export type MotionOutcomeKind = z.infer<typeof motionOutcomeKindSchema>;

export const motionFailureCodeSchema = z.enum([
  "insufficient_correspondences",
  "degenerate_correspondences",
  "non_invertible_transform",
]);
export type MotionFailureCode = z.infer<typeof motionFailureCodeSchema>;
