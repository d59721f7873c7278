import { ZONE_IDS, type FrameSize, type Point, type TrackId, type Zone, type ZoneCounts, type ZoneId, type ZoneSet } from "@lanewatch/types";

import { ZoneConfigurationError } from "./errors.ts";
import type { ImageFrame, Rgb } from "./image.ts";
import { COLORS, drawLine, drawText } from "./overlay.ts";
import { extentCenter, hasValidExtent, type TrackedObject } from "./tracked-object.ts";

export type ZoneCounterOptions = {
  /** When given, zone endpoints must lie inside the frame. */
  frameSize?: FrameSize | null;
  lineColor?: Rgb;
  highlightColor?: Rgb;
  textColor?: Rgb;
  thickness?: number;
  highlightExtraThickness?: number;
  textScale?: number;
};

export type ObjectRegistration = {
  trackId: TrackId;
  zones: ZoneId[];
};

export type FrameRegistration = {
  frame: ImageFrame;
  registered: ObjectRegistration[];
  skipped: TrackId[];
};

function isHorizontal(zone: Pick<Zone, "start" | "end">) {
  return Math.abs(zone.end.x - zone.start.x) >= Math.abs(zone.end.y - zone.start.y);
}

export function validateZone(zone: Zone, frameSize?: FrameSize | null) {
  const coordinates = [zone.start.x, zone.start.y, zone.end.x, zone.end.y];
  if (!coordinates.every(Number.isFinite)) {
    throw new ZoneConfigurationError(`Zone ${zone.id} has non-finite coordinates`);
  }

  if (!Number.isFinite(zone.bandHalfWidth) || zone.bandHalfWidth < 0) {
    throw new ZoneConfigurationError(`Zone ${zone.id} has an invalid band half-width (${zone.bandHalfWidth})`);
  }

  if (zone.start.x === zone.end.x && zone.start.y === zone.end.y) {
    throw new ZoneConfigurationError(`Zone ${zone.id} has a zero-length segment`);
  }

  if (isHorizontal(zone) ? zone.start.x > zone.end.x : zone.start.y > zone.end.y) {
    const axis = isHorizontal(zone) ? "x" : "y";
    throw new ZoneConfigurationError(
      `Zone ${zone.id} has inverted bounds (start.${axis} ${zone.start[axis]} > end.${axis} ${zone.end[axis]})`,
    );
  }

  if (frameSize) {
    for (const [label, point] of [
      ["start", zone.start],
      ["end", zone.end],
    ] as const) {
      if (point.x < 0 || point.y < 0 || point.x > frameSize.width || point.y > frameSize.height) {
        throw new ZoneConfigurationError(
          `Zone ${zone.id} ${label} (${point.x}, ${point.y}) lies outside the ${frameSize.width}x${frameSize.height} frame`,
        );
      }
    }
  }
}

export function validateZoneSet(zones: ZoneSet, frameSize?: FrameSize | null) {
  for (const id of ZONE_IDS) {
    const zone = zones[id];
    if (zone.id !== id) {
      throw new ZoneConfigurationError(`Zone stored under ${id} is labelled ${zone.id}`);
    }
    validateZone(zone, frameSize);
  }
}

/** True when the point lies within the segment's span and inside its perpendicular band. */
export function isInZoneBand(zone: Zone, point: Point): boolean {
  if (isHorizontal(zone)) {
    if (point.x < zone.start.x || point.x > zone.end.x) {
      return false;
    }
    const lineY = zone.start.y + ((point.x - zone.start.x) * (zone.end.y - zone.start.y)) / (zone.end.x - zone.start.x);
    return Math.abs(point.y - lineY) <= zone.bandHalfWidth;
  }

  if (point.y < zone.start.y || point.y > zone.end.y) {
    return false;
  }
  const lineX = zone.start.x + ((point.y - zone.start.y) * (zone.end.x - zone.start.x)) / (zone.end.y - zone.start.y);
  return Math.abs(point.x - lineX) <= zone.bandHalfWidth;
}

function freezeZone(zone: Zone): Zone {
  return Object.freeze({
    ...zone,
    start: Object.freeze({ ...zone.start }),
    end: Object.freeze({ ...zone.end }),
  });
}

/**
 * Counts distinct track ids seen inside each zone's crossing band.
 * Registries only grow, so every count is monotonic for the life of the counter.
 */
export class ZoneCounter {
  /** Frozen copy taken at construction; later edits to the caller's zones do not reach it. */
  readonly zones: Readonly<ZoneSet>;
  private readonly registries: Record<ZoneId, Set<TrackId>> = {
    leftEntry: new Set(),
    leftExit: new Set(),
    rightEntry: new Set(),
    rightExit: new Set(),
  };
  private readonly lineColor: Rgb;
  private readonly highlightColor: Rgb;
  private readonly textColor: Rgb;
  private readonly thickness: number;
  private readonly highlightExtraThickness: number;
  private readonly textScale: number;

  constructor(zones: ZoneSet, options: ZoneCounterOptions = {}) {
    const copy: ZoneSet = {
      leftEntry: freezeZone(zones.leftEntry),
      leftExit: freezeZone(zones.leftExit),
      rightEntry: freezeZone(zones.rightEntry),
      rightExit: freezeZone(zones.rightExit),
    };
    validateZoneSet(copy, options.frameSize);
    this.zones = Object.freeze(copy);
    this.lineColor = options.lineColor ?? COLORS.red;
    this.highlightColor = options.highlightColor ?? COLORS.green;
    this.textColor = options.textColor ?? COLORS.blue;
    this.thickness = options.thickness ?? 4;
    this.highlightExtraThickness = options.highlightExtraThickness ?? 20;
    this.textScale = options.textScale ?? 3;
  }

  count(zoneId: ZoneId): number {
    return this.registries[zoneId].size;
  }

  counts(): ZoneCounts {
    return {
      leftEntry: this.count("leftEntry"),
      leftExit: this.count("leftExit"),
      rightEntry: this.count("rightEntry"),
      rightExit: this.count("rightExit"),
    };
  }

  has(zoneId: ZoneId, trackId: TrackId): boolean {
    return this.registries[zoneId].has(trackId);
  }

  /**
   * Registers the object in every zone whose band holds its center.
   * Returns the zones it was newly added to, or null when the extent is unusable.
   */
  register(trackId: TrackId, extent: Point[]): ZoneId[] | null {
    if (!hasValidExtent(extent)) {
      return null;
    }

    const center = extentCenter(extent);
    const added: ZoneId[] = [];
    for (const id of ZONE_IDS) {
      const registry = this.registries[id];
      if (isInZoneBand(this.zones[id], center) && !registry.has(trackId)) {
        registry.add(trackId);
        added.push(id);
      }
    }
    return added;
  }

  /** Draws every zone with its count; zones in `flashing` are highlighted for this frame only. */
  render(frame: ImageFrame, flashing: Iterable<ZoneId> = []): ImageFrame {
    const highlighted = new Set(flashing);

    for (const id of ZONE_IDS) {
      const zone = this.zones[id];
      drawLine(frame, zone.start, zone.end, this.lineColor, this.thickness);
    }

    for (const id of highlighted) {
      const zone = this.zones[id];
      drawLine(frame, zone.start, zone.end, this.highlightColor, this.thickness + this.highlightExtraThickness);
    }

    for (const id of ZONE_IDS) {
      const zone = this.zones[id];
      const label = zone.direction === "entry" ? "In" : "Out";
      drawText(
        frame,
        `${label}: ${this.count(id)}`,
        { x: zone.start.x, y: zone.end.y - 10 },
        this.textColor,
        this.textScale,
      );
    }

    return frame;
  }

  registerAndRender(trackId: TrackId, extent: Point[], frame: ImageFrame): ImageFrame {
    return this.render(frame, this.register(trackId, extent) ?? []);
  }

  /** Registers every tracked object of a frame, then draws the zones once. */
  processFrame(objects: TrackedObject[], frame: ImageFrame): FrameRegistration {
    const registered: ObjectRegistration[] = [];
    const skipped: TrackId[] = [];
    const flashing = new Set<ZoneId>();

    for (const object of objects) {
      const zones = this.register(object.id, object.points);
      if (!zones) {
        skipped.push(object.id);
        continue;
      }
      if (zones.length > 0) {
        registered.push({ trackId: object.id, zones });
        zones.forEach((zone) => flashing.add(zone));
      }
    }

    return { frame: this.render(frame, flashing), registered, skipped };
  }
}
