import type { Point, TrackId } from "@lanewatch/types";

import type { CoordinateTransformation } from "./coordinate-transformation.ts";
import type { ImageFrame, Rgb } from "./image.ts";
import { drawPolyline } from "./overlay.ts";
import { objectCenter, type TrackedObject } from "./tracked-object.ts";

export type PathHistoryOptions = {
  maxHistory?: number;
  thickness?: number;
  palette?: Rgb[];
};

const DEFAULT_PALETTE: Rgb[] = [
  [230, 25, 75],
  [60, 180, 75],
  [255, 225, 25],
  [0, 130, 200],
  [245, 130, 48],
  [145, 30, 180],
  [70, 240, 240],
  [240, 50, 230],
];

/**
 * Keeps each track's recent centers in absolute (first reference frame) coordinates
 * and draws them back into the current frame, so paths stay put while the camera moves.
 */
export class AbsolutePathHistory {
  private readonly paths = new Map<TrackId, Point[]>();
  private readonly colors = new Map<TrackId, Rgb>();
  private readonly maxHistory: number;
  private readonly thickness: number;
  private readonly palette: Rgb[];

  constructor(options: PathHistoryOptions = {}) {
    this.maxHistory = Math.max(1, Math.floor(options.maxHistory ?? 30));
    this.thickness = options.thickness ?? 2;
    this.palette = options.palette && options.palette.length > 0 ? options.palette : DEFAULT_PALETTE;
  }

  /** Absolute path of a track, oldest point first. */
  path(trackId: TrackId): Point[] {
    return [...(this.paths.get(trackId) ?? [])];
  }

  get trackCount() {
    return this.paths.size;
  }

  record(objects: TrackedObject[], transformation: CoordinateTransformation) {
    for (const object of objects) {
      const center = objectCenter(object.points);
      if (!center || !Number.isFinite(center.x) || !Number.isFinite(center.y)) {
        continue;
      }

      const path = this.paths.get(object.id) ?? [];
      path.push(...transformation.relativeToAbsolute([center]));
      if (path.length > this.maxHistory) {
        path.splice(0, path.length - this.maxHistory);
      }
      this.paths.set(object.id, path);
    }
  }

  draw(frame: ImageFrame, objects: TrackedObject[], transformation: CoordinateTransformation): ImageFrame {
    this.record(objects, transformation);

    for (const [trackId, path] of this.paths) {
      const relative = transformation.absoluteToRelative(path);
      drawPolyline(frame, relative, this.colorFor(trackId), this.thickness);
    }

    return frame;
  }

  private colorFor(trackId: TrackId): Rgb {
    const existing = this.colors.get(trackId);
    if (existing) {
      return existing;
    }
    const color = this.palette[this.colors.size % this.palette.length];
    this.colors.set(trackId, color);
    return color;
  }
}
