import type { Point, TrackedObjectRecord, TrackId } from "@lanewatch/types";

export type TrackedObject = {
  id: TrackId;
  /** Extent corners (two for a box) or a single centroid. */
  points: Point[];
};

export function fromTrackedObjectRecord(record: TrackedObjectRecord): TrackedObject {
  return {
    id: record.id,
    points: record.points.map(([x, y]) => ({ x, y })),
  };
}

export function hasValidExtent(points: Point[]): boolean {
  return points.length >= 2 && points.slice(0, 2).every((point) => Number.isFinite(point.x) && Number.isFinite(point.y));
}

/** Midpoint of the first two extent corners, truncated to whole pixels. */
export function extentCenter(points: Point[]): Point {
  const [first, second] = points;
  return {
    x: Math.trunc((first.x + second.x) / 2),
    y: Math.trunc((first.y + second.y) / 2),
  };
}

/** Sub-pixel center: the extent midpoint, or the point itself for a centroid. */
export function objectCenter(points: Point[]): Point | null {
  if (points.length === 0) {
    return null;
  }
  let x = 0;
  let y = 0;
  for (const point of points) {
    x += point.x;
    y += point.y;
  }
  return { x: x / points.length, y: y / points.length };
}
