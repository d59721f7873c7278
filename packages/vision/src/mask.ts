import { createMask, type OccupancyMask } from "./image.ts";
import type { TrackedObject } from "./tracked-object.ts";

/**
 * Occupancy mask with every tracked-object box zeroed, so corner sampling
 * lands on the background instead of on moving vehicles.
 */
export function buildObjectMask(width: number, height: number, objects: TrackedObject[], padding = 0): OccupancyMask {
  const mask = createMask(width, height, 1);

  for (const object of objects) {
    const finite = object.points.filter((point) => Number.isFinite(point.x) && Number.isFinite(point.y));
    if (finite.length === 0) {
      continue;
    }

    const xs = finite.map((point) => point.x);
    const ys = finite.map((point) => point.y);
    const minX = Math.max(0, Math.floor(Math.min(...xs) - padding));
    const maxX = Math.min(width - 1, Math.ceil(Math.max(...xs) + padding));
    const minY = Math.max(0, Math.floor(Math.min(...ys) - padding));
    const maxY = Math.min(height - 1, Math.ceil(Math.max(...ys) + padding));

    for (let y = minY; y <= maxY; y += 1) {
      mask.data.fill(0, y * width + minX, y * width + maxX + 1);
    }
  }

  return mask;
}
