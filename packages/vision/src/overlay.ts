import type { Point } from "@lanewatch/types";

import font from "./font.json";
import type { ImageFrame, Rgb } from "./image.ts";
import type { TrackedObject } from "./tracked-object.ts";

export const COLORS = {
  red: [255, 0, 0],
  green: [0, 255, 0],
  blue: [0, 0, 255],
  yellow: [255, 255, 0],
  white: [255, 255, 255],
} as const satisfies Record<string, Rgb>;

const glyphs = new Map<string, string[]>(Object.entries(font.glyphs));

export function paintPixel(frame: ImageFrame, x: number, y: number, color: Rgb) {
  if (x < 0 || y < 0 || x >= frame.width || y >= frame.height) {
    return;
  }

  const offset = (y * frame.width + x) * frame.channels;
  if (frame.channels === 1) {
    frame.data[offset] = 0.299 * color[0] + 0.587 * color[1] + 0.114 * color[2];
    return;
  }

  frame.data[offset] = color[0];
  frame.data[offset + 1] = color[1];
  frame.data[offset + 2] = color[2];
  if (frame.channels === 4) {
    frame.data[offset + 3] = 255;
  }
}

/** Paints every pixel whose center lies within thickness / 2 of the segment. */
export function drawLine(frame: ImageFrame, from: Point, to: Point, color: Rgb, thickness = 1): ImageFrame {
  const radius = Math.max(1, thickness) / 2;
  const minX = Math.max(0, Math.floor(Math.min(from.x, to.x) - radius));
  const maxX = Math.min(frame.width - 1, Math.ceil(Math.max(from.x, to.x) + radius));
  const minY = Math.max(0, Math.floor(Math.min(from.y, to.y) - radius));
  const maxY = Math.min(frame.height - 1, Math.ceil(Math.max(from.y, to.y) + radius));

  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const lengthSquared = dx * dx + dy * dy;
  const radiusSquared = radius * radius;

  for (let y = minY; y <= maxY; y += 1) {
    for (let x = minX; x <= maxX; x += 1) {
      const t = lengthSquared === 0 ? 0 : Math.min(1, Math.max(0, ((x - from.x) * dx + (y - from.y) * dy) / lengthSquared));
      const px = from.x + t * dx - x;
      const py = from.y + t * dy - y;
      if (px * px + py * py <= radiusSquared) {
        paintPixel(frame, x, y, color);
      }
    }
  }

  return frame;
}

export function drawArrowedLine(
  frame: ImageFrame,
  from: Point,
  to: Point,
  color: Rgb,
  thickness = 1,
  tipLength = 0.1,
): ImageFrame {
  drawLine(frame, from, to, color, thickness);

  const tipSize = Math.hypot(to.x - from.x, to.y - from.y) * tipLength;
  if (tipSize === 0) {
    return frame;
  }

  const angle = Math.atan2(from.y - to.y, from.x - to.x);
  for (const offset of [Math.PI / 4, -Math.PI / 4]) {
    drawLine(
      frame,
      to,
      { x: to.x + tipSize * Math.cos(angle + offset), y: to.y + tipSize * Math.sin(angle + offset) },
      color,
      thickness,
    );
  }

  return frame;
}

export function drawPolyline(frame: ImageFrame, points: Point[], color: Rgb, thickness = 1): ImageFrame {
  for (let index = 1; index < points.length; index += 1) {
    drawLine(frame, points[index - 1], points[index], color, thickness);
  }
  return frame;
}

export function drawRectangle(frame: ImageFrame, corner: Point, opposite: Point, color: Rgb, thickness = 1): ImageFrame {
  const topRight = { x: opposite.x, y: corner.y };
  const bottomLeft = { x: corner.x, y: opposite.y };
  return drawPolyline(frame, [corner, topRight, opposite, bottomLeft, corner], color, thickness);
}

/** Bitmap text; origin is the bottom-left corner of the first glyph. */
export function drawText(frame: ImageFrame, text: string, origin: Point, color: Rgb, scale = 3): ImageFrame {
  const top = Math.round(origin.y) - font.height * scale;
  let left = Math.round(origin.x);

  for (const char of text) {
    const rows = glyphs.get(char);
    rows?.forEach((row, rowIndex) => {
      for (let column = 0; column < row.length; column += 1) {
        if (row[column] !== "#") {
          continue;
        }
        for (let sy = 0; sy < scale; sy += 1) {
          for (let sx = 0; sx < scale; sx += 1) {
            paintPixel(frame, left + column * scale + sx, top + rowIndex * scale + sy, color);
          }
        }
      }
    });
    left += (font.width + 1) * scale;
  }

  return frame;
}

export function drawTrackedObjects(
  frame: ImageFrame,
  objects: TrackedObject[],
  color: Rgb = COLORS.green,
  thickness = 2,
): ImageFrame {
  for (const object of objects) {
    const [corner, opposite] = object.points;
    if (corner && opposite) {
      drawRectangle(frame, corner, opposite, color, thickness);
    }
  }
  return frame;
}
