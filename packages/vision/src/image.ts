export type ImageFrame = {
  width: number;
  height: number;
  channels: 1 | 3 | 4;
  data: Uint8ClampedArray;
};

export type GrayImage = ImageFrame & { channels: 1 };

export type OccupancyMask = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type Rgb = readonly [number, number, number];

export function createFrame(width: number, height: number, channels: ImageFrame["channels"] = 3): ImageFrame {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid frame size ${width}x${height}`);
  }

  return { width, height, channels, data: new Uint8ClampedArray(width * height * channels) };
}

export function assertFrame(frame: ImageFrame) {
  if (frame.data.length !== frame.width * frame.height * frame.channels) {
    throw new Error(
      `Frame buffer holds ${frame.data.length} samples, expected ${frame.width}x${frame.height}x${frame.channels}`,
    );
  }
}

export function toGrayscale(frame: ImageFrame): GrayImage {
  assertFrame(frame);
  const { width, height, channels } = frame;

  if (channels === 1) {
    return { width, height, channels: 1, data: frame.data.slice() };
  }

  const gray = new Uint8ClampedArray(width * height);
  const source = frame.data;
  for (let index = 0, offset = 0; index < gray.length; index += 1, offset += channels) {
    gray[index] = 0.299 * source[offset] + 0.587 * source[offset + 1] + 0.114 * source[offset + 2];
  }

  return { width, height, channels: 1, data: gray };
}

export function createMask(width: number, height: number, fill: 0 | 1 = 1): OccupancyMask {
  return { width, height, data: new Uint8Array(width * height).fill(fill) };
}

export function assertMaskMatches(mask: OccupancyMask, image: { width: number; height: number }) {
  if (mask.width !== image.width || mask.height !== image.height || mask.data.length !== mask.width * mask.height) {
    throw new Error(`Mask ${mask.width}x${mask.height} does not match image ${image.width}x${image.height}`);
  }
}
