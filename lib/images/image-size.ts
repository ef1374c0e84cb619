import { PNG } from "pngjs";

export interface ImageSize {
  width: number;
  height: number;
}

/** Pixel dimensions of a PNG image, or null when the data is not a PNG. */
export function getPngSize(pngBuffer: Buffer): ImageSize | null {
  if (!isPng(pngBuffer)) return null;
  const png = PNG.sync.read(pngBuffer);
  return { width: png.width, height: png.height };
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function isPng(data: Buffer): boolean {
  return data.length >= PNG_SIGNATURE.length && data.subarray(0, 8).equals(PNG_SIGNATURE);
}

const CM_PER_PX = 2.54 / 96;

/**
 * Frame size in centimetres for an image placed in a text column of
 * `maxWidthCm`, keeping its aspect ratio. Unknown sizes get a square frame
 * of the full column width.
 */
export function frameSize(size: ImageSize | null, maxWidthCm: number): ImageSize {
  if (size === null || size.width === 0 || size.height === 0) {
    return { width: maxWidthCm, height: maxWidthCm };
  }
  const width = Math.min(size.width * CM_PER_PX, maxWidthCm);
  const height = (width * size.height) / size.width;
  return { width: round(width), height: round(height) };
}

function round(cm: number): number {
  return Math.round(cm * 1000) / 1000;
}
