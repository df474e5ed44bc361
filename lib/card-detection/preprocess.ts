import sharp from "sharp";
import type { RawImage } from "@/lib/capture/types";
import type { Rect } from "@/lib/extraction/region";

/** Working size for finding the glyph bounding box. */
const WORK_W = 80;
const WORK_H = 120;

/** Output size after tight bbox crop. All comparisons use this size. */
export const OUTPUT_W = 32;
export const OUTPUT_H = 48;

/** Pixels darker than this belong to the rank/suit glyph. */
const GLYPH_THRESHOLD = 180;

/**
 * Tight bounding box of dark pixels in a single-channel buffer,
 * padded by one pixel. Null when there is no usable glyph.
 */
function tightBBox(
  pixels: Buffer,
  width: number,
  height: number,
  threshold: number,
): { left: number; top: number; width: number; height: number } | null {
  let minX = width;
  let minY = height;
  let maxX = 0;
  let maxY = 0;
  let found = false;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (pixels[y * width + x] < threshold) {
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
        found = true;
      }
    }
  }

  if (!found) return null;

  const left = Math.max(0, minX - 1);
  const top = Math.max(0, minY - 1);
  const right = Math.min(width, maxX + 2);
  const bottom = Math.min(height, maxY + 2);

  const w = right - left;
  const h = bottom - top;
  if (w < 3 || h < 3) return null;

  return { left, top, width: w, height: h };
}

/**
 * Normalize a card corner for template matching.
 *
 * Pipeline: crop corner → resize → greyscale → tight glyph bbox → crop → resize.
 * The threshold only locates the glyph; stored values stay greyscale.
 *
 * Returns a raw single-channel buffer of OUTPUT_W × OUTPUT_H, or null when
 * the corner holds no glyph.
 */
export async function preprocessCorner(image: RawImage, corner: Rect): Promise<Buffer | null> {
  const { data: grey, info } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: rawChannels(image.channels) },
  })
    .extract({ left: corner.x, top: corner.y, width: corner.width, height: corner.height })
    .resize(WORK_W, WORK_H, { fit: "fill" })
    .greyscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const bbox = tightBBox(grey, info.width, info.height, GLYPH_THRESHOLD);
  if (!bbox) return null;

  return sharp(grey, { raw: { width: info.width, height: info.height, channels: 1 } })
    .extract(bbox)
    .resize(OUTPUT_W, OUTPUT_H, { fit: "fill" })
    .raw()
    .toBuffer();
}

/** Mean per-pixel closeness of two preprocessed buffers, 0 to 1. */
export function similarity(a: Buffer, b: Buffer): number {
  const len = Math.min(a.length, b.length);
  if (len === 0) return 0;

  let total = 0;
  for (let i = 0; i < len; i++) {
    total += 1 - Math.abs(a[i] - b[i]) / 255;
  }
  return total / len;
}

export function rawChannels(channels: number): 1 | 2 | 3 | 4 {
  switch (channels) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 4:
      return 4;
    default:
      return 3;
  }
}
