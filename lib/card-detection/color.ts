import type { RawImage } from "@/lib/capture/types";
import type { Rect } from "@/lib/extraction/region";

export interface Hsv {
  /** Degrees, 0 to 360. */
  h: number;
  /** 0 to 1. */
  s: number;
  /** 0 to 255. */
  v: number;
}

export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;

  let h = 0;
  if (delta > 0) {
    if (max === r) h = 60 * (((g - b) / delta) % 6);
    else if (max === g) h = 60 * ((b - r) / delta + 2);
    else h = 60 * ((r - g) / delta + 4);
  }
  if (h < 0) h += 360;

  return { h, s: max === 0 ? 0 : delta / max, v: max };
}

/** Visit every pixel of `rect` (clamped by the caller) as RGB. Greyscale images repeat the value. */
export function forEachPixel(
  image: RawImage,
  rect: Rect,
  visit: (r: number, g: number, b: number) => void,
): void {
  const { data, width, channels } = image;
  for (let y = rect.y; y < rect.y + rect.height; y++) {
    for (let x = rect.x; x < rect.x + rect.width; x++) {
      const i = (y * width + x) * channels;
      if (channels >= 3) visit(data[i], data[i + 1], data[i + 2]);
      else visit(data[i], data[i], data[i]);
    }
  }
}
