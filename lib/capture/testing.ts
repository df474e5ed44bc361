import type { Rect } from "@/lib/extraction/region";
import type { RawImage } from "./types";

export type Rgb = [number, number, number];

/** Solid RGB image for tests. */
export function blankImage(width: number, height: number, color: Rgb = [0, 0, 0]): RawImage {
  const data = Buffer.alloc(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    data[i * 3] = color[0];
    data[i * 3 + 1] = color[1];
    data[i * 3 + 2] = color[2];
  }
  return { data, width, height, channels: 3 };
}

export function fillRect(image: RawImage, rect: Rect, color: Rgb): void {
  for (let y = rect.y; y < rect.y + rect.height; y++) {
    for (let x = rect.x; x < rect.x + rect.width; x++) {
      const i = (y * image.width + x) * image.channels;
      image.data[i] = color[0];
      image.data[i + 1] = color[1];
      image.data[i + 2] = color[2];
    }
  }
}
