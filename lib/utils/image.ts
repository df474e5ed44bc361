import type { RawImage } from "@/lib/capture/types";
import type { Rect } from "@/lib/extraction/region";

/**
 * Copy `rect` out of a raw image. The rectangle must already lie inside
 * the image (see `clampToImage`).
 */
export function cropImage(image: RawImage, rect: Rect): RawImage {
  const { channels } = image;
  const rowBytes = rect.width * channels;
  const data = Buffer.alloc(rowBytes * rect.height);

  for (let y = 0; y < rect.height; y++) {
    const start = ((rect.y + y) * image.width + rect.x) * channels;
    image.data.copy(data, y * rowBytes, start, start + rowBytes);
  }

  return { data, width: rect.width, height: rect.height, channels };
}
