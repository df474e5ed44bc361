import type { RawImage } from "@/lib/capture/types";
import { clampToImage, type Rect } from "@/lib/extraction/region";
import type { LocatedCard } from "./types";

/** Greyscale threshold isolating bright card faces from the felt. */
const BRIGHTNESS_THRESHOLD = 150;

/** Minimum blob area in pixels (filters noise and small UI elements). */
const MIN_AREA = 200;

/** Minimum blob height in pixels. */
const MIN_HEIGHT = 14;

/** Maximum aspect ratio for blobs (width/height). Wider = buttons/text. */
const MAX_BLOB_ASPECT = 3.0;

/** Minimum fill ratio (bright pixels / bounding box area). */
const MIN_FILL_RATIO = 0.5;

/** Expected single card aspect ratio (width/height). */
const SINGLE_CARD_ASPECT = 0.7;

/** Blobs wider than this (w/h) are overlapping cards to split. */
const SPLIT_ASPECT_THRESHOLD = 0.9;

/** Corner crop: fraction of card width and height for rank/suit region. */
const CORNER_WIDTH_FRAC = 0.35;
const CORNER_HEIGHT_FRAC = 0.5;

interface Component {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  area: number;
}

export interface GreyscaleCrop {
  pixels: Uint8Array;
  width: number;
  height: number;
}

/** Luma of every pixel inside `rect`, row-major. */
export function greyscaleCrop(image: RawImage, rect: Rect): GreyscaleCrop {
  const pixels = new Uint8Array(rect.width * rect.height);
  const { data, width, channels } = image;

  for (let y = 0; y < rect.height; y++) {
    for (let x = 0; x < rect.width; x++) {
      const i = ((rect.y + y) * width + (rect.x + x)) * channels;
      pixels[y * rect.width + x] =
        channels >= 3
          ? Math.round((data[i] * 299 + data[i + 1] * 587 + data[i + 2] * 114) / 1000)
          : data[i];
    }
  }

  return { pixels, width: rect.width, height: rect.height };
}

/** 4-connected components of pixels above the brightness threshold. */
function findBrightComponents({ pixels, width: w, height: h }: GreyscaleCrop): Component[] {
  const labels = new Int32Array(w * h);
  const components: Component[] = [];
  let nextLabel = 1;

  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const idx = y * w + x;
      if (pixels[idx] <= BRIGHTNESS_THRESHOLD || labels[idx] !== 0) continue;

      const label = nextLabel++;
      const comp: Component = { minX: x, minY: y, maxX: x, maxY: y, area: 0 };
      const stack = [idx];
      labels[idx] = label;

      let ci = stack.pop();
      while (ci !== undefined) {
        const cx = ci % w;
        const cy = (ci - cx) / w;
        comp.area++;

        if (cx < comp.minX) comp.minX = cx;
        if (cx > comp.maxX) comp.maxX = cx;
        if (cy < comp.minY) comp.minY = cy;
        if (cy > comp.maxY) comp.maxY = cy;

        const neighbors: [number, number][] = [
          [cx - 1, cy],
          [cx + 1, cy],
          [cx, cy - 1],
          [cx, cy + 1],
        ];
        for (const [nx, ny] of neighbors) {
          if (nx < 0 || nx >= w || ny < 0 || ny >= h) continue;
          const ni = ny * w + nx;
          if (pixels[ni] > BRIGHTNESS_THRESHOLD && labels[ni] === 0) {
            labels[ni] = label;
            stack.push(ni);
          }
        }
        ci = stack.pop();
      }

      components.push(comp);
    }
  }

  return components;
}

/**
 * Locate card-shaped bright blobs inside `region`.
 *
 * Pipeline:
 * 1. Greyscale the region and threshold it into a mask of bright pixels
 * 2. Connected component labeling via flood fill
 * 3. Filter by size, aspect ratio and fill ratio
 * 4. Split wide blobs (overlapping cards merge into one)
 * 5. Compute corner crop regions for rank/suit identification
 *
 * Cards are returned left to right, in frame coordinates.
 */
export function locateCards(image: RawImage, region: Rect): LocatedCard[] {
  const bounds = clampToImage(region, image.width, image.height);
  if (!bounds) return [];

  const components = findBrightComponents(greyscaleCrop(image, bounds));
  const cards: LocatedCard[] = [];

  for (const comp of components) {
    const bw = comp.maxX - comp.minX + 1;
    const bh = comp.maxY - comp.minY + 1;
    const aspect = bw / bh;
    const fillRatio = comp.area / (bw * bh);

    if (comp.area < MIN_AREA) continue;
    if (bh < MIN_HEIGHT) continue;
    if (aspect > MAX_BLOB_ASPECT) continue;
    if (fillRatio < MIN_FILL_RATIO) continue;

    const x0 = bounds.x + comp.minX;
    const y0 = bounds.y + comp.minY;

    if (aspect > SPLIT_ASPECT_THRESHOLD) {
      const numCards = Math.max(2, Math.round(aspect / SINGLE_CARD_ASPECT));
      const cardWidth = bw / numCards;
      for (let i = 0; i < numCards; i++) {
        const left = x0 + Math.round(i * cardWidth);
        const right = x0 + Math.round((i + 1) * cardWidth);
        cards.push(toLocatedCard(image, left, y0, right - left, bh, fillRatio));
      }
    } else {
      cards.push(toLocatedCard(image, x0, y0, bw, bh, fillRatio));
    }
  }

  return cards.sort((a, b) => a.x - b.x);
}

function toLocatedCard(
  image: RawImage,
  x: number,
  y: number,
  width: number,
  height: number,
  fillRatio: number,
): LocatedCard {
  // Corner height follows card width: blob height picks up shadows, width is stable.
  const expectedHeight = Math.round(width / SINGLE_CARD_ASPECT);
  const corner = clampToImage(
    {
      x,
      y,
      width: Math.round(width * CORNER_WIDTH_FRAC),
      height: Math.round(expectedHeight * CORNER_HEIGHT_FRAC),
    },
    image.width,
    image.height,
  ) ?? { x, y, width: 1, height: 1 };

  return { x, y, width, height, fillRatio, corner };
}
