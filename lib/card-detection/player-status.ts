import type { RawImage } from "@/lib/capture/types";
import { clampToImage, type Rect } from "@/lib/extraction/region";
import { forEachPixel, rgbToHsv } from "./color";

/** Mean luma above which a seat counts as active (folded seats are greyed out). */
const ACTIVE_BRIGHTNESS = 50;

/** Share of gold/yellow highlight pixels marking the seat to act. */
const CURRENT_HIGHLIGHT_SHARE = 0.02;

export interface PlayerStatus {
  isActive: boolean;
  isCurrent: boolean;
  meanBrightness: number;
  highlightShare: number;
}

export function analyzePlayerStatus(image: RawImage, region: Rect): PlayerStatus {
  const bounds = clampToImage(region, image.width, image.height);
  if (!bounds) return { isActive: false, isCurrent: false, meanBrightness: 0, highlightShare: 0 };

  let lumaTotal = 0;
  let highlight = 0;

  forEachPixel(image, bounds, (r, g, b) => {
    lumaTotal += (r * 299 + g * 587 + b * 114) / 1000;
    const { h, s, v } = rgbToHsv(r, g, b);
    if (h >= 40 && h <= 60 && s >= 0.4 && v >= 100) highlight += 1;
  });

  const pixels = bounds.width * bounds.height;
  const meanBrightness = lumaTotal / pixels;
  const highlightShare = highlight / pixels;

  return {
    isActive: meanBrightness > ACTIVE_BRIGHTNESS,
    isCurrent: highlightShare >= CURRENT_HIGHLIGHT_SHARE,
    meanBrightness,
    highlightShare,
  };
}
