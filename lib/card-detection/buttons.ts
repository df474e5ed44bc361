import type { RawImage } from "@/lib/capture/types";
import { clampToImage, type Rect } from "@/lib/extraction/region";
import { forEachPixel, rgbToHsv } from "./color";

export const PLAYER_ACTIONS = ["fold", "check", "raise"] as const;
export type PlayerAction = (typeof PLAYER_ACTIONS)[number];

/** Minimum bright, saturated pixels of one hue for a button to count as visible. */
const MIN_BUTTON_PIXELS = 500;

const MIN_BRIGHTNESS = 140;
const MIN_SATURATION = 0.3;

type ButtonColor = "red" | "green" | "yellow";

const ACTION_BY_COLOR: Record<ButtonColor, PlayerAction> = {
  red: "fold",
  green: "check",
  yellow: "raise",
};

function classifyHue(h: number): ButtonColor | null {
  if (h < 15 || h >= 340) return "red";
  if (h >= 35 && h < 70) return "yellow";
  if (h >= 80 && h < 160) return "green";
  return null;
}

/**
 * Actions whose buttons are visible in the action area.
 *
 * Buttons are bright, saturated blocks against dark felt: red for fold,
 * green for check/call, yellow for raise. Returned in that order.
 */
export function detectActionButtons(image: RawImage, region: Rect): PlayerAction[] {
  const bounds = clampToImage(region, image.width, image.height);
  if (!bounds) return [];

  const counts: Record<ButtonColor, number> = { red: 0, green: 0, yellow: 0 };

  forEachPixel(image, bounds, (r, g, b) => {
    const { h, s, v } = rgbToHsv(r, g, b);
    if (v <= MIN_BRIGHTNESS || s <= MIN_SATURATION) return;
    const color = classifyHue(h);
    if (color) counts[color] += 1;
  });

  const colors: ButtonColor[] = ["red", "green", "yellow"];
  return colors.filter((color) => counts[color] >= MIN_BUTTON_PIXELS).map((color) => ACTION_BY_COLOR[color]);
}
