import { centerOf, containsPoint, type Rect } from "@/lib/extraction/region";
import type { TextElement } from "./types";

/**
 * Elements whose bounding-box center lies inside `region`.
 * Partial overlap does not count.
 */
export function attributeToRegion(elements: TextElement[], region: Rect): TextElement[] {
  return elements.filter((element) => containsPoint(region, centerOf(element.bbox)));
}

/** Reading order: top to bottom, then left to right. */
export function inReadingOrder(elements: TextElement[]): TextElement[] {
  return [...elements].sort((a, b) => a.bbox.y - b.bbox.y || a.bbox.x - b.bbox.x);
}
