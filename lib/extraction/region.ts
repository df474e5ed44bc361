export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface NamedRegion extends Rect {
  name: string;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Half-open containment: the left/top edges belong to the rectangle,
 * the right/bottom edges do not. Adjacent regions never share a point.
 */
export function containsPoint(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  );
}

export function centerOf(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/** Smallest rectangle covering every input rectangle. */
export function unionOf(rects: Rect[]): Rect | null {
  if (rects.length === 0) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const r of rects) {
    if (r.x < minX) minX = r.x;
    if (r.y < minY) minY = r.y;
    if (r.x + r.width > maxX) maxX = r.x + r.width;
    if (r.y + r.height > maxY) maxY = r.y + r.height;
  }

  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** Intersect a rectangle with the image bounds. Returns null if nothing is left. */
export function clampToImage(rect: Rect, width: number, height: number): Rect | null {
  const x = Math.max(0, Math.round(rect.x));
  const y = Math.max(0, Math.round(rect.y));
  const right = Math.min(width, Math.round(rect.x + rect.width));
  const bottom = Math.min(height, Math.round(rect.y + rect.height));

  if (right <= x || bottom <= y) return null;
  return { x, y, width: right - x, height: bottom - y };
}
