/**
 * Rectangle helpers shared by the canvases and the paint backend.
 */

/** Rectangle in host screen units */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

/**
 * Shrink a rectangle by `padding` on every side.
 * Width and height never drop below 1.
 */
export function inset(outer: Rect, padding: number): Rect {
  return {
    x: outer.x + padding,
    y: outer.y + padding,
    width: Math.max(1, outer.width - padding * 2),
    height: Math.max(1, outer.height - padding * 2),
  };
}

/**
 * Smallest rectangle containing every input rectangle, or null for none.
 */
export function union(rects: readonly Rect[]): Rect | null {
  if (rects.length === 0) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const r of rects) {
    minX = Math.min(minX, r.x);
    minY = Math.min(minY, r.y);
    maxX = Math.max(maxX, r.x + r.width);
    maxY = Math.max(maxY, r.y + r.height);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/** True when `inner` lies entirely inside `outer` (edges inclusive). */
export function containsRect(outer: Rect, inner: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  );
}
