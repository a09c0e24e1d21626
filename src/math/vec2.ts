/**
 * 2D vector utilities for scroll offsets and positions
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

/** The zero vector. Returns a fresh tuple each call. */
export function zero(): Vec2 {
  return [0, 0];
}

/**
 * Component-wise equality.
 */
export function equals(a: Vec2, b: Vec2): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Clamp each component into [min, max].
 * A max below min collapses to min (content smaller than the viewport).
 */
export function clamp(v: Vec2, min: Vec2, max: Vec2): Vec2 {
  return [
    Math.max(min[0], Math.min(Math.max(min[0], max[0]), v[0])),
    Math.max(min[1], Math.min(Math.max(min[1], max[1]), v[1])),
  ];
}
