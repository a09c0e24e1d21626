/**
 * Layout Types
 *
 * Sizing modes, alignment anchors and the size pair returned by
 * size computations.
 */

/** Width/height pair */
export interface Size {
  width: number;
  height: number;
}

/**
 * Per-axis sizing policy.
 * - fixed: explicit value
 * - content: derived from the element's own content or children
 * - fill: derived from the parent's resolved size on the same axis
 */
export type SizeMode = "fixed" | "content" | "fill";

export type Axis = "width" | "height";

/** 3x3 anchor used to place a child inside a cell */
export type Align =
  | "upper-left"
  | "upper-center"
  | "upper-right"
  | "middle-left"
  | "middle-center"
  | "middle-right"
  | "lower-left"
  | "lower-center"
  | "lower-right";

export const ALIGNMENTS: readonly Align[] = [
  "upper-left",
  "upper-center",
  "upper-right",
  "middle-left",
  "middle-center",
  "middle-right",
  "lower-left",
  "lower-center",
  "lower-right",
];

/**
 * Fraction of the free space placed before the child on each axis:
 * 0 (leading edge), 0.5 (centered) or 1 (trailing edge).
 */
export function anchorFraction(align: Align): [number, number] {
  const [vertical, horizontal] = align.split("-");
  const fx = horizontal === "left" ? 0 : horizontal === "center" ? 0.5 : 1;
  const fy = vertical === "upper" ? 0 : vertical === "middle" ? 0.5 : 1;
  return [fx, fy];
}

/**
 * Offset of a child of `childSize` inside a slot of `cellSize`.
 * Children as large as the slot or larger are pinned to the leading edge.
 */
export function alignOffset(cellSize: number, childSize: number, fraction: number): number {
  if (childSize >= cellSize) return 0;
  return (cellSize - childSize) * fraction;
}
