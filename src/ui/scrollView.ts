/**
 * Scroll view helper shared by the scrolling containers.
 */

import { clamp, type Vec2 } from "../math/vec2";
import type { Cell } from "./Cell";
import type { Rect } from "./Rect";
import type { UIContext } from "./UIContext";

export interface ScrollViewConfig {
  /** Visible area in screen coordinates */
  viewport: Rect;
  /** Bounds of the scrollable content */
  view: Rect;
  /** Offset read before drawing and written back after input */
  position: Cell<Vec2>;
  showScrollbars: boolean;
}

/**
 * Largest offset that still shows content: view size minus viewport size,
 * never below zero.
 */
export function maxScrollOffset(viewport: Rect, view: Rect): Vec2 {
  return [Math.max(0, view.width - viewport.width), Math.max(0, view.height - viewport.height)];
}

/**
 * Open a scroll view, run `draw` inside it, and store the clamped offset
 * reported by the backend.
 */
export function scrollView(ui: UIContext, config: ScrollViewConfig, draw: () => void): void {
  const { viewport, view, position, showScrollbars } = config;
  const offset = ui.beginScrollView(viewport, position.get(), view, showScrollbars);
  position.set(clamp(offset, [0, 0], maxScrollOffset(viewport, view)));
  try {
    draw();
  } finally {
    ui.endScrollView();
  }
}
