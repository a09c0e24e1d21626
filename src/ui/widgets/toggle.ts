/**
 * Shared geometry for box-plus-label widgets (checkbox, radio button).
 */

import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import type { UIElement } from "../UIElement";

/** Box, or box plus gap plus label text */
export function toggleWidth(el: UIElement, label: string): number {
  const { boxSize, labelGap } = el.theme.toggle;
  if (label.length === 0) return boxSize;
  return boxSize + labelGap + el.measurer.measure(label).width;
}

export function toggleHeight(el: UIElement, label: string): number {
  const { boxSize } = el.theme.toggle;
  if (label.length === 0) return boxSize;
  return Math.max(boxSize, el.measurer.measure(label).height);
}

/** Box rect at the left edge, vertically centered, and the rect right of it */
export function splitToggleRect(el: UIElement, bounds: Rect): [Rect, Rect] {
  const { boxSize, labelGap } = el.theme.toggle;
  const box = {
    x: bounds.x,
    y: bounds.y + Math.max(0, (bounds.height - boxSize) / 2),
    width: boxSize,
    height: boxSize,
  };
  const textX = bounds.x + boxSize + labelGap;
  const text = {
    x: textX,
    y: bounds.y,
    width: Math.max(0, bounds.x + bounds.width - textX),
    height: bounds.height,
  };
  return [box, text];
}

export function drawToggleLabel(ui: UIContext, el: UIElement, bounds: Rect, label: string): void {
  if (label.length === 0) return;
  ui.label(bounds, label, { color: el.theme.label.color, wordWrap: false, anchor: "left" });
}
