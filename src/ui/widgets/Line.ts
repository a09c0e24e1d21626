/**
 * Line Widget
 *
 * Horizontal or vertical rule. Across the line, the element's alignment
 * places it at the leading edge, center or trailing edge.
 */

import type { Rect } from "../Rect";
import { alignOffset, anchorFraction } from "../types";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";
import type { Color } from "../UITheme";

export type LineOrientation = "horizontal" | "vertical";

export const MIN_LINE_THICKNESS = 0.1;

export interface LineOptions extends ElementOptions {
  orientation?: LineOrientation;
  /** Default 1, never below 0.1 */
  thickness?: number;
  /** Defaults to the theme's line color */
  color?: Color;
  tooltip?: string;
}

export class Line extends UIElement {
  color: Color | undefined;
  tooltip: string;

  private _orientation: LineOrientation;
  private _thickness: number;

  constructor(options: LineOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this._orientation = options.orientation ?? "horizontal";
    this._thickness = Math.max(MIN_LINE_THICKNESS, options.thickness ?? 1);
    this.color = options.color;
    this.tooltip = options.tooltip ?? "";
  }

  get orientation(): LineOrientation {
    return this._orientation;
  }

  set orientation(value: LineOrientation) {
    if (value === this._orientation) return;
    this._orientation = value;
    this.invalidateSize();
  }

  get thickness(): number {
    return this._thickness;
  }

  set thickness(value: number) {
    const clamped = Math.max(MIN_LINE_THICKNESS, value);
    if (clamped === this._thickness) return;
    this._thickness = clamped;
    this.invalidateSize();
  }

  protected computeIntrinsicWidth(): number {
    return this._orientation === "horizontal" ? this.theme.line.length : this._thickness;
  }

  protected computeIntrinsicHeight(): number {
    return this._orientation === "horizontal" ? this._thickness : this.theme.line.length;
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    const color = this.color ?? this.theme.line.color;
    const half = this._thickness / 2;
    const [fx, fy] = anchorFraction(this.alignment);

    if (this._orientation === "horizontal") {
      const y = bounds.y + alignOffset(bounds.height, this._thickness, fy) + half;
      ui.drawLine([bounds.x, y], [bounds.x + bounds.width, y], color, this._thickness);
    } else {
      const x = bounds.x + alignOffset(bounds.width, this._thickness, fx) + half;
      ui.drawLine([x, bounds.y], [x, bounds.y + bounds.height], color, this._thickness);
    }
    ui.tooltip(bounds, this.tooltip);
  }
}
