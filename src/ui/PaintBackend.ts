/**
 * Paint Backend
 *
 * The immediate-mode primitives the element tree draws through.
 * Implemented by the host; every call receives a final resolved rectangle.
 * Interactive primitives return this frame's interaction result.
 */

import type { Vec2 } from "../math/vec2";
import type { Rect } from "./Rect";
import type { Color } from "./UITheme";

export type TextAnchor = "left" | "center" | "right";

export interface LabelStyle {
  color: Color;
  wordWrap: boolean;
  anchor: TextAnchor;
}

export interface PaintBackend {
  /** Framed panel background */
  panel(rect: Rect): void;
  fillRect(rect: Rect, color: Color): void;
  strokeRect(rect: Rect, color: Color, thickness: number): void;
  drawLine(from: Vec2, to: Vec2, color: Color, thickness: number): void;
  label(rect: Rect, text: string, style: LabelStyle): void;
  tooltip(rect: Rect, text: string): void;

  /** Returns true when clicked this frame */
  button(rect: Rect, text: string, disabled: boolean): boolean;
  /** Returns the new checked state */
  checkbox(rect: Rect, checked: boolean, disabled: boolean): boolean;
  /** Returns true when clicked this frame */
  radioButton(rect: Rect, selected: boolean, disabled: boolean): boolean;
  /** Returns the new value */
  slider(rect: Rect, value: number, min: number, max: number): number;
  /** Returns the edited text */
  textField(rect: Rect, text: string, multiline: boolean): string;
  /** Draws a menu button; returns the index chosen this frame, or null */
  selectMenu(rect: Rect, label: string, options: readonly string[]): number | null;

  /** Clip to `rect` and translate its origin to (0, 0) */
  beginGroup(rect: Rect): void;
  endGroup(): void;

  /**
   * Open a scroll view showing `view` (content coordinates) through
   * `viewport` (screen coordinates). Returns the scroll offset after input.
   */
  beginScrollView(viewport: Rect, offset: Vec2, view: Rect, showScrollbars: boolean): Vec2;
  endScrollView(): void;
}
