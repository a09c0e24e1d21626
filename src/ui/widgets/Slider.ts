/**
 * Slider Widget
 *
 * Horizontal slider bound to a shared number cell, with an optional label
 * line above it.
 */

import { requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";

export interface SliderOptions extends ElementOptions {
  value: Cell<number>;
  /** Default 0 */
  min?: number;
  /** Default 100 */
  max?: number;
  /** Round values to whole numbers */
  integer?: boolean;
  label?: string;
  tooltip?: string;
}

export class Slider extends UIElement {
  readonly value: Cell<number>;
  readonly min: number;
  readonly max: number;
  integer: boolean;
  tooltip: string;

  private _label: string;

  constructor(options: SliderOptions) {
    super({ widthMode: "content", heightMode: "content", ...options });
    const min = options.min ?? 0;
    const max = options.max ?? 100;
    if (min > max) {
      throw new RangeError(`Slider min (${min}) must not exceed max (${max})`);
    }
    this.value = requireCell(options.value, "value", "Slider");
    this.min = min;
    this.max = max;
    this.integer = options.integer ?? false;
    this._label = options.label ?? "";
    this.tooltip = options.tooltip ?? "";
  }

  get label(): string {
    return this._label;
  }

  set label(value: string) {
    if (value === this._label) return;
    this._label = value;
    this.invalidateSize();
  }

  /** Position of the value in [min, max] as 0-1 */
  get percentage(): number {
    if (this.max === this.min) return 0;
    return (this.value.get() - this.min) / (this.max - this.min);
  }

  /** Set the value to a fraction (0-1, clamped) of the range. */
  setToPercentage(fraction: number): void {
    const clamped = Math.max(0, Math.min(1, fraction));
    this.value.set(this.normalize(this.min + (this.max - this.min) * clamped));
  }

  /** Clamp into [min, max], rounding for integer sliders */
  normalize(value: number): number {
    const rounded = this.integer ? Math.round(value) : value;
    return Math.max(this.min, Math.min(this.max, rounded));
  }

  protected computeIntrinsicWidth(): number {
    const width = this.theme.slider.width;
    if (this._label.length === 0) return width;
    return Math.max(width, this.measurer.measure(this._label).width);
  }

  protected computeIntrinsicHeight(): number {
    const height = this.theme.slider.height;
    if (this._label.length === 0) return height;
    return height + this.measurer.lineHeight;
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    let track = bounds;
    if (this._label.length > 0) {
      const lineHeight = this.measurer.lineHeight;
      ui.label(
        { x: bounds.x, y: bounds.y, width: bounds.width, height: lineHeight },
        this._label,
        { color: this.theme.label.color, wordWrap: false, anchor: "left" }
      );
      track = {
        x: bounds.x,
        y: bounds.y + lineHeight,
        width: bounds.width,
        height: Math.max(0, bounds.height - lineHeight),
      };
    }

    const next = ui.slider(track, this.value.get(), this.min, this.max);
    this.value.set(this.normalize(next));
    ui.tooltip(bounds, this.tooltip);
  }
}
