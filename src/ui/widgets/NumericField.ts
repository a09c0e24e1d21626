/**
 * Numeric Field Widget
 *
 * Text field editing a number. Keystrokes go to an edit buffer; the cell
 * only takes input that parses to a number inside [min, max].
 */

import { cell, requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";

export const DEFAULT_NUMERIC_MAX = 1_000_000_000;

const FIELD_WIDTH = 120;

export interface NumericFieldOptions extends ElementOptions {
  /** A private cell at `min` when omitted */
  value?: Cell<number>;
  /** Default 0 */
  min?: number;
  /** Default 1e9 */
  max?: number;
  /** Reject input with a fractional part */
  integer?: boolean;
  /** Initial buffer; defaults to the formatted value */
  buffer?: string;
  /** Shown on a line above the field */
  label?: string;
  tooltip?: string;
}

export class NumericField extends UIElement {
  readonly value: Cell<number>;
  readonly min: number;
  readonly max: number;
  integer: boolean;
  tooltip: string;
  /** Current text of the field, valid or not */
  buffer: string;
  /** True after a frame whose edit updated the value */
  changed: boolean = false;

  private _label: string;

  constructor(options: NumericFieldOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    const min = options.min ?? 0;
    const max = options.max ?? DEFAULT_NUMERIC_MAX;
    if (min > max) {
      throw new RangeError(`NumericField min (${min}) must not exceed max (${max})`);
    }
    this.min = min;
    this.max = max;
    this.value = options.value === undefined ? cell(min) : requireCell(options.value, "value", "NumericField");
    this.integer = options.integer ?? false;
    this.buffer = options.buffer ?? String(this.value.get());
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

  /**
   * Parse field text. Returns null for text that is empty, not a finite
   * number, fractional in an integer field, or outside [min, max].
   */
  parse(text: string): number | null {
    const trimmed = text.trim();
    if (trimmed.length === 0) return null;
    const parsed = Number(trimmed);
    if (!Number.isFinite(parsed)) return null;
    if (this.integer && !Number.isInteger(parsed)) return null;
    if (parsed < this.min || parsed > this.max) return null;
    return parsed;
  }

  /**
   * Apply edited text: store it as the buffer and update the value when it
   * parses. Returns whether the value changed.
   */
  applyInput(text: string): boolean {
    this.buffer = text;
    const parsed = this.parse(text);
    this.changed = parsed !== null && parsed !== this.value.get();
    if (parsed !== null) {
      this.value.set(parsed);
    }
    return this.changed;
  }

  protected computeIntrinsicWidth(): number {
    if (this._label.length === 0) return FIELD_WIDTH;
    return Math.max(FIELD_WIDTH, this.measurer.measure(this._label).width);
  }

  protected computeIntrinsicHeight(): number {
    const lineHeight = this.measurer.lineHeight;
    return this._label.length === 0 ? lineHeight : lineHeight * 2;
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    // A valid buffer that disagrees with the cell was overtaken by an outside write
    const buffered = this.parse(this.buffer);
    if (buffered !== null && buffered !== this.value.get()) {
      this.buffer = String(this.value.get());
    }

    let field = bounds;
    if (this._label.length > 0) {
      const lineHeight = this.measurer.lineHeight;
      ui.label(
        { x: bounds.x, y: bounds.y, width: bounds.width, height: lineHeight },
        this._label,
        { color: this.theme.label.color, wordWrap: false, anchor: "left" }
      );
      field = { x: bounds.x, y: bounds.y + lineHeight, width: bounds.width, height: Math.max(0, bounds.height - lineHeight) };
    }

    this.applyInput(ui.textField(field, this.buffer, false));
    ui.tooltip(bounds, this.tooltip);
  }
}
