/**
 * Text Entry Widget
 *
 * Text field bound to a shared string cell, with an optional label to its
 * left.
 */

import { requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";

export interface TextEntryOptions extends ElementOptions {
  text: Cell<string>;
  label?: string;
  multiline?: boolean;
  /** Longer input from the backend is truncated */
  maxLength?: number;
  tooltip?: string;
}

export class TextEntry extends UIElement {
  readonly text: Cell<string>;
  maxLength: number | undefined;
  tooltip: string;

  private _label: string;
  private _multiline: boolean;

  constructor(options: TextEntryOptions) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this.text = requireCell(options.text, "text", "TextEntry");
    this._label = options.label ?? "";
    this._multiline = options.multiline ?? false;
    this.maxLength = options.maxLength;
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

  get multiline(): boolean {
    return this._multiline;
  }

  set multiline(value: boolean) {
    if (value === this._multiline) return;
    this._multiline = value;
    this.invalidateSize();
  }

  protected computeIntrinsicWidth(): number {
    const { width, labelGap } = this.theme.textEntry;
    if (this._label.length === 0) return width;
    return this.measurer.measure(this._label).width + labelGap + width;
  }

  protected computeIntrinsicHeight(): number {
    const rows = this._multiline ? this.theme.textEntry.multilineRows : 1;
    const fieldHeight = this.measurer.lineHeight * rows;
    if (this._label.length === 0) return fieldHeight;
    return Math.max(fieldHeight, this.measurer.measure(this._label).height);
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    let field = bounds;
    if (this._label.length > 0) {
      const labelWidth = this.measurer.measure(this._label).width;
      ui.label(
        { x: bounds.x, y: bounds.y, width: labelWidth, height: bounds.height },
        this._label,
        { color: this.theme.label.color, wordWrap: false, anchor: "left" }
      );
      const offset = labelWidth + this.theme.textEntry.labelGap;
      field = { x: bounds.x + offset, y: bounds.y, width: Math.max(0, bounds.width - offset), height: bounds.height };
    }

    const edited = ui.textField(field, this.text.get(), this._multiline);
    this.text.set(this.maxLength !== undefined ? edited.slice(0, this.maxLength) : edited);
    ui.tooltip(bounds, this.tooltip);
  }
}
