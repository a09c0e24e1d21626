/**
 * Checkbox Widget
 *
 * Box bound to a shared boolean cell, with an optional label to its right.
 */

import { requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";
import { drawToggleLabel, splitToggleRect, toggleHeight, toggleWidth } from "./toggle";

export interface CheckboxOptions extends ElementOptions {
  checked: Cell<boolean>;
  label?: string;
  disabled?: boolean;
  tooltip?: string;
}

export class Checkbox extends UIElement {
  readonly checked: Cell<boolean>;
  disabled: boolean;
  tooltip: string;

  private _label: string;

  constructor(options: CheckboxOptions) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this.checked = requireCell(options.checked, "checked", "Checkbox");
    this._label = options.label ?? "";
    this.disabled = options.disabled ?? false;
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

  protected computeIntrinsicWidth(): number {
    return toggleWidth(this, this._label);
  }

  protected computeIntrinsicHeight(): number {
    return toggleHeight(this, this._label);
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    const [box, text] = splitToggleRect(this, bounds);
    this.checked.set(ui.checkbox(box, this.checked.get(), this.disabled));
    drawToggleLabel(ui, this, text, this._label);
    ui.tooltip(bounds, this.tooltip);
  }
}
