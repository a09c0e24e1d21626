/**
 * Radio Button Widget
 */

import { requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";
import { drawToggleLabel, splitToggleRect, toggleHeight, toggleWidth } from "./toggle";

export interface RadioButtonOptions extends ElementOptions {
  selected: Cell<boolean>;
  label?: string;
  /** Called when a click selects the button */
  onSelect?: () => void;
  disabled?: boolean;
  tooltip?: string;
}

/**
 * Selecting is one-way: a click on a selected button leaves it selected.
 * Hosts clear the other buttons of a group from `onSelect`.
 */
export class RadioButton extends UIElement {
  readonly selected: Cell<boolean>;
  onSelect: (() => void) | undefined;
  disabled: boolean;
  tooltip: string;

  private _label: string;

  constructor(options: RadioButtonOptions) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this.selected = requireCell(options.selected, "selected", "RadioButton");
    this._label = options.label ?? "";
    this.onSelect = options.onSelect;
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
    const clicked = ui.radioButton(box, this.selected.get(), this.disabled);
    drawToggleLabel(ui, this, text, this._label);
    ui.tooltip(bounds, this.tooltip);

    if (clicked && !this.selected.get()) {
      this.selected.set(true);
      this.onSelect?.();
    }
  }
}
