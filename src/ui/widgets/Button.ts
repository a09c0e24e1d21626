/**
 * Button Widget
 *
 * Clickable text button sized from its text.
 */

import { cell, requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";

export interface ButtonOptions extends ElementOptions {
  text?: string;
  /** Set each frame to whether the button was clicked; a private cell when omitted */
  clicked?: Cell<boolean>;
  onClick?: () => void;
  disabled?: boolean;
  tooltip?: string;
}

export class Button extends UIElement {
  readonly clicked: Cell<boolean>;
  onClick: (() => void) | undefined;
  disabled: boolean;
  tooltip: string;

  private _text: string;

  constructor(options: ButtonOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this._text = options.text ?? "";
    this.clicked = options.clicked === undefined ? cell(false) : requireCell(options.clicked, "clicked", "Button");
    this.onClick = options.onClick;
    this.disabled = options.disabled ?? false;
    this.tooltip = options.tooltip ?? "";
  }

  get text(): string {
    return this._text;
  }

  set text(value: string) {
    if (value === this._text) return;
    this._text = value;
    this.invalidateSize();
  }

  protected computeIntrinsicWidth(): number {
    const theme = this.theme.button;
    if (this._text.length === 0) return theme.emptyWidth;
    return this.measurer.measure(this._text).width + theme.paddingX * 2;
  }

  protected computeIntrinsicHeight(): number {
    const theme = this.theme.button;
    if (this._text.length === 0) return theme.emptyHeight;
    return Math.max(this.measurer.measure(this._text).height + theme.paddingY * 2, theme.minHeight);
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    const clicked = ui.button(bounds, this._text, this.disabled);
    this.clicked.set(clicked);
    ui.tooltip(bounds, this.tooltip);
    if (clicked) {
      this.onClick?.();
    }
  }
}
