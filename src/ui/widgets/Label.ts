/**
 * Label Widget
 *
 * Text leaf. Content width follows the text; content height follows the
 * wrapped text at the resolved width.
 */

import type { TextAnchor } from "../PaintBackend";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";
import type { Color } from "../UITheme";

export interface LabelOptions extends ElementOptions {
  text?: string;
  /** Wrap at the resolved width. Default true */
  wordWrap?: boolean;
  /** Content width of a wrapping label */
  maxWidth?: number;
  tooltip?: string;
  /** Defaults to the theme's label color */
  color?: Color;
  anchor?: TextAnchor;
}

export class Label extends UIElement {
  tooltip: string;
  color: Color | undefined;
  anchor: TextAnchor;

  private _text: string;
  private _wordWrap: boolean;
  private _maxWidth: number | undefined;

  constructor(options: LabelOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this._text = options.text ?? "";
    this._wordWrap = options.wordWrap ?? true;
    this._maxWidth = options.maxWidth;
    this.tooltip = options.tooltip ?? "";
    this.color = options.color;
    this.anchor = options.anchor ?? "left";
  }

  get text(): string {
    return this._text;
  }

  set text(value: string) {
    if (value === this._text) return;
    this._text = value;
    this.invalidateSize();
  }

  get wordWrap(): boolean {
    return this._wordWrap;
  }

  set wordWrap(value: boolean) {
    if (value === this._wordWrap) return;
    this._wordWrap = value;
    this.invalidateSize();
  }

  get maxWidth(): number | undefined {
    return this._maxWidth;
  }

  set maxWidth(value: number | undefined) {
    if (value === this._maxWidth) return;
    this._maxWidth = value;
    this.invalidateSize();
  }

  protected computeIntrinsicWidth(): number {
    if (this._text.length === 0) return 1;
    const textWidth = this.measurer.measure(this._text).width;
    if (!this._wordWrap) return textWidth;
    if (this._maxWidth !== undefined) return this._maxWidth;
    return Math.min(textWidth, this.theme.label.wrapWidth);
  }

  protected computeIntrinsicHeight(): number {
    const lineHeight = this.measurer.lineHeight;
    if (this._text.length === 0) return lineHeight;
    if (this._wordWrap) {
      return Math.max(1, this.measurer.measureWrapped(this._text, this.width));
    }
    return Math.max(lineHeight, this.measurer.measure(this._text).height);
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    ui.label(bounds, this._text, {
      color: this.color ?? this.theme.label.color,
      wordWrap: this._wordWrap,
      anchor: this.anchor,
    });
    ui.tooltip(bounds, this.tooltip);
  }
}
