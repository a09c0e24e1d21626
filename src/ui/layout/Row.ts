/**
 * Horizontal packing container.
 */

import { UIElement, type ElementOptions } from "../UIElement";

export const DEFAULT_ROW_SPACING = 2;

export interface RowOptions extends ElementOptions {
  /** Gap between consecutive children */
  spacing?: number;
}

/**
 * Places children left to right from its own position.
 * Content size: sum of widths plus spacing by the tallest child.
 */
export class Row extends UIElement {
  private _spacing: number;

  constructor(options: RowOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this._spacing = options.spacing ?? DEFAULT_ROW_SPACING;
  }

  get spacing(): number {
    return this._spacing;
  }

  set spacing(value: number) {
    if (value === this._spacing) return;
    this._spacing = value;
    this.invalidateSize();
  }

  protected computeIntrinsicWidth(): number {
    if (this.children.length === 0) return this.theme.element.defaultWidth;
    let total = 0;
    for (const child of this.children) {
      total += child.width;
    }
    return total + this._spacing * (this.children.length - 1);
  }

  protected computeIntrinsicHeight(): number {
    if (this.children.length === 0) return this.theme.element.defaultHeight;
    return Math.max(...this.children.map((child) => child.height));
  }

  protected layoutChildren(): void {
    let currentX = this.x;
    for (const child of this.children) {
      child.x = currentX;
      child.y = this.y;
      currentX += child.width + this._spacing;
    }
  }
}
