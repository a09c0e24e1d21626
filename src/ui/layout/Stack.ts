/**
 * Vertical packing container.
 */

import { UIElement, type ElementOptions } from "../UIElement";

export const DEFAULT_STACK_SPACING = 2;

export interface StackOptions extends ElementOptions {
  /** Gap between consecutive children */
  spacing?: number;
}

/**
 * Stacks children top to bottom from its own position.
 * Content size: widest child by the sum of heights plus spacing.
 */
export class Stack extends UIElement {
  private _spacing: number;

  constructor(options: StackOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this._spacing = options.spacing ?? DEFAULT_STACK_SPACING;
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
    return Math.max(...this.children.map((child) => child.width));
  }

  protected computeIntrinsicHeight(): number {
    if (this.children.length === 0) return this.theme.element.defaultHeight;
    let total = 0;
    for (const child of this.children) {
      total += child.height;
    }
    return total + this._spacing * (this.children.length - 1);
  }

  protected layoutChildren(): void {
    let currentY = this.y;
    for (const child of this.children) {
      child.x = this.x;
      child.y = currentY;
      currentY += child.height + this._spacing;
    }
  }
}
