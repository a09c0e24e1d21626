/**
 * Canvas
 *
 * Fixed-size root that binds a host rectangle to an element tree.
 * Children are drawn inside a backend group, so they are arranged from
 * the group origin (0, 0) rather than the canvas position.
 */

import type { Rect } from "./Rect";
import type { UIContext } from "./UIContext";
import { UIElement, type ElementOptions } from "./UIElement";

export interface CanvasOptions
  extends Omit<ElementOptions, "x" | "y" | "width" | "height" | "widthMode" | "heightMode"> {
  /** Paint a panel background behind the children */
  drawPanel?: boolean;
}

export class Canvas extends UIElement {
  drawPanel: boolean;

  constructor(bounds: Rect, options: CanvasOptions = {}) {
    super({ ...options, x: bounds.x, y: bounds.y, width: bounds.width, height: bounds.height });
    this.drawPanel = options.drawPanel ?? false;
  }

  /**
   * Rebind the canvas to a new host rectangle.
   * Fill descendants re-derive from the new size.
   */
  updateRect(bounds: Rect): void {
    this.x = bounds.x;
    this.y = bounds.y;
    this.width = bounds.width;
    this.height = bounds.height;
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    if (this.drawPanel) {
      ui.panel(bounds);
    }
  }

  protected layoutChildren(): void {
    let currentY = 0;
    for (const child of this.children) {
      child.x = 0;
      child.y = currentY;
      currentY += child.height + this.lineSpacing;
    }
  }

  protected renderChildren(ui: UIContext): void {
    ui.beginGroup(this.rect);
    try {
      super.renderChildren(ui);
    } finally {
      ui.endGroup();
    }
  }
}
