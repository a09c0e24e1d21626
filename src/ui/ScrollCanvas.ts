/**
 * Scroll Canvas
 *
 * Canvas whose children keep the absolute positions the caller gives them
 * and are drawn inside a scroll view over their bounding box.
 */

import { zero, type Vec2 } from "../math/vec2";
import { cell, requireCell, type Cell } from "./Cell";
import { Canvas, type CanvasOptions } from "./Canvas";
import { containsRect, inset, union, type Rect } from "./Rect";
import { scrollView } from "./scrollView";
import type { UIContext } from "./UIContext";

export interface ScrollCanvasOptions extends CanvasOptions {
  /** Inset of the interactive scroll rect */
  padding?: number;
  showScrollbars?: boolean;
  /** Shared offset; a private cell at (0, 0) when omitted */
  scrollPosition?: Cell<Vec2>;
}

export class ScrollCanvas extends Canvas {
  padding: number;
  showScrollbars: boolean;
  readonly scrollPosition: Cell<Vec2>;

  constructor(bounds: Rect, options: ScrollCanvasOptions = {}) {
    super(bounds, options);
    this.padding = options.padding ?? 0;
    this.showScrollbars = options.showScrollbars ?? true;
    this.scrollPosition =
      options.scrollPosition === undefined
        ? cell(zero())
        : requireCell(options.scrollPosition, "scrollPosition", "ScrollCanvas");
  }

  getRect(): Rect {
    return this.rect;
  }

  /** Canvas rect shrunk by padding, at least 1x1 */
  calculateScrollRect(): Rect {
    return inset(this.rect, this.padding);
  }

  /**
   * Bounding box of the children. A box that lies inside the canvas is
   * grown from the canvas origin to at least the canvas size; without
   * children the canvas rect itself.
   */
  calculateViewRect(): Rect {
    const bounds = this.rect;
    const content = union(this.children.map((child) => child.rect));
    if (!content) return bounds;

    if (containsRect(bounds, content) && (content.width < bounds.width || content.height < bounds.height)) {
      return {
        x: bounds.x,
        y: bounds.y,
        width: Math.max(content.width, bounds.width),
        height: Math.max(content.height, bounds.height),
      };
    }
    return content;
  }

  /** Children keep their own positions */
  protected layoutChildren(): void {}

  protected renderChildren(ui: UIContext): void {
    const config = {
      viewport: this.calculateScrollRect(),
      view: this.calculateViewRect(),
      position: this.scrollPosition,
      showScrollbars: this.showScrollbars,
    };
    scrollView(ui, config, () => {
      for (const child of this.children) {
        child.render(ui);
      }
    });
  }
}
