/**
 * Scroll Container
 *
 * Stacks its children vertically inside a scroll view. The scroll rect is
 * the element rect inset by padding; fill children take its size.
 */

import { zero, type Vec2 } from "../../math/vec2";
import { cell, requireCell, type Cell } from "../Cell";
import { inset, union, type Rect } from "../Rect";
import { scrollView } from "../scrollView";
import type { Axis } from "../types";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";

export interface ScrollContainerOptions extends ElementOptions {
  padding?: number;
  /** Gap between consecutive children */
  spacing?: number;
  showScrollbars?: boolean;
  /** Shared offset; a private cell at (0, 0) when omitted */
  scrollPosition?: Cell<Vec2>;
  /** Paint a panel background behind the scroll view */
  drawPanel?: boolean;
}

export class ScrollContainer extends UIElement {
  showScrollbars: boolean;
  drawPanel: boolean;
  readonly scrollPosition: Cell<Vec2>;

  private _padding: number;
  private _spacing: number;

  constructor(options: ScrollContainerOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this._padding = options.padding ?? 0;
    this._spacing = options.spacing ?? 2;
    this.showScrollbars = options.showScrollbars ?? true;
    this.drawPanel = options.drawPanel ?? true;
    this.scrollPosition =
      options.scrollPosition === undefined
        ? cell(zero())
        : requireCell(options.scrollPosition, "scrollPosition", "ScrollContainer");
  }

  get padding(): number {
    return this._padding;
  }

  set padding(value: number) {
    if (value === this._padding) return;
    this._padding = value;
    this.invalidateLayout();
  }

  get spacing(): number {
    return this._spacing;
  }

  set spacing(value: number) {
    if (value === this._spacing) return;
    this._spacing = value;
    this.invalidateSize();
  }

  /** Element rect shrunk by padding, at least 1x1 */
  calculateScrollRect(): Rect {
    return inset(this.rect, this._padding);
  }

  /**
   * Bounds of the arranged children, at least the size of the scroll
   * rect. The scroll rect itself when there are no children.
   */
  calculateViewRect(): Rect {
    this.layoutChildren();
    const scrollRect = this.calculateScrollRect();
    const content = union(this.children.map((child) => child.rect));
    if (!content) return scrollRect;
    return {
      x: content.x,
      y: content.y,
      width: Math.max(content.width, scrollRect.width),
      height: Math.max(content.height, scrollRect.height),
    };
  }

  get contentOverflows(): boolean {
    const scrollRect = this.calculateScrollRect();
    const view = this.calculateViewRect();
    return view.width > scrollRect.width || view.height > scrollRect.height;
  }

  protected computeIntrinsicWidth(): number {
    if (this.children.length === 0) return Math.max(1, this._padding * 2);
    return Math.max(1, Math.max(...this.children.map((child) => child.width)) + this._padding * 2);
  }

  protected computeIntrinsicHeight(): number {
    if (this.children.length === 0) return Math.max(1, this._padding * 2);
    let total = 0;
    for (const child of this.children) {
      total += child.height;
    }
    total += this._spacing * (this.children.length - 1);
    return Math.max(1, total + this._padding * 2);
  }

  protected fillSizeFor(_child: UIElement, axis: Axis): number {
    const scrollRect = this.calculateScrollRect();
    return axis === "width" ? scrollRect.width : scrollRect.height;
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    if (this.drawPanel) {
      ui.panel(bounds);
    }
  }

  protected layoutChildren(): void {
    const scrollRect = this.calculateScrollRect();
    let currentY = scrollRect.y;
    for (const child of this.children) {
      child.x = scrollRect.x;
      child.y = currentY;
      currentY += child.height + this._spacing;
    }
  }

  protected renderChildren(ui: UIContext): void {
    const config = {
      viewport: this.calculateScrollRect(),
      view: this.calculateViewRect(),
      position: this.scrollPosition,
      showScrollbars: this.showScrollbars,
    };
    scrollView(ui, config, () => super.renderChildren(ui));
  }
}
