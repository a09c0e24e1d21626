/**
 * UI Element
 *
 * Base node of the element tree and owner of the sizing engine.
 * Each axis resolves from its SizeMode:
 * - fixed: the explicitly set value (intrinsic size once if never set)
 * - content: the element's intrinsic size, cached until invalidated
 * - fill: the parent's size on that axis (0 without a parent)
 *
 * A content parent holding a fill child depends on itself. Every
 * intrinsic computation runs behind a per-node, per-axis reentry marker;
 * a reentrant query gets the last known size, else MIN_FALLBACK_SIZE.
 */

import type { Rect } from "./Rect";
import { DEFAULT_TEXT_MEASURER, type TextMeasurer } from "./TextMeasurer";
import type { Align, Axis, Size, SizeMode } from "./types";
import type { UIContext } from "./UIContext";
import { DEFAULT_THEME, type Color, type UITheme } from "./UITheme";

/** Size returned to a reentrant query that has no last known value */
export const MIN_FALLBACK_SIZE = 1;

/** Options accepted by every element constructor */
export interface ElementOptions {
  x?: number;
  y?: number;
  /** Setting a width forces widthMode to "fixed" */
  width?: number;
  /** Setting a height forces heightMode to "fixed" */
  height?: number;
  widthMode?: SizeMode;
  heightMode?: SizeMode;
  /** Anchor used by grids when the element is smaller than its cell */
  alignment?: Align;
  showBorders?: boolean;
  /** Defaults to the theme's element border color */
  borderColor?: Color;
  /** Defaults to the theme's element border thickness */
  borderThickness?: number;
  /** Inherited by descendants that set none */
  measurer?: TextMeasurer;
  /** Inherited by descendants that set none */
  theme?: UITheme;
}

export const DEFAULT_ELEMENT_OPTIONS = {
  x: 0,
  y: 0,
  widthMode: "fixed",
  heightMode: "fixed",
  alignment: "upper-left",
  showBorders: false,
} as const satisfies ElementOptions;

interface AxisState {
  value: number;
  /** Value was assigned through the setter or constructor */
  explicit: boolean;
  /** Value holds a computed size that is still valid */
  cached: boolean;
  /** Intrinsic computation for this axis is on the call stack */
  resolving: boolean;
  lastKnown: number | null;
}

function createAxisState(value: number | undefined): AxisState {
  return {
    value: value ?? 0,
    explicit: value !== undefined,
    cached: false,
    resolving: false,
    lastKnown: value ?? null,
  };
}

export class UIElement {
  x: number;
  y: number;
  alignment: Align;
  showBorders: boolean;

  private _widthMode: SizeMode;
  private _heightMode: SizeMode;
  private readonly axes: Record<Axis, AxisState>;
  private _parent: UIElement | null = null;
  private readonly _children: UIElement[] = [];
  private invalidating: boolean = false;

  private ownBorderColor: Color | undefined;
  private ownBorderThickness: number | undefined;
  private ownMeasurer: TextMeasurer | undefined;
  private ownTheme: UITheme | undefined;

  constructor(options: ElementOptions = {}) {
    this.x = options.x ?? DEFAULT_ELEMENT_OPTIONS.x;
    this.y = options.y ?? DEFAULT_ELEMENT_OPTIONS.y;
    this.alignment = options.alignment ?? DEFAULT_ELEMENT_OPTIONS.alignment;
    this.showBorders = options.showBorders ?? DEFAULT_ELEMENT_OPTIONS.showBorders;
    this._widthMode =
      options.width !== undefined ? "fixed" : options.widthMode ?? DEFAULT_ELEMENT_OPTIONS.widthMode;
    this._heightMode =
      options.height !== undefined ? "fixed" : options.heightMode ?? DEFAULT_ELEMENT_OPTIONS.heightMode;
    this.axes = {
      width: createAxisState(options.width),
      height: createAxisState(options.height),
    };
    this.ownBorderColor = options.borderColor;
    this.ownBorderThickness = options.borderThickness;
    this.ownMeasurer = options.measurer;
    this.ownTheme = options.theme;
  }

  // ==================== Tree ====================

  get parent(): UIElement | null {
    return this._parent;
  }

  /** Children in insertion order (= z-order = default layout order) */
  get children(): readonly UIElement[] {
    return this._children;
  }

  /**
   * Append a child, detaching it from its previous parent first.
   * Null or undefined is ignored.
   */
  addChild(child: UIElement | null | undefined): this {
    if (!child) return this;
    return this.insertChild(child, this._children.length);
  }

  /** Append several children in order. */
  addChildren(...children: UIElement[]): this {
    for (const child of children) {
      this.addChild(child);
    }
    return this;
  }

  /**
   * Remove a child and clear its parent reference.
   * Null, undefined and non-children are ignored.
   */
  removeChild(child: UIElement | null | undefined): this {
    if (!child) return this;
    const index = this._children.indexOf(child);
    if (index === -1) return this;

    this._children.splice(index, 1);
    child._parent = null;
    child.invalidateLayout();
    this.childrenChanged();
    return this;
  }

  /**
   * Insert `child` at `index` (clamped to [0, children.length]).
   */
  protected insertChild(child: UIElement, index: number): this {
    if (child === this || child.isAncestorOf(this)) {
      throw new Error("Cannot add an element to itself or to one of its descendants");
    }
    child._parent?.removeChild(child);

    const target = Math.max(0, Math.min(this._children.length, index));
    this._children.splice(target, 0, child);
    child._parent = this;
    child.invalidateLayout();
    this.childrenChanged();
    return this;
  }

  /** True when this element is `node` or one of its ancestors. */
  isAncestorOf(node: UIElement): boolean {
    for (let current: UIElement | null = node; current; current = current._parent) {
      if (current === this) return true;
    }
    return false;
  }

  private childrenChanged(): void {
    if (this.dependsOnChildren()) {
      this.invalidateSize();
    }
  }

  // ==================== Sizing Modes ====================

  get widthMode(): SizeMode {
    return this._widthMode;
  }

  set widthMode(mode: SizeMode) {
    this.setMode("width", mode);
  }

  get heightMode(): SizeMode {
    return this._heightMode;
  }

  set heightMode(mode: SizeMode) {
    this.setMode("height", mode);
  }

  modeOf(axis: Axis): SizeMode {
    return axis === "width" ? this.widthMode : this.heightMode;
  }

  protected setMode(axis: Axis, mode: SizeMode): void {
    if (this.modeOf(axis) === mode) return;
    if (axis === "width") {
      this._widthMode = mode;
    } else {
      this._heightMode = mode;
    }
    this.axes[axis].cached = false;
    this.invalidateSize();
  }

  // ==================== Resolved Size ====================

  get width(): number {
    return this.resolve("width");
  }

  set width(value: number) {
    this.assign("width", value);
  }

  get height(): number {
    return this.resolve("height");
  }

  set height(value: number) {
    this.assign("height", value);
  }

  get rect(): Rect {
    return { x: this.x, y: this.y, width: this.width, height: this.height };
  }

  /**
   * Size this element computes from its own content, whatever its modes.
   */
  get intrinsicSize(): Size {
    return { width: this.intrinsic("width"), height: this.intrinsic("height") };
  }

  /**
   * Size a container should reserve for this element on `axis`: the
   * resolved size, or the intrinsic size when the axis fills its parent.
   */
  preferredSize(axis: Axis): number {
    return this.modeOf(axis) === "fill" ? this.intrinsic(axis) : this.resolve(axis);
  }

  private resolve(axis: Axis): number {
    const state = this.axes[axis];
    switch (this.modeOf(axis)) {
      case "fixed":
        if (state.explicit || state.cached) return state.value;
        return this.computeAndCache(axis);
      case "content":
        if (state.cached) return state.value;
        return this.computeAndCache(axis);
      case "fill":
        return this._parent ? this._parent.fillSizeFor(this, axis) : 0;
    }
  }

  private intrinsic(axis: Axis): number {
    if (this.modeOf(axis) === "content") return this.resolve(axis);
    return this.guarded(axis, () => this.measureIntrinsic(axis));
  }

  private computeAndCache(axis: Axis): number {
    const state = this.axes[axis];
    if (state.resolving) return this.fallbackSize(axis);

    const value = this.guarded(axis, () => this.measureIntrinsic(axis));
    state.value = value;
    state.cached = true;
    state.lastKnown = value;
    return value;
  }

  /**
   * Run an intrinsic computation for `axis` behind the reentry marker.
   */
  protected guarded(axis: Axis, compute: () => number): number {
    const state = this.axes[axis];
    if (state.resolving) return this.fallbackSize(axis);

    state.resolving = true;
    try {
      return compute();
    } finally {
      state.resolving = false;
    }
  }

  /** Last known good size on `axis`, else MIN_FALLBACK_SIZE */
  protected fallbackSize(axis: Axis): number {
    const lastKnown = this.axes[axis].lastKnown;
    return lastKnown !== null && lastKnown > 0 ? lastKnown : MIN_FALLBACK_SIZE;
  }

  private measureIntrinsic(axis: Axis): number {
    return axis === "width" ? this.computeIntrinsicWidth() : this.computeIntrinsicHeight();
  }

  private assign(axis: Axis, value: number): void {
    const state = this.axes[axis];
    state.lastKnown = value;
    if (this.modeOf(axis) === "content") {
      // Content axes keep deriving from content; the value only seeds the fallback
      return;
    }
    const changed = !state.explicit || state.value !== value;
    state.value = value;
    state.explicit = true;
    state.cached = true;
    if (!changed) return;

    this.resized(axis);
  }

  /** True when `axis` holds a value assigned by the caller */
  protected hasExplicitSize(axis: Axis): boolean {
    return this.axes[axis].explicit;
  }

  // ==================== Invalidation ====================

  /**
   * Called after an explicit size change on `axis`. Content axes that
   * depend on it, fill children and content-sized ancestors re-derive.
   */
  protected resized(_axis: Axis): void {
    this.invalidateSize();
  }

  /**
   * Drop cached content sizes, re-derive fill children, and invalidate the
   * parent when it sizes itself from its children.
   */
  invalidateSize(): void {
    if (this.invalidating) return;
    this.invalidating = true;
    try {
      this.clearCaches();
      this.invalidateFillChildren("width");
      this.invalidateFillChildren("height");
      if (this._parent?.dependsOnChildren()) {
        this._parent.invalidateSize();
      }
    } finally {
      this.invalidating = false;
    }
  }

  /**
   * Invalidate every descendant's cached sizes, then this element's.
   */
  invalidateLayout(): void {
    for (const child of this._children) {
      child.clearSubtreeCaches();
    }
    this.invalidateSize();
  }

  private clearSubtreeCaches(): void {
    for (const child of this._children) {
      child.clearSubtreeCaches();
    }
    this.clearCaches();
  }

  /**
   * Clear cached values derived from content. Fixed and fill axes keep theirs.
   */
  protected clearCaches(): void {
    if (this.widthMode === "content") this.axes.width.cached = false;
    if (this.heightMode === "content") this.axes.height.cached = false;
  }

  /**
   * True when this element's size is computed from its children, so a
   * change in a child invalidates it.
   */
  protected dependsOnChildren(): boolean {
    return this.widthMode === "content" || this.heightMode === "content";
  }

  protected invalidateFillChildren(axis: Axis): void {
    for (const child of this._children) {
      if (child.modeOf(axis) === "fill") {
        child.invalidateSize();
      }
    }
  }

  // ==================== Sizing Hooks ====================

  /**
   * Size a fill-mode child receives on `axis`.
   */
  protected fillSizeFor(_child: UIElement, axis: Axis): number {
    return this.resolve(axis);
  }

  /** Widest child, or the theme default without children */
  protected computeIntrinsicWidth(): number {
    if (this._children.length === 0) return this.theme.element.defaultWidth;
    return Math.max(...this._children.map((child) => child.width));
  }

  /** Children stacked in a line, or the theme default without children */
  protected computeIntrinsicHeight(): number {
    if (this._children.length === 0) return this.theme.element.defaultHeight;
    let total = 0;
    for (const child of this._children) {
      total += child.height;
    }
    return total + this.lineSpacing * (this._children.length - 1);
  }

  // ==================== Inherited Settings ====================

  get measurer(): TextMeasurer {
    return this.ownMeasurer ?? this._parent?.measurer ?? DEFAULT_TEXT_MEASURER;
  }

  set measurer(measurer: TextMeasurer | undefined) {
    this.ownMeasurer = measurer;
    this.invalidateLayout();
  }

  get theme(): UITheme {
    return this.ownTheme ?? this._parent?.theme ?? DEFAULT_THEME;
  }

  set theme(theme: UITheme | undefined) {
    this.ownTheme = theme;
    this.invalidateLayout();
  }

  /** Gap used by the default vertical line arrangement */
  get lineSpacing(): number {
    return this.theme.element.lineSpacing;
  }

  get borderColor(): Color {
    return this.ownBorderColor ?? this.theme.element.borderColor;
  }

  set borderColor(color: Color) {
    this.ownBorderColor = color;
  }

  get borderThickness(): number {
    return this.ownBorderThickness ?? this.theme.element.borderThickness;
  }

  set borderThickness(thickness: number) {
    this.ownBorderThickness = thickness;
  }

  // ==================== Rendering ====================

  /**
   * Resolve geometry, paint, arrange children and render them.
   */
  render(ui: UIContext): void {
    const bounds = this.rect;
    this.paint(ui, bounds);
    this.layoutChildren();
    this.renderChildren(ui);
    if (this.showBorders) {
      this.drawBorders(ui, bounds);
    }
  }

  /** Widget-specific drawing. The base element draws nothing. */
  protected paint(_ui: UIContext, _bounds: Rect): void {}

  /**
   * Position children. Default: a vertical line from this element's
   * top-left corner, `lineSpacing` apart.
   */
  protected layoutChildren(): void {
    let currentY = this.y;
    for (const child of this._children) {
      child.x = this.x;
      child.y = currentY;
      currentY += child.height + this.lineSpacing;
    }
  }

  protected renderChildren(ui: UIContext): void {
    for (const child of this._children) {
      child.render(ui);
    }
  }

  /**
   * Stroke a border around `bounds`. Skipped for empty rects or
   * non-positive thickness.
   */
  drawBorders(ui: UIContext, bounds: Rect = this.rect, color: Color = this.borderColor, thickness: number = this.borderThickness): void {
    if (thickness <= 0 || bounds.width <= 0 || bounds.height <= 0) return;
    ui.strokeRect(bounds, color, thickness);
  }
}
