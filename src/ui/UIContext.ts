/**
 * UI Context
 *
 * Entry point for rendering an element tree.
 * Wraps the host's PaintBackend and the persistent WidgetState.
 */

import type { Vec2 } from "../math/vec2";
import type { LabelStyle, PaintBackend } from "./PaintBackend";
import type { Rect } from "./Rect";
import type { Color } from "./UITheme";
import { WidgetState } from "./WidgetState";

export interface UIContextOptions {
  backend: PaintBackend;
  /** Host-owned state; a fresh store is created when omitted */
  state?: WidgetState;
}

type Scope = "group" | "scroll";

/**
 * Render context handed to `UIElement.render`.
 *
 * Forwards paint calls to the backend and checks that frames, groups and
 * scroll views are balanced.
 */
export class UIContext {
  readonly backend: PaintBackend;

  private state: WidgetState;

  // Frame state
  private inFrame: boolean = false;
  private scopes: Scope[] = [];

  constructor(options: UIContextOptions) {
    this.backend = options.backend;
    this.state = options.state ?? new WidgetState();
  }

  // ==================== Frame Lifecycle ====================

  /**
   * Begin a new UI frame.
   * Must be called before any element is rendered.
   */
  beginFrame(): void {
    if (this.inFrame) {
      throw new Error("Already in UI frame - call endFrame() first");
    }
    this.inFrame = true;
    this.scopes = [];
  }

  /**
   * End the UI frame.
   */
  endFrame(): void {
    if (!this.inFrame) {
      throw new Error("Not in UI frame - call beginFrame() first");
    }
    if (this.scopes.length > 0) {
      const open = this.scopes[this.scopes.length - 1];
      throw new Error(`Unclosed ${open} at endFrame() - ${this.scopes.length} scope(s) still open`);
    }
    this.inFrame = false;
  }

  /**
   * Run `draw` inside beginFrame/endFrame.
   */
  frame(draw: (ui: UIContext) => void): void {
    this.beginFrame();
    draw(this);
    this.endFrame();
  }

  isInFrame(): boolean {
    return this.inFrame;
  }

  // ==================== Clipping & Scrolling ====================

  beginGroup(rect: Rect): void {
    this.assertInFrame("beginGroup");
    this.scopes.push("group");
    this.backend.beginGroup(rect);
  }

  endGroup(): void {
    this.popScope("group");
    this.backend.endGroup();
  }

  /**
   * Open a scroll view. Returns the backend's scroll offset after input.
   */
  beginScrollView(viewport: Rect, offset: Vec2, view: Rect, showScrollbars: boolean): Vec2 {
    this.assertInFrame("beginScrollView");
    this.scopes.push("scroll");
    return this.backend.beginScrollView(viewport, offset, view, showScrollbars);
  }

  endScrollView(): void {
    this.popScope("scroll");
    this.backend.endScrollView();
  }

  // ==================== Drawing ====================

  panel(rect: Rect): void {
    this.assertInFrame("panel");
    this.backend.panel(rect);
  }

  fillRect(rect: Rect, color: Color): void {
    this.assertInFrame("fillRect");
    this.backend.fillRect(rect, color);
  }

  strokeRect(rect: Rect, color: Color, thickness: number = 1): void {
    this.assertInFrame("strokeRect");
    this.backend.strokeRect(rect, color, thickness);
  }

  drawLine(from: Vec2, to: Vec2, color: Color, thickness: number = 1): void {
    this.assertInFrame("drawLine");
    this.backend.drawLine(from, to, color, thickness);
  }

  label(rect: Rect, text: string, style: LabelStyle): void {
    this.assertInFrame("label");
    this.backend.label(rect, text, style);
  }

  /**
   * Attach a tooltip to `rect`. Empty text is ignored.
   */
  tooltip(rect: Rect, text: string): void {
    this.assertInFrame("tooltip");
    if (text.length === 0) return;
    this.backend.tooltip(rect, text);
  }

  // ==================== Interactive Primitives ====================

  button(rect: Rect, text: string, disabled: boolean = false): boolean {
    this.assertInFrame("button");
    return this.backend.button(rect, text, disabled);
  }

  checkbox(rect: Rect, checked: boolean, disabled: boolean = false): boolean {
    this.assertInFrame("checkbox");
    return this.backend.checkbox(rect, checked, disabled);
  }

  radioButton(rect: Rect, selected: boolean, disabled: boolean = false): boolean {
    this.assertInFrame("radioButton");
    return this.backend.radioButton(rect, selected, disabled);
  }

  slider(rect: Rect, value: number, min: number, max: number): number {
    this.assertInFrame("slider");
    return this.backend.slider(rect, value, min, max);
  }

  textField(rect: Rect, text: string, multiline: boolean = false): string {
    this.assertInFrame("textField");
    return this.backend.textField(rect, text, multiline);
  }

  selectMenu(rect: Rect, label: string, options: readonly string[]): number | null {
    this.assertInFrame("selectMenu");
    return this.backend.selectMenu(rect, label, options);
  }

  // ==================== Accessors ====================

  /** Get widget state manager */
  getState(): WidgetState {
    return this.state;
  }

  // ==================== Helpers ====================

  private assertInFrame(operation: string): void {
    if (!this.inFrame) {
      throw new Error(`${operation}() called outside a UI frame - call beginFrame() first`);
    }
  }

  private popScope(expected: Scope): void {
    this.assertInFrame(expected === "group" ? "endGroup" : "endScrollView");
    const top = this.scopes[this.scopes.length - 1];
    if (top !== expected) {
      throw new Error(`Mismatched end${expected === "group" ? "Group" : "ScrollView"}() - innermost scope is ${top ?? "none"}`);
    }
    this.scopes.pop();
  }
}
