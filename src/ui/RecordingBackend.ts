/**
 * Recording Backend
 *
 * Headless PaintBackend that records every call as a command and answers
 * interactive primitives from scripted responders. Used by tests and by
 * hosts that need a layout pass without drawing.
 */

import type { Vec2 } from "../math/vec2";
import type { LabelStyle, PaintBackend } from "./PaintBackend";
import type { Rect } from "./Rect";
import type { Color } from "./UITheme";

export type PaintCommand =
  | { kind: "panel"; rect: Rect }
  | { kind: "fillRect"; rect: Rect; color: Color }
  | { kind: "strokeRect"; rect: Rect; color: Color; thickness: number }
  | { kind: "drawLine"; from: Vec2; to: Vec2; color: Color; thickness: number }
  | { kind: "label"; rect: Rect; text: string; style: LabelStyle }
  | { kind: "tooltip"; rect: Rect; text: string }
  | { kind: "button"; rect: Rect; text: string; disabled: boolean }
  | { kind: "checkbox"; rect: Rect; checked: boolean; disabled: boolean }
  | { kind: "radioButton"; rect: Rect; selected: boolean; disabled: boolean }
  | { kind: "slider"; rect: Rect; value: number; min: number; max: number }
  | { kind: "textField"; rect: Rect; text: string; multiline: boolean }
  | { kind: "selectMenu"; rect: Rect; label: string; options: readonly string[] }
  | { kind: "beginGroup"; rect: Rect }
  | { kind: "endGroup" }
  | { kind: "beginScrollView"; viewport: Rect; offset: Vec2; view: Rect; showScrollbars: boolean }
  | { kind: "endScrollView" };

export type PaintCommandKind = PaintCommand["kind"];

/** Scripted answers for interactive primitives */
export interface Responders {
  button: (rect: Rect, text: string) => boolean;
  checkbox: (rect: Rect, checked: boolean) => boolean;
  radioButton: (rect: Rect, selected: boolean) => boolean;
  slider: (rect: Rect, value: number, min: number, max: number) => number;
  textField: (rect: Rect, text: string) => string;
  selectMenu: (rect: Rect, options: readonly string[]) => number | null;
  scrollView: (viewport: Rect, offset: Vec2, view: Rect) => Vec2;
}

/** Responders of a backend with no user input */
export const IDLE_RESPONDERS: Responders = {
  button: () => false,
  checkbox: (_rect, checked) => checked,
  radioButton: () => false,
  slider: (_rect, value) => value,
  textField: (_rect, text) => text,
  selectMenu: () => null,
  scrollView: (_viewport, offset) => offset,
};

export class RecordingBackend implements PaintBackend {
  readonly commands: PaintCommand[] = [];
  responders: Responders;

  constructor(responders: Partial<Responders> = {}) {
    this.responders = { ...IDLE_RESPONDERS, ...responders };
  }

  /** Commands of one kind, in call order */
  ofKind<K extends PaintCommandKind>(kind: K): Extract<PaintCommand, { kind: K }>[] {
    return this.commands.filter(
      (command): command is Extract<PaintCommand, { kind: K }> => command.kind === kind
    );
  }

  clear(): void {
    this.commands.length = 0;
  }

  panel(rect: Rect): void {
    this.commands.push({ kind: "panel", rect });
  }

  fillRect(rect: Rect, color: Color): void {
    this.commands.push({ kind: "fillRect", rect, color });
  }

  strokeRect(rect: Rect, color: Color, thickness: number): void {
    this.commands.push({ kind: "strokeRect", rect, color, thickness });
  }

  drawLine(from: Vec2, to: Vec2, color: Color, thickness: number): void {
    this.commands.push({ kind: "drawLine", from, to, color, thickness });
  }

  label(rect: Rect, text: string, style: LabelStyle): void {
    this.commands.push({ kind: "label", rect, text, style });
  }

  tooltip(rect: Rect, text: string): void {
    this.commands.push({ kind: "tooltip", rect, text });
  }

  button(rect: Rect, text: string, disabled: boolean): boolean {
    this.commands.push({ kind: "button", rect, text, disabled });
    return !disabled && this.responders.button(rect, text);
  }

  checkbox(rect: Rect, checked: boolean, disabled: boolean): boolean {
    this.commands.push({ kind: "checkbox", rect, checked, disabled });
    return disabled ? checked : this.responders.checkbox(rect, checked);
  }

  radioButton(rect: Rect, selected: boolean, disabled: boolean): boolean {
    this.commands.push({ kind: "radioButton", rect, selected, disabled });
    return !disabled && this.responders.radioButton(rect, selected);
  }

  slider(rect: Rect, value: number, min: number, max: number): number {
    this.commands.push({ kind: "slider", rect, value, min, max });
    return this.responders.slider(rect, value, min, max);
  }

  textField(rect: Rect, text: string, multiline: boolean): string {
    this.commands.push({ kind: "textField", rect, text, multiline });
    return this.responders.textField(rect, text);
  }

  selectMenu(rect: Rect, label: string, options: readonly string[]): number | null {
    this.commands.push({ kind: "selectMenu", rect, label, options });
    return this.responders.selectMenu(rect, options);
  }

  beginGroup(rect: Rect): void {
    this.commands.push({ kind: "beginGroup", rect });
  }

  endGroup(): void {
    this.commands.push({ kind: "endGroup" });
  }

  beginScrollView(viewport: Rect, offset: Vec2, view: Rect, showScrollbars: boolean): Vec2 {
    this.commands.push({ kind: "beginScrollView", viewport, offset, view, showScrollbars });
    return this.responders.scrollView(viewport, offset, view);
  }

  endScrollView(): void {
    this.commands.push({ kind: "endScrollView" });
  }
}
