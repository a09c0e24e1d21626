import { describe, it, expect } from "vitest";
import { RecordingBackend } from "../RecordingBackend";
import { UIContext } from "../UIContext";
import { UIElement } from "../UIElement";
import { Stack } from "./Stack";

function box(width: number, height: number): UIElement {
  return new UIElement({ width, height });
}

describe("Stack", () => {
  it("resolves to the default size when empty", () => {
    const stack = new Stack();
    expect(stack.width).toBe(50);
    expect(stack.height).toBe(30);
  });

  it("sums heights with spacing and takes the widest child", () => {
    const stack = new Stack().addChildren(box(60, 40), box(80, 30));
    expect(stack.width).toBe(80);
    expect(stack.height).toBe(72);
  });

  it("uses the configured spacing", () => {
    const stack = new Stack({ spacing: 5 }).addChildren(box(10, 10), box(10, 10), box(10, 10));
    expect(stack.height).toBe(40);
  });

  it("recomputes when spacing changes", () => {
    const stack = new Stack().addChildren(box(60, 40), box(80, 30));
    expect(stack.height).toBe(72);
    stack.spacing = 10;
    expect(stack.height).toBe(80);
  });

  it("recomputes when a child is added or removed", () => {
    const first = box(60, 40);
    const stack = new Stack().addChild(first);
    expect(stack.height).toBe(40);
    stack.addChild(box(10, 20));
    expect(stack.height).toBe(62);
    stack.removeChild(first);
    expect(stack.height).toBe(20);
  });

  it("gives a fill child the width of its siblings", () => {
    const filler = new UIElement({ widthMode: "fill", height: 10 });
    const stack = new Stack().addChildren(box(100, 20), filler);
    expect(stack.width).toBe(100);
    expect(filler.width).toBe(100);
  });

  it("arranges children top to bottom when rendered", () => {
    const a = box(60, 40);
    const b = box(80, 30);
    const stack = new Stack({ x: 5, y: 10 }).addChildren(a, b);
    new UIContext({ backend: new RecordingBackend() }).frame((ui) => stack.render(ui));
    expect([a.x, a.y]).toEqual([5, 10]);
    expect([b.x, b.y]).toEqual([5, 52]);
  });
});
