import { describe, it, expect } from "vitest";
import { Canvas } from "./Canvas";
import { rect } from "./Rect";
import { RecordingBackend } from "./RecordingBackend";
import { UIContext } from "./UIContext";
import { UIElement } from "./UIElement";

describe("Canvas", () => {
  it("binds to the host rectangle", () => {
    const canvas = new Canvas(rect(10, 20, 400, 300));
    expect(canvas.rect).toEqual({ x: 10, y: 20, width: 400, height: 300 });
    expect(canvas.widthMode).toBe("fixed");
    expect(canvas.heightMode).toBe("fixed");
  });

  it("gives fill children its size", () => {
    const canvas = new Canvas(rect(0, 0, 400, 300));
    const child = new UIElement({ widthMode: "fill", heightMode: "fill" });
    canvas.addChild(child);
    expect(child.width).toBe(400);
    expect(child.height).toBe(300);
  });

  it("re-derives fill descendants after updateRect", () => {
    const canvas = new Canvas(rect(0, 0, 400, 300));
    const middle = new UIElement({ widthMode: "fill", heightMode: "content" });
    const leaf = new UIElement({ widthMode: "fill", height: 20 });
    canvas.addChild(middle);
    middle.addChild(leaf);
    expect(leaf.width).toBe(400);

    canvas.updateRect(rect(5, 5, 500, 250));

    expect(canvas.rect).toEqual({ x: 5, y: 5, width: 500, height: 250 });
    expect(middle.width).toBe(500);
    expect(leaf.width).toBe(500);
  });

  it("draws children inside a group arranged from the origin", () => {
    const backend = new RecordingBackend();
    const a = new UIElement({ width: 60, height: 40 });
    const b = new UIElement({ width: 80, height: 30 });
    const canvas = new Canvas(rect(100, 50, 400, 300), { drawPanel: true }).addChildren(a, b);

    new UIContext({ backend }).frame((ui) => canvas.render(ui));

    const bounds = { x: 100, y: 50, width: 400, height: 300 };
    expect(backend.commands).toEqual([
      { kind: "panel", rect: bounds },
      { kind: "beginGroup", rect: bounds },
      { kind: "endGroup" },
    ]);
    expect([a.x, a.y]).toEqual([0, 0]);
    expect([b.x, b.y]).toEqual([0, 42]);
  });

  it("skips the panel by default", () => {
    const backend = new RecordingBackend();
    new UIContext({ backend }).frame((ui) => new Canvas(rect(0, 0, 10, 10)).render(ui));
    expect(backend.ofKind("panel")).toHaveLength(0);
  });
});
