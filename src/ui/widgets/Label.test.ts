import { describe, it, expect } from "vitest";
import { RecordingBackend } from "../RecordingBackend";
import { Stack } from "../layout/Stack";
import { createFixedWidthMeasurer } from "../TextMeasurer";
import { UIContext } from "../UIContext";
import { UIElement } from "../UIElement";
import { Label } from "./Label";

const measurer = createFixedWidthMeasurer({ charWidth: 10, lineHeight: 20 });

// 39 characters
const SENTENCE = "word word word word word word word word";

describe("Label sizing", () => {
  it("keeps a minimal size for empty text", () => {
    const label = new Label({ measurer });
    expect(label.width).toBe(1);
    expect(label.height).toBe(20);
  });

  it("measures unwrapped text", () => {
    const label = new Label({ text: "hello", wordWrap: false, measurer });
    expect(label.width).toBe(50);
    expect(label.height).toBe(20);
  });

  it("counts explicit lines of unwrapped text", () => {
    const label = new Label({ text: "a\nb", wordWrap: false, measurer });
    expect(label.height).toBe(40);
  });

  it("caps wrapped text at the wrap width", () => {
    const label = new Label({ text: SENTENCE, measurer });
    expect(label.width).toBe(300);
    expect(label.height).toBe(40);
  });

  it("keeps short wrapped text at its own width", () => {
    const label = new Label({ text: "hello", measurer });
    expect(label.width).toBe(50);
    expect(label.height).toBe(20);
  });

  it("uses maxWidth for wrapped text", () => {
    const label = new Label({ text: SENTENCE, maxWidth: 100, measurer });
    expect(label.width).toBe(100);
    expect(label.height).toBe(80);
  });

  it("rewraps when a fill width changes", () => {
    const parent = new UIElement({ width: 100, height: 400, measurer });
    const label = new Label({ text: SENTENCE, widthMode: "fill" });
    parent.addChild(label);
    expect(label.height).toBe(80);

    parent.width = 300;

    expect(label.height).toBe(40);
  });

  it("invalidates its container when the text changes", () => {
    const label = new Label({ text: "hi", wordWrap: false });
    const stack = new Stack({ measurer }).addChild(label);
    expect(stack.width).toBe(20);

    label.text = "hello there";

    expect(stack.width).toBe(110);
  });
});

describe("Label paint", () => {
  it("draws its text and tooltip", () => {
    const backend = new RecordingBackend();
    const label = new Label({ text: "hello", wordWrap: false, tooltip: "greeting", measurer, x: 4, y: 8 });

    new UIContext({ backend }).frame((ui) => label.render(ui));

    const bounds = { x: 4, y: 8, width: 50, height: 20 };
    expect(backend.commands).toEqual([
      { kind: "label", rect: bounds, text: "hello", style: { color: [1, 1, 1, 0.9], wordWrap: false, anchor: "left" } },
      { kind: "tooltip", rect: bounds, text: "greeting" },
    ]);
  });
});
