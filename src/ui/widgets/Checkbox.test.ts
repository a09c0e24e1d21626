import { describe, it, expect } from "vitest";
import { cell } from "../Cell";
import { RecordingBackend } from "../RecordingBackend";
import { createFixedWidthMeasurer } from "../TextMeasurer";
import { UIContext } from "../UIContext";
import { Checkbox } from "./Checkbox";

const measurer = createFixedWidthMeasurer({ charWidth: 10, lineHeight: 20 });

describe("Checkbox", () => {
  it("is a bare box without a label", () => {
    const checkbox = new Checkbox({ checked: cell(false), measurer });
    expect(checkbox.width).toBe(24);
    expect(checkbox.height).toBe(24);
  });

  it("widens for its label", () => {
    const checkbox = new Checkbox({ checked: cell(false), label: "Enable", measurer });
    expect(checkbox.width).toBe(90);
    expect(checkbox.height).toBe(24);
  });

  it("writes the toggled value to its cell", () => {
    const checked = cell(false);
    const checkbox = new Checkbox({ checked, label: "Enable", measurer });
    const backend = new RecordingBackend({ checkbox: (_rect, value) => !value });

    new UIContext({ backend }).frame((ui) => checkbox.render(ui));

    expect(checked.get()).toBe(true);
    expect(backend.commands).toEqual([
      { kind: "checkbox", rect: { x: 0, y: 0, width: 24, height: 24 }, checked: false, disabled: false },
      {
        kind: "label",
        rect: { x: 30, y: 0, width: 60, height: 24 },
        text: "Enable",
        style: { color: [1, 1, 1, 0.9], wordWrap: false, anchor: "left" },
      },
    ]);
  });

  it("keeps its value while disabled", () => {
    const checked = cell(true);
    const checkbox = new Checkbox({ checked, disabled: true });
    const backend = new RecordingBackend({ checkbox: () => false });

    new UIContext({ backend }).frame((ui) => checkbox.render(ui));

    expect(checked.get()).toBe(true);
  });

  it("shares its cell with other holders", () => {
    const checked = cell(false);
    const first = new Checkbox({ checked });
    const second = new Checkbox({ checked });
    first.checked.set(true);
    expect(second.checked.get()).toBe(true);
  });
});
