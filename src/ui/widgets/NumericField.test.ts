import { describe, it, expect } from "vitest";
import { cell } from "../Cell";
import { RecordingBackend } from "../RecordingBackend";
import { createFixedWidthMeasurer } from "../TextMeasurer";
import { UIContext } from "../UIContext";
import { NumericField } from "./NumericField";

const measurer = createFixedWidthMeasurer({ charWidth: 10, lineHeight: 20 });

function renderWith(field: NumericField, respond: (text: string) => string): void {
  const backend = new RecordingBackend({ textField: (_rect, text) => respond(text) });
  new UIContext({ backend }).frame((ui) => field.render(ui));
}

describe("NumericField sizing", () => {
  it("is one line without a label", () => {
    const field = new NumericField({ measurer });
    expect(field.width).toBe(120);
    expect(field.height).toBe(20);
  });

  it("adds a label line", () => {
    const field = new NumericField({ label: "Quantity", measurer });
    expect(field.width).toBe(120);
    expect(field.height).toBe(40);
  });
});

describe("NumericField input", () => {
  it("rejects an inverted range", () => {
    expect(() => new NumericField({ min: 5, max: 1 })).toThrow(RangeError);
  });

  it("starts from min with its own cell", () => {
    const field = new NumericField({ min: 3, max: 10 });
    expect(field.value.get()).toBe(3);
    expect(field.buffer).toBe("3");
  });

  it("parses numbers inside the range", () => {
    const field = new NumericField({ min: 0, max: 100, integer: true });
    expect(field.parse(" 42 ")).toBe(42);
    expect(field.parse("abc")).toBeNull();
    expect(field.parse("")).toBeNull();
    expect(field.parse("1.5")).toBeNull();
    expect(field.parse("-1")).toBeNull();
    expect(field.parse("101")).toBeNull();
  });

  it("updates the value from valid input", () => {
    const value = cell(5);
    const field = new NumericField({ value });
    expect(field.applyInput("12.5")).toBe(true);
    expect(value.get()).toBe(12.5);
    expect(field.changed).toBe(true);
  });

  it("keeps invalid input in the buffer only", () => {
    const value = cell(5);
    const field = new NumericField({ value });
    expect(field.applyInput("12x")).toBe(false);
    expect(field.buffer).toBe("12x");
    expect(value.get()).toBe(5);
    expect(field.changed).toBe(false);
  });

  it("applies text edited in the backend", () => {
    const value = cell(5);
    const field = new NumericField({ value });
    renderWith(field, () => "75");
    expect(value.get()).toBe(75);
    expect(field.buffer).toBe("75");
  });

  it("follows outside writes to the cell", () => {
    const value = cell(5);
    const field = new NumericField({ value });
    value.set(9);
    renderWith(field, (text) => text);
    expect(field.buffer).toBe("9");
    expect(field.changed).toBe(false);
  });

  it("keeps an unfinished edit across frames", () => {
    const value = cell(5);
    const field = new NumericField({ value });
    field.applyInput("1e");
    value.set(9);
    renderWith(field, (text) => text);
    expect(field.buffer).toBe("1e");
    expect(value.get()).toBe(9);
  });
});
