import { describe, it, expect } from "vitest";
import { RecordingBackend } from "../RecordingBackend";
import type { Align } from "../types";
import { UIContext } from "../UIContext";
import { Line, type LineOptions } from "./Line";

function drawn(options: LineOptions): { from: [number, number]; to: [number, number]; thickness: number } {
  const backend = new RecordingBackend();
  const line = new Line(options);
  new UIContext({ backend }).frame((ui) => line.render(ui));
  const [command] = backend.ofKind("drawLine");
  return { from: command.from, to: command.to, thickness: command.thickness };
}

describe("Line sizing", () => {
  it("runs 100 along a horizontal line", () => {
    const line = new Line();
    expect(line.width).toBe(100);
    expect(line.height).toBe(1);
  });

  it("runs 100 along a vertical line", () => {
    const line = new Line({ orientation: "vertical", thickness: 3 });
    expect(line.width).toBe(3);
    expect(line.height).toBe(100);
  });

  it("keeps a minimum thickness", () => {
    const line = new Line({ thickness: 0 });
    expect(line.thickness).toBe(0.1);
    line.thickness = -4;
    expect(line.thickness).toBe(0.1);
  });

  it("resizes when the thickness changes", () => {
    const line = new Line();
    expect(line.height).toBe(1);
    line.thickness = 4;
    expect(line.height).toBe(4);
  });
});

describe("Line paint", () => {
  it.each<[Align, number]>([
    ["upper-left", 1],
    ["middle-center", 10],
    ["lower-right", 19],
  ])("places a horizontal line for %s", (alignment, y) => {
    expect(drawn({ width: 200, height: 20, thickness: 2, alignment })).toEqual({
      from: [0, y],
      to: [200, y],
      thickness: 2,
    });
  });

  it("places a vertical line across its width", () => {
    expect(drawn({ orientation: "vertical", x: 10, y: 5, width: 20, height: 80, thickness: 4, alignment: "lower-right" })).toEqual({
      from: [28, 5],
      to: [28, 85],
      thickness: 4,
    });
  });
});
