import { describe, it, expect } from "vitest";
import { ALIGNMENTS, anchorFraction, alignOffset } from "./types";

describe("anchorFraction", () => {
  it("maps every alignment to its anchor", () => {
    const fractions = ALIGNMENTS.map((align) => anchorFraction(align));
    expect(fractions).toEqual([
      [0, 0],
      [0.5, 0],
      [1, 0],
      [0, 0.5],
      [0.5, 0.5],
      [1, 0.5],
      [0, 1],
      [0.5, 1],
      [1, 1],
    ]);
  });
});

describe("alignOffset", () => {
  it("scales the free space by the fraction", () => {
    expect(alignOffset(100, 40, 0)).toBe(0);
    expect(alignOffset(100, 40, 0.5)).toBe(30);
    expect(alignOffset(100, 40, 1)).toBe(60);
  });

  it("pins children that do not fit to the leading edge", () => {
    expect(alignOffset(100, 100, 1)).toBe(0);
    expect(alignOffset(100, 140, 0.5)).toBe(0);
  });
});
