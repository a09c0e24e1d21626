import { describe, it, expect } from "vitest";
import { rect, inset, union, containsRect } from "./Rect";

describe("Rect helpers", () => {
  describe("inset", () => {
    it("shrinks by padding on every side", () => {
      expect(inset(rect(20, 30, 400, 300), 15)).toEqual(rect(35, 45, 370, 270));
    });

    it("never produces a size below 1", () => {
      expect(inset(rect(0, 0, 100, 80), 60)).toEqual(rect(60, 60, 1, 1));
    });
  });

  describe("union", () => {
    it("returns null for no rectangles", () => {
      expect(union([])).toBeNull();
    });

    it("bounds all rectangles including negative coordinates", () => {
      expect(union([rect(-50, -30, 100, 50), rect(100, 150, 80, 60)])).toEqual(
        rect(-50, -30, 230, 240)
      );
    });
  });

  describe("containsRect", () => {
    it("includes rectangles touching the edges", () => {
      expect(containsRect(rect(0, 0, 100, 100), rect(0, 0, 100, 100))).toBe(true);
    });

    it("rejects rectangles that stick out", () => {
      expect(containsRect(rect(0, 0, 100, 100), rect(50, 50, 60, 10))).toBe(false);
    });
  });
});
