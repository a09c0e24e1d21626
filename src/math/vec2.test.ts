import { describe, it, expect } from "vitest";
import { zero, equals, clamp } from "./vec2";

describe("vec2", () => {
  it("returns a fresh zero vector", () => {
    const a = zero();
    a[0] = 5;
    expect(zero()).toEqual([0, 0]);
  });

  it("compares component-wise", () => {
    expect(equals([1, 2], [1, 2])).toBe(true);
    expect(equals([1, 2], [2, 1])).toBe(false);
  });

  describe("clamp", () => {
    it("keeps values inside the range", () => {
      expect(clamp([10, 20], [0, 0], [100, 100])).toEqual([10, 20]);
    });

    it("clamps each component independently", () => {
      expect(clamp([-5, 150], [0, 0], [100, 100])).toEqual([0, 100]);
    });

    it("collapses to min when max is below min", () => {
      expect(clamp([30, 40], [0, 0], [-20, -1])).toEqual([0, 0]);
    });
  });
});
