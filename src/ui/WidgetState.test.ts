import { describe, it, expect } from "vitest";
import { WidgetState } from "./WidgetState";

describe("WidgetState", () => {
  it("returns the default when no state exists", () => {
    const state = new WidgetState();
    expect(state.getState("missing", 42)).toBe(42);
  });

  it("stores and deletes persistent state", () => {
    const state = new WidgetState();
    state.setState("scroll", 120);
    expect(state.getState("scroll", 0)).toBe(120);
    state.deleteState("scroll");
    expect(state.has("scroll")).toBe(false);
  });

  it("hands out the same cell for the same id", () => {
    const state = new WidgetState();
    const first = state.cell("checked", false);
    first.set(true);

    const second = state.cell("checked", false);
    expect(second).toBe(first);
    expect(second.get()).toBe(true);
  });

  it("forgets cells on clearAllState", () => {
    const state = new WidgetState();
    state.cell("text", "abc").set("changed");
    state.clearAllState();
    expect(state.cell("text", "abc").get()).toBe("abc");
  });
});
