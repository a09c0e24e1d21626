import { describe, it, expect } from "vitest";
import { DEFAULT_THEME, mergeTheme } from "./UITheme";

describe("mergeTheme", () => {
  it("returns the defaults for an empty override", () => {
    expect(mergeTheme({})).toEqual(DEFAULT_THEME);
  });

  it("overrides single fields and keeps the rest of the section", () => {
    const theme = mergeTheme({ button: { minHeight: 40 } });
    expect(theme.button.minHeight).toBe(40);
    expect(theme.button.paddingX).toBe(DEFAULT_THEME.button.paddingX);
    expect(theme.slider).toEqual(DEFAULT_THEME.slider);
  });

  it("does not mutate the default theme", () => {
    mergeTheme({ element: { lineSpacing: 8 } });
    expect(DEFAULT_THEME.element.lineSpacing).toBe(2);
  });
});
