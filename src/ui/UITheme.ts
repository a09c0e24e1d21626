/**
 * UI Theme
 *
 * Paint colors and the intrinsic-size constants of the built-in widgets.
 * All colors are RGBA in 0-1 range.
 */

/** RGBA color in 0-1 range */
export type Color = [number, number, number, number];

export interface ElementTheme {
  /** Content size of a bare element with no children */
  defaultWidth: number;
  defaultHeight: number;
  /** Gap between children in the default vertical line arrangement */
  lineSpacing: number;
  borderColor: Color;
  borderThickness: number;
}

export interface ButtonTheme {
  paddingX: number;
  paddingY: number;
  minHeight: number;
  emptyWidth: number;
  emptyHeight: number;
}

export interface ToggleTheme {
  /** Checkbox / radio box edge length */
  boxSize: number;
  /** Gap between the box and its label */
  labelGap: number;
}

export interface SliderTheme {
  width: number;
  height: number;
}

export interface TextEntryTheme {
  width: number;
  labelGap: number;
  multilineRows: number;
}

export interface DropdownTheme {
  minWidth: number;
  height: number;
  /** Room for the arrow next to the widest item */
  arrowPadding: number;
}

export interface LabelTheme {
  color: Color;
  /** Wrapped labels without maxWidth never grow wider than this */
  wrapWidth: number;
}

export interface LineTheme {
  color: Color;
  /** Content length along the line */
  length: number;
}

export interface PanelTheme {
  background: Color;
  borderColor: Color;
  borderWidth: number;
}

export interface UITheme {
  element: ElementTheme;
  button: ButtonTheme;
  toggle: ToggleTheme;
  slider: SliderTheme;
  textEntry: TextEntryTheme;
  dropdown: DropdownTheme;
  label: LabelTheme;
  line: LineTheme;
  panel: PanelTheme;
}

/** Default theme */
export const DEFAULT_THEME: UITheme = {
  element: {
    defaultWidth: 50,
    defaultHeight: 30,
    lineSpacing: 2,
    borderColor: [1, 1, 1, 1],
    borderThickness: 1,
  },
  button: {
    paddingX: 10,
    paddingY: 5,
    minHeight: 30,
    emptyWidth: 60,
    emptyHeight: 30,
  },
  toggle: {
    boxSize: 24,
    labelGap: 6,
  },
  slider: {
    width: 120,
    height: 22,
  },
  textEntry: {
    width: 150,
    labelGap: 6,
    multilineRows: 3,
  },
  dropdown: {
    minWidth: 150,
    height: 30,
    arrowPadding: 30,
  },
  label: {
    color: [1, 1, 1, 0.9],
    wrapWidth: 300,
  },
  line: {
    color: [1, 1, 1, 1],
    length: 100,
  },
  panel: {
    background: [0.08, 0.08, 0.08, 0.92],
    borderColor: [0.3, 0.3, 0.3, 0.6],
    borderWidth: 1,
  },
};

/** Partial theme where each section may itself be partial */
export type ThemeOverrides = { [K in keyof UITheme]?: Partial<UITheme[K]> };

/** Deep merge a partial theme with the default theme */
export function mergeTheme(partial: ThemeOverrides): UITheme {
  return {
    element: { ...DEFAULT_THEME.element, ...partial.element },
    button: { ...DEFAULT_THEME.button, ...partial.button },
    toggle: { ...DEFAULT_THEME.toggle, ...partial.toggle },
    slider: { ...DEFAULT_THEME.slider, ...partial.slider },
    textEntry: { ...DEFAULT_THEME.textEntry, ...partial.textEntry },
    dropdown: { ...DEFAULT_THEME.dropdown, ...partial.dropdown },
    label: { ...DEFAULT_THEME.label, ...partial.label },
    line: { ...DEFAULT_THEME.line, ...partial.line },
    panel: { ...DEFAULT_THEME.panel, ...partial.panel },
  };
}
