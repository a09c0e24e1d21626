/**
 * Element Tree UI
 *
 * Retained element tree with per-axis fixed/content/fill sizing, drawn
 * through a host-supplied paint backend.
 */

// Core
export { UIElement, DEFAULT_ELEMENT_OPTIONS, MIN_FALLBACK_SIZE, type ElementOptions } from "./UIElement";
export { ALIGNMENTS, alignOffset, anchorFraction, type Align, type Axis, type Size, type SizeMode } from "./types";
export { rect, inset, union, containsRect, type Rect } from "./Rect";
export { UIContext, type UIContextOptions } from "./UIContext";
export { Cell, cell, requireCell } from "./Cell";
export { WidgetState, type WidgetId } from "./WidgetState";

// Roots
export { Canvas, type CanvasOptions } from "./Canvas";
export { ScrollCanvas, type ScrollCanvasOptions } from "./ScrollCanvas";
export { scrollView, maxScrollOffset, type ScrollViewConfig } from "./scrollView";

// Host collaborators
export type { PaintBackend, LabelStyle, TextAnchor } from "./PaintBackend";
export {
  RecordingBackend,
  IDLE_RESPONDERS,
  type PaintCommand,
  type PaintCommandKind,
  type Responders,
} from "./RecordingBackend";
export {
  createFixedWidthMeasurer,
  countWrappedLines,
  DEFAULT_TEXT_MEASURER,
  type TextMeasurer,
  type FixedWidthMeasurerOptions,
} from "./TextMeasurer";

// Theme
export {
  type UITheme,
  type ThemeOverrides,
  type Color,
  type ElementTheme,
  type ButtonTheme,
  type ToggleTheme,
  type SliderTheme,
  type TextEntryTheme,
  type DropdownTheme,
  type LabelTheme,
  type LineTheme,
  type PanelTheme,
  DEFAULT_THEME,
  mergeTheme,
} from "./UITheme";

// Layout
export { Stack, DEFAULT_STACK_SPACING, type StackOptions } from "./layout/Stack";
export { Row, DEFAULT_ROW_SPACING, type RowOptions } from "./layout/Row";
export { Grid, distributeSize, NOT_IN_GRID, type GridOptions, type GridPosition } from "./layout/Grid";
export { FillGrid, type FillGridOptions } from "./layout/FillGrid";
export { ScrollContainer, type ScrollContainerOptions } from "./layout/ScrollContainer";

// Widgets
export * from "./widgets";
