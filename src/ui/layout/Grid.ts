/**
 * Grid Container
 *
 * Places children row-major into equally sized cells. Cell size is either
 * set explicitly or derived from the children, and each child is anchored
 * inside its cell by its own alignment.
 */

import { alignOffset, anchorFraction, type Axis } from "../types";
import type { UIContext } from "../UIContext";
import { MIN_FALLBACK_SIZE, UIElement, type ElementOptions } from "../UIElement";

export interface GridOptions extends ElementOptions {
  /** Positive integer */
  columns: number;
  /** 0 for unbounded rows */
  rows?: number;
  /** Fixed cell width; derived from the children when omitted */
  cellWidth?: number;
  /** Fixed cell height; derived from the children when omitted */
  cellHeight?: number;
  columnSpacing?: number;
  rowSpacing?: number;
  /** Inset between the grid edge and the outer cells */
  padding?: number;
}

/** Cell coordinate. (-1, -1) marks a child that is not in the grid. */
export interface GridPosition {
  column: number;
  row: number;
}

export const NOT_IN_GRID: Readonly<GridPosition> = { column: -1, row: -1 };

/**
 * Width of one of `count` slots sharing `total`, after padding on both
 * sides and spacing between slots. Never below 1.
 */
export function distributeSize(total: number, count: number, padding: number, spacing: number): number {
  const size = (total - padding * 2 - spacing * (count - 1)) / count;
  return size > 0 ? size : MIN_FALLBACK_SIZE;
}

type AxisValues<T> = Record<Axis, T>;

export class Grid extends UIElement {
  readonly columns: number;
  readonly rows: number;

  private _columnSpacing: number;
  private _rowSpacing: number;
  private _padding: number;

  private explicitCell: AxisValues<number | null>;
  private autoCell: AxisValues<number | null> = { width: null, height: null };
  private lastAutoCell: AxisValues<number | null> = { width: null, height: null };
  private cellResolving: AxisValues<boolean> = { width: false, height: false };

  constructor(options: GridOptions) {
    super({ widthMode: "content", heightMode: "content", ...options });

    const rows = options.rows ?? 0;
    if (!Number.isInteger(options.columns) || options.columns <= 0) {
      throw new RangeError(`Grid columns must be a positive integer, got ${options.columns}`);
    }
    if (!Number.isInteger(rows) || rows < 0) {
      throw new RangeError(`Grid rows must be a non-negative integer, got ${rows}`);
    }

    this.columns = options.columns;
    this.rows = rows;
    this._columnSpacing = options.columnSpacing ?? 0;
    this._rowSpacing = options.rowSpacing ?? 0;
    this._padding = options.padding ?? 0;
    this.explicitCell = {
      width: options.cellWidth ?? null,
      height: options.cellHeight ?? null,
    };
  }

  // ==================== Geometry ====================

  get cellWidth(): number {
    return this.cellSize("width");
  }

  set cellWidth(value: number) {
    this.setCellSize("width", value);
  }

  get cellHeight(): number {
    return this.cellSize("height");
  }

  set cellHeight(value: number) {
    this.setCellSize("height", value);
  }

  /** Return both cell axes to sizes derived from the children. */
  resetCellSize(): void {
    this.explicitCell = { width: null, height: null };
    this.invalidateSize();
  }

  get columnSpacing(): number {
    return this._columnSpacing;
  }

  set columnSpacing(value: number) {
    if (value === this._columnSpacing) return;
    this._columnSpacing = value;
    this.invalidateSize();
  }

  get rowSpacing(): number {
    return this._rowSpacing;
  }

  set rowSpacing(value: number) {
    if (value === this._rowSpacing) return;
    this._rowSpacing = value;
    this.invalidateSize();
  }

  get padding(): number {
    return this._padding;
  }

  set padding(value: number) {
    if (value === this._padding) return;
    this._padding = value;
    this.invalidateSize();
  }

  // ==================== Capacity ====================

  /** columns * rows, or -1 when rows are unbounded */
  get maxCapacity(): number {
    return this.rows > 0 ? this.columns * this.rows : -1;
  }

  /** Free cells, or -1 when rows are unbounded */
  get availableCells(): number {
    return this.rows > 0 ? Math.max(0, this.maxCapacity - this.children.length) : -1;
  }

  get isFull(): boolean {
    return this.rows > 0 && this.children.length >= this.maxCapacity;
  }

  /** Rows occupied by the current children */
  get actualRows(): number {
    return Math.ceil(this.children.length / this.columns);
  }

  // ==================== Lookup ====================

  getChildAt(column: number, row: number): UIElement | null {
    if (column < 0 || column >= this.columns || row < 0) return null;
    if (this.rows > 0 && row >= this.rows) return null;
    return this.children[row * this.columns + column] ?? null;
  }

  getPositionOfChild(child: UIElement | null | undefined): GridPosition {
    const index = child ? this.children.indexOf(child) : -1;
    if (index === -1) return { ...NOT_IN_GRID };
    return { column: index % this.columns, row: Math.floor(index / this.columns) };
  }

  /**
   * Insert `child` at a cell, shifting later children one slot forward.
   * Coordinates outside the grid are clamped into it.
   */
  insertChildAt(child: UIElement | null | undefined, column: number, row: number): this {
    if (!child) return this;
    const lastRow = this.rows > 0 ? this.rows - 1 : this.actualRows;
    const clampedColumn = Math.max(0, Math.min(this.columns - 1, column));
    const clampedRow = Math.max(0, Math.min(lastRow, row));
    return this.insertChild(child, clampedRow * this.columns + clampedColumn);
  }

  // ==================== Sizing ====================

  protected computeIntrinsicWidth(): number {
    return this.cellWidth * this.columns + this._columnSpacing * (this.columns - 1) + this._padding * 2;
  }

  protected computeIntrinsicHeight(): number {
    const rows = this.rows > 0 ? this.rows : Math.max(1, this.actualRows);
    return this.cellHeight * rows + this._rowSpacing * (rows - 1) + this._padding * 2;
  }

  /** Fill children take the cell size, not the grid size */
  protected fillSizeFor(_child: UIElement, axis: Axis): number {
    return this.cellSize(axis);
  }

  protected dependsOnChildren(): boolean {
    return super.dependsOnChildren() || this.explicitCell.width === null || this.explicitCell.height === null;
  }

  protected clearCaches(): void {
    super.clearCaches();
    this.autoCell = { width: null, height: null };
  }

  private setCellSize(axis: Axis, value: number): void {
    if (this.explicitCell[axis] === value) return;
    this.explicitCell[axis] = value;
    this.invalidateSize();
  }

  private cellSize(axis: Axis): number {
    const explicit = this.explicitCell[axis];
    if (explicit !== null) return explicit;
    const cached = this.autoCell[axis];
    if (cached !== null) return cached;
    if (this.cellResolving[axis]) return this.lastAutoCell[axis] ?? MIN_FALLBACK_SIZE;

    this.cellResolving[axis] = true;
    let value: number;
    try {
      value = this.computeAutoCellSize(axis);
    } finally {
      this.cellResolving[axis] = false;
    }
    this.autoCell[axis] = value;
    this.lastAutoCell[axis] = value;
    return value;
  }

  /**
   * Auto cell size. A grid with a set or filled width shares it between
   * the columns; otherwise the largest placed child decides.
   */
  private computeAutoCellSize(axis: Axis): number {
    if (axis === "width" && this.distributesWidth()) {
      return distributeSize(this.width, this.columns, this._padding, this._columnSpacing);
    }
    const placed = this.placedChildren();
    if (placed.length === 0) {
      return axis === "width" ? this.theme.element.defaultWidth : this.theme.element.defaultHeight;
    }
    return Math.max(...placed.map((child) => child.preferredSize(axis)));
  }

  private distributesWidth(): boolean {
    return this.widthMode === "fill" || (this.widthMode === "fixed" && this.hasExplicitSize("width"));
  }

  // ==================== Layout ====================

  /** Children that fit in the grid, in placement order */
  placedChildren(): readonly UIElement[] {
    return this.rows > 0 ? this.children.slice(0, this.maxCapacity) : this.children;
  }

  protected layoutChildren(): void {
    const cellWidth = this.cellWidth;
    const cellHeight = this.cellHeight;

    this.placedChildren().forEach((child, index) => {
      const column = index % this.columns;
      const row = Math.floor(index / this.columns);
      const cellX = this.x + this._padding + column * (cellWidth + this._columnSpacing);
      const cellY = this.y + this._padding + row * (cellHeight + this._rowSpacing);
      const [fx, fy] = anchorFraction(child.alignment);

      child.x = cellX + alignOffset(cellWidth, child.width, fx);
      child.y = cellY + alignOffset(cellHeight, child.height, fy);
    });
  }

  protected renderChildren(ui: UIContext): void {
    const placed = this.placedChildren();
    const hidden = this.children.length - placed.length;
    if (hidden > 0) {
      console.warn(`[Grid] ${hidden} child(ren) beyond capacity ${this.maxCapacity} are not rendered`);
    }
    for (const child of placed) {
      child.render(ui);
    }
  }
}
