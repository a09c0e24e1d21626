/**
 * Widget State Manager
 *
 * Host-owned persistent state that outlives the element trees rebuilt
 * every frame: scroll positions, toggle values, text buffers.
 */

import { Cell } from "./Cell";

export type WidgetId = string;

/**
 * Persistent per-widget state keyed by id.
 */
export class WidgetState {
  /** Persistent state per widget (scroll positions, etc.) */
  private persistent = new Map<WidgetId, unknown>();

  /** Cells handed out by cell(), stable across frames */
  private cells = new Map<WidgetId, Cell<unknown>>();

  /**
   * Get persistent state for a widget.
   * Returns the default value if no state exists.
   */
  getState<T>(id: WidgetId, defaultValue: T): T {
    const value = this.persistent.get(id);
    return value !== undefined ? (value as T) : defaultValue;
  }

  /**
   * Set persistent state for a widget.
   */
  setState<T>(id: WidgetId, value: T): void {
    this.persistent.set(id, value);
  }

  /**
   * Get the shared cell for `id`, creating it with `initial` on first use.
   * Every call with the same id returns the same cell, so a tree rebuilt
   * each frame keeps observing one value.
   */
  cell<T>(id: WidgetId, initial: T): Cell<T> {
    const existing = this.cells.get(id);
    if (existing) {
      return existing as Cell<T>;
    }
    const created = new Cell<T>(initial);
    this.cells.set(id, created);
    return created;
  }

  /**
   * Check whether any state or cell exists for a widget.
   */
  has(id: WidgetId): boolean {
    return this.persistent.has(id) || this.cells.has(id);
  }

  /**
   * Delete persistent state and the cell for a widget.
   */
  deleteState(id: WidgetId): void {
    this.persistent.delete(id);
    this.cells.delete(id);
  }

  /**
   * Clear all persistent state.
   */
  clearAllState(): void {
    this.persistent.clear();
    this.cells.clear();
  }
}
