/**
 * Dropdown Widget
 *
 * Menu button showing the selected item. Choosing an entry from the
 * backend's menu writes it to the shared selection cell.
 */

import { requireCell, type Cell } from "../Cell";
import type { Rect } from "../Rect";
import type { UIContext } from "../UIContext";
import { UIElement, type ElementOptions } from "../UIElement";

export const DEFAULT_PLACEHOLDER = "Select...";

export interface DropdownOptions<T> extends ElementOptions {
  items: readonly T[];
  /** null when nothing is selected */
  selected: Cell<T | null>;
  /** Display text of an item. Defaults to String(item) */
  format?: (item: T) => string;
  /** Shown without a selection */
  placeholder?: string;
  tooltip?: string;
}

export class Dropdown<T> extends UIElement {
  readonly selected: Cell<T | null>;
  tooltip: string;

  private _items: readonly T[];
  private _format: (item: T) => string;
  private _placeholder: string;

  constructor(options: DropdownOptions<T>) {
    super({ widthMode: "content", heightMode: "content", ...options });
    this.selected = requireCell(options.selected, "selected", "Dropdown");
    this._items = options.items;
    this._format = options.format ?? ((item: T) => String(item));
    this._placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;
    this.tooltip = options.tooltip ?? "";
  }

  get items(): readonly T[] {
    return this._items;
  }

  /** Replacing the items drops a selection that is no longer listed. */
  set items(items: readonly T[]) {
    this._items = items;
    const current = this.selected.get();
    if (current !== null && !items.includes(current)) {
      this.selected.set(null);
    }
    this.invalidateSize();
  }

  get placeholder(): string {
    return this._placeholder;
  }

  set placeholder(value: string) {
    if (value === this._placeholder) return;
    this._placeholder = value;
    this.invalidateSize();
  }

  get hasSelection(): boolean {
    return this.selected.get() !== null;
  }

  /** Formatted selection, or the placeholder */
  get selectedText(): string {
    const current = this.selected.get();
    if (current === null) return this._placeholder.length > 0 ? this._placeholder : DEFAULT_PLACEHOLDER;
    return this._format(current);
  }

  /** Index of the selection in items, -1 without one */
  get selectedIndex(): number {
    const current = this.selected.get();
    return current === null ? -1 : this._items.indexOf(current);
  }

  format(item: T): string {
    return this._format(item);
  }

  clearSelection(): void {
    this.selected.set(null);
  }

  selectFirst(): void {
    if (this._items.length > 0) this.selected.set(this._items[0]);
  }

  selectLast(): void {
    if (this._items.length > 0) this.selected.set(this._items[this._items.length - 1]);
  }

  /** Out-of-range indices are ignored. */
  selectByIndex(index: number): void {
    if (Number.isInteger(index) && index >= 0 && index < this._items.length) {
      this.selected.set(this._items[index]);
    }
  }

  protected computeIntrinsicWidth(): number {
    const { minWidth, arrowPadding } = this.theme.dropdown;
    const texts = this._items.map((item) => this._format(item));
    if (this._placeholder.length > 0) texts.push(this._placeholder);

    let width = minWidth;
    for (const text of texts) {
      if (text.length === 0) continue;
      width = Math.max(width, this.measurer.measure(text).width + arrowPadding);
    }
    return width;
  }

  protected computeIntrinsicHeight(): number {
    return this.theme.dropdown.height;
  }

  protected paint(ui: UIContext, bounds: Rect): void {
    const options = this._items.map((item) => this._format(item));
    const chosen = ui.selectMenu(bounds, this.selectedText, options);
    if (chosen !== null) {
      this.selectByIndex(chosen);
    }
    ui.tooltip(bounds, this.tooltip);
  }
}
