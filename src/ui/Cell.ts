/**
 * Shared reference cell.
 *
 * Several widgets may hold the same cell on purpose: two scroll views bound
 * to one offset stay in sync, and a host keeps a checkbox value alive across
 * frames by handing the same cell to each rebuilt tree.
 */
export class Cell<T> {
  private value: T;

  constructor(initial: T) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }

  /** Replace the value with `fn(current)` and return the new value. */
  update(fn: (current: T) => T): T {
    this.value = fn(this.value);
    return this.value;
  }
}

/** Create a new cell holding `initial`. */
export function cell<T>(initial: T): Cell<T> {
  return new Cell(initial);
}

/**
 * Fail fast when a required shared cell is missing.
 * Used by widget constructors; an absent cell is a programming mistake.
 */
export function requireCell<T>(value: Cell<T> | undefined, name: string, owner: string): Cell<T> {
  if (!(value instanceof Cell)) {
    throw new TypeError(`${owner}: "${name}" must be a Cell`);
  }
  return value;
}
