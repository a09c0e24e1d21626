import { UIElement, type ElementOptions } from "../UIElement";

export const EMPTY_SIZE = 10;

/** Spacer. Takes room in a layout and paints nothing. */
export class Empty extends UIElement {
  constructor(options: ElementOptions = {}) {
    super({ widthMode: "content", heightMode: "content", ...options });
  }

  protected computeIntrinsicWidth(): number {
    return EMPTY_SIZE;
  }

  protected computeIntrinsicHeight(): number {
    return EMPTY_SIZE;
  }
}
