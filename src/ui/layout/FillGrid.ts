/**
 * Grid whose width always follows its parent, shared evenly between a
 * fixed number of columns. Rows grow with the children.
 */

import type { SizeMode } from "../types";
import { Grid, type GridOptions } from "./Grid";

export type FillGridOptions = Omit<GridOptions, "rows" | "width" | "widthMode" | "cellWidth">;

export class FillGrid extends Grid {
  constructor(options: FillGridOptions) {
    super({ heightMode: "content", ...options, rows: 0, widthMode: "fill" });
  }

  /** Always "fill"; assignments are ignored */
  get widthMode(): SizeMode {
    return "fill";
  }

  set widthMode(_mode: SizeMode) {
    // width is bound to the parent
  }
}
