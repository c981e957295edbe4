/**
 * DrawOp: a pending (x, y, cell) write. Tools emit them, commands consume them.
 */

import type { Cell } from "./cell.js";
import { EMPTY_CELL, createCell } from "./cell.js";

export interface DrawOp {
  x: number;
  y: number;
  cell: Cell;
}

export function drawOp(x: number, y: number, ch: string): DrawOp {
  return { x, y, cell: createCell(ch) };
}

/** A write that blanks the cell. */
export function blankOp(x: number, y: number): DrawOp {
  return { x, y, cell: EMPTY_CELL };
}
