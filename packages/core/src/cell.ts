/**
 * Cell: one character position on the canvas.
 * Cells are plain values; the Grid owns and copies them freely.
 */

/** Style bitmask flags for a cell. */
export const CellStyle = {
  NONE: 0,
  BOLD: 1 << 0,
  ITALIC: 1 << 1,
  UNDERLINE: 1 << 2,
  HIGHLIGHT: 1 << 3,
} as const;

export interface Cell {
  /** A single code point. */
  readonly ch: string;
  /** Combination of CellStyle flags. */
  readonly style: number;
}

export const EMPTY_CELL: Cell = Object.freeze({ ch: " ", style: CellStyle.NONE });

/** Create a cell. Only the first code point of `ch` is kept; an empty string becomes a space. */
export function createCell(ch: string, style: number = CellStyle.NONE): Cell {
  const first = ch.codePointAt(0);
  return { ch: first === undefined ? " " : String.fromCodePoint(first), style };
}

/** True when the cell holds exactly a space. */
export function isEmptyCell(cell: Cell): boolean {
  return cell.ch === " ";
}

/** True when the cell's character is not whitespace. */
export function isVisibleCell(cell: Cell): boolean {
  return !/^\s$/u.test(cell.ch);
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.ch === b.ch && a.style === b.style;
}

export function hasStyle(cell: Cell, flag: number): boolean {
  return (cell.style & flag) === flag;
}

export function withStyle(cell: Cell, flags: number): Cell {
  return { ch: cell.ch, style: cell.style | flags };
}
