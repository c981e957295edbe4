/**
 * 2D character grid: the canvas data.
 * Cells are stored flat in row-major order: index = y * width + x.
 * Every accessor is bounds-checked and reports failure instead of throwing.
 */

import type { Cell } from "./cell.js";
import { EMPTY_CELL, createCell } from "./cell.js";

export const DEFAULT_WIDTH = 80;
export const DEFAULT_HEIGHT = 40;

/** A cell together with its coordinates, as yielded by iteration. */
export interface GridEntry {
  x: number;
  y: number;
  cell: Cell;
}

export class Grid {
  private _width: number;
  private _height: number;
  private cells: Cell[];

  constructor(width = DEFAULT_WIDTH, height = DEFAULT_HEIGHT) {
    this._width = Math.max(0, Math.floor(width));
    this._height = Math.max(0, Math.floor(height));
    this.cells = new Array<Cell>(this._width * this._height).fill(EMPTY_CELL);
  }

  /** Build a grid around an existing cell array. Returns null if the length does not match. */
  static fromCells(cells: readonly Cell[], width: number, height: number): Grid | null {
    if (cells.length !== width * height) return null;
    const grid = new Grid(width, height);
    grid.cells = [...cells];
    return grid;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  /** Total number of cells. */
  get length(): number {
    return this.cells.length;
  }

  indexOf(x: number, y: number): number {
    return y * this._width + x;
  }

  coordsOf(index: number): { x: number; y: number } {
    return { x: index % this._width, y: Math.floor(index / this._width) };
  }

  inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this._width &&
      y < this._height
    );
  }

  /** Get the cell at (x, y). Returns undefined if out of bounds. */
  get(x: number, y: number): Cell | undefined {
    if (!this.inBounds(x, y)) return undefined;
    return this.cells[this.indexOf(x, y)];
  }

  /** Get the character at (x, y), or " " when out of bounds. */
  charAt(x: number, y: number): string {
    return this.get(x, y)?.ch ?? " ";
  }

  /** Set the cell at (x, y). Returns false if out of bounds. */
  set(x: number, y: number, cell: Cell): boolean {
    if (!this.inBounds(x, y)) return false;
    this.cells[this.indexOf(x, y)] = cell;
    return true;
  }

  /** Replace the character at (x, y), keeping its style. Returns false if out of bounds. */
  setChar(x: number, y: number, ch: string): boolean {
    const current = this.get(x, y);
    if (!current) return false;
    return this.set(x, y, createCell(ch, current.style));
  }

  /** Reset the cell at (x, y) to the default. Returns false if out of bounds. */
  clearCell(x: number, y: number): boolean {
    return this.set(x, y, EMPTY_CELL);
  }

  /** Reset every cell to the default. */
  clear(): void {
    this.cells.fill(EMPTY_CELL);
  }

  /** Write a string horizontally starting at (x, y), one cell per code point. Clipped at the edges. */
  writeString(x: number, y: number, text: string): void {
    let i = 0;
    for (const ch of text) {
      this.setChar(x + i, y, ch);
      i++;
    }
  }

  /** Fill the normalized rectangle between two corners with a character, clipping cell by cell. */
  fillRect(x1: number, y1: number, x2: number, y2: number, ch: string): void {
    const minX = Math.min(x1, x2);
    const maxX = Math.max(x1, x2);
    const minY = Math.min(y1, y2);
    const maxY = Math.max(y1, y2);
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        this.setChar(x, y, ch);
      }
    }
  }

  /**
   * Copy the rectangle between two corners, clipped to the grid, in row-major order.
   * Returns an empty array when the rectangle lies entirely outside.
   */
  getRegion(x1: number, y1: number, x2: number, y2: number): Cell[] {
    const minX = Math.max(0, Math.min(x1, x2));
    const maxX = Math.min(this._width - 1, Math.max(x1, x2));
    const minY = Math.max(0, Math.min(y1, y2));
    const maxY = Math.min(this._height - 1, Math.max(y1, y2));
    const region: Cell[] = [];
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        region.push(this.cells[this.indexOf(x, y)]);
      }
    }
    return region;
  }

  /**
   * Resize the grid. The overlapping top-left sub-rectangle is kept;
   * anything outside the new bounds is discarded.
   */
  resize(width: number, height: number): void {
    const newWidth = Math.max(0, Math.floor(width));
    const newHeight = Math.max(0, Math.floor(height));
    if (newWidth === this._width && newHeight === this._height) return;

    const next = new Array<Cell>(newWidth * newHeight).fill(EMPTY_CELL);
    const copyWidth = Math.min(newWidth, this._width);
    const copyHeight = Math.min(newHeight, this._height);
    for (let y = 0; y < copyHeight; y++) {
      const src = y * this._width;
      const dst = y * newWidth;
      for (let x = 0; x < copyWidth; x++) {
        next[dst + x] = this.cells[src + x];
      }
    }

    this.cells = next;
    this._width = newWidth;
    this._height = newHeight;
  }

  /** Copy of the backing array. */
  snapshot(): Cell[] {
    return [...this.cells];
  }

  /** Replace contents and dimensions from a snapshot. Returns false if the length does not match. */
  restore(cells: readonly Cell[], width: number, height: number): boolean {
    if (cells.length !== width * height) return false;
    this.cells = [...cells];
    this._width = width;
    this._height = height;
    return true;
  }

  /** Iterate every cell with its coordinates, row by row. */
  *entries(): IterableIterator<GridEntry> {
    for (let i = 0; i < this.cells.length; i++) {
      const { x, y } = this.coordsOf(i);
      yield { x, y, cell: this.cells[i] };
    }
  }

  /** Create a deep copy of this grid. */
  clone(): Grid {
    const copy = new Grid(this._width, this._height);
    copy.cells = [...this.cells];
    return copy;
  }

  /** Serialize to plain text: rows with trailing spaces trimmed, trailing empty rows dropped. */
  toString(): string {
    const lines: string[] = [];
    for (let y = 0; y < this._height; y++) {
      let line = "";
      for (let x = 0; x < this._width; x++) {
        line += this.cells[this.indexOf(x, y)].ch;
      }
      lines.push(line.replace(/ +$/, ""));
    }
    while (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines.join("\n") + "\n";
  }

  /** Parse plain text into a Grid sized to fit the content, with minimums. */
  static fromString(text: string, minWidth = DEFAULT_WIDTH, minHeight = DEFAULT_HEIGHT): Grid {
    const lines = text.replace(/\r\n?/g, "\n").split("\n");
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

    const rows = lines.map((line) => Array.from(line));
    const maxLineWidth = rows.reduce((max, row) => Math.max(max, row.length), 0);
    const grid = new Grid(Math.max(minWidth, maxLineWidth), Math.max(minHeight, rows.length));

    for (let y = 0; y < rows.length; y++) {
      for (let x = 0; x < rows[y].length; x++) {
        grid.setChar(x, y, rows[y][x]);
      }
    }
    return grid;
  }
}
