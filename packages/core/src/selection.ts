/**
 * Selection: a rectangular region between two corners.
 *
 * Corners are stored as given (not normalized); every derived query
 * normalizes with min/max, so a selection dragged up-left behaves the
 * same as one dragged down-right.
 */

import type { Cell } from "./cell.js";

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export class Selection {
  constructor(
    readonly x1: number,
    readonly y1: number,
    readonly x2: number,
    readonly y2: number,
  ) {}

  bounds(): Bounds {
    return {
      minX: Math.min(this.x1, this.x2),
      minY: Math.min(this.y1, this.y2),
      maxX: Math.max(this.x1, this.x2),
      maxY: Math.max(this.y1, this.y2),
    };
  }

  /** Inclusive width. */
  get width(): number {
    return Math.abs(this.x2 - this.x1) + 1;
  }

  /** Inclusive height. */
  get height(): number {
    return Math.abs(this.y2 - this.y1) + 1;
  }

  get area(): number {
    return this.width * this.height;
  }

  /** True when both corners are the same cell. */
  get isEmpty(): boolean {
    return this.x1 === this.x2 && this.y1 === this.y2;
  }

  contains(x: number, y: number): boolean {
    const { minX, minY, maxX, maxY } = this.bounds();
    return x >= minX && x <= maxX && y >= minY && y <= maxY;
  }

  translated(dx: number, dy: number): Selection {
    return new Selection(this.x1 + dx, this.y1 + dy, this.x2 + dx, this.y2 + dy);
  }

  equals(other: Selection): boolean {
    return (
      this.x1 === other.x1 &&
      this.y1 === other.y1 &&
      this.x2 === other.x2 &&
      this.y2 === other.y2
    );
  }
}

// ─── Clipboard ──────────────────────────────────────────────────────────────

/** A cell captured relative to the selection's top-left corner. */
export interface ClipboardCell {
  dx: number;
  dy: number;
  cell: Cell;
}

export interface Clipboard {
  cells: ClipboardCell[];
  width: number;
  height: number;
}

export function emptyClipboard(): Clipboard {
  return { cells: [], width: 0, height: 0 };
}

export function isClipboardEmpty(clipboard: Clipboard): boolean {
  return clipboard.cells.length === 0;
}

/** Render clipboard contents as plain text, trailing spaces trimmed per row. */
export function clipboardToText(clipboard: Clipboard): string {
  if (isClipboardEmpty(clipboard)) return "";
  const rows: string[][] = [];
  for (let y = 0; y < clipboard.height; y++) {
    rows.push(new Array<string>(clipboard.width).fill(" "));
  }
  for (const { dx, dy, cell } of clipboard.cells) {
    if (dy >= 0 && dy < clipboard.height && dx >= 0 && dx < clipboard.width) {
      rows[dy][dx] = cell.ch;
    }
  }
  return rows.map((row) => row.join("").replace(/ +$/, "")).join("\n");
}
