/**
 * Plain-text export of the grid.
 */

import type { Bounds } from "./selection.js";
import { isVisibleCell } from "./cell.js";
import type { Grid } from "./grid.js";

export interface ExportOptions {
  /** Emit only the bounding box of visible content, trailing spaces stripped. */
  trimBorders: boolean;
  /** Prefix each line with its 1-based grid row, e.g. `   3 | `. */
  lineNumbers: boolean;
  /** Truncate each finished line to this many characters. 0 = unlimited. */
  maxWidth: number;
}

export const DEFAULT_EXPORT_OPTIONS: Readonly<ExportOptions> = {
  trimBorders: true,
  lineNumbers: false,
  maxWidth: 0,
};

/** Tight bounding box of visible cells, or null when there are none. */
export function findContentBounds(grid: Grid): Bounds | null {
  let minX = grid.width;
  let minY = grid.height;
  let maxX = -1;
  let maxY = -1;

  for (const { x, y, cell } of grid.entries()) {
    if (!isVisibleCell(cell)) continue;
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }

  return maxX < 0 ? null : { minX, minY, maxX, maxY };
}

function rowText(grid: Grid, y: number, minX: number, maxX: number): string {
  let line = "";
  for (let x = minX; x <= maxX; x++) {
    line += grid.charAt(x, y);
  }
  return line;
}

function lineNumber(y: number): string {
  return `${String(y + 1).padStart(4)} | `;
}

function truncate(line: string, maxWidth: number): string {
  if (maxWidth <= 0) return line;
  const chars = [...line];
  return chars.length > maxWidth ? chars.slice(0, maxWidth).join("") : line;
}

export function exportGrid(grid: Grid, options: Partial<ExportOptions> = {}): string {
  const opts = { ...DEFAULT_EXPORT_OPTIONS, ...options };
  const lines: string[] = [];

  if (opts.trimBorders) {
    const bounds = findContentBounds(grid);
    if (!bounds) return "";
    for (let y = bounds.minY; y <= bounds.maxY; y++) {
      const prefix = opts.lineNumbers ? lineNumber(y) : "";
      lines.push((prefix + rowText(grid, y, bounds.minX, bounds.maxX)).replace(/ +$/, ""));
    }
  } else {
    for (let y = 0; y < grid.height; y++) {
      const prefix = opts.lineNumbers ? lineNumber(y) : "";
      lines.push(prefix + rowText(grid, y, 0, grid.width - 1));
    }
  }

  return lines.map((line) => truncate(line, opts.maxWidth)).join("\n");
}

/** Text of a rectangle between two corners, clipped to the grid, trailing spaces stripped per line. */
export function exportRegion(grid: Grid, x1: number, y1: number, x2: number, y2: number): string {
  const minX = Math.max(0, Math.min(x1, x2));
  const minY = Math.max(0, Math.min(y1, y2));
  const maxX = Math.min(grid.width - 1, Math.max(x1, x2));
  const maxY = Math.min(grid.height - 1, Math.max(y1, y2));

  const lines: string[] = [];
  for (let y = minY; y <= maxY; y++) {
    lines.push(rowText(grid, y, minX, maxX).replace(/ +$/, ""));
  }
  return lines.join("\n");
}

/** Number of visible cells. */
export function countContent(grid: Grid): number {
  let count = 0;
  for (const { cell } of grid.entries()) {
    if (isVisibleCell(cell)) count++;
  }
  return count;
}
