/**
 * Test helpers: grids from ASCII art template literals, and back.
 */

import type { DrawOp } from "./draw-op.js";
import type { BorderStyle } from "./glyphs.js";
import { Grid } from "./grid.js";
import type { ToolContext } from "./tools/tool.js";

/**
 * Create a Grid from an ASCII art template literal.
 *
 * Strips the first and last blank lines, removes common leading indent,
 * and sizes the grid to fit the content exactly.
 *
 * Usage:
 *   const grid = gridFrom`
 *     ┌──┐
 *     │  │
 *     └──┘
 *   `;
 */
export function gridFrom(strings: TemplateStringsArray): Grid {
  let lines = strings[0].split("\n");

  if (lines.length > 0 && lines[0].trim() === "") lines = lines.slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim() === "") lines = lines.slice(0, -1);
  if (lines.length === 0) return new Grid(1, 1);

  const indents = lines
    .filter((l) => l.trim().length > 0)
    .map((l) => l.length - l.trimStart().length);
  const minIndent = indents.length > 0 ? Math.min(...indents) : 0;
  const rows = lines.map((l) => Array.from(l.slice(minIndent)));

  const width = Math.max(...rows.map((r) => r.length), 1);
  const grid = new Grid(width, rows.length);
  rows.forEach((row, y) => row.forEach((ch, x) => grid.setChar(x, y, ch)));
  return grid;
}

/** Every row of the grid as a string, trailing spaces trimmed. */
export function rowsOf(grid: Grid): string[] {
  const rows: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let row = "";
    for (let x = 0; x < grid.width; x++) row += grid.charAt(x, y);
    rows.push(row.replace(/ +$/, ""));
  }
  return rows;
}

/** Write ops straight into the grid, skipping out-of-bounds ones. */
export function paint(grid: Grid, ops: readonly DrawOp[]): Grid {
  for (const op of ops) grid.set(op.x, op.y, op.cell);
  return grid;
}

export function ctxFor(grid: Grid, borderStyle: BorderStyle = "single"): ToolContext {
  return { gridWidth: grid.width, gridHeight: grid.height, borderStyle };
}
