/**
 * Line tool: straight segments rasterized with Bresenham.
 *
 * One glyph for the whole segment, picked by direction:
 *   horizontal ─   vertical │   down-right/up-left \   up-right/down-left /
 */

import type { DrawOp } from "../draw-op.js";
import { drawOp } from "../draw-op.js";
import { bresenham, stepToward } from "../geometry.js";
import { LINE_CHARS } from "../glyphs.js";
import { DragTool } from "./drag-tool.js";

/** Glyph for a segment from (x1, y1) to (x2, y2). */
export function lineChar(x1: number, y1: number, x2: number, y2: number): string {
  if (x1 === x2) return LINE_CHARS.vertical;
  if (y1 === y2) return LINE_CHARS.horizontal;
  const sx = stepToward(x1, x2);
  const sy = stepToward(y1, y2);
  return sx === sy ? LINE_CHARS.backslash : LINE_CHARS.slash;
}

export function drawLine(x1: number, y1: number, x2: number, y2: number): DrawOp[] {
  const ch = lineChar(x1, y1, x2, y2);
  return bresenham(x1, y1, x2, y2).map((p) => drawOp(p.x, p.y, ch));
}

export class LineTool extends DragTool {
  readonly id = "line";

  shape(x1: number, y1: number, x2: number, y2: number): DrawOp[] {
    return drawLine(x1, y1, x2, y2);
  }
}
