/**
 * Rectangle tool: boxes in the current border style.
 *
 * Degenerate drags collapse: a single point becomes one corner glyph,
 * a one-row or one-column drag becomes a straight border run.
 * Border runs stop strictly between the corners.
 */

import type { DrawOp } from "../draw-op.js";
import { drawOp } from "../draw-op.js";
import type { BorderStyle } from "../glyphs.js";
import { BORDER_CHARS } from "../glyphs.js";
import { DragTool } from "./drag-tool.js";
import type { ToolContext } from "./tool.js";

export function drawRectangle(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  style: BorderStyle = "single",
): DrawOp[] {
  const chars = BORDER_CHARS[style];
  const minX = Math.min(x1, x2);
  const maxX = Math.max(x1, x2);
  const minY = Math.min(y1, y2);
  const maxY = Math.max(y1, y2);
  const ops: DrawOp[] = [];

  if (minX === maxX && minY === maxY) {
    return [drawOp(minX, minY, chars.topLeft)];
  }
  if (minY === maxY) {
    for (let x = minX; x <= maxX; x++) ops.push(drawOp(x, minY, chars.horizontal));
    return ops;
  }
  if (minX === maxX) {
    for (let y = minY; y <= maxY; y++) ops.push(drawOp(minX, y, chars.vertical));
    return ops;
  }

  ops.push(drawOp(minX, minY, chars.topLeft));
  ops.push(drawOp(maxX, minY, chars.topRight));
  ops.push(drawOp(minX, maxY, chars.bottomLeft));
  ops.push(drawOp(maxX, maxY, chars.bottomRight));

  for (let x = minX + 1; x < maxX; x++) {
    ops.push(drawOp(x, minY, chars.horizontal));
    ops.push(drawOp(x, maxY, chars.horizontal));
  }
  for (let y = minY + 1; y < maxY; y++) {
    ops.push(drawOp(minX, y, chars.vertical));
    ops.push(drawOp(maxX, y, chars.vertical));
  }
  return ops;
}

export class RectangleTool extends DragTool {
  readonly id = "rectangle";

  shape(x1: number, y1: number, x2: number, y2: number, ctx: ToolContext): DrawOp[] {
    return drawRectangle(x1, y1, x2, y2, ctx.borderStyle);
  }
}
