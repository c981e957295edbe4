/**
 * Diamond tool: four half-diagonals from the center of the dragged box
 * to the midpoints of its edges.
 *
 * Coincident cells (the shared center) are removed after sorting by
 * (y, x); the first op drawn for a cell wins. A drag too small to have
 * a half-extent yields a single ◆.
 */

import type { DrawOp } from "../draw-op.js";
import { drawOp } from "../draw-op.js";
import { bresenham, stepToward } from "../geometry.js";
import { DIAMOND_POINT, LINE_CHARS } from "../glyphs.js";
import { DragTool } from "./drag-tool.js";

function halfDiagonal(
  cx: number,
  cy: number,
  tx: number,
  ty: number,
  opposite: string,
  same: string,
): DrawOp[] {
  const ch = stepToward(cx, tx) !== stepToward(cy, ty) ? opposite : same;
  return bresenham(cx, cy, tx, ty).map((p) => drawOp(p.x, p.y, ch));
}

export function drawDiamond(x1: number, y1: number, x2: number, y2: number): DrawOp[] {
  const cx = Math.trunc((x1 + x2) / 2);
  const cy = Math.trunc((y1 + y2) / 2);
  const halfWidth = Math.trunc(Math.abs(x2 - x1) / 2);
  const halfHeight = Math.trunc(Math.abs(y2 - y1) / 2);

  if (halfWidth === 0 && halfHeight === 0) {
    return [drawOp(cx, cy, DIAMOND_POINT)];
  }

  const { slash, backslash } = LINE_CHARS;
  const ops = [
    ...halfDiagonal(cx, cy, cx, cy - halfHeight, slash, backslash),
    ...halfDiagonal(cx, cy, cx + halfWidth, cy, slash, backslash),
    ...halfDiagonal(cx, cy, cx, cy + halfHeight, backslash, slash),
    ...halfDiagonal(cx, cy, cx - halfWidth, cy, backslash, slash),
  ];

  ops.sort((a, b) => a.y - b.y || a.x - b.x);
  return ops.filter((op, i) => i === 0 || op.x !== ops[i - 1].x || op.y !== ops[i - 1].y);
}

export class DiamondTool extends DragTool {
  readonly id = "diamond";

  shape(x1: number, y1: number, x2: number, y2: number): DrawOp[] {
    return drawDiamond(x1, y1, x2, y2);
  }
}
