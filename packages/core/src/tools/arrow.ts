/**
 * Arrow tool: a Bresenham segment followed by an arrowhead at the end point.
 *
 * Body glyphs and the head are chosen by angle bucket. The slope ratio is
 * |dx| * 10 / |dy| (integer division):
 *   < 3   steep:   │ body, ╲ ╱ head
 *   > 7   shallow: ─ body, ► ◄ head
 *   3..7  diagonal: / \ body, > < head
 */

import type { DrawOp } from "../draw-op.js";
import { drawOp } from "../draw-op.js";
import { bresenham } from "../geometry.js";
import { ARROWHEADS, LINE_CHARS } from "../glyphs.js";
import { DragTool } from "./drag-tool.js";

function slopeRatio(dx: number, dy: number): number {
  return Math.trunc((Math.abs(dx) * 10) / Math.max(Math.abs(dy), 1));
}

/** Arrowhead for a drag of (dx, dy). */
export function arrowhead(dx: number, dy: number): string {
  if (dx === 0 && dy === 0) return ARROWHEADS.dot;
  if (dx === 0) return dy > 0 ? ARROWHEADS.down : ARROWHEADS.up;
  if (dy === 0) return dx > 0 ? ARROWHEADS.right : ARROWHEADS.left;

  const ratio = slopeRatio(dx, dy);
  if (ratio < 3) {
    return (dx > 0) === (dy > 0) ? ARROWHEADS.steepBackslash : ARROWHEADS.steepSlash;
  }
  if (ratio > 7) return dx > 0 ? ARROWHEADS.right : ARROWHEADS.left;
  return dx > 0 ? ARROWHEADS.right45 : ARROWHEADS.left45;
}

/** Body glyph for the cell at (x, y) on the way to (targetX, targetY). */
export function arrowBodyChar(x: number, y: number, targetX: number, targetY: number): string {
  const dx = targetX - x;
  const dy = targetY - y;
  if (dx === 0) return LINE_CHARS.vertical;
  if (dy === 0) return LINE_CHARS.horizontal;

  const ratio = slopeRatio(dx, dy);
  if (ratio < 3) return LINE_CHARS.vertical;
  if (ratio > 7) return LINE_CHARS.horizontal;
  return (dx > 0) === (dy > 0) ? LINE_CHARS.backslash : LINE_CHARS.slash;
}

export function drawArrow(x1: number, y1: number, x2: number, y2: number): DrawOp[] {
  const ops = bresenham(x1, y1, x2, y2).map((p) => drawOp(p.x, p.y, arrowBodyChar(p.x, p.y, x2, y2)));
  ops.push(drawOp(x2, y2, arrowhead(x2 - x1, y2 - y1)));
  return ops;
}

export class ArrowTool extends DragTool {
  readonly id = "arrow";

  shape(x1: number, y1: number, x2: number, y2: number): DrawOp[] {
    return drawArrow(x1, y1, x2, y2);
  }
}
