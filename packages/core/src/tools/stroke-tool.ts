/**
 * Base for stroke tools that follow Idle → Drawing → Idle.
 *
 * Pointer-down seeds the last position and stamps it. Each move to a new
 * cell stamps every cell on the straight path from the last position.
 * Stamps are returned as append-mode previews and buffered; pointer-up
 * returns the whole buffer as one finished batch.
 */

import type { DrawOp } from "../draw-op.js";
import type { Point } from "../geometry.js";
import { bresenham, clampToGrid } from "../geometry.js";
import type { Selection } from "../selection.js";
import type { Tool, ToolContext, ToolId, ToolResult } from "./tool.js";
import { emptyResult, finishedResult, previewResult } from "./tool.js";

export abstract class StrokeTool implements Tool {
  abstract readonly id: ToolId;
  readonly previewMode = "append";

  private last: Point | null = null;
  private buffer: DrawOp[] = [];

  /** Ops for a single point of the stroke. */
  protected abstract stamp(x: number, y: number): DrawOp[];

  onPointerDown(x: number, y: number, ctx: ToolContext): ToolResult {
    const p = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    this.last = p;
    this.buffer = this.stamp(p.x, p.y);
    return previewResult([...this.buffer]);
  }

  onPointerMove(x: number, y: number, ctx: ToolContext): ToolResult {
    const last = this.last;
    if (!last) return emptyResult();
    const p = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    if (p.x === last.x && p.y === last.y) return emptyResult();

    // the first point was stamped by the previous event
    const ops = bresenham(last.x, last.y, p.x, p.y)
      .slice(1)
      .flatMap((q) => this.stamp(q.x, q.y));
    this.buffer.push(...ops);
    this.last = p;
    return previewResult(ops);
  }

  onPointerUp(_x: number, _y: number, _ctx: ToolContext): ToolResult {
    if (!this.last) return emptyResult();
    const ops = this.buffer;
    this.reset();
    return finishedResult(ops);
  }

  onKey(_key: string, _ctx: ToolContext): ToolResult {
    return emptyResult();
  }

  reset(): void {
    this.last = null;
    this.buffer = [];
  }

  isActive(): boolean {
    return this.last !== null;
  }

  getSelection(): Selection | null {
    return null;
  }
}
