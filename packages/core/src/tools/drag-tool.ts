/**
 * Base for shape tools that follow Idle → Dragging → Idle.
 *
 * Pointer-down records the anchor. Every move recomputes the full shape
 * from the anchor as a preview; pointer-up recomputes it once more as a
 * finished result and returns to idle.
 */

import type { DrawOp } from "../draw-op.js";
import type { Point } from "../geometry.js";
import { clampToGrid } from "../geometry.js";
import type { Selection } from "../selection.js";
import type { Tool, ToolContext, ToolId, ToolResult } from "./tool.js";
import { emptyResult, finishedResult, previewResult } from "./tool.js";

export abstract class DragTool implements Tool {
  abstract readonly id: ToolId;
  readonly previewMode = "replace";

  protected anchor: Point | null = null;

  /** Ops for the shape spanning the two points (already clamped). */
  abstract shape(x1: number, y1: number, x2: number, y2: number, ctx: ToolContext): DrawOp[];

  onPointerDown(x: number, y: number, ctx: ToolContext): ToolResult {
    this.anchor = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    return emptyResult();
  }

  onPointerMove(x: number, y: number, ctx: ToolContext): ToolResult {
    if (!this.anchor) return emptyResult();
    const end = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    return previewResult(this.shape(this.anchor.x, this.anchor.y, end.x, end.y, ctx));
  }

  onPointerUp(x: number, y: number, ctx: ToolContext): ToolResult {
    if (!this.anchor) return emptyResult();
    const end = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    const ops = this.shape(this.anchor.x, this.anchor.y, end.x, end.y, ctx);
    this.anchor = null;
    return finishedResult(ops);
  }

  onKey(_key: string, _ctx: ToolContext): ToolResult {
    return emptyResult();
  }

  reset(): void {
    this.anchor = null;
  }

  isActive(): boolean {
    return this.anchor !== null;
  }

  getSelection(): Selection | null {
    return null;
  }
}
