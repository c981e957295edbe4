/**
 * Select tool: Idle → Selecting | Moving.
 *
 * The tool only manages the Selection value. A finished move gesture is
 * reported through `takeMove()`; relocating the cells is left to the
 * session that owns the grid.
 */

import type { Point } from "../geometry.js";
import { clampToGrid } from "../geometry.js";
import { Selection } from "../selection.js";
import type { Tool, ToolContext, ToolResult } from "./tool.js";
import { emptyResult, finishedResult } from "./tool.js";

/** A completed move gesture: `source` is the selection before the move. */
export interface SelectionMove {
  source: Selection;
  dx: number;
  dy: number;
}

type SelectState =
  | { kind: "idle" }
  | { kind: "selecting"; anchor: Point }
  | { kind: "moving"; offsetX: number; offsetY: number };

export class SelectTool implements Tool {
  readonly id = "select";
  readonly previewMode = "replace";

  private selection: Selection | null = null;
  private state: SelectState = { kind: "idle" };
  private pendingMove: SelectionMove | null = null;

  onPointerDown(x: number, y: number, ctx: ToolContext): ToolResult {
    const p = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    this.pendingMove = null;

    if (this.selection && this.selection.contains(p.x, p.y)) {
      this.state = {
        kind: "moving",
        offsetX: p.x - this.selection.x1,
        offsetY: p.y - this.selection.y1,
      };
    } else {
      this.selection = null;
      this.state = { kind: "selecting", anchor: p };
    }
    return emptyResult();
  }

  onPointerMove(x: number, y: number, ctx: ToolContext): ToolResult {
    if (this.state.kind === "selecting") {
      const p = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
      const { anchor } = this.state;
      this.selection = new Selection(anchor.x, anchor.y, p.x, p.y);
    }
    return emptyResult();
  }

  onPointerUp(x: number, y: number, ctx: ToolContext): ToolResult {
    const p = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    const state = this.state;
    this.state = { kind: "idle" };

    if (state.kind === "selecting") {
      this.selection = new Selection(state.anchor.x, state.anchor.y, p.x, p.y);
      return emptyResult();
    }

    if (state.kind === "moving" && this.selection) {
      const source = this.selection;
      const dx = p.x - state.offsetX - source.x1;
      const dy = p.y - state.offsetY - source.y1;
      if (dx !== 0 || dy !== 0) {
        this.pendingMove = { source, dx, dy };
        this.selection = source.translated(dx, dy);
      }
      return finishedResult([]);
    }

    return emptyResult();
  }

  onKey(_key: string, _ctx: ToolContext): ToolResult {
    return emptyResult();
  }

  /** The last finished move, cleared once read. */
  takeMove(): SelectionMove | null {
    const move = this.pendingMove;
    this.pendingMove = null;
    return move;
  }

  getSelection(): Selection | null {
    return this.selection;
  }

  /** Replace the selection without a gesture (e.g. after paste or delete). */
  setSelection(selection: Selection | null): void {
    this.selection = selection;
  }

  reset(): void {
    this.selection = null;
    this.state = { kind: "idle" };
    this.pendingMove = null;
  }

  isActive(): boolean {
    return this.state.kind !== "idle";
  }
}
