/**
 * Text tool: Idle → Editing.
 *
 * A click places the cursor; keystrokes draw at the cursor and advance it.
 * Drawn characters are previews staged on the tool until the next click
 * (or an explicit `flush`) hands them back as one finished batch.
 */

import type { DrawOp } from "../draw-op.js";
import { blankOp, drawOp } from "../draw-op.js";
import type { Point } from "../geometry.js";
import { clampToGrid } from "../geometry.js";
import type { Selection } from "../selection.js";
import type { Tool, ToolContext, ToolResult } from "./tool.js";
import { emptyResult, finishedResult, previewResult } from "./tool.js";

const NEWLINE_KEYS = new Set(["Enter", "\n", "\r"]);
const BACKSPACE_KEYS = new Set(["Backspace", "\b"]);
const DELETE_KEYS = new Set(["Delete", "\x7f"]);

function isPrintable(key: string): boolean {
  return [...key].length === 1 && !/\p{Cc}/u.test(key);
}

export class TextTool implements Tool {
  readonly id = "text";
  readonly previewMode = "append";

  private _cursor: Point | null = null;
  private startX = 0;
  private line: string[] = [];
  private staged: DrawOp[] = [];

  get cursor(): Point | null {
    return this._cursor ? { ...this._cursor } : null;
  }

  onPointerDown(x: number, y: number, ctx: ToolContext): ToolResult {
    const committed = this.flush();
    const p = clampToGrid(x, y, ctx.gridWidth, ctx.gridHeight);
    this._cursor = p;
    this.startX = p.x;
    this.line = [];
    return committed;
  }

  onPointerMove(_x: number, _y: number, _ctx: ToolContext): ToolResult {
    return emptyResult();
  }

  onPointerUp(_x: number, _y: number, _ctx: ToolContext): ToolResult {
    return emptyResult();
  }

  onKey(key: string, ctx: ToolContext): ToolResult {
    const cursor = this._cursor;
    if (!cursor) return emptyResult();

    if (NEWLINE_KEYS.has(key)) {
      this._cursor = { x: this.startX, y: cursor.y + 1 };
      this.line = [];
      return emptyResult();
    }

    if (BACKSPACE_KEYS.has(key)) {
      if (cursor.x <= this.startX || this.line.length === 0) return emptyResult();
      this.line.pop();
      cursor.x -= 1;
      return this.stage(blankOp(cursor.x, cursor.y));
    }

    if (DELETE_KEYS.has(key)) {
      const index = cursor.x - this.startX;
      if (index < 0 || index >= this.line.length) return emptyResult();
      this.line.splice(index, 1);
      return this.stage(blankOp(cursor.x, cursor.y));
    }

    if (!isPrintable(key)) return emptyResult();

    // the last column stays free
    const lastColumn = ctx.gridWidth - 1;
    if (cursor.x >= lastColumn || this.startX >= lastColumn) return emptyResult();

    this.line.push(key);
    const op = drawOp(cursor.x, cursor.y, key);
    cursor.x += 1;
    return this.stage(op);
  }

  /** Hand back everything typed since the last click as a finished batch. */
  flush(): ToolResult {
    if (this.staged.length === 0) return emptyResult();
    const ops = this.staged;
    this.staged = [];
    return finishedResult(ops);
  }

  reset(): void {
    this._cursor = null;
    this.startX = 0;
    this.line = [];
    this.staged = [];
  }

  isActive(): boolean {
    return this._cursor !== null;
  }

  getSelection(): Selection | null {
    return null;
  }

  private stage(op: DrawOp): ToolResult {
    this.staged.push(op);
    return previewResult([op]);
  }
}
