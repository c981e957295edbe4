import type { DrawOp } from "../draw-op.js";
import { blankOp } from "../draw-op.js";
import { StrokeTool } from "./stroke-tool.js";

/**
 * Blanks a square patch of side `2 * size - 1` around every point of the
 * pointer path. Patch cells past the grid edge are still emitted; the
 * grid rejects them when the batch is applied.
 */
export function erasePatch(cx: number, cy: number, size: number): DrawOp[] {
  const r = Math.max(1, Math.trunc(size)) - 1;
  const ops: DrawOp[] = [];
  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      ops.push(blankOp(cx + dx, cy + dy));
    }
  }
  return ops;
}

export class EraserTool extends StrokeTool {
  readonly id = "eraser";
  readonly size: number;

  constructor(size = 1) {
    super();
    this.size = Math.max(1, Math.trunc(size));
  }

  protected stamp(x: number, y: number): DrawOp[] {
    return erasePatch(x, y, this.size);
  }
}
