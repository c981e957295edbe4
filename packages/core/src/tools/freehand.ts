import type { DrawOp } from "../draw-op.js";
import { drawOp } from "../draw-op.js";
import { DEFAULT_FREEHAND_CHAR } from "../glyphs.js";
import { StrokeTool } from "./stroke-tool.js";

/** Paints one fixed glyph along the pointer path. */
export class FreehandTool extends StrokeTool {
  readonly id = "freehand";

  constructor(readonly glyph: string = DEFAULT_FREEHAND_CHAR) {
    super();
  }

  protected stamp(x: number, y: number): DrawOp[] {
    return [drawOp(x, y, this.glyph)];
  }
}
