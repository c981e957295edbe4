import { describe, it, expect } from "vitest";
import { Grid } from "../grid.js";
import { ctxFor, paint, rowsOf } from "../test-helpers.js";
import { FreehandTool } from "./freehand.js";

describe("FreehandTool", () => {
  it("stamps the pointer-down cell as a preview", () => {
    const ctx = ctxFor(new Grid(10, 10));
    const tool = new FreehandTool();
    const down = tool.onPointerDown(1, 1, ctx);
    expect(down.finished).toBe(false);
    expect(down.ops).toEqual([{ x: 1, y: 1, cell: { ch: "*", style: 0 } }]);
    expect(tool.isActive()).toBe(true);
  });

  it("skips moves within the same cell", () => {
    const ctx = ctxFor(new Grid(10, 10));
    const tool = new FreehandTool();
    tool.onPointerDown(1, 1, ctx);
    expect(tool.onPointerMove(1, 1, ctx).modified).toBe(false);
  });

  it("interpolates gaps between moves", () => {
    const ctx = ctxFor(new Grid(10, 10));
    const tool = new FreehandTool();
    tool.onPointerDown(1, 1, ctx);
    const move = tool.onPointerMove(4, 1, ctx);
    expect(move.ops.map((op) => op.x)).toEqual([2, 3, 4]);
  });

  it("flushes the whole stroke as one finished batch", () => {
    const g = new Grid(6, 3);
    const ctx = ctxFor(g);
    const tool = new FreehandTool("#");
    tool.onPointerDown(0, 0, ctx);
    tool.onPointerMove(2, 0, ctx);
    tool.onPointerMove(2, 2, ctx);
    const up = tool.onPointerUp(2, 2, ctx);
    expect(up.finished).toBe(true);
    expect(up.ops).toHaveLength(5);
    expect(rowsOf(paint(g, up.ops))).toEqual(["###", "  #", "  #"]);
    expect(tool.isActive()).toBe(false);
  });

  it("starts each stroke with an empty buffer", () => {
    const ctx = ctxFor(new Grid(10, 10));
    const tool = new FreehandTool();
    tool.onPointerDown(0, 0, ctx);
    tool.onPointerMove(5, 0, ctx);
    tool.onPointerUp(5, 0, ctx);
    tool.onPointerDown(3, 3, ctx);
    expect(tool.onPointerUp(3, 3, ctx).ops).toHaveLength(1);
  });
});
