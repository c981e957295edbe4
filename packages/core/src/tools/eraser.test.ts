import { describe, it, expect } from "vitest";
import { Grid } from "../grid.js";
import { countContent } from "../export.js";
import { ctxFor, paint } from "../test-helpers.js";
import { EraserTool, erasePatch } from "./eraser.js";

function filled(width: number, height: number): Grid {
  const g = new Grid(width, height);
  g.fillRect(0, 0, width - 1, height - 1, "x");
  return g;
}

describe("erasePatch", () => {
  it("size 1 clears exactly one cell", () => {
    const g = filled(10, 10);
    paint(g, erasePatch(5, 5, 1));
    expect(countContent(g)).toBe(99);
    expect(g.charAt(5, 5)).toBe(" ");
  });

  it("size 2 clears a 3x3 square", () => {
    const g = filled(10, 10);
    const ops = erasePatch(5, 5, 2);
    expect(ops).toHaveLength(9);
    paint(g, ops);
    expect(countContent(g)).toBe(91);
    expect(g.charAt(4, 4)).toBe(" ");
    expect(g.charAt(6, 6)).toBe(" ");
    expect(g.charAt(7, 5)).toBe("x");
  });

  it("treats sizes below 1 as 1", () => {
    expect(erasePatch(2, 2, 0)).toHaveLength(1);
  });

  it("emits cells past the edge for the grid to reject", () => {
    const g = filled(4, 4);
    const ops = erasePatch(0, 0, 2);
    expect(ops).toHaveLength(9);
    paint(g, ops);
    expect(countContent(g)).toBe(12);
  });
});

describe("EraserTool", () => {
  it("erases along the drag path", () => {
    const g = filled(10, 3);
    const ctx = ctxFor(g);
    const tool = new EraserTool(1);
    tool.onPointerDown(1, 1, ctx);
    tool.onPointerMove(4, 1, ctx);
    const up = tool.onPointerUp(4, 1, ctx);
    expect(up.finished).toBe(true);
    expect(up.ops).toHaveLength(4);
    paint(g, up.ops);
    expect(countContent(g)).toBe(26);
  });
});
