import { describe, it, expect } from "vitest";
import { Grid } from "../grid.js";
import { paint, rowsOf } from "../test-helpers.js";
import { arrowhead, drawArrow } from "./arrow.js";

describe("arrowhead", () => {
  it("uses directional glyphs on the axes", () => {
    expect(arrowhead(4, 0)).toBe("►");
    expect(arrowhead(-4, 0)).toBe("◄");
    expect(arrowhead(0, 3)).toBe("▼");
    expect(arrowhead(0, -3)).toBe("▲");
  });

  it("uses a dot for a zero-length arrow", () => {
    expect(arrowhead(0, 0)).toBe("•");
  });

  it("uses diagonal glyphs for steep drags", () => {
    expect(arrowhead(1, 5)).toBe("╲");
    expect(arrowhead(-1, -5)).toBe("╲");
    expect(arrowhead(-1, 5)).toBe("╱");
    expect(arrowhead(1, -5)).toBe("╱");
  });

  it("uses plain < and > in the 3:10 to 7:10 band", () => {
    expect(arrowhead(1, 2)).toBe(">");
    expect(arrowhead(-1, 2)).toBe("<");
    expect(arrowhead(3, 10)).toBe(">");
    expect(arrowhead(7, 10)).toBe(">");
  });

  it("treats shallow drags as horizontal", () => {
    expect(arrowhead(10, 1)).toBe("►");
    expect(arrowhead(-8, 10)).toBe("◄");
  });
});

describe("drawArrow", () => {
  it("ends a horizontal arrow with a head", () => {
    const ops = drawArrow(0, 0, 4, 0);
    expect(ops).toHaveLength(6);
    expect(rowsOf(paint(new Grid(5, 1), ops))).toEqual(["────►"]);
  });

  it("ends a vertical arrow with a head", () => {
    const g = paint(new Grid(1, 3), drawArrow(0, 2, 0, 0));
    expect(rowsOf(g)).toEqual(["▲", "│", "│"]);
  });

  it("places the head last so it wins the end cell", () => {
    const ops = drawArrow(2, 2, 2, 2);
    expect(ops.map((op) => op.cell.ch)).toEqual(["│", "•"]);
    expect(rowsOf(paint(new Grid(3, 3), ops))[2]).toBe("  •");
  });
});
