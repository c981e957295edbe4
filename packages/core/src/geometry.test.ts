import { describe, it, expect } from "vitest";
import { bresenham, clampToGrid } from "./geometry.js";

const key = (p: { x: number; y: number }) => `${p.x},${p.y}`;

describe("clampToGrid", () => {
  it("clamps into the grid", () => {
    expect(clampToGrid(-3, 12, 10, 5)).toEqual({ x: 0, y: 4 });
    expect(clampToGrid(4.7, 2, 10, 5)).toEqual({ x: 4, y: 2 });
  });
});

describe("bresenham", () => {
  it("includes both endpoints in order", () => {
    expect(bresenham(0, 0, 3, 0).map(key)).toEqual(["0,0", "1,0", "2,0", "3,0"]);
    expect(bresenham(2, 3, 2, 1).map(key)).toEqual(["2,3", "2,2", "2,1"]);
  });

  it("steps diagonally on 45 degrees", () => {
    expect(bresenham(0, 0, 2, 2).map(key)).toEqual(["0,0", "1,1", "2,2"]);
  });

  it("a single point is one cell", () => {
    expect(bresenham(4, 4, 4, 4)).toEqual([{ x: 4, y: 4 }]);
  });

  it("visits the same cells in both directions", () => {
    const ends: [number, number, number, number][] = [
      [0, 0, 2, 1],
      [0, 0, 7, 3],
      [5, 1, 0, 4],
      [3, 9, 4, 0],
      [-2, 6, 6, -1],
    ];
    for (const [x1, y1, x2, y2] of ends) {
      const forward = bresenham(x1, y1, x2, y2).map(key);
      const backward = bresenham(x2, y2, x1, y1).map(key);
      expect(new Set(backward)).toEqual(new Set(forward));
      expect(forward[0]).toBe(`${x1},${y1}`);
      expect(backward[0]).toBe(`${x2},${y2}`);
    }
  });
});
