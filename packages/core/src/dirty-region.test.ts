import { describe, it, expect } from "vitest";
import { DirtyRect, DirtyTracker } from "./dirty-region.js";

describe("DirtyRect", () => {
  it("empty has no extent", () => {
    const r = DirtyRect.empty();
    expect(r.isEmpty).toBe(true);
    expect(r.width).toBe(0);
    expect(r.area).toBe(0);
    expect([...r.cells()]).toEqual([]);
  });

  it("include grows to cover points", () => {
    const r = DirtyRect.single(3, 3);
    r.include(1, 5);
    expect([r.x1, r.y1, r.x2, r.y2]).toEqual([1, 3, 3, 5]);
    expect(r.area).toBe(9);
  });

  it("union with an empty operand changes nothing", () => {
    const r = DirtyRect.fromPoints(4, 4, 2, 2);
    r.union(DirtyRect.empty());
    expect([r.x1, r.y1, r.x2, r.y2]).toEqual([2, 2, 4, 4]);
  });

  it("empty adopts the other rect on union", () => {
    const r = DirtyRect.empty();
    r.union(DirtyRect.fromPoints(1, 2, 3, 4));
    expect([r.x1, r.y1, r.x2, r.y2]).toEqual([1, 2, 3, 4]);
  });

  it("clamp limits to grid bounds", () => {
    const r = new DirtyRect(-2, -1, 12, 3);
    r.clamp(10, 3);
    expect([r.x1, r.y1, r.x2, r.y2]).toEqual([0, 0, 9, 2]);
    expect(r.isFull(10, 3)).toBe(true);
  });

  it("full covers the grid", () => {
    expect(DirtyRect.full(4, 2).area).toBe(8);
    expect(DirtyRect.full(4, 2).contains(3, 1)).toBe(true);
  });

  it("cells iterates row by row", () => {
    expect([...DirtyRect.fromPoints(0, 0, 1, 1).cells()]).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 1 },
    ]);
  });
});

describe("DirtyTracker", () => {
  it("treats the initial empty state as a full redraw", () => {
    const t = new DirtyTracker();
    expect(t.needsFullRedraw).toBe(true);
    expect(t.hasChanges).toBe(false);
  });

  it("tracks the bounding box of marks", () => {
    const t = new DirtyTracker();
    t.mark(5, 1);
    t.markRegion(2, 4, 3, 3);
    expect(t.needsFullRedraw).toBe(false);
    const state = t.flush();
    expect(state.full).toBe(false);
    if (!state.full) {
      expect([state.rect.x1, state.rect.y1, state.rect.x2, state.rect.y2]).toEqual([2, 1, 5, 4]);
    }
    expect(t.hasChanges).toBe(false);
  });

  it("a full request stays until cleared", () => {
    const t = new DirtyTracker();
    t.requestFull();
    t.mark(1, 1);
    expect(t.needsFullRedraw).toBe(true);
    expect(t.flush()).toEqual({ full: true });
    t.mark(0, 0);
    expect(t.needsFullRedraw).toBe(false);
  });
});
