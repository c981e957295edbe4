import { describe, it, expect } from "vitest";
import { createCell } from "./cell.js";
import { ClearGrid, SetCell } from "./commands.js";
import { Grid } from "./grid.js";
import { History } from "./history.js";

function write(grid: Grid, history: History, x: number, ch: string): void {
  history.execute(new SetCell(x, 0, createCell(ch)), grid);
}

describe("History", () => {
  it("undo and redo walk the stacks", () => {
    const g = new Grid(5, 1);
    const h = new History();
    write(g, h, 0, "a");
    write(g, h, 1, "b");
    expect(h.undoCount).toBe(2);

    expect(h.undo(g)).toBe(true);
    expect(g.charAt(1, 0)).toBe(" ");
    expect(h.redoCount).toBe(1);

    expect(h.redo(g)).toBe(true);
    expect(g.charAt(1, 0)).toBe("b");
    expect(h.canRedo).toBe(false);
  });

  it("reports failure with nothing to undo or redo", () => {
    const g = new Grid(2, 1);
    const h = new History();
    expect(h.undo(g)).toBe(false);
    expect(h.redo(g)).toBe(false);
  });

  it("a push after undo empties the redo stack", () => {
    const g = new Grid(5, 1);
    const h = new History();
    write(g, h, 0, "a");
    h.undo(g);
    expect(h.redoCount).toBe(1);
    write(g, h, 1, "b");
    expect(h.redoCount).toBe(0);
    expect(h.canRedo).toBe(false);
  });

  it("keeps at most capacity entries, dropping the oldest", () => {
    const g = new Grid(20, 1);
    const h = new History(5);
    for (let i = 0; i < 8; i++) write(g, h, i, "x");
    expect(h.undoCount).toBe(5);

    for (let i = 0; i < 5; i++) expect(h.undo(g)).toBe(true);
    expect(h.undo(g)).toBe(false);
    expect(h.canUndo).toBe(false);
    expect(g.charAt(2, 0)).toBe("x");
    expect(g.charAt(3, 0)).toBe(" ");
  });

  it("keeps evicting correctly after many pushes past capacity", () => {
    const g = new Grid(20, 1);
    const h = new History(3);
    for (let i = 0; i < 13; i++) write(g, h, i, "x");
    expect(h.undoCount).toBe(3);
    expect(h.undoDescription).toBe("Set cell");

    for (let i = 0; i < 3; i++) expect(h.undo(g)).toBe(true);
    expect(h.undo(g)).toBe(false);
    expect(h.undoDescription).toBeUndefined();
    expect(g.charAt(9, 0)).toBe("x");
    expect(g.charAt(10, 0)).toBe(" ");

    expect(h.redo(g)).toBe(true);
    expect(h.undoCount).toBe(1);
    expect(g.charAt(10, 0)).toBe("x");
  });

  it("defaults to a capacity of 100", () => {
    const g = new Grid(1, 1);
    const h = new History();
    for (let i = 0; i < 150; i++) write(g, h, 0, "x");
    expect(h.capacity).toBe(100);
    expect(h.undoCount).toBe(100);
  });

  it("describes the next undo and redo", () => {
    const g = new Grid(5, 1);
    const h = new History();
    write(g, h, 0, "a");
    h.execute(new ClearGrid(), g);
    expect(h.undoDescription).toBe("Clear canvas");
    h.undo(g);
    expect(h.undoDescription).toBe("Set cell");
    expect(h.redoDescription).toBe("Clear canvas");
  });

  it("clear empties both stacks", () => {
    const g = new Grid(5, 1);
    const h = new History();
    write(g, h, 0, "a");
    write(g, h, 1, "b");
    h.undo(g);
    h.clear();
    expect(h.undoCount).toBe(0);
    expect(h.redoCount).toBe(0);
  });
});
