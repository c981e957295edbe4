import { describe, it, expect } from "vitest";
import {
  CellStyle,
  EMPTY_CELL,
  cellsEqual,
  createCell,
  hasStyle,
  isEmptyCell,
  isVisibleCell,
  withStyle,
} from "./cell.js";

describe("Cell", () => {
  it("defaults to an unstyled space", () => {
    expect(EMPTY_CELL).toEqual({ ch: " ", style: CellStyle.NONE });
    expect(createCell("")).toEqual(EMPTY_CELL);
  });

  it("keeps only the first code point", () => {
    expect(createCell("abc").ch).toBe("a");
    expect(createCell("😀x").ch).toBe("😀");
  });

  it("distinguishes empty from invisible", () => {
    expect(isEmptyCell(createCell(" "))).toBe(true);
    expect(isVisibleCell(createCell(" "))).toBe(false);
    expect(isEmptyCell(createCell("\t"))).toBe(false);
    expect(isVisibleCell(createCell("\t"))).toBe(false);
    expect(isVisibleCell(createCell("─"))).toBe(true);
  });

  it("combines and tests style flags", () => {
    const cell = withStyle(createCell("x", CellStyle.BOLD), CellStyle.HIGHLIGHT);
    expect(cell.style).toBe(9);
    expect(hasStyle(cell, CellStyle.BOLD)).toBe(true);
    expect(hasStyle(cell, CellStyle.ITALIC)).toBe(false);
    expect(hasStyle(cell, CellStyle.BOLD | CellStyle.HIGHLIGHT)).toBe(true);
  });

  it("compares by value", () => {
    expect(cellsEqual(createCell("a", 2), { ch: "a", style: 2 })).toBe(true);
    expect(cellsEqual(createCell("a", 2), createCell("a"))).toBe(false);
  });
});
