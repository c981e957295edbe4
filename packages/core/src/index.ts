export { CellStyle, EMPTY_CELL, cellsEqual, createCell, hasStyle, isEmptyCell, isVisibleCell, withStyle } from "./cell.js";
export type { Cell } from "./cell.js";
export { Grid, DEFAULT_WIDTH, DEFAULT_HEIGHT } from "./grid.js";
export type { GridEntry } from "./grid.js";
export { Selection, clipboardToText, emptyClipboard, isClipboardEmpty } from "./selection.js";
export type { Bounds, Clipboard, ClipboardCell } from "./selection.js";
export { DirtyRect, DirtyTracker } from "./dirty-region.js";
export type { DirtyState } from "./dirty-region.js";
export { blankOp, drawOp } from "./draw-op.js";
export type { DrawOp } from "./draw-op.js";
export { bresenham, clampToGrid } from "./geometry.js";
export type { Point } from "./geometry.js";
export {
  ARROWHEADS,
  BORDER_CHARS,
  BORDER_STYLES,
  DEFAULT_FREEHAND_CHAR,
  DIAMOND_POINT,
  LINE_CHARS,
  parseBorderStyle,
} from "./glyphs.js";
export type { BorderChars, BorderStyle } from "./glyphs.js";
export * from "./tools/index.js";
export { ClearCell, ClearGrid, Composite, DrawBatch, MERGE_CAP, SetCell } from "./commands.js";
export type { Command, CommandKind } from "./commands.js";
export { DEFAULT_HISTORY_CAPACITY, History } from "./history.js";
export {
  DEFAULT_EXPORT_OPTIONS,
  countContent,
  exportGrid,
  exportRegion,
  findContentBounds,
} from "./export.js";
export type { ExportOptions } from "./export.js";
export { SessionEvent, onSessionEvent } from "./events.js";
export type { SessionEventOf, SessionEventPayload, SessionEventType } from "./events.js";
export { EditorSession } from "./session.js";
export type { EditorSessionOptions, KeyInput } from "./session.js";
