/**
 * Tool interface.
 *
 * Each drawing mode is a small state machine that consumes pointer and
 * key events in grid coordinates and emits ordered DrawOps. Tools never
 * touch the grid: the session turns their results into previews or
 * committed commands.
 */

import type { DrawOp } from "../draw-op.js";
import type { BorderStyle } from "../glyphs.js";
import type { Selection } from "../selection.js";

export type ToolId =
  | "rectangle"
  | "line"
  | "arrow"
  | "diamond"
  | "text"
  | "freehand"
  | "select"
  | "eraser";

export interface ToolInfo {
  id: ToolId;
  name: string;
  shortcut: string;
}

export const TOOLS: readonly ToolInfo[] = [
  { id: "rectangle", name: "Rectangle", shortcut: "R" },
  { id: "line", name: "Line", shortcut: "L" },
  { id: "arrow", name: "Arrow", shortcut: "A" },
  { id: "diamond", name: "Diamond", shortcut: "D" },
  { id: "text", name: "Text", shortcut: "T" },
  { id: "freehand", name: "Freehand", shortcut: "F" },
  { id: "select", name: "Select", shortcut: "V" },
  { id: "eraser", name: "Eraser", shortcut: "E" },
];

export const DEFAULT_TOOL: ToolId = "rectangle";

const ALIASES: Readonly<Record<string, ToolId>> = {
  rect: "rectangle",
};

export function toolInfo(id: ToolId): ToolInfo {
  const info = TOOLS.find((t) => t.id === id);
  return info ?? { id, name: id, shortcut: "" };
}

/** Resolve a tool from its id, display name, alias or shortcut letter (case-insensitive). */
export function parseToolId(value: string): ToolId | undefined {
  const lower = value.trim().toLowerCase();
  if (lower === "") return undefined;
  const alias = ALIASES[lower];
  if (alias) return alias;
  return TOOLS.find((t) => t.id === lower || t.shortcut.toLowerCase() === lower)?.id;
}

/** Resolve a tool from a single shortcut letter. */
export function toolFromShortcut(key: string): ToolId | undefined {
  if ([...key].length !== 1) return undefined;
  const upper = key.toUpperCase();
  return TOOLS.find((t) => t.shortcut === upper)?.id;
}

/** Context provided to tools on every event. */
export interface ToolContext {
  gridWidth: number;
  gridHeight: number;
  borderStyle: BorderStyle;
}

/** Result of a single tool event. */
export interface ToolResult {
  /** Ops to apply, in order. */
  ops: DrawOp[];
  /** Whether the result carries any ops. */
  modified: boolean;
  /** Gesture concluded: commit to history. Otherwise the ops are a live preview. */
  finished: boolean;
}

export function emptyResult(): ToolResult {
  return { ops: [], modified: false, finished: false };
}

export function previewResult(ops: DrawOp[]): ToolResult {
  return { ops, modified: ops.length > 0, finished: false };
}

export function finishedResult(ops: DrawOp[]): ToolResult {
  return { ops, modified: ops.length > 0, finished: true };
}

/**
 * How a preview result relates to the previous one: shape tools recompute
 * the whole shape each move ("replace"), stroke tools emit only the new
 * cells ("append").
 */
export type PreviewMode = "replace" | "append";

export interface Tool {
  readonly id: ToolId;
  readonly previewMode: PreviewMode;

  onPointerDown(x: number, y: number, ctx: ToolContext): ToolResult;
  onPointerMove(x: number, y: number, ctx: ToolContext): ToolResult;
  onPointerUp(x: number, y: number, ctx: ToolContext): ToolResult;
  /** Keyboard input. `key` is a single character or a key name such as "Enter". */
  onKey(key: string, ctx: ToolContext): ToolResult;

  /** Abandon any in-progress gesture. */
  reset(): void;
  /** Whether a gesture (drag, stroke, text entry) is in progress. */
  isActive(): boolean;
  /** The tool's selection, if it keeps one. */
  getSelection(): Selection | null;
}
