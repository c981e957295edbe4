/**
 * EditorSession: owns one document's grid, active tool, history, dirty
 * tracker, selection and clipboard, and turns tool results into commands.
 *
 * Previews are kept on the session only. They are never written to the
 * grid and never reach history; finished results become one DrawBatch.
 * The session reports what happened through events and never logs.
 */

import type { Cell } from "./cell.js";
import { createCell } from "./cell.js";
import type { Command } from "./commands.js";
import { ClearGrid, Composite, DrawBatch } from "./commands.js";
import type { DirtyState } from "./dirty-region.js";
import { DirtyTracker } from "./dirty-region.js";
import type { DrawOp } from "./draw-op.js";
import { blankOp } from "./draw-op.js";
import { SessionEvent } from "./events.js";
import type { SessionEventPayload } from "./events.js";
import type { ExportOptions } from "./export.js";
import { exportGrid } from "./export.js";
import type { BorderStyle } from "./glyphs.js";
import { DEFAULT_FREEHAND_CHAR } from "./glyphs.js";
import { DEFAULT_HEIGHT, DEFAULT_WIDTH, Grid } from "./grid.js";
import { DEFAULT_HISTORY_CAPACITY, History } from "./history.js";
import type { Clipboard } from "./selection.js";
import { Selection, clipboardToText, emptyClipboard, isClipboardEmpty } from "./selection.js";
import { createTool } from "./tools/index.js";
import type { SelectionMove } from "./tools/select.js";
import { SelectTool } from "./tools/select.js";
import { TextTool } from "./tools/text.js";
import type { Tool, ToolContext, ToolId, ToolResult } from "./tools/tool.js";
import { DEFAULT_TOOL, toolFromShortcut } from "./tools/tool.js";

export interface EditorSessionOptions {
  historyCapacity?: number;
  borderStyle?: BorderStyle;
  freehandChar?: string;
  eraserSize?: number;
  tool?: ToolId;
}

/** A normalized key press from the host. */
export interface KeyInput {
  key: string;
  ctrl?: boolean;
  shift?: boolean;
  alt?: boolean;
}

export class EditorSession extends EventTarget {
  readonly grid: Grid;
  readonly history: History;
  private readonly dirty = new DirtyTracker();

  private _borderStyle: BorderStyle;
  private readonly freehandChar: string;
  private readonly eraserSize: number;

  private _toolId: ToolId;
  private tool: Tool;
  private _selection: Selection | null = null;
  private clipboard: Clipboard = emptyClipboard();
  private _preview: DrawOp[] = [];

  constructor(width?: number, height?: number, options?: EditorSessionOptions);
  constructor(grid: Grid, options?: EditorSessionOptions);
  constructor(
    gridOrWidth: Grid | number = DEFAULT_WIDTH,
    heightOrOptions?: number | EditorSessionOptions,
    maybeOptions: EditorSessionOptions = {},
  ) {
    super();
    let options: EditorSessionOptions;
    if (gridOrWidth instanceof Grid) {
      this.grid = gridOrWidth;
      options = typeof heightOrOptions === "object" ? heightOrOptions : {};
    } else {
      const height = typeof heightOrOptions === "number" ? heightOrOptions : DEFAULT_HEIGHT;
      this.grid = new Grid(gridOrWidth, height);
      options = maybeOptions;
    }

    this.history = new History(options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this._borderStyle = options.borderStyle ?? "single";
    this.freehandChar = options.freehandChar ?? DEFAULT_FREEHAND_CHAR;
    this.eraserSize = options.eraserSize ?? 1;
    this._toolId = options.tool ?? DEFAULT_TOOL;
    this.tool = this.makeTool(this._toolId);
  }

  // ─── State ────────────────────────────────────────────────────────────────

  get toolId(): ToolId {
    return this._toolId;
  }

  get selection(): Selection | null {
    return this._selection;
  }

  get borderStyle(): BorderStyle {
    return this._borderStyle;
  }

  set borderStyle(style: BorderStyle) {
    this._borderStyle = style;
  }

  /** Uncommitted preview ops, in drawing order (later ops win). */
  get preview(): readonly DrawOp[] {
    return this._preview;
  }

  get hasClipboard(): boolean {
    return !isClipboardEmpty(this.clipboard);
  }

  /** Whether the active tool is mid-gesture or editing text. */
  get toolActive(): boolean {
    return this.tool.isActive();
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  // ─── Tools ────────────────────────────────────────────────────────────────

  /**
   * Switch the active tool. Staged text is committed first, the outgoing
   * tool is reset and its preview dropped. Returns false if already active.
   */
  setTool(id: ToolId): boolean {
    if (id === this._toolId) return false;

    this.commitPending();
    this.tool.reset();
    this.discardPreview();
    if (id !== "select") this.updateSelection(null);

    this._toolId = id;
    this.tool = this.makeTool(id);
    this.emit({ type: "tool-change", tool: id });
    return true;
  }

  /**
   * Commit text staged by the text tool without ending text entry. Hosts
   * call this before saving or exporting. Returns true if anything was committed.
   */
  commitPending(): boolean {
    if (!(this.tool instanceof TextTool)) return false;
    const staged = this.tool.flush();
    if (!staged.modified) return false;
    this.discardPreview();
    this.commitResult(staged);
    return true;
  }

  setToolByShortcut(letter: string): boolean {
    const id = toolFromShortcut(letter);
    return id !== undefined && this.setTool(id);
  }

  // ─── Pointer ──────────────────────────────────────────────────────────────

  pointerDown(x: number, y: number): void {
    this.discardPreview();
    this.handle(this.tool.onPointerDown(x, y, this.context()));
    this.syncSelectTool();
  }

  pointerMove(x: number, y: number): void {
    this.handle(this.tool.onPointerMove(x, y, this.context()));
    this.syncSelectTool();
  }

  pointerUp(x: number, y: number): void {
    this.handle(this.tool.onPointerUp(x, y, this.context()));
    if (this.tool instanceof SelectTool) {
      const move = this.tool.takeMove();
      if (move) this.moveContent(move);
    }
    this.syncSelectTool();
  }

  // ─── Keyboard ─────────────────────────────────────────────────────────────

  /** Route a key press. Returns true if anything handled it. */
  keyDown(input: KeyInput): boolean {
    const { key } = input;
    const ctrl = input.ctrl ?? false;
    const shift = input.shift ?? false;
    const alt = input.alt ?? false;
    const lower = key.toLowerCase();

    if (key === "Escape") {
      this.tool.reset();
      this.discardPreview();
      this.syncSelectTool();
      return true;
    }

    if (ctrl) {
      if (lower === "z" && !shift) return this.undo();
      if ((lower === "z" && shift) || lower === "y") return this.redo();
      if (lower === "c") return this.copySelection();
      if (lower === "x") return this.cutSelection();
      if (lower === "v") return this.paste();
      return false;
    }

    if (key === "Delete" || key === "Backspace") {
      if (this._toolId === "select" && this._selection) return this.deleteSelection();
      if (this.tool instanceof TextTool && this.tool.isActive()) {
        this.handle(this.tool.onKey(key, this.context()));
        return true;
      }
      return false;
    }

    if (!shift && !alt && !this.tool.isActive()) {
      const id = toolFromShortcut(key);
      if (id) {
        this.setTool(id);
        return true;
      }
    }

    if (this.tool instanceof TextTool && this.tool.isActive()) {
      this.handle(this.tool.onKey(key, this.context()));
      return true;
    }
    return false;
  }

  // ─── History ──────────────────────────────────────────────────────────────

  undo(): boolean {
    if (!this.history.undo(this.grid)) return false;
    // The selection may no longer frame the content it was drawn around
    this.updateSelection(null);
    this.dirty.requestFull();
    this.emitHistory();
    return true;
  }

  redo(): boolean {
    if (!this.history.redo(this.grid)) return false;
    // The selection may no longer frame the content it was drawn around
    this.updateSelection(null);
    this.dirty.requestFull();
    this.emitHistory();
    return true;
  }

  /** Blank the whole canvas as one undoable command. */
  clearCanvas(): void {
    this.discardPreview();
    this.commit(new ClearGrid());
  }

  /**
   * Resize the canvas. Content outside the new bounds is lost, and history
   * is cleared because its snapshots no longer fit.
   */
  resize(width: number, height: number): void {
    this.tool.reset();
    this.discardPreview();
    this.grid.resize(width, height);
    this.history.clear();
    this.updateSelection(null);
    this.dirty.requestFull();
    this.emitHistory();
  }

  // ─── Selection & clipboard ────────────────────────────────────────────────

  /** Copy the selection into the clipboard. */
  copySelection(): boolean {
    if (!this._selection) return false;
    const { minX, minY, maxX, maxY } = this._selection.bounds();
    const cells: Clipboard["cells"] = [];
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const cell = this.grid.get(x, y);
        if (cell) cells.push({ dx: x - minX, dy: y - minY, cell });
      }
    }
    this.clipboard = { cells, width: maxX - minX + 1, height: maxY - minY + 1 };
    return true;
  }

  /** Copy the selection, then blank it as one committed batch. */
  cutSelection(): boolean {
    const selection = this._selection;
    if (!selection || !this.copySelection()) return false;
    this.commit(new DrawBatch(this.blankOps(selection), "Cut"));
    this.updateSelection(null);
    return true;
  }

  /** Blank the selection as one committed batch. */
  deleteSelection(): boolean {
    const selection = this._selection;
    if (!selection) return false;
    this.commit(new DrawBatch(this.blankOps(selection), "Delete selection"));
    this.updateSelection(null);
    return true;
  }

  /**
   * Write the clipboard at its recorded offsets from (originX, originY).
   * Cells that land outside the grid are dropped.
   */
  paste(originX = 0, originY = 0): boolean {
    if (isClipboardEmpty(this.clipboard)) return false;
    const ops: DrawOp[] = [];
    for (const { dx, dy, cell } of this.clipboard.cells) {
      const x = originX + dx;
      const y = originY + dy;
      if (this.grid.inBounds(x, y)) ops.push({ x, y, cell });
    }
    if (ops.length === 0) return false;
    this.commit(new DrawBatch(ops, "Paste"));
    return true;
  }

  /** Clipboard contents as plain text for the host's system clipboard. */
  clipboardText(): string {
    return clipboardToText(this.clipboard);
  }

  /** Write plain text with its top-left at (x, y) as one batch. */
  pasteText(text: string, x = 0, y = 0): boolean {
    const ops: DrawOp[] = [];
    const lines = text.replace(/\r\n?/g, "\n").split("\n");
    lines.forEach((line, row) => {
      let col = 0;
      for (const ch of line) {
        if (this.grid.inBounds(x + col, y + row)) {
          ops.push({ x: x + col, y: y + row, cell: createCell(ch) });
        }
        col++;
      }
    });
    if (ops.length === 0) return false;
    this.commit(new DrawBatch(ops, "Paste"));
    return true;
  }

  /** Select a region programmatically. Switches to the select tool. */
  select(selection: Selection | null): void {
    this.setTool("select");
    if (this.tool instanceof SelectTool) this.tool.setSelection(selection);
    this.updateSelection(selection);
  }

  // ─── Output ───────────────────────────────────────────────────────────────

  /** Whether anything was marked dirty since the last `takeDirty`. */
  get hasDirty(): boolean {
    return this.dirty.hasChanges;
  }

  /** What the host must repaint since the last call. Clears the tracker. */
  takeDirty(): DirtyState {
    return this.dirty.flush();
  }

  exportText(options: Partial<ExportOptions> = {}): string {
    return exportGrid(this.grid, options);
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private makeTool(id: ToolId): Tool {
    return createTool(id, { freehandChar: this.freehandChar, eraserSize: this.eraserSize });
  }

  private context(): ToolContext {
    return {
      gridWidth: this.grid.width,
      gridHeight: this.grid.height,
      borderStyle: this._borderStyle,
    };
  }

  private handle(result: ToolResult): void {
    if (result.finished) {
      this.discardPreview();
      this.commitResult(result);
    } else if (result.modified) {
      this.showPreview(result.ops);
    }
  }

  private commitResult(result: ToolResult): void {
    if (result.finished && result.ops.length > 0) {
      this.commit(new DrawBatch(result.ops));
    }
  }

  private commit(command: Command): void {
    this.history.execute(command, this.grid);
    if (command.kind === "draw") {
      this.markOps(command.ops);
    } else {
      this.dirty.requestFull();
    }
    this.emit({ type: "command", command, description: command.description });
    this.emitHistory();
  }

  private showPreview(ops: readonly DrawOp[]): void {
    if (this.tool.previewMode === "replace") {
      this.markOps(this._preview);
      this._preview = [...ops];
    } else {
      this._preview = this._preview.concat(ops);
    }
    this.markOps(ops);
    this.emit({ type: "preview-change", ops: this._preview });
  }

  private discardPreview(): void {
    if (this._preview.length === 0) return;
    this.markOps(this._preview);
    this._preview = [];
    this.emit({ type: "preview-change", ops: this._preview });
  }

  private markOps(ops: readonly DrawOp[]): void {
    for (const op of ops) {
      if (this.grid.inBounds(op.x, op.y)) this.dirty.mark(op.x, op.y);
    }
  }

  private blankOps(selection: Selection): DrawOp[] {
    const { minX, minY, maxX, maxY } = selection.bounds();
    const ops: DrawOp[] = [];
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        if (this.grid.inBounds(x, y)) ops.push(blankOp(x, y));
      }
    }
    return ops;
  }

  /** Relocate the selected cells as one undoable command. */
  private moveContent({ source, dx, dy }: SelectionMove): void {
    const { minX, minY, maxX, maxY } = source.bounds();
    const moved: { x: number; y: number; cell: Cell }[] = [];
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const cell = this.grid.get(x, y);
        if (cell) moved.push({ x: x + dx, y: y + dy, cell });
      }
    }
    const writes = moved.filter((op) => this.grid.inBounds(op.x, op.y));
    this.commit(
      new Composite(
        [new DrawBatch(this.blankOps(source), "Clear selection"), new DrawBatch(writes, "Place selection")],
        "Move selection",
      ),
    );
  }

  private syncSelectTool(): void {
    if (this._toolId !== "select") return;
    this.updateSelection(this.tool.getSelection());
  }

  private updateSelection(selection: Selection | null): void {
    const current = this._selection;
    const same = current === selection || (current !== null && selection !== null && current.equals(selection));
    if (same) return;
    this._selection = selection;
    if (selection === null && this.tool instanceof SelectTool) this.tool.setSelection(null);
    this.emit({ type: "selection-change", selection });
  }

  private emitHistory(): void {
    this.emit({
      type: "history-change",
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
      undoDescription: this.history.undoDescription,
      redoDescription: this.history.redoDescription,
    });
  }

  private emit(payload: SessionEventPayload): void {
    this.dispatchEvent(new SessionEvent(payload));
  }
}
