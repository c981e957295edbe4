/**
 * SessionHost: drives one EditorSession for one connected client.
 *
 * Raw socket frames go in through `handle`; replies go out through the
 * `send` callback. Bad input is answered with an `error` message and
 * never throws.
 */

import type { DirtyState, ExportOptions } from "@gridsketch/core";
import {
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  EditorSession,
  Grid,
  isVisibleCell,
  onSessionEvent,
} from "@gridsketch/core";
import type { DiagramStore } from "./files.js";
import type { CellPatch, ClientMessage, ServerMessage } from "./protocol.js";
import { parseClientMessage } from "./protocol.js";

export interface SessionHostOptions {
  /** Minimum canvas size for a loaded or new document. */
  width?: number;
  height?: number;
}

interface OpenDocument {
  name: string;
  session: EditorSession;
  unsubscribe: () => void;
}

export class SessionHost {
  private doc: OpenDocument | null = null;
  private readonly width: number;
  private readonly height: number;

  constructor(
    private readonly store: DiagramStore,
    private readonly send: (message: ServerMessage) => void,
    options: SessionHostOptions = {},
  ) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.height = options.height ?? DEFAULT_HEIGHT;
  }

  /** Name of the open document, if any. */
  get documentName(): string | null {
    return this.doc?.name ?? null;
  }

  handle(raw: string): void {
    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      this.send({ type: "error", message: parsed.error });
      return;
    }
    try {
      this.dispatch(parsed.message);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[session] ${parsed.message.type} failed:`, message);
      this.send({ type: "error", message });
    }
  }

  /** Export the open document as plain text, including text still being typed. */
  exportText(options: Partial<ExportOptions> = {}): string | null {
    const doc = this.doc;
    if (!doc) return null;
    if (doc.session.commitPending()) this.sendUpdate(doc);
    return doc.session.exportText(options);
  }

  close(): void {
    if (!this.doc) return;
    this.doc.unsubscribe();
    console.log(`[session] Closed ${this.doc.name}`);
    this.doc = null;
  }

  private dispatch(message: ClientMessage): void {
    if (message.type === "open") {
      this.open(message.name);
      return;
    }

    const doc = this.doc;
    if (!doc) {
      this.send({ type: "error", message: "No document open" });
      return;
    }
    const { session } = doc;

    switch (message.type) {
      case "pointer":
        if (message.phase === "down") session.pointerDown(message.x, message.y);
        else if (message.phase === "move") session.pointerMove(message.x, message.y);
        else session.pointerUp(message.x, message.y);
        break;
      case "key":
        session.keyDown(message);
        break;
      case "tool":
        session.setTool(message.tool);
        break;
      case "undo":
        session.undo();
        break;
      case "redo":
        session.redo();
        break;
      case "clear":
        session.clearCanvas();
        break;
      case "resize":
        session.resize(message.width, message.height);
        break;
      case "save":
        if (session.commitPending()) this.sendUpdate(doc);
        this.store.write(doc.name, session.grid.toString());
        console.log(`[session] Saved ${doc.name}`);
        this.send({ type: "saved", name: doc.name });
        return;
    }
    this.sendUpdate(doc);
  }

  private open(name: string): void {
    const text = this.store.read(name);
    const grid = text === null ? new Grid(this.width, this.height) : Grid.fromString(text, this.width, this.height);

    this.close();
    const session = new EditorSession(grid);
    const unsubscribe = onSessionEvent(session, "command", (e) => {
      console.log(`[session] ${name}: ${e.description}`);
    });
    const doc: OpenDocument = { name, session, unsubscribe };
    this.doc = doc;
    console.log(`[session] Opened ${name} (${grid.width}x${grid.height}${text === null ? ", new" : ""})`);

    this.sendState(doc);
    this.sendCells(doc, session.takeDirty());
  }

  private sendUpdate(doc: OpenDocument): void {
    this.sendState(doc);
    if (doc.session.hasDirty) this.sendCells(doc, doc.session.takeDirty());
  }

  private sendState({ name, session }: OpenDocument): void {
    const sel = session.selection;
    this.send({
      type: "state",
      name,
      tool: session.toolId,
      canUndo: session.canUndo,
      canRedo: session.canRedo,
      selection: sel ? { x1: sel.x1, y1: sel.y1, x2: sel.x2, y2: sel.y2 } : null,
      width: session.grid.width,
      height: session.grid.height,
    });
  }

  /** A full patch lists visible cells only; the client clears first. */
  private sendCells({ session }: OpenDocument, dirty: DirtyState): void {
    const { grid } = session;
    const cells: CellPatch[] = [];
    if (dirty.full) {
      for (const { x, y, cell } of grid.entries()) {
        if (isVisibleCell(cell)) cells.push({ x, y, ch: cell.ch });
      }
    } else {
      const rect = dirty.rect.clone();
      rect.clamp(grid.width, grid.height);
      for (const { x, y } of rect.cells()) {
        cells.push({ x, y, ch: grid.charAt(x, y) });
      }
    }
    const preview = session.preview
      .filter((op) => grid.inBounds(op.x, op.y))
      .map((op) => ({ x: op.x, y: op.y, ch: op.cell.ch }));
    this.send({ type: "cells", full: dirty.full, cells, preview });
  }
}
