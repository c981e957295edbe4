/**
 * WebSocket message shapes between a canvas client and the server.
 * Every message is a JSON object tagged by `type`.
 */

import type { ToolId } from "@gridsketch/core";
import { parseToolId } from "@gridsketch/core";

export type PointerPhase = "down" | "move" | "up";

export type ClientMessage =
  | { type: "open"; name: string }
  | { type: "pointer"; phase: PointerPhase; x: number; y: number }
  | { type: "key"; key: string; ctrl: boolean; shift: boolean; alt: boolean }
  | { type: "tool"; tool: ToolId }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "clear" }
  | { type: "resize"; width: number; height: number }
  | { type: "save" };

export interface CellPatch {
  x: number;
  y: number;
  ch: string;
}

export interface SelectionRect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export type ServerMessage =
  | {
      type: "state";
      name: string;
      tool: ToolId;
      canUndo: boolean;
      canRedo: boolean;
      selection: SelectionRect | null;
      width: number;
      height: number;
    }
  | { type: "cells"; full: boolean; cells: CellPatch[]; preview: CellPatch[] }
  | { type: "saved"; name: string }
  | { type: "file-changed"; name: string }
  | { type: "error"; message: string };

export type ParseResult = { ok: true; message: ClientMessage } | { ok: false; error: string };

const MAX_DIMENSION = 1000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isPointerPhase(value: unknown): value is PointerPhase {
  return value === "down" || value === "move" || value === "up";
}

function flag(value: unknown): boolean {
  return value === true;
}

function fail(error: string): ParseResult {
  return { ok: false, error };
}

/** Parse and validate one raw client frame. Never throws. */
export function parseClientMessage(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return fail("Malformed JSON");
  }
  if (!isRecord(data) || typeof data.type !== "string") {
    return fail("Message must be an object with a type");
  }

  switch (data.type) {
    case "open":
      if (typeof data.name !== "string" || data.name === "") return fail("open needs a name");
      return { ok: true, message: { type: "open", name: data.name } };

    case "pointer":
      if (!isPointerPhase(data.phase)) return fail("pointer phase must be down, move or up");
      if (!isInt(data.x) || !isInt(data.y)) return fail("pointer needs integer x and y");
      return { ok: true, message: { type: "pointer", phase: data.phase, x: data.x, y: data.y } };

    case "key":
      if (typeof data.key !== "string" || data.key === "") return fail("key needs a key");
      return {
        ok: true,
        message: {
          type: "key",
          key: data.key,
          ctrl: flag(data.ctrl),
          shift: flag(data.shift),
          alt: flag(data.alt),
        },
      };

    case "tool": {
      const tool = typeof data.tool === "string" ? parseToolId(data.tool) : undefined;
      if (!tool) return fail(`Unknown tool: ${String(data.tool)}`);
      return { ok: true, message: { type: "tool", tool } };
    }

    case "resize":
      if (!isInt(data.width) || !isInt(data.height)) return fail("resize needs integer width and height");
      if (data.width < 1 || data.height < 1 || data.width > MAX_DIMENSION || data.height > MAX_DIMENSION) {
        return fail(`resize dimensions must be between 1 and ${MAX_DIMENSION}`);
      }
      return { ok: true, message: { type: "resize", width: data.width, height: data.height } };

    case "undo":
      return { ok: true, message: { type: "undo" } };
    case "redo":
      return { ok: true, message: { type: "redo" } };
    case "clear":
      return { ok: true, message: { type: "clear" } };
    case "save":
      return { ok: true, message: { type: "save" } };

    default:
      return fail(`Unknown message type: ${data.type}`);
  }
}
