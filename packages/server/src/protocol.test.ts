import { describe, expect, it } from "vitest";
import { parseClientMessage } from "./protocol.js";

describe("parseClientMessage", () => {
  it("accepts well-formed messages", () => {
    expect(parseClientMessage('{"type":"pointer","phase":"move","x":3,"y":4}')).toEqual({
      ok: true,
      message: { type: "pointer", phase: "move", x: 3, y: 4 },
    });
    expect(parseClientMessage('{"type":"key","key":"z","ctrl":true}')).toEqual({
      ok: true,
      message: { type: "key", key: "z", ctrl: true, shift: false, alt: false },
    });
    expect(parseClientMessage('{"type":"tool","tool":"rect"}')).toEqual({
      ok: true,
      message: { type: "tool", tool: "rectangle" },
    });
    expect(parseClientMessage('{"type":"save"}')).toEqual({ ok: true, message: { type: "save" } });
  });

  it("rejects malformed messages", () => {
    expect(parseClientMessage("[]")).toEqual({ ok: false, error: "Message must be an object with a type" });
    expect(parseClientMessage('{"type":"pointer","phase":"drag","x":1,"y":1}').ok).toBe(false);
    expect(parseClientMessage('{"type":"pointer","phase":"down","x":1.5,"y":1}').ok).toBe(false);
    expect(parseClientMessage('{"type":"open"}').ok).toBe(false);
    expect(parseClientMessage('{"type":"resize","width":0,"height":5}').ok).toBe(false);
    expect(parseClientMessage('{"type":"launch"}')).toEqual({ ok: false, error: "Unknown message type: launch" });
  });
});
