import { once } from "node:events";
import fs from "node:fs";
import type { Server } from "node:http";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";
import { exportOptionsFrom, startServer } from "./index.js";
import type { ServerMessage } from "./protocol.js";

let dir: string;
let server: Server;
let base: string;
let clients: WebSocket[];
let rawSockets: net.Socket[];

function portOf(s: Server): number {
  const addr = s.address();
  if (!addr || typeof addr === "string") throw new Error("Server is not listening on a port");
  return addr.port;
}

function write(rel: string, text: string): void {
  const file = path.join(dir, rel);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text, "utf-8");
}

async function connect(): Promise<{ socket: WebSocket; messages: ServerMessage[] }> {
  const socket = new WebSocket(`ws://127.0.0.1:${portOf(server)}/ws`);
  const messages: ServerMessage[] = [];
  socket.on("message", (data) => {
    const message: ServerMessage = JSON.parse(data.toString());
    messages.push(message);
  });
  clients.push(socket);
  await once(socket, "open");
  return { socket, messages };
}

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "gridsketch-server-"));
  clients = [];
  rawSockets = [];
  server = startServer({ targetDir: dir, port: 0 });
  await once(server, "listening");
  base = `http://127.0.0.1:${portOf(server)}`;
});

afterEach(async () => {
  for (const client of clients) client.terminate();
  for (const socket of rawSockets) socket.destroy();
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("exportOptionsFrom", () => {
  it("reads flags and a width from the query", () => {
    expect(exportOptionsFrom({ trim: "0", lineNumbers: "1", maxWidth: "12" })).toEqual({
      trimBorders: false,
      lineNumbers: true,
      maxWidth: 12,
    });
    expect(exportOptionsFrom({ trim: "yes", lineNumbers: "false" })).toEqual({
      trimBorders: true,
      lineNumbers: false,
    });
  });

  it("ignores negative or non-numeric widths and non-string values", () => {
    expect(exportOptionsFrom({ maxWidth: "-3" })).toEqual({});
    expect(exportOptionsFrom({ maxWidth: "wide" })).toEqual({});
    expect(exportOptionsFrom({ trim: ["0"] })).toEqual({});
  });
});

describe("startServer REST routes", () => {
  it("logs the port it actually bound", () => {
    expect(console.log).toHaveBeenCalledWith(`[server] Running on http://localhost:${portOf(server)}`);
  });

  it("lists text files", async () => {
    write("a.txt", "");
    write("sub/b.txt", "");
    write("notes.md", "");
    const res = await fetch(`${base}/files`);
    expect(await res.json()).toEqual(["a.txt", "sub/b.txt"]);
  });

  it("reads a file as plain text", async () => {
    write("a.txt", "hello\n");
    const res = await fetch(`${base}/file/a.txt`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^text\/plain/);
    expect(await res.text()).toBe("hello\n");
  });

  it("answers 404 for a missing file", async () => {
    const res = await fetch(`${base}/file/missing.txt`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("rejects names that are not text files or escape the directory", async () => {
    write("notes.md", "x");
    const notText = await fetch(`${base}/file/notes.md`);
    expect(notText.status).toBe(400);
    expect(await notText.json()).toEqual({ error: "Invalid filename" });

    const escaping = await fetch(`${base}/file/..%2Fescape.txt`);
    expect(escaping.status).toBe(400);

    const exported = await fetch(`${base}/export/notes.md`);
    expect(exported.status).toBe(400);
  });

  it("requires a text/plain body on PUT", async () => {
    const res = await fetch(`${base}/file/b.txt`, {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text: "hi" }),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Expected a text/plain body" });
    expect(fs.existsSync(path.join(dir, "b.txt"))).toBe(false);
  });

  it("writes a file and tells connected clients", async () => {
    const { messages } = await connect();
    const res = await fetch(`${base}/file/b.txt`, {
      method: "PUT",
      headers: { "Content-Type": "text/plain" },
      body: "box\n",
    });
    expect(await res.json()).toEqual({ ok: true });
    expect(fs.readFileSync(path.join(dir, "b.txt"), "utf-8")).toBe("box\n");
    await vi.waitFor(() => expect(messages).toContainEqual({ type: "file-changed", name: "b.txt" }));
  });

  it("exports a file from disk with query options", async () => {
    write("a.txt", "  hi\n");
    const plain = await fetch(`${base}/export/a.txt`);
    expect(await plain.text()).toBe("hi");
    const numbered = await fetch(`${base}/export/a.txt?lineNumbers=1`);
    expect(await numbered.text()).toBe("   1 | hi");
  });

  it("exports the open session rather than the file on disk", async () => {
    write("a.txt", "hi\n");
    const { socket, messages } = await connect();
    socket.send(JSON.stringify({ type: "open", name: "a.txt" }));
    socket.send(JSON.stringify({ type: "tool", tool: "line" }));
    socket.send(JSON.stringify({ type: "pointer", phase: "down", x: 0, y: 1 }));
    socket.send(JSON.stringify({ type: "pointer", phase: "up", x: 2, y: 1 }));
    await vi.waitFor(() => expect(messages.some((m) => m.type === "cells" && !m.full)).toBe(true));

    const res = await fetch(`${base}/export/a.txt`);
    expect(await res.text()).toBe("hi\n───");
    expect(fs.readFileSync(path.join(dir, "a.txt"), "utf-8")).toBe("hi\n");
  });
});

describe("startServer WebSocket", () => {
  it("stays up after a client sends an invalid frame", async () => {
    const raw = net.connect(portOf(server), "127.0.0.1");
    rawSockets.push(raw);
    await once(raw, "connect");
    raw.write(
      [
        "GET /ws HTTP/1.1",
        "Host: 127.0.0.1",
        "Upgrade: websocket",
        "Connection: Upgrade",
        "Sec-WebSocket-Key: dGVzdC1rZXktMTIzNDU2Nw==",
        "Sec-WebSocket-Version: 13",
        "",
        "",
      ].join("\r\n"),
    );
    const [head] = await once(raw, "data");
    expect(String(head)).toMatch(/^HTTP\/1\.1 101/);

    // Masked text frame, zero mask key, payload ff fe (not UTF-8)
    raw.write(Buffer.from([0x81, 0x82, 0, 0, 0, 0, 0xff, 0xfe]));
    await vi.waitFor(() =>
      expect(console.error).toHaveBeenCalledWith(
        "[ws] Socket error:",
        "Invalid WebSocket frame: invalid UTF-8 sequence",
      ),
    );

    const res = await fetch(`${base}/files`);
    expect(res.status).toBe(200);
  });
});
