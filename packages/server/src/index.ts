import express from "express";
import fs from "node:fs";
import path from "node:path";
import { createServer } from "node:http";
import type { Server } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { Grid, exportGrid } from "@gridsketch/core";
import type { ExportOptions } from "@gridsketch/core";
import { DirectoryStore, InvalidNameError } from "./files.js";
import type { ServerMessage } from "./protocol.js";
import { SessionHost } from "./session-host.js";

export { DirectoryStore, InvalidNameError, findTxtFiles } from "./files.js";
export type { DiagramStore } from "./files.js";
export { parseClientMessage } from "./protocol.js";
export type { CellPatch, ClientMessage, ServerMessage } from "./protocol.js";
export { SessionHost } from "./session-host.js";

export interface ServerOptions {
  targetDir: string;
  port?: number;
}

/** Parse `?trim=&lineNumbers=&maxWidth=` into export options. */
export function exportOptionsFrom(query: Record<string, unknown>): Partial<ExportOptions> {
  const options: Partial<ExportOptions> = {};
  if (typeof query.trim === "string") options.trimBorders = query.trim !== "false" && query.trim !== "0";
  if (typeof query.lineNumbers === "string") {
    options.lineNumbers = query.lineNumbers === "true" || query.lineNumbers === "1";
  }
  if (typeof query.maxWidth === "string") {
    const maxWidth = Number.parseInt(query.maxWidth, 10);
    if (Number.isFinite(maxWidth) && maxWidth >= 0) options.maxWidth = maxWidth;
  }
  return options;
}

export function startServer(options: ServerOptions): Server {
  const PREFERRED_PORT = options.port ?? (Number(process.env.PORT) || 3001);

  // Validate target directory
  const rawDir = path.resolve(options.targetDir);
  if (!fs.existsSync(rawDir)) {
    throw new Error(`Directory does not exist: ${rawDir}`);
  }
  if (!fs.statSync(rawDir).isDirectory()) {
    throw new Error(`Not a directory: ${rawDir}`);
  }

  const store = new DirectoryStore(rawDir);
  const hosts = new Set<SessionHost>();

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(express.text({ type: "text/plain", limit: "1mb" }));

  // CORS for local dev
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, PUT, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    next();
  });

  /** List all diagram files */
  app.get("/files", (_req, res) => {
    res.json(store.list());
  });

  /** Read a diagram file */
  app.get("/file/:name", (req, res) => {
    if (!store.resolve(req.params.name)) return res.status(400).json({ error: "Invalid filename" });
    const content = store.read(req.params.name);
    if (content === null) return res.status(404).json({ error: "Not found" });
    res.type("text/plain").send(content);
  });

  /** Write a diagram file */
  app.put("/file/:name", (req, res) => {
    const { name } = req.params;
    if (!store.resolve(name)) return res.status(400).json({ error: "Invalid filename" });
    if (typeof req.body !== "string") return res.status(400).json({ error: "Expected a text/plain body" });

    store.write(name, req.body);
    console.log(`[server] Wrote ${name} (${req.body.length} chars)`);
    broadcast({ type: "file-changed", name });
    res.json({ ok: true });
  });

  /** Export a diagram, from its open session when there is one */
  app.get("/export/:name", (req, res) => {
    const { name } = req.params;
    if (!store.resolve(name)) return res.status(400).json({ error: "Invalid filename" });
    const exportOptions = exportOptionsFrom(req.query);

    for (const host of hosts) {
      if (host.documentName !== name) continue;
      const text = host.exportText(exportOptions);
      if (text !== null) return res.type("text/plain").send(text);
    }

    const content = store.read(name);
    if (content === null) return res.status(404).json({ error: "Not found" });
    res.type("text/plain").send(exportGrid(Grid.fromString(content, 0, 0), exportOptions));
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof InvalidNameError) return res.status(400).json({ error: err.message });
    console.error("[server] Request failed:", err);
    res.status(500).json({ error: "Internal error" });
  });

  // --- WebSocket: one editor session per connection ---

  const server = createServer(app);
  const wss = new WebSocketServer({ server, path: "/ws" });

  function broadcast(message: ServerMessage): void {
    const data = JSON.stringify(message);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  }

  wss.on("connection", (socket) => {
    const host = new SessionHost(store, (message) => {
      if (socket.readyState === WebSocket.OPEN) socket.send(JSON.stringify(message));
    });
    hosts.add(host);
    console.log(`[ws] Client connected (${hosts.size} open)`);

    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        socket.send(JSON.stringify({ type: "error", message: "Binary frames are not supported" }));
        return;
      }
      host.handle(data.toString());
    });

    // Protocol violations (bad frames, invalid UTF-8) surface here; ws closes the socket itself
    socket.on("error", (err) => {
      console.error("[ws] Socket error:", err.message);
    });

    socket.on("close", () => {
      host.close();
      hosts.delete(host);
      console.log(`[ws] Client disconnected (${hosts.size} open)`);
    });
  });

  function listeningPort(): number {
    const addr = server.address();
    return typeof addr === "object" && addr ? addr.port : 0;
  }

  function startListening(port: number): void {
    console.log(`[server] Running on http://localhost:${port}`);
    console.log(`[server] Serving diagrams from: ${store.root}`);
  }

  // WSS errors mirror the HTTP server's; those are handled below
  wss.on("error", (err) => {
    console.error("[ws] Server error:", err.message);
  });

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.log(`[server] Port ${PREFERRED_PORT} in use, finding an open port...`);
      server.listen(0, () => {
        startListening(listeningPort());
      });
    } else {
      throw err;
    }
  });

  server.listen(PREFERRED_PORT, () => {
    startListening(listeningPort());
  });

  return server;
}

// When run directly (not imported), parse CLI args and start
const isDirectRun = process.argv[1] &&
  (process.argv[1].endsWith("/index.ts") || process.argv[1].endsWith("/index.js"));

if (isDirectRun) {
  const args = process.argv.slice(2);
  let targetDir = process.cwd();
  let port: number | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--port" && args[i + 1]) {
      port = Number(args[i + 1]);
      i++;
    } else if (!args[i].startsWith("-")) {
      targetDir = path.resolve(args[i]);
    }
  }

  try {
    startServer({ targetDir, port });
  } catch (err) {
    console.error(`[server] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
