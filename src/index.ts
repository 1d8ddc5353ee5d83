#!/usr/bin/env node
/**
 * Finance Analytics MCP Server
 *
 * MCP server over a local SQLite ledger: record transactions, then ask for
 * trends, anomalies, projections, health scores, and monthly summaries.
 * Supports dual transport: stdio (desktop MCP clients) and HTTP.
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local
 *   node dist/index.js --transport http    # Remote (HTTP server on port 3200)
 */

import "dotenv/config";
import crypto from "node:crypto";
import { loadConfig } from "./config.js";
import logger from "./logger.js";
import { SERVER_NAME, SERVER_VERSION, createMcpServer } from "./mcp/server.js";
import { closeLedgerStore, initLedgerStore } from "./ledger/store.js";

const config = loadConfig();
logger.level = config.logLevel;

initLedgerStore(config.dbPath);
logger.info({ dbPath: config.dbPath }, "Ledger store ready");

const context = { analytics: config.analytics, logger };

if (config.server.transport === "stdio") {
  await startStdio();
} else {
  await startHttp();
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const { StdioServerTransport } = await import(
    "@modelcontextprotocol/sdk/server/stdio.js"
  );

  const server = createMcpServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server connected over stdio");

  process.on("SIGINT", () => {
    server
      .close()
      .catch((err: unknown) => logger.error({ err }, "Failed to close MCP server"))
      .finally(() => {
        closeLedgerStore();
        process.exit(0);
      });
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp() {
  const { Hono } = await import("hono");
  const { cors } = await import("hono/cors");
  const { serve } = await import("@hono/node-server");
  const { JSONRPCMessageSchema } = await import("@modelcontextprotocol/sdk/types.js");
  const { HttpTransport } = await import("./mcp/transport.js");
  const { auditLog } = await import("./middleware/audit.js");

  const app = new Hono();

  // ── Middleware ──
  app.use(auditLog(logger));
  app.use(
    cors({
      origin: config.server.corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Mcp-Session-Id"],
      exposeHeaders: ["Mcp-Session-Id"],
    }),
  );

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({
      status: "ok",
      server: SERVER_NAME,
      version: SERVER_VERSION,
    }),
  );

  // ── MCP endpoint (Streamable HTTP) ──
  interface McpSession {
    server: ReturnType<typeof createMcpServer>;
    transport: InstanceType<typeof HttpTransport>;
    lastAccess: number;
  }
  const sessions = new Map<string, McpSession>();

  // Drop sessions idle for 30 minutes, checked every 5 minutes
  const sweeper = setInterval(() => {
    const cutoff = Date.now() - 30 * 60_000;
    for (const [id, session] of sessions) {
      if (session.lastAccess < cutoff) {
        sessions.delete(id);
        session.server
          .close()
          .catch((err: unknown) => logger.warn({ err, sessionId: id }, "Failed to close session"));
      }
    }
  }, 5 * 60_000);
  sweeper.unref();

  app.post("/mcp", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } },
        400,
      );
    }

    const parsed = JSONRPCMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(
        { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid Request" } },
        400,
      );
    }

    const sessionId = c.req.header("mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    let transport: InstanceType<typeof HttpTransport>;
    let newSessionId: string | undefined;

    if (existing) {
      transport = existing.transport;
      existing.lastAccess = Date.now();
    } else {
      newSessionId = crypto.randomUUID();
      const mcpServer = createMcpServer(context);
      transport = new HttpTransport({ requestTimeoutMs: config.server.requestTimeoutMs });
      await mcpServer.connect(transport);
      sessions.set(newSessionId, {
        server: mcpServer,
        transport,
        lastAccess: Date.now(),
      });
      logger.debug({ sessionId: newSessionId }, "MCP session opened");
    }

    const response = await transport.handleJsonRpc(parsed.data);

    const headers: Record<string, string> = {};
    if (newSessionId) {
      headers["mcp-session-id"] = newSessionId;
    }

    if (response === null) {
      return c.body(null, 202, headers);
    }
    return c.json(response, 200, headers);
  });

  // ── Start server ──
  const port = config.server.port;
  const httpServer = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(
      { port: info.port, mcp: "POST /mcp", health: "GET /health" },
      `Finance analytics MCP server listening on http://localhost:${info.port}`,
    );
  });

  process.on("SIGINT", () => {
    clearInterval(sweeper);
    httpServer.close((err) => {
      if (err) logger.error({ err }, "HTTP server closed with error");
      closeLedgerStore();
      process.exit(0);
    });
  });
}
