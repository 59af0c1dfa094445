/**
 * Streamable HTTP transport.
 *
 * Every MCP session gets its own transport and its own Server, and with it
 * its own Guest conversation scope. A session begins with an `initialize`
 * POST that carries no `mcp-session-id`; the id generated for it is returned
 * in the response headers and must accompany every later request. Closing
 * the transport (DELETE /mcp or a dropped stream) forgets the session.
 *
 * Routes: POST /mcp (JSON-RPC), GET /mcp (server-to-client stream),
 * DELETE /mcp (teardown), GET /health (status snapshot plus open sessions).
 *
 * Environment: MCP_PORT (3000), HOST (127.0.0.1), ALLOWED_HOSTS (comma list
 * of host[:port], local-only by default), ENABLE_DNS_REBINDING_PROTECTION
 * ("false" turns the Host check off).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { statusManager } from "../status";

export interface HttpTransportOptions {
  port?: number;
  host?: string;
}

/** Host[:port] pairs accepted when ALLOWED_HOSTS is unset. */
export function defaultAllowedHosts(host: string, port: number): string[] {
  const names = new Set<string>(["127.0.0.1", "localhost", host]);
  return [...names].flatMap((name) => [name, `${name}:${port}`]);
}

function jsonRpcError(res: express.Response, status: number, code: number, message: string) {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

/**
 * Express app routing MCP traffic to per-session transports. Separate from
 * {@link startHttpTransport} so nothing is bound until the caller listens.
 */
export function createHttpApp(createServer: () => Server, opts: Required<HttpTransportOptions>) {
  const allowedHosts = (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts(opts.host, opts.port).join(","))
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  const enableDnsRebindingProtection = process.env.ENABLE_DNS_REBINDING_PROTECTION !== "false";

  const sessions = new Map<string, StreamableHTTPServerTransport>();

  const lookup = (req: express.Request): StreamableHTTPServerTransport | undefined => {
    const id = req.headers["mcp-session-id"];
    return typeof id === "string" ? sessions.get(id) : undefined;
  };

  /** Pair a fresh transport with a fresh Server; registered once initialize succeeds. */
  async function openSession(): Promise<StreamableHTTPServerTransport> {
    const server = createServer();
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: randomUUID,
      onsessioninitialized: (id) => {
        sessions.set(id, transport);
      },
      enableDnsRebindingProtection,
      allowedHosts,
    });
    let closed = false;
    transport.onclose = () => {
      // server.close() closes the transport again; forget the session once.
      if (closed) return;
      closed = true;
      if (transport.sessionId) sessions.delete(transport.sessionId);
      server.close().catch((e: unknown) => console.error("[RAG] Failed to close MCP server:", e));
    };
    await server.connect(transport);
    return transport;
  }

  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.post("/mcp", async (req, res) => {
    try {
      let transport = lookup(req);
      if (!transport && req.headers["mcp-session-id"] === undefined && isInitializeRequest(req.body)) {
        transport = await openSession();
      }
      if (!transport) {
        jsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] HTTP POST error:", err);
      if (!res.headersSent) jsonRpcError(res, 500, -32603, "Internal server error");
    }
  });

  const existingSession = async (req: express.Request, res: express.Response) => {
    const transport = lookup(req);
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[RAG] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };
  app.get("/mcp", existingSession);
  app.delete("/mcp", existingSession);

  app.get("/health", (_req, res) => {
    res.json({ ...statusManager.getStatus(), sessions: sessions.size });
  });

  return app;
}

/** Bind the HTTP listener; resolves once it accepts connections. */
export async function startHttpTransport(createServer: () => Server, opts: HttpTransportOptions = {}) {
  const port = opts.port ?? Number(process.env.MCP_PORT ?? 3000);
  const host = (opts.host ?? process.env.HOST ?? "127.0.0.1").trim();
  const app = createHttpApp(createServer, { port, host });

  await new Promise<void>((resolve, reject) => {
    const listener = app.listen(port, host, () => {
      console.error(`[RAG] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
    listener.once("error", reject);
  });
}
