/**
 * HTTP transport.
 *
 * One express application serving:
 *  - POST /rag/answer, POST /rag/followup, DELETE /rag/session/:id,
 *    POST /rag/search : REST surface (see ./rest.ts), CORS enabled.
 *  - POST /mcp    : MCP JSON-RPC requests (initial + subsequent). Body must be JSON.
 *  - GET  /mcp    : MCP streaming / follow-up channel (delegated to transport).
 *  - DELETE /mcp  : Allows the MCP client to request session teardown.
 *  - GET  /health : Readiness, store summary and in-memory metrics.
 *
 * MCP session model:
 *  - A client begins by sending an `initialize` request to POST /mcp WITHOUT an
 *    `mcp-session-id` header; a new transport + MCP Server pair is created and
 *    the generated session id is returned in the response headers.
 *  - Subsequent requests for that session carry the same `mcp-session-id`.
 *  - When the transport closes, the session is evicted from the in-memory map.
 *
 * Environment (via config): HTTP_PORT (default 8000), HOST (default 127.0.0.1),
 * CORS_ORIGINS (default "*"), ALLOWED_HOSTS / ENABLE_DNS_REBINDING_PROTECTION for /mcp.
 */
import express from "express";
import cors from "cors";
import { randomUUID } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { AppContext } from "../context";
import { createRagRouter, errorHandler, requestLogger } from "./rest";

function sessionIdOf(req: express.Request): string | undefined {
  const raw = req.headers["mcp-session-id"];
  return typeof raw === "string" && raw ? raw : undefined;
}

/**
 * Build the express application without binding a port.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 */
export function createHttpApp(ctx: AppContext, createServer: () => Server): express.Express {
  const { config, status } = ctx;
  const app = express();
  app.use(requestLogger(status));
  app.use(express.json({ limit: "2mb" }));

  app.use("/rag", cors({ origin: config.CORS_ORIGINS }), createRagRouter(ctx));

  const defaultAllowedHosts = Array.from(
    new Set<string>([
      "127.0.0.1",
      `127.0.0.1:${config.HTTP_PORT}`,
      "localhost",
      `localhost:${config.HTTP_PORT}`,
      config.HOST,
      `${config.HOST}:${config.HTTP_PORT}`,
    ]),
  );

  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req, res) => {
    const sessionId = sessionIdOf(req);
    let transport: StreamableHTTPServerTransport | undefined = sessionId
      ? transports[sessionId]
      : undefined;

    // Session creation path: only when no header AND the body is a valid initialize request.
    if (!transport && !sessionId && isInitializeRequest(req.body)) {
      const created = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid: string) => {
          transports[sid] = created;
        },
        enableDnsRebindingProtection:
          (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
        allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
          .split(",")
          .map((s) => s.trim())
          .filter(Boolean),
      });

      const server = createServer();
      let closing = false;
      created.onclose = () => {
        if (closing) return; // Idempotent guard to avoid recursion.
        closing = true;
        if (created.sessionId) delete transports[created.sessionId];
        // Detach before server.close(), which closes the transport again.
        created.onclose = undefined;
        server.close().catch((e: unknown) => console.error("[HTTP] MCP server close failed:", e));
      };
      await server.connect(created);
      transport = created;
    }

    if (!transport) {
      res.status(400).json({
        jsonrpc: "2.0",
        error: { code: -32000, message: "Bad Request: No valid session ID provided" },
        id: null,
      });
      return;
    }

    await transport.handleRequest(req, res, req.body);
  });

  /**
   * GET /mcp and DELETE /mcp only make sense for an existing session.
   */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    const s = status.getStatus();
    res.json({ ok: s.ready, ...s });
  });

  app.use(errorHandler(status));
  return app;
}

/**
 * Bind the HTTP application.
 *
 * @returns Resolves with the listening server once the port is bound.
 */
export async function startHttpTransport(
  ctx: AppContext,
  createServer: () => Server,
): Promise<HttpServer> {
  const app = createHttpApp(ctx, createServer);
  const { HOST: host, HTTP_PORT: port } = ctx.config;
  return new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(port, host, (err?: Error) => {
      if (err) {
        reject(err);
        return;
      }
      console.error(`[HTTP] Listening at http://${host}:${port} (REST: /rag/*, MCP: /mcp)`);
      resolve(server);
    });
  });
}
