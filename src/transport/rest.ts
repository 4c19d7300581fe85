/**
 * REST surface over the orchestrator: `/rag/answer`, `/rag/followup`,
 * `/rag/session/:id`, `/rag/search`, plus the request logger and the error
 * translator shared with the MCP HTTP routes.
 */
import express, { type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { isRagError, QueryValidationError, type RagErrorKind } from "../errors";
import type { StatusManager } from "../status";
import { stripText } from "../types";

const AnswerBody = z.object({
  query: z.string().default(""),
  k: z.coerce.number().int().min(1).max(50).optional(),
  provider: z.string().optional(),
  /** When set, the exchange becomes this session's last turn. */
  session_id: z.string().optional(),
});

const FollowupBody = z.object({
  session_id: z.string().default(""),
  query: z.string().default(""),
  k: z.coerce.number().int().min(1).max(50).optional(),
  provider: z.string().optional(),
});

const SearchBody = z.object({
  query: z.string().default(""),
  k: z.coerce.number().int().min(1).max(50).optional(),
  include_text: z.boolean().optional(),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`);
    throw new QueryValidationError(`Invalid request body (${detail.join("; ")})`);
  }
  return parsed.data;
}

const STATUS_BY_KIND: Record<RagErrorKind, number> = {
  validation: 400,
  timeout: 504,
  upstream: 502,
  load: 503,
  ingestion: 500,
  config: 500,
};

/** Transport-level status code and JSON body for an error. */
export function translateError(err: unknown): {
  status: number;
  body: { error: string; kind: string };
} {
  if (isRagError(err)) {
    return { status: STATUS_BY_KIND[err.kind], body: { error: err.message, kind: err.kind } };
  }
  // body-parser errors (malformed JSON, oversized payload) carry a 4xx status.
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    if (err.status >= 400 && err.status < 500) {
      const message = err instanceof Error ? err.message : "Bad request";
      return { status: err.status, body: { error: message, kind: "validation" } };
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  const kind = err instanceof Error ? err.name : "Error";
  return { status: 500, body: { error: message, kind } };
}

/** One log line + one metrics sample per finished request. */
export function requestLogger(status: StatusManager) {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();
    // Captured up front: mounted routers rewrite req.url while handling.
    const route = `${req.method} ${req.path}`;
    res.on("finish", () => {
      const ms = Number(process.hrtime.bigint() - started) / 1e6;
      status.recordRequest(route, ms, res.statusCode >= 400);
      console.error(`[HTTP] ${route} ${res.statusCode} ${ms.toFixed(1)}ms`);
    });
    next();
  };
}

export function errorHandler(status: StatusManager) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status: code, body } = translateError(err);
    status.recordError(body.kind);
    if (code >= 500) console.error(`[HTTP] ${req.method} ${req.path} failed:`, err);
    if (res.headersSent) return;
    res.status(code).json(body);
  };
}

export function createRagRouter(ctx: AppContext): express.Router {
  const { orchestrator, conversations, status, config } = ctx;
  const router = express.Router();

  router.post("/answer", async (req, res) => {
    const body = parseBody(AnswerBody, req.body);
    const k = body.k ?? config.DEFAULT_K;
    const result =
      body.session_id === undefined
        ? await orchestrator.answer(body.query, k, body.provider)
        : await conversations.ask(body.session_id, body.query, k, body.provider);
    status.recordAnswer(result.meta.refused);
    res.json(result);
  });

  router.post("/followup", async (req, res) => {
    const body = parseBody(FollowupBody, req.body);
    const result = await conversations.followUp(
      body.session_id,
      body.query,
      body.k ?? config.DEFAULT_K,
      body.provider,
    );
    status.recordAnswer(result.meta.refused);
    res.json(result);
  });

  router.delete("/session/:id", (req, res) => {
    res.json({ cleared: conversations.clear(req.params.id) });
  });

  router.post("/search", async (req, res) => {
    const body = parseBody(SearchBody, req.body);
    const contexts = await orchestrator.search(body.query, body.k ?? config.DEFAULT_K);
    // hide chunk text unless asked for it
    res.json(body.include_text ? contexts : contexts.map(stripText));
  });

  return router;
}
