import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import type { AppContext } from "./context";
import { isRagError } from "./errors";
import { stripText } from "./types";

const RagAnswerArgs = z.object({
  query: z.string(),
  k: z.number().int().min(1).max(50).optional(),
  provider: z.string().optional(),
  session_id: z.string().optional(),
});

const RagFollowupArgs = z.object({
  session_id: z.string(),
  query: z.string(),
  k: z.number().int().min(1).max(50).optional(),
  provider: z.string().optional(),
});

const RagClearArgs = z.object({
  session_id: z.string(),
});

const RagSearchArgs = z.object({
  query: z.string(),
  k: z.number().int().min(1).max(50).optional(),
  include_text: z.boolean().optional(),
});

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Map core failures onto MCP error codes; validation is the caller's fault. */
export function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (isRagError(e)) {
    const code = e.kind === "validation" ? ErrorCode.InvalidParams : ErrorCode.InternalError;
    return new McpError(code, e.message, { kind: e.kind });
  }
  return new McpError(ErrorCode.InternalError, e instanceof Error ? e.message : String(e));
}

function jsonContent(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Factory to construct a new MCP Server instance with tool handlers.
 *
 * A fresh server is created per transport session (HTTP mode may host many);
 * the application context, and with it the loaded store, is shared.
 *
 * Tool contracts:
 *  rag_answer
 *    Input:  { query: string, k?: number, provider?: string, session_id?: string }
 *    Output: AnswerResponse JSON ({ answer, contexts[{source,title,score}], meta })
 *  rag_followup
 *    Input:  { session_id: string, query: string, k?: number, provider?: string }
 *    Output: AnswerResponse JSON, retrieved with the session's previous question
 *  rag_clear
 *    Input:  { session_id: string }
 *    Output: { cleared: boolean }
 *  rag_search
 *    Input:  { query: string, k?: number, include_text?: boolean }
 *    Output: Context[] JSON; `text` omitted unless include_text is true
 */
export function createServer(ctx: AppContext): Server {
  const { orchestrator, conversations, status, config } = ctx;
  const server = new Server(
    { name: "corpus-qa-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "rag_answer",
          description:
            "Answer a question from the indexed documents. Returns the answer (or a refusal when the documents do not support one), the cited contexts (source, title, score) and metadata.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Natural language question." },
              k: {
                type: "number",
                description: `Number of contexts to retrieve (1-50). Defaults to ${config.DEFAULT_K}.`,
                minimum: 1,
                maximum: 50,
              },
              provider: {
                type: "string",
                description: `Generation provider. Defaults to '${orchestrator.defaultProvider}'.`,
                enum: orchestrator.providers,
              },
              session_id: {
                type: "string",
                description: "Chat session to remember this question in, for rag_followup.",
              },
            },
            required: ["query"],
          },
        },
        {
          name: "rag_followup",
          description:
            "Ask a follow-up to the previous question of a chat session. Retrieval sees both questions; the response has the same shape as rag_answer.",
          inputSchema: {
            type: "object",
            properties: {
              session_id: { type: "string", description: "Session used in an earlier rag_answer." },
              query: { type: "string", description: "Follow-up question." },
              k: {
                type: "number",
                description: `Number of contexts to retrieve (1-50). Defaults to ${config.DEFAULT_K}.`,
                minimum: 1,
                maximum: 50,
              },
              provider: {
                type: "string",
                description: `Generation provider. Defaults to '${orchestrator.defaultProvider}'.`,
                enum: orchestrator.providers,
              },
            },
            required: ["session_id", "query"],
          },
        },
        {
          name: "rag_clear",
          description: "Forget the conversation history of a chat session.",
          inputSchema: {
            type: "object",
            properties: {
              session_id: { type: "string", description: "Session to clear." },
            },
            required: ["session_id"],
          },
        },
        {
          name: "rag_search",
          description:
            "Semantic search over the indexed documents without generation. Returns contexts ordered by descending similarity.",
          inputSchema: {
            type: "object",
            properties: {
              query: { type: "string", description: "Natural language search query." },
              k: {
                type: "number",
                description: `Maximum number of contexts (1-50). Defaults to ${config.DEFAULT_K}.`,
                minimum: 1,
                maximum: 50,
              },
              include_text: {
                type: "boolean",
                description: "Include the chunk text of each context (default false).",
              },
            },
            required: ["query"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const name = req.params.name;
    const started = Date.now();
    let failed = false;
    try {
      if (name === "rag_answer") {
        const args = parseArgs(RagAnswerArgs, req.params.arguments);
        const k = args.k ?? config.DEFAULT_K;
        const result =
          args.session_id === undefined
            ? await orchestrator.answer(args.query, k, args.provider)
            : await conversations.ask(args.session_id, args.query, k, args.provider);
        status.recordAnswer(result.meta.refused);
        return jsonContent(result);
      }
      if (name === "rag_followup") {
        const args = parseArgs(RagFollowupArgs, req.params.arguments);
        const result = await conversations.followUp(
          args.session_id,
          args.query,
          args.k ?? config.DEFAULT_K,
          args.provider,
        );
        status.recordAnswer(result.meta.refused);
        return jsonContent(result);
      }
      if (name === "rag_clear") {
        const args = parseArgs(RagClearArgs, req.params.arguments);
        return jsonContent({ cleared: conversations.clear(args.session_id) });
      }
      if (name === "rag_search") {
        const args = parseArgs(RagSearchArgs, req.params.arguments);
        const contexts = await orchestrator.search(args.query, args.k ?? config.DEFAULT_K);
        return jsonContent(args.include_text ? contexts : contexts.map(stripText));
      }
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    } catch (e) {
      failed = true;
      const err = toMcpError(e);
      status.recordError(
        isRagError(e) ? e.kind : err.code === ErrorCode.InvalidParams ? "validation" : "internal",
      );
      console.error(`[RAG] Tool ${name} failed:`, err.message);
      throw err;
    } finally {
      status.recordRequest(`mcp:${name}`, Date.now() - started, failed);
    }
  });

  return server;
}
