/**
 * Serving entry point.
 *
 * High‑level flow:
 * 1. Load environment configuration (.env at the project root or cwd).
 * 2. Build the application context once, before any transport starts:
 *    set up the embedder, load and index the embedding store (built offline
 *    by `npm run ingest`), register the generation backends and the chat
 *    session memory.
 * 3. Start either:
 *      - MCP over STDIO (default): for local editor / agent integration.
 *      - HTTP (TRANSPORT=http|streamable-http): REST routes /rag/answer,
 *        /rag/followup, /rag/session/:id, /rag/search, /health, plus MCP at /mcp.
 *
 * Exposed MCP tools:
 *  - rag_answer : Grounded answer with cited contexts, or a refusal when retrieval is weak.
 *  - rag_search : Raw similarity search results.
 *  - rag_followup / rag_clear : Follow-up questions within a chat session, and forgetting one.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - STORE_DIR              Directory holding embeddings.npy / chunks.jsonl / meta.json (default store).
 *  - EMBEDDING_MODEL        Must match the model recorded in the store (default text-embedding-3-small).
 *  - EMBEDDING_BASE_URL     Embedding endpoint; defaults to the generation endpoint.
 *  - EMBEDDING_API_KEY      Defaults to the generation key.
 *  - DEFAULT_K              Contexts retrieved when a request omits k (default 4).
 *  - DEFAULT_PROVIDER       Provider name for the generation backend (default azure).
 *  - LLM_BASE_URL           OpenAI-compatible base URL; or AZURE_OPENAI_ENDPOINT (+ /openai/v1).
 *  - LLM_API_KEY            Or AZURE_OPENAI_API_KEY.
 *  - LLM_MODEL              Or AZURE_OPENAI_MODEL (default DeepSeek-R1).
 *  - GENERATION_TIMEOUT_MS  Deadline per generation call (default 60000).
 *  - TRANSPORT              'stdio' (default) or 'http'/'streamable-http'.
 *  - HTTP_PORT / HOST       HTTP bind address (default 8000 / 127.0.0.1).
 *  - CORS_ORIGINS           Comma list of allowed origins for /rag routes (default *).
 *  - VERBOSE                '1'/'true'/... for extra logging.
 *  - MAX_SESSIONS           Chat sessions remembered for follow-ups (default 1000).
 */
import { getConfig } from "./config";
import { createAppContext } from "./context";
import { createServer } from "./mcp-server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();

const appCtx = await createAppContext(config).catch((e: unknown) => {
  console.error("[RAG] Startup failed:", e instanceof Error ? e.message : e);
  process.exit(1);
});

if (config.TRANSPORT === "http") {
  appCtx.status.markTransport("http");
  await startHttpTransport(appCtx, () => createServer(appCtx));
} else {
  appCtx.status.markTransport("stdio");
  await startStdioTransport(() => createServer(appCtx));
}
