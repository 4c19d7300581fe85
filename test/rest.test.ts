import type { Server as HttpServer } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GenerationError } from "../src/errors";
import { createServer } from "../src/mcp-server";
import { REFUSAL_ANSWER } from "../src/prompt";
import { createHttpApp } from "../src/transport/http";
import { translateError } from "../src/transport/rest";
import type { AppContext } from "../src/context";
import type { Context } from "../src/types";
import { ScriptedBackend, testContext } from "./fakes";

const contexts: Context[] = [
  { text: "Attendance is mandatory in Week 2.", source: "/corpus/syllabus.md", title: "syllabus.md", score: 0.61 },
  { text: "Labs start in Week 3.", source: "/corpus/labs.txt", title: "labs.txt", score: 0.3 },
];

describe("HTTP transport", () => {
  let server: HttpServer | undefined;

  async function serve(ctx: AppContext): Promise<string> {
    const app = createHttpApp(ctx, () => createServer(ctx));
    const listening = app.listen(0, "127.0.0.1");
    server = listening;
    await new Promise<void>((resolve) => listening.once("listening", () => resolve()));
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");
    return `http://127.0.0.1:${address.port}`;
  }

  function post(base: string, route: string, body: string, headers: Record<string, string> = {}) {
    return fetch(`${base}${route}`, {
      method: "POST",
      headers: { "content-type": "application/json", ...headers },
      body,
    });
  }

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    const s = server;
    server = undefined;
    if (s) await new Promise<void>((resolve) => s.close(() => resolve()));
  });

  it("answers with the envelope and no chunk text", async () => {
    const base = await serve(testContext(contexts, new ScriptedBackend("Week 2 [1].")));
    const res = await post(base, "/rag/answer", JSON.stringify({ query: "When is attendance mandatory?", k: 2 }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      answer: "Week 2 [1].",
      contexts: [
        { source: "/corpus/syllabus.md", title: "syllabus.md", score: 0.61 },
        { source: "/corpus/labs.txt", title: "labs.txt", score: 0.3 },
      ],
      meta: {
        k: 2,
        provider: "azure",
        generated_at: "2026-01-02T03:04:05.000Z",
        refused: false,
        top_score: 0.61,
        threshold: 0.55,
      },
    });
  });

  it("uses DEFAULT_K when k is omitted", async () => {
    const ctx = testContext(contexts, new ScriptedBackend("ok"), { env: { DEFAULT_K: "1" } });
    const base = await serve(ctx);
    const body = await (await post(base, "/rag/answer", JSON.stringify({ query: "q" }))).json();
    expect(body).toMatchObject({ meta: { k: 1 }, contexts: [{ title: "syllabus.md" }] });
  });

  it("returns a refusal as a normal response", async () => {
    const base = await serve(testContext([], new ScriptedBackend("unused")));
    const res = await post(base, "/rag/answer", JSON.stringify({ query: "q" }));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ answer: REFUSAL_ANSWER, contexts: [], meta: { refused: true } });
  });

  it("maps validation failures to 400", async () => {
    const base = await serve(testContext(contexts, new ScriptedBackend("unused")));

    const missing = await post(base, "/rag/answer", JSON.stringify({}));
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: "Missing 'query'", kind: "validation" });

    const badK = await post(base, "/rag/answer", JSON.stringify({ query: "q", k: 0 }));
    expect(badK.status).toBe(400);
    expect(await badK.json()).toMatchObject({ kind: "validation" });

    const malformed = await post(base, "/rag/answer", "{not json");
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ kind: "validation" });
  });

  it("maps upstream failures to 502 and timeouts to 504", async () => {
    const failing = new ScriptedBackend(async () => {
      throw new GenerationError("azure", "Generation via 'azure' failed: 401 Unauthorized");
    });
    let base = await serve(testContext(contexts, failing));
    const upstream = await post(base, "/rag/answer", JSON.stringify({ query: "q" }));
    expect(upstream.status).toBe(502);
    expect(await upstream.json()).toEqual({
      error: "Generation via 'azure' failed: 401 Unauthorized",
      kind: "upstream",
    });

    await new Promise<void>((resolve) => server?.close(() => resolve()));
    const stuck = new ScriptedBackend(() => new Promise<string>(() => undefined));
    base = await serve(testContext(contexts, stuck, { generationTimeoutMs: 20 }));
    const timeout = await post(base, "/rag/answer", JSON.stringify({ query: "q" }));
    expect(timeout.status).toBe(504);
    expect(await timeout.json()).toEqual({ error: "Generation did not complete within 20 ms", kind: "timeout" });
  });

  it("answers follow-ups within a session and clears it", async () => {
    const backend = new ScriptedBackend("Week 2 [1].");
    const base = await serve(testContext(contexts, backend));

    const first = await post(
      base,
      "/rag/answer",
      JSON.stringify({ query: "When is attendance mandatory?", k: 1, session_id: "chat-1" }),
    );
    expect(first.status).toBe(200);

    const followup = await post(
      base,
      "/rag/followup",
      JSON.stringify({ session_id: "chat-1", query: "And for labs?", k: 1 }),
    );
    expect(followup.status).toBe(200);
    expect(await followup.json()).toMatchObject({ answer: "Week 2 [1].", meta: { k: 1, refused: false } });
    expect(backend.prompts[1]).toContain("Previous question: When is attendance mandatory?\nFollow-up: And for labs?");

    const cleared = await fetch(`${base}/rag/session/chat-1`, { method: "DELETE" });
    expect(await cleared.json()).toEqual({ cleared: true });
    const again = await fetch(`${base}/rag/session/chat-1`, { method: "DELETE" });
    expect(await again.json()).toEqual({ cleared: false });

    const orphan = await post(base, "/rag/followup", JSON.stringify({ session_id: "chat-1", query: "More?" }));
    expect(orphan.status).toBe(400);
    expect(await orphan.json()).toEqual({
      error: "No previous question in session 'chat-1'. Ask a question first.",
      kind: "validation",
    });
  });

  it("strips text from search results unless asked for it", async () => {
    const base = await serve(testContext(contexts, new ScriptedBackend("unused")));

    const plain = await (await post(base, "/rag/search", JSON.stringify({ query: "q", k: 1 }))).json();
    expect(plain).toEqual([{ source: "/corpus/syllabus.md", title: "syllabus.md", score: 0.61 }]);

    const full = await (
      await post(base, "/rag/search", JSON.stringify({ query: "q", k: 1, include_text: true }))
    ).json();
    expect(full).toEqual([contexts[0]]);
  });

  it("sends CORS headers on the REST routes", async () => {
    const base = await serve(testContext(contexts, new ScriptedBackend("ok")));
    const res = await post(base, "/rag/search", JSON.stringify({ query: "q" }), {
      origin: "http://app.test",
    });
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("reports readiness and counters on /health", async () => {
    const ctx = testContext(contexts, new ScriptedBackend("ok"));
    const base = await serve(ctx);
    await post(base, "/rag/answer", JSON.stringify({ query: "q" }));
    await post(base, "/rag/answer", JSON.stringify({}));

    const health = await (await fetch(`${base}/health`)).json();
    expect(health).toMatchObject({
      ok: true,
      ready: true,
      modelName: "test/vocab-embedder",
      store: { chunks: 2, dim: 7 },
      metrics: {
        answers: 1,
        refusals: 0,
        errorsByKind: { validation: 1 },
        routes: { "POST /rag/answer": { count: 2, errors: 1 } },
      },
    });
  });

  it("rejects MCP requests without a session", async () => {
    const base = await serve(testContext(contexts, new ScriptedBackend("ok")));
    const res = await post(base, "/mcp", JSON.stringify({ jsonrpc: "2.0", id: 1, method: "tools/list" }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: -32000 } });
  });
});

describe("translateError", () => {
  it("reports unknown errors as 500 with their name", () => {
    expect(translateError(new TypeError("boom"))).toEqual({
      status: 500,
      body: { error: "boom", kind: "TypeError" },
    });
    expect(translateError("text")).toEqual({ status: 500, body: { error: "text", kind: "Error" } });
  });
});
