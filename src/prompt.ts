import type { Context } from "./types";

/** Returned instead of a generated answer when retrieval evidence is too weak. */
export const REFUSAL_ANSWER = "I couldn’t find a reliable answer in the provided documents.";

/**
 * Grounded answering prompt. Contexts are numbered [1], [2], ... in retrieval
 * order so citations in the answer map back to `contexts[i - 1]`. Only chunk
 * text is interpolated.
 */
export function buildPrompt(query: string, contexts: readonly Pick<Context, "text">[]): string {
  const ctx = contexts.map((c, i) => `[${i + 1}] ${c.text}`).join("\n\n");
  return `You are a helpful assistant. Answer ONLY using the context. If the answer is not in the context, say you don't know.

Question: ${query}

Context:
${ctx}

Requirements:
- Be concise.
- Cite sources like [1], [2] that correspond to the context indices above.`;
}
