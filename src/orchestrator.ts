import { GUARDRAIL_THRESHOLD } from "./config";
import { GenerationTimeoutError, QueryValidationError } from "./errors";
import { applySanitizers } from "./generation";
import { buildPrompt, REFUSAL_ANSWER } from "./prompt";
import { assertQuery, type Retriever } from "./retriever";
import {
  stripText,
  type AnswerResponse,
  type Context,
  type GenerationBackend,
  type PublicContext,
} from "./types";

export interface OrchestratorOptions {
  retriever: Pick<Retriever, "search">;
  backends: Record<string, GenerationBackend>;
  defaultProvider: string;
  /** Deadline for one generation call (default 60000). */
  generationTimeoutMs?: number;
  /** Minimum top-context score required to generate (default 0.55). */
  threshold?: number;
  /** Clock used for `meta.generated_at`. */
  now?: () => Date;
}

/**
 * Run `fn` with an abort signal that fires after `ms`. The returned promise
 * rejects with {@link GenerationTimeoutError} at the deadline even if `fn`
 * ignores its signal.
 */
export async function withDeadline<T>(ms: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new GenerationTimeoutError(ms);
      controller.abort(err);
      reject(err);
    }, ms);
  });
  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Retrieve → guardrail → generate → envelope. The returned response shape is
 * consumed as-is by the HTTP and MCP transports.
 */
export class AnswerOrchestrator {
  private readonly retriever: Pick<Retriever, "search">;
  private readonly backends: Record<string, GenerationBackend>;
  public readonly defaultProvider: string;
  public readonly threshold: number;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  public constructor(opts: OrchestratorOptions) {
    this.retriever = opts.retriever;
    this.backends = opts.backends;
    this.defaultProvider = opts.defaultProvider;
    this.threshold = opts.threshold ?? GUARDRAIL_THRESHOLD;
    this.timeoutMs = opts.generationTimeoutMs ?? 60_000;
    this.now = opts.now ?? (() => new Date());
  }

  public get providers(): string[] {
    return Object.keys(this.backends);
  }

  /** Raw contexts, text included. */
  public async search(query: string, k: number): Promise<Context[]> {
    return this.retriever.search(query, k);
  }

  public async answer(query: string, k: number, provider?: string): Promise<AnswerResponse> {
    const providerName = provider?.trim() || this.defaultProvider;
    assertQuery(query, k);
    const backend = Object.hasOwn(this.backends, providerName)
      ? this.backends[providerName]
      : undefined;
    if (!backend) {
      throw new QueryValidationError(
        `Unknown provider '${providerName}' (available: ${this.providers.join(", ") || "none"})`,
      );
    }

    const contexts = await this.retriever.search(query, k);
    const top = contexts[0]?.score ?? null;

    // Guardrail: if evidence is too weak, don't guess.
    if (top === null || top < this.threshold) {
      return this.envelope(REFUSAL_ANSWER, contexts, k, providerName, true, top);
    }

    const prompt = buildPrompt(query, contexts);
    const raw = await withDeadline(this.timeoutMs, (signal) => backend.generate(prompt, { signal }));
    const answer = applySanitizers(raw, backend.sanitizers);
    return this.envelope(answer, contexts, k, providerName, false, top);
  }

  private envelope(
    answer: string,
    contexts: readonly Context[],
    k: number,
    provider: string,
    refused: boolean,
    topScore: number | null,
  ): AnswerResponse {
    const publicContexts: PublicContext[] = contexts.map(stripText);
    return {
      answer,
      contexts: publicContexts,
      meta: {
        k,
        provider,
        generated_at: this.now().toISOString(),
        refused,
        top_score: topScore,
        threshold: this.threshold,
      },
    };
  }
}
