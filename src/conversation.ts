import { QueryValidationError } from "./errors";
import type { AnswerOrchestrator } from "./orchestrator";
import { assertQuery } from "./retriever";
import type { AnswerResponse, PublicContext } from "./types";

/** The last exchange remembered for a chat session. */
export interface Turn {
  readonly query: string;
  readonly answer: string;
  readonly contexts: readonly PublicContext[];
}

export interface ConversationOptions {
  /** Sessions kept before the least recently used one is dropped (default 1000). */
  maxSessions?: number;
}

/** Retrieval query for a follow-up: the previous question, then the new one. */
export function followupQuery(previous: Turn, question: string): string {
  return `Previous question: ${previous.query}\nFollow-up: ${question}`;
}

function assertSession(sessionId: string): void {
  if (typeof sessionId !== "string" || !sessionId.trim()) {
    throw new QueryValidationError("Missing 'session_id'");
  }
}

/**
 * Chat sessions on top of the orchestrator. Each session remembers only its
 * last question and answer; a follow-up folds the previous question into the
 * retrieval query. Refusals are remembered like any other answer; failed
 * calls leave the session untouched.
 */
export class Conversations {
  private readonly orchestrator: Pick<AnswerOrchestrator, "answer">;
  private readonly turns = new Map<string, Turn>();
  private readonly maxSessions: number;

  public constructor(orchestrator: Pick<AnswerOrchestrator, "answer">, opts: ConversationOptions = {}) {
    this.orchestrator = orchestrator;
    this.maxSessions = Math.max(1, opts.maxSessions ?? 1000);
  }

  public get size(): number {
    return this.turns.size;
  }

  public lastTurn(sessionId: string): Turn | undefined {
    return this.turns.get(sessionId);
  }

  /** Answer `query` and make it the session's last turn. */
  public async ask(sessionId: string, query: string, k: number, provider?: string): Promise<AnswerResponse> {
    assertSession(sessionId);
    const res = await this.orchestrator.answer(query, k, provider);
    this.remember(sessionId, query, res);
    return res;
  }

  /**
   * Answer `question` in the light of the session's previous question.
   *
   * @throws {QueryValidationError} When the session has no previous turn.
   */
  public async followUp(
    sessionId: string,
    question: string,
    k: number,
    provider?: string,
  ): Promise<AnswerResponse> {
    assertSession(sessionId);
    assertQuery(question, k);
    const previous = this.turns.get(sessionId);
    if (!previous) {
      throw new QueryValidationError(
        `No previous question in session '${sessionId}'. Ask a question first.`,
      );
    }
    const res = await this.orchestrator.answer(followupQuery(previous, question), k, provider);
    this.remember(sessionId, question, res);
    return res;
  }

  /** Forget a session. Returns false when there was nothing to forget. */
  public clear(sessionId: string): boolean {
    return this.turns.delete(sessionId);
  }

  private remember(sessionId: string, query: string, res: AnswerResponse): void {
    // Re-insert so Map order tracks recency.
    this.turns.delete(sessionId);
    this.turns.set(sessionId, { query, answer: res.answer, contexts: res.contexts });
    for (const oldest of this.turns.keys()) {
      if (this.turns.size <= this.maxSessions) break;
      this.turns.delete(oldest);
    }
  }
}
