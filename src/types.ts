/**
 * Shared chunk / retrieval / answer types used across ingestion, the store,
 * the retriever and the transports. Field names of the persisted and returned
 * shapes are snake_case because they are part of the on-disk and wire format.
 */

/** One line of `chunks.jsonl`. */
export interface ChunkRecord {
  /** UUID of the owning document (generated per ingestion run). */
  readonly doc_id: string;
  /** Resolved path of the owning document. */
  readonly source: string;
  /** `{doc_id}::{sequence_index}` */
  readonly chunk_id: string;
  /** Decoded token slice. */
  readonly text: string;
}

/** A chunk paired with its embedding; the unit the retriever indexes. */
export interface EmbeddedChunk {
  readonly chunk: ChunkRecord;
  readonly vector: Float32Array;
}

/** A retrieval result. */
export interface Context {
  readonly text: string;
  readonly source: string;
  /** Base file name of `source`. */
  readonly title: string;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

/** Context as returned to answer callers: text stripped. */
export type PublicContext = Omit<Context, "text">;

export interface AnswerMeta {
  readonly k: number;
  readonly provider: string;
  /** UTC ISO-8601 with trailing `Z`. */
  readonly generated_at: string;
  /** True when the guardrail suppressed generation. */
  readonly refused: boolean;
  /** Similarity of the best context, null when nothing was retrieved. */
  readonly top_score: number | null;
  readonly threshold: number;
}

export interface AnswerResponse {
  readonly answer: string;
  readonly contexts: PublicContext[];
  readonly meta: AnswerMeta;
}

/**
 * Text embedding model. Implementations must return one vector per input, in
 * input order, all of the same width, deterministically for a given model.
 */
export interface Embedder {
  readonly modelName: string;
  embed(texts: string[]): Promise<Float32Array[]>;
}

export interface GenerateOptions {
  /** Aborted when the caller's deadline expires. */
  signal?: AbortSignal;
}

/** Removes backend-specific scaffolding (e.g. reasoning blocks) from raw output. */
export type OutputSanitizer = (raw: string) => string;

/** A text generation provider plus the post-processing its output needs. */
export interface GenerationBackend {
  readonly provider: string;
  readonly sanitizers: readonly OutputSanitizer[];
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export function stripText(context: Context): PublicContext {
  const { text: _text, ...rest } = context;
  return rest;
}
