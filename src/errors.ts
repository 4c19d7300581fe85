/**
 * Failure taxonomy shared by ingestion, retrieval and answering.
 *
 * Every error raised by the core carries a `kind` so transports can translate
 * it (HTTP status, MCP error code) without matching on class or message.
 */
export type RagErrorKind = "validation" | "load" | "ingestion" | "upstream" | "timeout" | "config";

export class RagError extends Error {
  public readonly kind: RagErrorKind;

  public constructor(kind: RagErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagError";
    this.kind = kind;
  }
}

/** Client input rejected before any retrieval work (empty query, bad k, unknown provider). */
export class QueryValidationError extends RagError {
  public constructor(message: string) {
    super("validation", message);
    this.name = "QueryValidationError";
  }
}

/** Store artifacts missing, corrupt, inconsistent, or built with another embedding model. */
export class StoreLoadError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("load", message, options);
    this.name = "StoreLoadError";
  }
}

export class IngestionError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("ingestion", message, options);
    this.name = "IngestionError";
  }
}

/** Generation backend failed (transport, auth, malformed reply). */
export class GenerationError extends RagError {
  public readonly provider: string;

  public constructor(provider: string, message: string, options?: { cause?: unknown }) {
    super("upstream", message, options);
    this.name = "GenerationError";
    this.provider = provider;
  }
}

export class GenerationTimeoutError extends RagError {
  public readonly timeoutMs: number;

  public constructor(timeoutMs: number) {
    super("timeout", `Generation did not complete within ${timeoutMs} ms`);
    this.name = "GenerationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends RagError {
  public constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

/** Embedding endpoint failed or answered with the wrong number of vectors. */
export class EmbeddingError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("upstream", message, options);
    this.name = "EmbeddingError";
  }
}

export function isRagError(e: unknown): e is RagError {
  return e instanceof RagError;
}
