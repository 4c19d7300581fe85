import { embedMany, type EmbeddingModel } from "ai";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import type { Config } from "./config";
import { ConfigError, EmbeddingError } from "./errors";
import type { Embedder } from "./types";

export interface EmbeddingsOptions {
  /** Retries for transient endpoint failures (default 2). */
  maxRetries?: number;
}

/**
 * Sentence embeddings from an OpenAI-compatible `/embeddings` endpoint, used
 * both at ingestion time and for queries. The AI SDK splits large inputs into
 * as many requests as the provider allows and keeps output order.
 */
export class Embeddings implements Embedder {
  public readonly modelName: string;
  private readonly model: EmbeddingModel<string>;
  private readonly maxRetries: number;

  public constructor(modelName: string, model: EmbeddingModel<string>, opts: EmbeddingsOptions = {}) {
    this.modelName = modelName;
    this.model = model;
    this.maxRetries = opts.maxRetries ?? 2;
  }

  /**
   * Embed a batch of texts. Output order matches input order.
   *
   * @throws {EmbeddingError} When the endpoint fails or returns a wrong count.
   */
  public async embed(texts: string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    let embeddings: number[][];
    try {
      ({ embeddings } = await embedMany({
        model: this.model,
        values: texts,
        maxRetries: this.maxRetries,
      }));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new EmbeddingError(`Embedding with '${this.modelName}' failed: ${reason}`, { cause: e });
    }
    if (embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding endpoint returned ${embeddings.length} vectors for ${texts.length} inputs`,
      );
    }
    return embeddings.map((v) => Float32Array.from(v));
  }
}

/** Embedder for EMBEDDING_MODEL on the configured endpoint. */
export function createEmbeddings(config: Config): Embeddings {
  if (!config.EMBEDDING_BASE_URL) {
    throw new ConfigError(
      "No embedding endpoint configured. Set EMBEDDING_BASE_URL, LLM_BASE_URL or AZURE_OPENAI_ENDPOINT.",
    );
  }
  const provider = createOpenAICompatible({
    name: "embeddings",
    baseURL: config.EMBEDDING_BASE_URL,
    apiKey: config.EMBEDDING_API_KEY,
  });
  console.error(`[RAG] Embedding model: ${config.EMBEDDING_MODEL} via ${config.EMBEDDING_BASE_URL}`);
  return new Embeddings(config.EMBEDDING_MODEL, provider.textEmbeddingModel(config.EMBEDDING_MODEL));
}
