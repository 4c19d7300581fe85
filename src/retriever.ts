import path from "node:path";
import { QueryValidationError, StoreLoadError } from "./errors";
import { loadStore, type LoadedStore } from "./persistence";
import { CosineIndex } from "./vector-index";
import type { Context, Embedder } from "./types";

export function assertQuery(query: string, k: number): void {
  if (typeof query !== "string" || !query.trim()) {
    throw new QueryValidationError("Missing 'query'");
  }
  if (!Number.isInteger(k) || k < 1) {
    throw new QueryValidationError(`'k' must be an integer >= 1 (got ${k})`);
  }
}

/**
 * Vector similarity search over a loaded store. Owns the chunk list, the
 * matrix and the cosine index for its lifetime; all of them are read-only
 * after construction, so concurrent search() calls need no locking.
 */
export class Retriever {
  private readonly store: LoadedStore;
  private readonly index: CosineIndex;
  private readonly embedder: Embedder;

  public constructor(store: LoadedStore, embedder: Embedder) {
    this.store = store;
    this.embedder = embedder;
    this.index = new CosineIndex(store.records.map((r) => r.vector));
  }

  /**
   * Load the store at `storeDir` and index it. Rejects with
   * {@link StoreLoadError} when artifacts are missing or inconsistent, or were
   * produced by a different embedding model than `embedder`.
   */
  public static async open(
    storeDir: string,
    embedder: Embedder,
    opts: { verbose?: boolean } = {},
  ): Promise<Retriever> {
    const store = await loadStore(storeDir, {
      expectedModel: embedder.modelName,
      verbose: opts.verbose,
    });
    try {
      return new Retriever(store, embedder);
    } catch (e) {
      throw new StoreLoadError(`Failed to index store at ${storeDir}`, { cause: e });
    }
  }

  public get size(): number {
    return this.store.records.length;
  }

  public get dim(): number {
    return this.store.dim;
  }

  public get modelName(): string {
    return this.store.meta.model;
  }

  /**
   * The `min(k, size)` chunks most similar to `query`, by descending cosine
   * similarity. An empty store yields `[]` without embedding the query.
   */
  public async search(query: string, k: number): Promise<Context[]> {
    assertQuery(query, k);
    if (this.size === 0) return [];

    const [qEmb] = await this.embedder.embed([query]);
    return this.index.query(qEmb, k).map(({ index, distance }) => {
      const { chunk } = this.store.records[index];
      return {
        text: chunk.text,
        source: chunk.source,
        title: path.basename(chunk.source),
        score: 1 - distance,
      };
    });
  }
}
