import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { decodeNpy, encodeNpy, type Matrix } from "./npy";
import { StoreLoadError } from "./errors";
import type { ChunkRecord, EmbeddedChunk } from "./types";

/** File names of the three store artifacts inside a store directory. */
export const STORE_FILES = {
  embeddings: "embeddings.npy",
  chunks: "chunks.jsonl",
  meta: "meta.json",
} as const;

const ChunkRecordSchema = z.object({
  doc_id: z.string(),
  source: z.string(),
  chunk_id: z.string(),
  text: z.string(),
});

const StoreMetaSchema = z.object({
  model: z.string().min(1),
  count: z.number().int().nonnegative(),
  dim: z.number().int().nonnegative().optional(),
  chunk_ids: z.array(z.string()).optional(),
  tokenizer: z.string().optional(),
  chunk_tokens: z.number().int().positive().optional(),
  chunk_overlap: z.number().int().nonnegative().optional(),
  created_at: z.string().optional(),
});

export type StoreMeta = z.infer<typeof StoreMetaSchema>;

/** Chunking parameters recorded alongside the store for diagnostics. */
export interface ChunkingInfo {
  tokenizer: string;
  chunkTokens: number;
  chunkOverlap: number;
}

export interface SaveParams {
  model: string;
  records: readonly EmbeddedChunk[];
  chunking?: ChunkingInfo;
  verbose?: boolean;
}

export interface LoadParams {
  /** When set, a store built with a different embedding model is rejected. */
  expectedModel?: string;
  verbose?: boolean;
}

export interface LoadedStore {
  readonly meta: StoreMeta;
  readonly dim: number;
  readonly records: readonly EmbeddedChunk[];
}

/**
 * Persist records as `embeddings.npy` + `chunks.jsonl` + `meta.json`.
 *
 * Files are written into a staging directory next to `dir` which then
 * replaces `dir`; a failure before the swap leaves any previous store as it was.
 */
export async function saveStore(dir: string, params: SaveParams): Promise<StoreMeta> {
  const { model, records, chunking, verbose } = params;
  const dim = records[0]?.vector.length ?? 0;
  const data = new Float32Array(records.length * dim);
  records.forEach((r, i) => {
    if (r.vector.length !== dim) {
      throw new Error(
        `Vector ${i} (${r.chunk.chunk_id}) has width ${r.vector.length}, expected ${dim}`,
      );
    }
    data.set(r.vector, i * dim);
  });

  const meta: StoreMeta = {
    model,
    count: records.length,
    dim,
    chunk_ids: records.map((r) => r.chunk.chunk_id),
    ...(chunking && {
      tokenizer: chunking.tokenizer,
      chunk_tokens: chunking.chunkTokens,
      chunk_overlap: chunking.chunkOverlap,
    }),
    created_at: new Date().toISOString(),
  };
  const lines = records.map((r) =>
    JSON.stringify({
      doc_id: r.chunk.doc_id,
      source: r.chunk.source,
      chunk_id: r.chunk.chunk_id,
      text: r.chunk.text,
    }),
  );

  const target = path.resolve(dir);
  const staging = `${target}.staging-${randomUUID()}`;
  await fs.mkdir(staging, { recursive: true });
  try {
    await fs.writeFile(
      path.join(staging, STORE_FILES.embeddings),
      encodeNpy({ rows: records.length, cols: dim, data }),
    );
    await fs.writeFile(
      path.join(staging, STORE_FILES.chunks),
      lines.length ? lines.join("\n") + "\n" : "",
      "utf8",
    );
    await fs.writeFile(path.join(staging, STORE_FILES.meta), JSON.stringify(meta, null, 2), "utf8");
    await fs.rm(target, { recursive: true, force: true });
    await fs.rename(staging, target);
  } catch (e) {
    await fs.rm(staging, { recursive: true, force: true });
    throw e;
  }
  if (verbose) console.error(`[INGEST][verbose] Persisted ${records.length} chunks to ${target}`);
  return meta;
}

async function readArtifact(dir: string, name: string): Promise<Buffer> {
  const file = path.join(dir, name);
  try {
    return await fs.readFile(file);
  } catch (e) {
    throw new StoreLoadError(`Cannot read store artifact ${file}`, { cause: e });
  }
}

function parseMeta(raw: Buffer): StoreMeta {
  let json: unknown;
  try {
    json = JSON.parse(raw.toString("utf8"));
  } catch (e) {
    throw new StoreLoadError(`${STORE_FILES.meta} is not valid JSON`, { cause: e });
  }
  const parsed = StoreMetaSchema.safeParse(json);
  if (!parsed.success) {
    throw new StoreLoadError(`${STORE_FILES.meta} is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

function parseChunks(raw: Buffer): ChunkRecord[] {
  const chunks: ChunkRecord[] = [];
  const lines = raw.toString("utf8").split(/\r?\n/);
  lines.forEach((line, i) => {
    if (!line.trim()) return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (e) {
      throw new StoreLoadError(`${STORE_FILES.chunks} line ${i + 1} is not valid JSON`, { cause: e });
    }
    const parsed = ChunkRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreLoadError(
        `${STORE_FILES.chunks} line ${i + 1} is malformed: ${parsed.error.message}`,
      );
    }
    chunks.push(parsed.data);
  });
  return chunks;
}

/**
 * Load and cross-check a store. Throws {@link StoreLoadError} on any missing
 * artifact, malformed content, count/id/width disagreement, or model mismatch.
 */
export async function loadStore(dir: string, params: LoadParams = {}): Promise<LoadedStore> {
  const meta = parseMeta(await readArtifact(dir, STORE_FILES.meta));
  if (params.expectedModel && meta.model !== params.expectedModel) {
    throw new StoreLoadError(
      `Store at ${dir} was built with embedding model '${meta.model}' but the query embedder is '${params.expectedModel}'. Re-run ingestion.`,
    );
  }

  const chunks = parseChunks(await readArtifact(dir, STORE_FILES.chunks));
  let matrix: Matrix;
  try {
    matrix = decodeNpy(await readArtifact(dir, STORE_FILES.embeddings));
  } catch (e) {
    if (e instanceof StoreLoadError) throw e;
    throw new StoreLoadError(`${STORE_FILES.embeddings} is malformed`, { cause: e });
  }

  if (chunks.length !== meta.count || matrix.rows !== meta.count) {
    throw new StoreLoadError(
      `Store count mismatch: meta.count=${meta.count}, chunks=${chunks.length}, embedding rows=${matrix.rows}`,
    );
  }
  if (meta.dim !== undefined && meta.count > 0 && matrix.cols !== meta.dim) {
    throw new StoreLoadError(`Embedding width ${matrix.cols} does not match meta.dim=${meta.dim}`);
  }
  if (meta.chunk_ids) {
    const ids = meta.chunk_ids;
    const drift = chunks.findIndex((c, i) => c.chunk_id !== ids[i]);
    if (ids.length !== chunks.length || drift !== -1) {
      throw new StoreLoadError(
        `Chunk order does not match meta.chunk_ids (first difference at row ${drift === -1 ? ids.length : drift})`,
      );
    }
  }

  const records: EmbeddedChunk[] = chunks.map((chunk, i) => ({
    chunk,
    vector: matrix.data.slice(i * matrix.cols, (i + 1) * matrix.cols),
  }));
  console.error(`[RAG] Loaded store: ${records.length} chunks (model ${meta.model}).`);
  if (params.verbose) console.error(`[RAG][verbose] Loaded from ${path.resolve(dir)}`);
  return { meta, dim: matrix.cols, records };
}
