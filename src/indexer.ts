import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { Chunker } from "./chunker";
import { TOKENIZER_ENCODING } from "./config";
import { IngestionError } from "./errors";
import { extractText } from "./extractors";
import { saveStore, type StoreMeta } from "./persistence";
import type { ChunkRecord, EmbeddedChunk, Embedder } from "./types";

/** A scanned source file with its extracted text. Never persisted. */
export interface SourceDocument {
  readonly id: string;
  /** Resolved absolute path. */
  readonly path: string;
  readonly text: string;
}

export interface ScanOptions {
  dataDir: string;
  /** Extensions WITHOUT leading dot. */
  allowedExt: readonly string[];
  /** Files whose base name starts with any of these are skipped. */
  excludedPrefixes?: readonly string[];
  /** Folder names pruned anywhere in the tree. */
  excludedFolders?: readonly string[];
  verbose?: boolean;
}

/**
 * Options required to construct an {@link Indexer}. `embedder` must already
 * be initialized.
 */
export interface IndexerOptions extends ScanOptions {
  storeDir: string;
  embedder: Embedder;
  chunkTokens?: number;
  chunkOverlap?: number;
  batchSize?: number;
}

export interface IngestSummary {
  documents: number;
  chunks: number;
  meta: StoreMeta;
}

/**
 * Discover documents under `dataDir`, extract their text, and drop files
 * that are excluded by prefix or whose text is empty after trimming. Output
 * is sorted by path so chunk order is reproducible across runs.
 */
export async function scanDocuments(opts: ScanOptions): Promise<SourceDocument[]> {
  const root = path.resolve(opts.dataDir);
  const st = await fs.stat(root).catch((e: unknown) => {
    throw new IngestionError(`Data directory ${root} is not readable`, { cause: e });
  });
  if (!st.isDirectory()) throw new IngestionError(`Data directory ${root} is not a directory`);

  const patterns = opts.allowedExt.map((ext) => `**/*.${ext}`);
  const ignore = (opts.excludedFolders ?? []).map((f) => `**/${f}/**`);
  const files = await fg(patterns, {
    cwd: root,
    dot: false,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    ignore,
  });
  files.sort();

  const prefixes = opts.excludedPrefixes ?? [];
  const docs: SourceDocument[] = [];
  for (const abs of files) {
    const name = path.basename(abs);
    if (prefixes.some((p) => name.startsWith(p))) {
      if (opts.verbose) console.error(`[INGEST][verbose] Skipping excluded document ${name}`);
      continue;
    }
    const text = await extractText(abs, opts.verbose);
    if (!text.trim()) {
      console.error(`[INGEST] Skipping ${name}: no extractable text`);
      continue;
    }
    docs.push({ id: randomUUID(), path: abs, text });
  }
  return docs;
}

/**
 * Offline ingestion: scan → chunk → embed (batched, order-preserving) →
 * persist. A run either writes a complete store or nothing.
 */
export class Indexer {
  private readonly opts: IndexerOptions;
  private readonly chunker: Chunker;
  private readonly batchSize: number;

  public constructor(opts: IndexerOptions) {
    this.opts = opts;
    this.chunker = new Chunker({ maxTokens: opts.chunkTokens, overlap: opts.chunkOverlap });
    this.batchSize = Math.max(1, opts.batchSize ?? 32);
  }

  /** Split documents into chunk records, document by document, in token order. */
  public chunkDocuments(docs: readonly SourceDocument[]): ChunkRecord[] {
    const out: ChunkRecord[] = [];
    for (const doc of docs) {
      this.chunker.split(doc.text).forEach((text, i) => {
        out.push({ doc_id: doc.id, source: doc.path, chunk_id: `${doc.id}::${i}`, text });
      });
    }
    return out;
  }

  /** Embed chunk texts in batches; vector i belongs to chunk i. */
  public async embedChunks(chunks: readonly ChunkRecord[]): Promise<EmbeddedChunk[]> {
    const out: EmbeddedChunk[] = [];
    let dim = -1;
    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batch = chunks.slice(start, start + this.batchSize);
      if (this.opts.verbose) {
        const pct = ((start / chunks.length) * 100).toFixed(1);
        console.error(`[INGEST][verbose] Embedding progress: ${start}/${chunks.length} (${pct}%)`);
      }
      const vectors = await this.opts.embedder.embed(batch.map((c) => c.text));
      if (vectors.length !== batch.length) {
        throw new IngestionError(
          `Embedder returned ${vectors.length} vectors for a batch of ${batch.length} chunks`,
        );
      }
      vectors.forEach((vector, i) => {
        if (dim === -1) dim = vector.length;
        if (vector.length !== dim || dim === 0) {
          throw new IngestionError(
            `Embedding width ${vector.length} for ${batch[i].chunk_id} differs from ${dim}`,
          );
        }
        out.push({ chunk: batch[i], vector });
      });
    }
    return out;
  }

  /** Full rebuild of the store; overwrites any existing store on success. */
  public async build(): Promise<IngestSummary> {
    const { dataDir, storeDir, embedder, verbose } = this.opts;
    console.error(`[INGEST] Scanning ${path.resolve(dataDir)} ...`);
    const docs = await scanDocuments(this.opts);
    const chunks = this.chunkDocuments(docs);
    if (chunks.length === 0) {
      throw new IngestionError(
        `No indexable text found under ${path.resolve(dataDir)} (allowed: ${this.opts.allowedExt.join(", ")}). Nothing to index.`,
      );
    }
    console.error(
      `[INGEST] ${docs.length} documents → ${chunks.length} chunks. Generating embeddings with ${embedder.modelName}...`,
    );
    const records = await this.embedChunks(chunks);

    let meta: StoreMeta;
    try {
      meta = await saveStore(storeDir, {
        model: embedder.modelName,
        records,
        chunking: {
          tokenizer: TOKENIZER_ENCODING,
          chunkTokens: this.chunker.maxTokens,
          chunkOverlap: this.chunker.overlap,
        },
        verbose,
      });
    } catch (e) {
      throw new IngestionError(`Failed to write store at ${path.resolve(storeDir)}`, { cause: e });
    }
    console.error(`[INGEST] Saved ${records.length} chunks and embeddings → ${path.resolve(storeDir)}`);
    return { documents: docs.length, chunks: records.length, meta };
  }
}
