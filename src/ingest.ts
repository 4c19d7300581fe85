/**
 * Offline ingestion entry point: `npm run ingest`.
 *
 * Scans DATA_DIR (.txt, .md, .pdf, .docx), chunks by tokens (CHUNK_TOKENS /
 * CHUNK_OVERLAP, cl100k_base), embeds with EMBEDDING_MODEL on the configured
 * OpenAI-compatible endpoint and writes embeddings.npy + chunks.jsonl +
 * meta.json to STORE_DIR, replacing any previous store. Exits non-zero, writing nothing, when there is nothing to
 * index.
 */
import { getConfig } from "./config";
import { createEmbeddings } from "./embeddings";
import { isRagError } from "./errors";
import { Indexer } from "./indexer";

const config = getConfig();

try {
  const embeddings = createEmbeddings(config);

  const indexer = new Indexer({
    dataDir: config.DATA_DIR,
    storeDir: config.STORE_DIR,
    allowedExt: config.ALLOWED_EXT,
    excludedPrefixes: config.EXCLUDED_PREFIXES,
    excludedFolders: config.EXCLUDED_FOLDERS,
    embedder: embeddings,
    chunkTokens: config.CHUNK_TOKENS,
    chunkOverlap: config.CHUNK_OVERLAP,
    batchSize: config.EMBED_BATCH_SIZE,
    verbose: config.VERBOSE,
  });
  const summary = await indexer.build();
  console.error(
    `[INGEST] Done: ${summary.documents} documents, ${summary.chunks} chunks, dim ${summary.meta.dim}.`,
  );
} catch (e) {
  if (isRagError(e)) {
    console.error(`[INGEST] ${e.name} (${e.kind}): ${e.message}`);
    if (e.cause) console.error("[INGEST] Cause:", e.cause);
  } else {
    console.error("[INGEST] Unexpected failure:", e);
  }
  process.exit(1);
}
