import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// If a .env exists at the project root (one level above src/), prefer it; otherwise use the cwd.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, falling back to cwd:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

/** Document extensions the extractors understand. */
export const SUPPORTED_EXT = ["txt", "md", "pdf", "docx"] as const;
export type SupportedExt = (typeof SUPPORTED_EXT)[number];

/** Fixed, versioned subword tokenizer used for chunk sizing. */
export const TOKENIZER_ENCODING = "cl100k_base";

/** Top-context similarity below which generation is skipped. */
export const GUARDRAIL_THRESHOLD = 0.55;

export interface Config {
  DATA_DIR: string;
  STORE_DIR: string;
  ALLOWED_EXT: SupportedExt[];
  EXCLUDED_PREFIXES: string[];
  EXCLUDED_FOLDERS: string[];
  CHUNK_TOKENS: number;
  CHUNK_OVERLAP: number;
  EMBEDDING_MODEL: string;
  EMBEDDING_BASE_URL: string | undefined;
  EMBEDDING_API_KEY: string | undefined;
  EMBED_BATCH_SIZE: number;
  DEFAULT_K: number;
  DEFAULT_PROVIDER: string;
  LLM_BASE_URL: string | undefined;
  LLM_API_KEY: string | undefined;
  LLM_MODEL: string;
  LLM_TEMPERATURE: number;
  GENERATION_TIMEOUT_MS: number;
  MAX_SESSIONS: number;
  TRANSPORT: "stdio" | "http";
  HTTP_PORT: number;
  HOST: string;
  CORS_ORIGINS: string | string[];
  VERBOSE: boolean;
}

function isSupportedExt(ext: string): ext is SupportedExt {
  return (SUPPORTED_EXT as readonly string[]).includes(ext);
}

function csv(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function intFrom(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const DATA_DIR = env.DATA_DIR?.trim() || "data";
  const STORE_DIR = env.STORE_DIR?.trim() || "store";

  // Unknown extensions are dropped; extractors only handle SUPPORTED_EXT.
  const ALLOWED_EXT = (() => {
    const requested = csv(env.ALLOWED_EXT)?.map((e) => e.toLowerCase().replace(/^\./, ""));
    if (!requested) return [...SUPPORTED_EXT];
    const kept = requested.filter(isSupportedExt);
    const dropped = requested.filter((e) => !isSupportedExt(e));
    if (dropped.length) {
      console.error(`[RAG] Ignoring unsupported ALLOWED_EXT entries: ${dropped.join(", ")}`);
    }
    return kept.length ? kept : [...SUPPORTED_EXT];
  })();

  // File-name prefixes of meta documents that should not be indexed.
  const EXCLUDED_PREFIXES = csv(env.EXCLUDED_PREFIXES) ?? [];

  // Folder names (not globs) pruned during the corpus scan.
  const EXCLUDED_FOLDERS = csv(env.EXCLUDED_FOLDERS) ?? ["node_modules", ".git", ".cache"];

  // Chunk sizing in tokenizer units. Overlap >= size is clamped by the chunker.
  const CHUNK_TOKENS = intFrom(env.CHUNK_TOKENS, 400, 1, 8000);
  const CHUNK_OVERLAP = intFrom(env.CHUNK_OVERLAP, 60, 0, 8000);

  const DEFAULT_K = intFrom(env.DEFAULT_K, 4, 1, 50);
  const DEFAULT_PROVIDER = env.DEFAULT_PROVIDER?.trim() || "azure";

  // Explicit LLM_* wins; otherwise derive from the Azure AI Foundry variables.
  const LLM_BASE_URL = (() => {
    const explicit = env.LLM_BASE_URL?.trim();
    if (explicit) return explicit.replace(/\/+$/, "");
    const azure = env.AZURE_OPENAI_ENDPOINT?.trim();
    return azure ? `${azure.replace(/\/+$/, "")}/openai/v1` : undefined;
  })();
  const LLM_API_KEY = env.LLM_API_KEY?.trim() || env.AZURE_OPENAI_API_KEY?.trim() || undefined;

  // Embeddings share the generation endpoint unless pointed elsewhere.
  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small";
  const EMBEDDING_BASE_URL = env.EMBEDDING_BASE_URL?.trim().replace(/\/+$/, "") || LLM_BASE_URL;
  const EMBEDDING_API_KEY = env.EMBEDDING_API_KEY?.trim() || LLM_API_KEY;
  const EMBED_BATCH_SIZE = intFrom(env.EMBED_BATCH_SIZE, 32, 1, 1024);
  const LLM_MODEL = env.LLM_MODEL?.trim() || env.AZURE_OPENAI_MODEL?.trim() || "DeepSeek-R1";
  const LLM_TEMPERATURE = (() => {
    const raw = env.LLM_TEMPERATURE?.trim();
    if (!raw) return 0.2;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 && n <= 2 ? n : 0.2;
  })();
  const GENERATION_TIMEOUT_MS = intFrom(env.GENERATION_TIMEOUT_MS, 60_000, 1, 600_000);

  // Chat sessions remembered for follow-ups.
  const MAX_SESSIONS = intFrom(env.MAX_SESSIONS, 1000, 1, 100_000);

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const TRANSPORT = (() => {
    const t = (env.TRANSPORT ?? "").trim().toLowerCase();
    return t === "http" || t === "streamable-http" ? "http" : "stdio";
  })();
  const HTTP_PORT = intFrom(env.HTTP_PORT, 8000, 0, 65535);
  const HOST = env.HOST?.trim() || "127.0.0.1";
  const CORS_ORIGINS = (() => {
    const list = csv(env.CORS_ORIGINS);
    if (!list || list.length === 0 || list.includes("*")) return "*";
    return list;
  })();

  // Verbosity toggle with tolerant truthy parsing (supports several common forms).
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  return {
    DATA_DIR,
    STORE_DIR,
    ALLOWED_EXT,
    EXCLUDED_PREFIXES,
    EXCLUDED_FOLDERS,
    CHUNK_TOKENS,
    CHUNK_OVERLAP,
    EMBEDDING_MODEL,
    EMBEDDING_BASE_URL,
    EMBEDDING_API_KEY,
    EMBED_BATCH_SIZE,
    DEFAULT_K,
    DEFAULT_PROVIDER,
    LLM_BASE_URL,
    LLM_API_KEY,
    LLM_MODEL,
    LLM_TEMPERATURE,
    GENERATION_TIMEOUT_MS,
    MAX_SESSIONS,
    TRANSPORT,
    HTTP_PORT,
    HOST,
    CORS_ORIGINS,
    VERBOSE,
  };
}
