import path from "node:path";
import type { Config } from "./config";
import { Conversations } from "./conversation";
import { createEmbeddings } from "./embeddings";
import { createBackends } from "./generation";
import { AnswerOrchestrator } from "./orchestrator";
import { Retriever } from "./retriever";
import { StatusManager } from "./status";

/**
 * Everything a request handler needs, built once at startup and passed to
 * the transports. Nothing in here is constructed lazily on first request.
 */
export interface AppContext {
  readonly config: Config;
  readonly orchestrator: AnswerOrchestrator;
  readonly conversations: Conversations;
  readonly status: StatusManager;
}

/**
 * Set up the embedder, load + index the store, and register the generation
 * backends. Rejects (and the process should exit) if the store is missing,
 * corrupt, or was built with another embedding model.
 */
export async function createAppContext(config: Config): Promise<AppContext> {
  const embeddings = createEmbeddings(config);

  const retriever = await Retriever.open(config.STORE_DIR, embeddings, { verbose: config.VERBOSE });
  const orchestrator = new AnswerOrchestrator({
    retriever,
    backends: createBackends(config),
    defaultProvider: config.DEFAULT_PROVIDER,
    generationTimeoutMs: config.GENERATION_TIMEOUT_MS,
  });
  const conversations = new Conversations(orchestrator, { maxSessions: config.MAX_SESSIONS });

  const status = new StatusManager();
  status.markReady({
    storeDir: path.resolve(config.STORE_DIR),
    modelName: retriever.modelName,
    chunks: retriever.size,
    dim: retriever.dim,
  });
  return { config, orchestrator, conversations, status };
}
