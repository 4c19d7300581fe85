import { APP_VERSION } from "./config";

/** Per-route request counters, updated in place. */
export interface RouteMetrics {
  count: number;
  errors: number;
  totalMs: number;
  maxMs: number;
}

/**
 * In-memory request and answer counters. Reset only by process restart.
 */
export interface Metrics {
  routes: Record<string, RouteMetrics>;
  answers: number;
  refusals: number;
  /** Failures by error kind ("validation", "upstream", "timeout", ...). */
  errorsByKind: Record<string, number>;
}

/**
 * Snapshot of server lifecycle, loaded store and traffic counters, exposed
 * read-only via `GET /health`.
 *
 * ready = true once the store is loaded and the embedding model initialized.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  storeDir: string;
  /** Embedding model the store was built with (empty pre-load). */
  modelName: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  store: { chunks: number; dim: number };
  metrics: Metrics;
}

/**
 * Class wrapper around mutable server status state. One instance lives in
 * the application context; transports record traffic through it.
 */
export class StatusManager {
  /** Internal mutable status object. */
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      storeDir: initial?.storeDir ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      store: initial?.store ?? { chunks: 0, dim: 0 },
      metrics: initial?.metrics ?? { routes: {}, answers: 0, refusals: 0, errorsByKind: {} },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  /** Record the loaded store and flip to ready. */
  public markReady(store: { storeDir: string; modelName: string; chunks: number; dim: number }) {
    this.data.storeDir = store.storeDir;
    this.data.modelName = store.modelName;
    this.data.store = { chunks: store.chunks, dim: store.dim };
    this.data.ready = true;
  }

  /** Count one finished request on `route`. */
  public recordRequest(route: string, durationMs: number, failed: boolean) {
    let m = this.data.metrics.routes[route];
    if (!m) {
      m = { count: 0, errors: 0, totalMs: 0, maxMs: 0 };
      this.data.metrics.routes[route] = m;
    }
    m.count++;
    if (failed) m.errors++;
    m.totalMs += durationMs;
    m.maxMs = Math.max(m.maxMs, durationMs);
  }

  public recordAnswer(refused: boolean) {
    this.data.metrics.answers++;
    if (refused) this.data.metrics.refusals++;
  }

  public recordError(kind: string) {
    const byKind = this.data.metrics.errorsByKind;
    byKind[kind] = (byKind[kind] ?? 0) + 1;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  /** JSON serialization helper (returns underlying object). */
  public toJSON() {
    return this.data;
  }
}
