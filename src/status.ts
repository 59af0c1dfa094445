import { APP_VERSION } from "./config";

export type IndexState = "idle" | "loading" | "building" | "ready" | "unavailable";

/** Knowledge index lifecycle and progress counters. */
export interface IndexingStatus {
  state: IndexState;
  /** Passages produced by the chunker (or loaded from disk). */
  passagesTotal: number;
  /** Passages with an embedding so far. */
  passagesEmbedded: number;
  /** Reason for the last `unavailable` transition, if any. */
  lastError?: string;
}

/**
 * Mutable in-memory snapshot of server lifecycle + index progress, served
 * read-only on `/health`.
 */
export interface ServerStatus {
  version: string;
  corpusPath: string;
  embeddingModel: string;
  chatModel: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  startedAt: string;
  indexing: IndexingStatus;
}

/** Single writer for the status snapshot; modules report through its setters. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      corpusPath: initial?.corpusPath ?? "",
      embeddingModel: initial?.embeddingModel ?? "",
      chatModel: initial?.chatModel ?? "",
      transport: initial?.transport ?? "unknown",
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? { state: "idle", passagesTotal: 0, passagesEmbedded: 0 },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModels(embeddingModel: string, chatModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.chatModel = chatModel;
  }

  public setCorpusPath(p: string) {
    this.data.corpusPath = p;
  }

  public setIndexState(state: IndexState, lastError?: string) {
    this.data.indexing.state = state;
    if (state === "unavailable") this.data.indexing.lastError = lastError;
    else if (state === "ready") delete this.data.indexing.lastError;
  }

  /** Record progress of a build (or the totals of a loaded index). */
  public setIndexProgress(embedded: number, total: number) {
    this.data.indexing.passagesEmbedded = embedded;
    this.data.indexing.passagesTotal = total;
  }

  /** Live reference, not a copy. */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Shared by the indexer, the transports and /health.
export const statusManager = new StatusManager();
