import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { loadCorpus, splitPassages } from "./chunker";
import type { EmbeddingProvider } from "./embeddings";
import { CorpusNotFoundError, IndexUnavailableError, isNotFound } from "./errors";
import { Persistence } from "./persistence";
import { statusManager, type StatusManager } from "./status";
import { VectorIndex } from "./vector-index";

/**
 * Options required to construct an {@link Indexer}. `verbose` enables
 * per-batch progress logging.
 */
export interface IndexerOptions {
  corpusPath: string; // UTF-8 knowledge file
  storePath: string; // persisted index artifact
  embeddings: EmbeddingProvider;
  chunkSize: number;
  chunkOverlap: number;
  batchSize?: number; // passages per embedding call (default 100)
  verbose?: boolean;
  lockStaleMs?: number; // age after which another process's build lock is ignored
  lockPollMs?: number;
  status?: StatusManager;
}

interface BuildLock {
  release(): Promise<void>;
}

/**
 * Owns the process-wide knowledge index: a lazily initialized,
 * single-assignment cache. The first caller loads the persisted artifact or,
 * failing that, builds one from the corpus; concurrent callers share the same
 * in-flight promise. Across processes a lock file beside the artifact
 * serializes builds, and the artifact itself is only ever replaced by rename.
 *
 * Failures are not cached: a later call retries (e.g. once a corpus appears).
 */
export class Indexer {
  private readonly corpusPath: string;
  private readonly embeddings: EmbeddingProvider;
  private readonly persistence: Persistence;
  private readonly lockPath: string;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly batchSize: number;
  private readonly verbose: boolean;
  private readonly lockStaleMs: number;
  private readonly lockPollMs: number;
  private readonly status: StatusManager;
  private cached: VectorIndex | null = null;
  private pending: Promise<VectorIndex> | null = null;

  public constructor(opts: IndexerOptions) {
    this.corpusPath = opts.corpusPath;
    this.embeddings = opts.embeddings;
    this.persistence = new Persistence(opts.storePath, opts.verbose);
    this.lockPath = `${opts.storePath}.lock`;
    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;
    this.batchSize = opts.batchSize ?? 100;
    this.verbose = !!opts.verbose;
    this.lockStaleMs = opts.lockStaleMs ?? 600_000;
    this.lockPollMs = opts.lockPollMs ?? 250;
    this.status = opts.status ?? statusManager;
  }

  /** Whether an index is currently cached in memory. */
  public isReady(): boolean {
    return this.cached !== null;
  }

  /**
   * Resolve the cached index, loading or building it on first use.
   *
   * @throws {IndexUnavailableError} No persisted index and no corpus.
   * @throws {EmbeddingServiceError} The build could not embed every passage.
   */
  public getIndex(): Promise<VectorIndex> {
    if (this.cached) return Promise.resolve(this.cached);
    if (!this.pending) {
      this.pending = this.loadOrBuild().then(
        (index) => {
          this.cached = index;
          this.pending = null;
          return index;
        },
        (e: unknown) => {
          this.pending = null;
          throw e;
        },
      );
    }
    return this.pending;
  }

  /** Drop the in-memory index so the next {@link getIndex} reloads it. */
  public invalidate(): void {
    this.cached = null;
  }

  /**
   * Build from the corpus regardless of any stored artifact, then atomically
   * replace the artifact and the cached index.
   */
  public async rebuild(): Promise<VectorIndex> {
    const lock = await this.acquireLock();
    try {
      const index = await this.buildFromCorpus(true);
      this.cached = index;
      return index;
    } finally {
      await lock.release();
    }
  }

  private async loadOrBuild(): Promise<VectorIndex> {
    this.status.setIndexState("loading");
    const stored = await this.tryLoad();
    if (stored) return stored;
    const lock = await this.acquireLock();
    try {
      // Another process may have finished a build while we waited for the lock.
      const again = await this.tryLoad();
      if (again) return again;
      return await this.buildFromCorpus(false);
    } finally {
      await lock.release();
    }
  }

  private async tryLoad(): Promise<VectorIndex | null> {
    try {
      const index = await VectorIndex.load(this.persistence, {
        modelName: this.embeddings.model,
        chunkSize: this.chunkSize,
        chunkOverlap: this.chunkOverlap,
      });
      this.status.setIndexProgress(index.size, index.size);
      this.status.setIndexState("ready");
      return index;
    } catch (e) {
      if (e instanceof IndexUnavailableError) return null;
      throw e;
    }
  }

  /** @param requireSave Fail when the artifact cannot be written (offline rebuild). */
  private async buildFromCorpus(requireSave: boolean): Promise<VectorIndex> {
    let corpus: string;
    try {
      corpus = await loadCorpus(this.corpusPath);
    } catch (e) {
      if (e instanceof CorpusNotFoundError) {
        this.status.setIndexState("unavailable", e.message);
        throw new IndexUnavailableError(`No persisted index and ${e.message}`, { cause: e });
      }
      throw e;
    }
    const passages = splitPassages(corpus, this.chunkSize, this.chunkOverlap);
    console.error(
      `[RAG] Building index from ${this.corpusPath}: ${passages.length} passages. Generating embeddings...`,
    );
    this.status.setIndexState("building");
    this.status.setIndexProgress(0, passages.length);

    let index: VectorIndex;
    try {
      index = await VectorIndex.build(passages, this.embeddings, {
        chunkSize: this.chunkSize,
        chunkOverlap: this.chunkOverlap,
        batchSize: this.batchSize,
        verbose: this.verbose,
        onProgress: (embedded, total) => this.status.setIndexProgress(embedded, total),
      });
    } catch (e) {
      this.status.setIndexState("unavailable", e instanceof Error ? e.message : String(e));
      throw e;
    }

    try {
      await index.save(this.persistence);
    } catch (e) {
      if (requireSave) throw e;
      // The in-memory index is complete; only reuse across restarts is lost.
      console.error(`[RAG] Failed to save index store:`, e);
    }
    this.status.setIndexState("ready");
    console.error(`[RAG] Embeddings ready.`);
    return index;
  }

  /** Wait for and take the exclusive build lock (stale locks are broken). */
  private async acquireLock(): Promise<BuildLock> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    let announced = false;
    for (;;) {
      try {
        const handle = await fs.open(this.lockPath, "wx");
        try {
          await handle.writeFile(`${process.pid}\n`);
        } finally {
          await handle.close();
        }
        return { release: () => fs.rm(this.lockPath, { force: true }) };
      } catch (e) {
        if (!(e instanceof Error && "code" in e && e.code === "EEXIST")) throw e;
      }
      if (await this.breakStaleLock()) continue;
      if (!announced) {
        console.error(`[RAG] Waiting for another process to finish building the index...`);
        announced = true;
      }
      await sleep(this.lockPollMs);
    }
  }

  private async breakStaleLock(): Promise<boolean> {
    let judged: Stats;
    try {
      judged = await fs.stat(this.lockPath);
    } catch (e) {
      // Lock vanished between open and stat: retry immediately.
      if (isNotFound(e)) return true;
      throw e;
    }
    if (Date.now() - judged.mtimeMs < this.lockStaleMs) return false;
    return removeLockIfUnchanged(this.lockPath, judged);
  }
}

/**
 * Remove the lock at `lockPath` only if it is still the file described by
 * `judged` (same inode and mtime). The lock is first renamed aside, which
 * only one process can do; if what was taken turns out to be a newer lock,
 * it is linked back without replacing anything created since.
 *
 * @returns Whether the caller should try to take the lock again.
 */
export async function removeLockIfUnchanged(lockPath: string, judged: Stats): Promise<boolean> {
  const aside = `${lockPath}.${process.pid}.${Date.now()}.stale`;
  try {
    await fs.rename(lockPath, aside);
  } catch (e) {
    if (isNotFound(e)) return true;
    throw e;
  }
  try {
    const taken = await fs.stat(aside);
    if (taken.ino === judged.ino && taken.mtimeMs === judged.mtimeMs) {
      console.error(`[RAG] Removed stale build lock ${lockPath}`);
      return true;
    }
    try {
      await fs.link(aside, lockPath);
    } catch (e) {
      if (!(e instanceof Error && "code" in e && e.code === "EEXIST")) throw e;
    }
    return false;
  } finally {
    await fs.rm(aside, { force: true });
  }
}
