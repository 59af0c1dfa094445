import { cosine, type EmbeddingProvider } from "./embeddings";
import { EmbeddingServiceError, IndexUnavailableError } from "./errors";
import { Persistence, type ExpectedMeta, type IndexEntry, type IndexMeta } from "./persistence";
import type { Passage, ScoredPassage } from "./types";

export interface BuildOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** Passages per embedMany call. */
  batchSize?: number;
  verbose?: boolean;
  /** Called after each embedded batch with (embedded, total). */
  onProgress?: (embedded: number, total: number) => void;
}

/**
 * Immutable in-memory semantic index: ordered (passage, vector) pairs searched
 * by exhaustive cosine scan. Instances are only created fully built, so a
 * half-built index is never observable.
 */
export class VectorIndex {
  private readonly entries: readonly IndexEntry[];
  public readonly meta: IndexMeta;

  private constructor(meta: IndexMeta, entries: readonly IndexEntry[]) {
    this.meta = meta;
    this.entries = entries;
  }

  public get size(): number {
    return this.entries.length;
  }

  public get passages(): Passage[] {
    return this.entries.map((e) => e.passage);
  }

  /**
   * Embed every passage (batched) and construct the index. All-or-nothing:
   * any embedding failure rejects and no index is produced.
   *
   * @throws {EmbeddingServiceError} On service failure or inconsistent vectors.
   */
  public static async build(
    passages: readonly Passage[],
    embeddings: EmbeddingProvider,
    opts: BuildOptions,
  ): Promise<VectorIndex> {
    const batchSize = Math.max(1, opts.batchSize ?? 100);
    const entries: IndexEntry[] = [];
    let dimension = 0;
    for (let i = 0; i < passages.length; i += batchSize) {
      const batch = passages.slice(i, i + batchSize);
      if (opts.verbose) {
        console.error(`[RAG][verbose] Embedding ${i}/${passages.length}`);
      }
      const vectors = await embeddings.embedMany(batch.map((p) => p.text));
      if (vectors.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Expected ${batch.length} vectors, embedding service returned ${vectors.length}`,
        );
      }
      for (let j = 0; j < batch.length; j++) {
        const vector = vectors[j];
        if (dimension === 0) dimension = vector.length;
        if (vector.length === 0 || vector.length !== dimension) {
          throw new EmbeddingServiceError(
            `Inconsistent embedding dimension ${vector.length} (expected ${dimension}) for passage ${i + j}`,
          );
        }
        entries.push({ passage: batch[j], vector });
      }
      opts.onProgress?.(entries.length, passages.length);
    }
    return new VectorIndex(
      {
        modelName: embeddings.model,
        dimension,
        chunkSize: opts.chunkSize,
        chunkOverlap: opts.chunkOverlap,
      },
      entries,
    );
  }

  /**
   * Top-k passages by descending cosine similarity. Ties keep insertion
   * order; `k` larger than the index returns every entry.
   */
  public search(query: Float32Array, k: number): ScoredPassage[] {
    if (this.entries.length === 0 || k <= 0) return [];
    const scored = this.entries.map((e, idx) => ({ idx, s: cosine(e.vector, query) }));
    scored.sort((a, b) => b.s - a.s || a.idx - b.idx);
    return scored
      .slice(0, Math.floor(k))
      .map((r) => ({ passage: this.entries[r.idx].passage, score: r.s }));
  }

  public async save(location: string | Persistence): Promise<void> {
    const store = typeof location === "string" ? new Persistence(location) : location;
    await store.save({ meta: this.meta, entries: [...this.entries] });
  }

  /**
   * @throws {IndexUnavailableError} When nothing compatible is stored at `location`.
   */
  public static async load(
    location: string | Persistence,
    expected?: ExpectedMeta,
  ): Promise<VectorIndex> {
    const store = typeof location === "string" ? new Persistence(location) : location;
    const snapshot = await store.load(expected);
    if (!snapshot) {
      throw new IndexUnavailableError(`No usable index stored at ${store.getStorePath()}`);
    }
    return new VectorIndex(snapshot.meta, snapshot.entries);
  }
}
