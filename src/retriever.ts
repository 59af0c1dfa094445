import { errorMessage, type EmbeddingProvider } from "./embeddings";
import type { VectorIndex } from "./vector-index";

/** Anything that can hand out the current index (see {@link Indexer}). */
export interface IndexSource {
  getIndex(): Promise<VectorIndex>;
}

export interface RetrieverOptions {
  embeddings: EmbeddingProvider;
  source: IndexSource;
  defaultK?: number;
  verbose?: boolean;
}

/**
 * Best-effort context lookup. Retrieval only enriches the prompt, so every
 * failure (missing index, embedding outage, blank query) yields no passages
 * instead of an error.
 */
export class Retriever {
  private readonly embeddings: EmbeddingProvider;
  private readonly source: IndexSource;
  private readonly defaultK: number;
  private readonly verbose: boolean;

  public constructor(opts: RetrieverOptions) {
    this.embeddings = opts.embeddings;
    this.source = opts.source;
    this.defaultK = opts.defaultK ?? 4;
    this.verbose = !!opts.verbose;
  }

  /** Texts of the top-k passages for `query`, most similar first. */
  public async retrieve(query: string, k = this.defaultK): Promise<string[]> {
    if (!query.trim()) return [];
    try {
      const index = await this.source.getIndex();
      if (index.size === 0) return [];
      const queryVector = await this.embeddings.embed(query);
      const hits = index.search(queryVector, k);
      if (this.verbose) {
        const scores = hits.map((h) => h.score.toFixed(4)).join(", ");
        console.error(`[RAG][verbose] Retrieved ${hits.length} passages (scores: ${scores})`);
      }
      return hits.map((h) => h.passage.text);
    } catch (e) {
      console.error(`[RAG] Retrieval unavailable, continuing without context: ${errorMessage(e)}`);
      return [];
    }
  }
}
