import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { EmbeddingServiceError } from "./errors";

/**
 * Contract for anything that turns text into fixed-length vectors. Pure from
 * the caller's perspective: the same text always maps to the same vector.
 */
export interface EmbeddingProvider {
  /** Identifier of the underlying model, recorded in persisted indexes. */
  readonly model: string;
  embed(text: string): Promise<Float32Array>;
  /** Batch form; the result is index-aligned with `texts`. */
  embedMany(texts: readonly string[]): Promise<Float32Array[]>;
}

export interface EmbeddingsOptions {
  apiKey: string;
  modelName?: string;
  /** Maximum texts per batch request (provider cap is 100). */
  batchSize?: number;
  timeoutMs?: number;
}

/**
 * Embedding gateway backed by Google's embedding API. The client is created
 * lazily on first use; every failure surfaces as {@link EmbeddingServiceError}.
 */
export class Embeddings implements EmbeddingProvider {
  public readonly model: string;
  private readonly apiKey: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private embedder: GenerativeModel | null = null;

  public constructor(opts: EmbeddingsOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.modelName?.trim() || "text-embedding-004";
    this.batchSize = Math.max(1, Math.min(100, opts.batchSize ?? 100));
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  /** Lazily create the model client (idempotent). */
  public init(): GenerativeModel {
    if (this.embedder) return this.embedder;
    if (!this.apiKey) throw new EmbeddingServiceError("GOOGLE_API_KEY is not configured");
    const genAI = new GoogleGenerativeAI(this.apiKey);
    this.embedder = genAI.getGenerativeModel({ model: this.model }, { timeout: this.timeoutMs });
    return this.embedder;
  }

  public async embed(text: string): Promise<Float32Array> {
    const model = this.init();
    try {
      const result = await model.embedContent(text);
      return Float32Array.from(result.embedding.values);
    } catch (e) {
      throw new EmbeddingServiceError(`Embedding request failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  public async embedMany(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const model = this.init();
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      let values: number[][];
      try {
        const result = await model.batchEmbedContents({
          requests: batch.map((text) => ({ content: { role: "user", parts: [{ text }] } })),
        });
        values = result.embeddings.map((e) => e.values);
      } catch (e) {
        throw new EmbeddingServiceError(
          `Batch embedding request failed at ${i}/${texts.length}: ${errorMessage(e)}`,
          { cause: e },
        );
      }
      if (values.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Embedding service returned ${values.length} vectors for ${batch.length} inputs`,
        );
      }
      for (const v of values) out.push(Float32Array.from(v));
    }
    return out;
  }
}

/**
 * Cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length.
 *
 * @returns Similarity in range [-1, 1] (0 when either vector is all zeros).
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
