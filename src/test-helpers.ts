import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CompletionRequest, CompletionService } from "./completion";
import type { EmbeddingProvider } from "./embeddings";
import { EmbeddingServiceError } from "./errors";

export const TEST_DIMENSION = 64;

/** Hash a lowercase word into a bucket, so texts sharing words share vector mass. */
function bucket(word: string): number {
  let h = 0;
  for (let i = 0; i < word.length; i++) h = (h * 31 + word.charCodeAt(i)) >>> 0;
  return h % TEST_DIMENSION;
}

export function bagOfWords(text: string): Float32Array {
  const v = new Float32Array(TEST_DIMENSION);
  for (const w of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) v[bucket(w)] += 1;
  return v;
}

/** Deterministic in-process embedder; counts calls so tests can assert batching. */
export class FakeEmbeddings implements EmbeddingProvider {
  public readonly model: string;
  public embedCalls = 0;
  public batchSizes: number[] = [];
  public failWith: Error | null = null;

  public constructor(model = "fake-embedder") {
    this.model = model;
  }

  public async embed(text: string): Promise<Float32Array> {
    this.embedCalls++;
    if (this.failWith) throw this.failWith;
    return bagOfWords(text);
  }

  public async embedMany(texts: readonly string[]): Promise<Float32Array[]> {
    this.batchSizes.push(texts.length);
    if (this.failWith) throw this.failWith;
    return texts.map(bagOfWords);
  }
}

/** Embedder whose every call fails like a service outage. */
export class BrokenEmbeddings implements EmbeddingProvider {
  public readonly model = "broken-embedder";

  public async embed(): Promise<Float32Array> {
    throw new EmbeddingServiceError("service down");
  }

  public async embedMany(): Promise<Float32Array[]> {
    throw new EmbeddingServiceError("service down");
  }
}

/** Completion stub that records requests and echoes the system instruction. */
export class EchoCompletion implements CompletionService {
  public readonly model = "echo";
  public requests: CompletionRequest[] = [];
  public failWith: Error | null = null;

  public async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    return `ECHO: ${request.systemInstruction}`;
  }
}

export async function makeTempDir(prefix = "kb-chat-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
