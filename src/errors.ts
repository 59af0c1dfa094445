/** The knowledge corpus file is missing. Retrieval degrades to "no context". */
export class CorpusNotFoundError extends Error {
  public constructor(public readonly corpusPath: string) {
    super(`Knowledge corpus not found at ${corpusPath}`);
    this.name = "CorpusNotFoundError";
  }
}

/** Transport, quota or timeout failure from the embedding service. */
export class EmbeddingServiceError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingServiceError";
  }
}

/** Neither a persisted index nor a corpus to build one from is available. */
export class IndexUnavailableError extends Error {
  public constructor(message = "Knowledge index unavailable", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexUnavailableError";
  }
}

/** The completion service failed; `rateLimited` marks HTTP 429 / quota signals. */
export class CompletionServiceError extends Error {
  public readonly rateLimited: boolean;

  public constructor(message: string, options?: { cause?: unknown; rateLimited?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = "CompletionServiceError";
    this.rateLimited = options?.rateLimited ?? false;
  }
}

export class SessionNotFoundError extends Error {
  public constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

/** Durable conversation store could not be read or written. */
export class SessionStoreError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionStoreError";
  }
}

/** Readable text for an error surfaced to the user. */
export function describeError(err: unknown): string {
  if (err instanceof CompletionServiceError && err.rateLimited) {
    return "Too many requests! Please wait a moment.";
  }
  if (err instanceof SessionNotFoundError) return `Chat not found: ${err.sessionId}`;
  if (err instanceof SessionStoreError) return `Could not save your chat history: ${err.message}`;
  const message = err instanceof Error ? err.message : String(err);
  return `An error occurred: ${message}`;
}

/** True for a filesystem error meaning "nothing at that path". */
export function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}
