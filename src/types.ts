/**
 * Shared record types for the knowledge index and the conversation store.
 */

/** A contiguous slice of the knowledge corpus stored for retrieval. */
export interface Passage {
  /** Passage text. */
  readonly text: string;
  /** Character offset of the passage start within the corpus. */
  readonly offset: number;
}

/** One search hit: a passage and its cosine similarity to the query. */
export interface ScoredPassage {
  readonly passage: Passage;
  readonly score: number;
}

export type Role = "user" | "assistant";

export interface Message {
  readonly role: Role;
  readonly content: string;
}

/** One multi-turn conversation. `timestamp` is an ISO-8601 string. */
export interface Session {
  readonly id: string;
  readonly title: string;
  readonly messages: readonly Message[];
  readonly timestamp: string;
}

export type SessionSummary = Pick<Session, "id" | "title" | "timestamp">;

/** On-disk shape of one session inside a per-identity history document. */
export interface StoredSession {
  title: string;
  messages: Message[];
  timestamp: string;
}

/** Per-identity history document: session id → stored session. */
export type HistoryDocument = Record<string, StoredSession>;
