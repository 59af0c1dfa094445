import fs from "node:fs/promises";
import path from "node:path";
import { isNotFound, SessionNotFoundError, SessionStoreError } from "./errors";
import { isRecord, writeFileAtomic } from "./persistence";
import type { HistoryDocument, Message, Session, SessionSummary, StoredSession } from "./types";

/** Identity that selects the transient, never-persisted scope. */
export const GUEST_IDENTITY = "Guest";

export function isAnonymous(identity: string | undefined): boolean {
  return !identity?.trim() || identity.trim() === GUEST_IDENTITY;
}

/**
 * Sessions of exactly one identity. Writes replace whole sessions
 * (last writer wins); durable scopes persist after every mutation.
 */
export interface ConversationStore {
  readonly identity: string;
  readonly durable: boolean;
  /** Most recently updated first. */
  listSessions(): SessionSummary[];
  /** @throws {SessionNotFoundError} */
  get(id: string): Session;
  has(id: string): boolean;
  upsert(session: Session): Promise<void>;
  /** Idempotent: deleting an unknown id is a no-op. */
  delete(id: string): Promise<void>;
  persist(): Promise<void>;
  load(): Promise<void>;
}

/** In-memory scope used for anonymous chats; persist/load do nothing. */
export class MemoryConversationStore implements ConversationStore {
  public readonly identity: string;
  public readonly durable: boolean = false;
  protected sessions = new Map<string, Session>();

  public constructor(identity = GUEST_IDENTITY) {
    this.identity = identity;
  }

  public listSessions(): SessionSummary[] {
    const ordered = [...this.sessions.values()].map((s, idx) => ({
      idx,
      at: timeOf(s.timestamp),
      summary: { id: s.id, title: s.title, timestamp: s.timestamp },
    }));
    ordered.sort((a, b) => b.at - a.at || b.idx - a.idx);
    return ordered.map((o) => o.summary);
  }

  public get(id: string): Session {
    const s = this.sessions.get(id);
    if (!s) throw new SessionNotFoundError(id);
    return s;
  }

  public has(id: string): boolean {
    return this.sessions.has(id);
  }

  public async upsert(session: Session): Promise<void> {
    await this.mutate((m) => m.set(session.id, session));
  }

  public async delete(id: string): Promise<void> {
    if (!this.sessions.has(id)) return;
    await this.mutate((m) => m.delete(id));
  }

  public async persist(): Promise<void> {
    /* anonymous scopes are never written */
  }

  public async load(): Promise<void> {
    /* nothing to load */
  }

  /** Apply a change and persist; on failure restore the previous scope. */
  protected async mutate(change: (m: Map<string, Session>) => void): Promise<void> {
    const previous = new Map(this.sessions);
    change(this.sessions);
    try {
      await this.persist();
    } catch (e) {
      this.sessions = previous;
      throw e;
    }
  }
}

/**
 * Durable scope: one JSON document per identity,
 * `{ [sessionId]: { title, messages, timestamp } }`.
 */
export class FileConversationStore extends MemoryConversationStore {
  public override readonly durable = true;
  private readonly filePath: string;

  public constructor(identity: string, dir: string) {
    super(identity);
    this.filePath = historyPath(dir, identity);
  }

  public getFilePath(): string {
    return this.filePath;
  }

  /** @throws {SessionStoreError} When the document cannot be written. */
  public override async persist(): Promise<void> {
    const doc: HistoryDocument = {};
    for (const s of this.sessions.values()) doc[s.id] = toStored(s);
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFileAtomic(this.filePath, JSON.stringify(doc, null, 2));
    } catch (e) {
      throw new SessionStoreError(`Failed to write ${path.basename(this.filePath)}`, { cause: e });
    }
  }

  /**
   * Replace the in-memory scope with the stored document. Malformed entries
   * are moved to a `.quarantine` side file; an unparseable document is
   * renamed aside and the scope starts empty.
   *
   * @throws {SessionStoreError} When the document exists but cannot be read.
   */
  public override async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isNotFound(e)) {
        this.sessions = new Map();
        return;
      }
      throw new SessionStoreError(`Failed to read ${path.basename(this.filePath)}`, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = undefined;
    }
    if (!isRecord(parsed)) {
      const aside = `${this.filePath}.corrupt-${Date.now()}`;
      console.error(`[RAG] Unreadable history for '${this.identity}', moved to ${aside}`);
      await this.moveAside(aside);
      this.sessions = new Map();
      return;
    }

    const sessions = new Map<string, Session>();
    const rejected: Record<string, unknown> = {};
    for (const [id, value] of Object.entries(parsed)) {
      const session = parseStoredSession(id, value);
      if (session) sessions.set(id, session);
      else rejected[id] = value;
    }
    const rejectedCount = Object.keys(rejected).length;
    if (rejectedCount > 0) {
      console.error(
        `[RAG] Quarantined ${rejectedCount} malformed session(s) for '${this.identity}'`,
      );
      await this.quarantine(rejected);
    }
    this.sessions = sessions;
  }

  private async moveAside(target: string): Promise<void> {
    try {
      await fs.rename(this.filePath, target);
    } catch (e) {
      throw new SessionStoreError(`Failed to move aside ${path.basename(this.filePath)}`, {
        cause: e,
      });
    }
  }

  private async quarantine(rejected: Record<string, unknown>): Promise<void> {
    // Outside the history_<id>.json namespace, like `.corrupt-<ms>`.
    const target = `${this.filePath}.quarantine`;
    let existing: Record<string, unknown> = {};
    try {
      const prior: unknown = JSON.parse(await fs.readFile(target, "utf8"));
      if (isRecord(prior)) existing = prior;
    } catch (e) {
      if (!isNotFound(e)) console.error(`[RAG] Replacing unreadable quarantine file ${target}`);
    }
    try {
      await writeFileAtomic(target, JSON.stringify({ ...existing, ...rejected }, null, 2));
    } catch (e) {
      throw new SessionStoreError(`Failed to write ${path.basename(target)}`, { cause: e });
    }
  }
}

/**
 * Hands out conversation scopes strictly by identity. Durable scopes are
 * loaded once and shared within the process; anonymous callers always get a
 * fresh transient scope, which they own.
 */
export class ConversationStoreRegistry {
  private readonly dir: string;
  private readonly durable = new Map<string, Promise<FileConversationStore>>();

  public constructor(dir: string) {
    this.dir = dir;
  }

  public async open(identity: string): Promise<FileConversationStore> {
    const key = identity.trim();
    let pending = this.durable.get(key);
    if (!pending) {
      const store = new FileConversationStore(key, this.dir);
      pending = store.load().then(() => store);
      this.durable.set(key, pending);
      // A failed load must not pin the identity to a broken scope.
      void pending.catch(() => this.durable.delete(key));
    }
    return pending;
  }

  public createAnonymous(): MemoryConversationStore {
    return new MemoryConversationStore(GUEST_IDENTITY);
  }
}

/** File for one identity's history; the identity is encoded so it cannot escape `dir`. */
export function historyPath(dir: string, identity: string): string {
  return path.join(dir, `history_${encodeURIComponent(identity)}.json`);
}

/** Validate one stored entry; null when any field is missing or mistyped. */
export function parseStoredSession(id: string, value: unknown): Session | null {
  if (!id || !isRecord(value)) return null;
  const { title, messages, timestamp } = value;
  if (typeof title !== "string" || typeof timestamp !== "string" || !Array.isArray(messages)) {
    return null;
  }
  const parsedMessages: Message[] = [];
  for (const m of messages) {
    if (!isRecord(m) || typeof m.content !== "string") return null;
    if (m.role !== "user" && m.role !== "assistant") return null;
    parsedMessages.push({ role: m.role, content: m.content });
  }
  return { id, title, messages: parsedMessages, timestamp };
}

function toStored(s: Session): StoredSession {
  return {
    title: s.title,
    messages: s.messages.map((m) => ({ role: m.role, content: m.content })),
    timestamp: s.timestamp,
  };
}

function timeOf(ts: string): number {
  const t = Date.parse(ts);
  return Number.isNaN(t) ? Number.NEGATIVE_INFINITY : t;
}
