import { randomUUID } from "node:crypto";
import type { CompletionService } from "./completion";
import type { ConversationStore } from "./conversation-store";
import type { Message, Session } from "./types";

export const NEW_CHAT_TITLE = "New Chat";
const TITLE_LENGTH = 30;

/** Minimal retrieval contract the orchestrator needs (see Retriever). */
export interface ContextSource {
  retrieve(query: string, k?: number): Promise<string[]>;
}

/**
 * Per-interaction state threaded explicitly through a chat turn: who is
 * talking and which conversation scope belongs to them.
 */
export interface InteractionContext {
  readonly identity: string;
  readonly store: ConversationStore;
}

export interface ChatTurn {
  session: Session;
  reply: string;
  /** Passages that were placed in the system instruction. */
  context: string[];
}

export interface ChatOrchestratorOptions {
  retriever: ContextSource;
  completion: CompletionService;
  preamble: string;
  verbose?: boolean;
  /** Clock override for tests. */
  now?: () => Date;
}

/**
 * Title of a session: the first user message cut to 30 characters plus an
 * ellipsis, or "New Chat" before any user message.
 */
export function deriveTitle(messages: readonly Message[]): string {
  const first = messages.find((m) => m.role === "user");
  if (!first) return NEW_CHAT_TITLE;
  // Code points, so an emoji at the cut stays whole.
  return `${Array.from(first.content).slice(0, TITLE_LENGTH).join("")}...`;
}

export function buildSystemInstruction(preamble: string, context: readonly string[]): string {
  return `${preamble}\n\nCONTEXT:\n${context.join("\n\n")}`;
}

/**
 * Runs one chat turn: retrieve context, ask the completion service with the
 * prior history, then record both messages. The store is written only after a
 * successful completion, so a failed turn leaves the session as it was.
 */
export class ChatOrchestrator {
  private readonly retriever: ContextSource;
  private readonly completion: CompletionService;
  private readonly preamble: string;
  private readonly verbose: boolean;
  private readonly now: () => Date;

  public constructor(opts: ChatOrchestratorOptions) {
    this.retriever = opts.retriever;
    this.completion = opts.completion;
    this.preamble = opts.preamble;
    this.verbose = !!opts.verbose;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * @param sessionId Existing session to continue; a new one with a fresh id
   *                  is started when omitted or unknown to this identity's store.
   * @throws {CompletionServiceError} Completion failed; nothing was stored.
   * @throws {SessionStoreError} The durable write failed; the store is unchanged.
   */
  public async send(
    ctx: InteractionContext,
    sessionId: string | undefined,
    message: string,
  ): Promise<ChatTurn> {
    const current: Session =
      sessionId && ctx.store.has(sessionId)
        ? ctx.store.get(sessionId)
        : {
            id: randomUUID(),
            title: NEW_CHAT_TITLE,
            messages: [],
            timestamp: this.now().toISOString(),
          };

    const history = current.messages;
    const userMessage: Message = { role: "user", content: message };
    const context = await this.retriever.retrieve(message);
    const systemInstruction = buildSystemInstruction(this.preamble, context);
    if (this.verbose) {
      console.error(
        `[RAG][verbose] ${ctx.identity}: session ${current.id}, ${history.length} prior messages, ${context.length} passages`,
      );
    }

    const reply = await this.completion.complete({ systemInstruction, history, message });

    const messages: Message[] = [...history, userMessage, { role: "assistant", content: reply }];
    const session: Session = {
      id: current.id,
      // Fixed once the first user message exists.
      title: current.title === NEW_CHAT_TITLE ? deriveTitle(messages) : current.title,
      messages,
      timestamp: this.now().toISOString(),
    };
    await ctx.store.upsert(session);
    return { session, reply, context };
  }
}
