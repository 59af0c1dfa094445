import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import {
  isAnonymous,
  type ConversationStore,
  type ConversationStoreRegistry,
} from "./conversation-store";
import {
  CompletionServiceError,
  describeError,
  SessionNotFoundError,
  SessionStoreError,
} from "./errors";
import type { ChatOrchestrator, InteractionContext } from "./orchestrator";
import type { Retriever } from "./retriever";

/** Shared, process-wide collaborators closed over by every server instance. */
export interface ServerDeps {
  orchestrator: ChatOrchestrator;
  retriever: Retriever;
  stores: ConversationStoreRegistry;
  defaultTopK?: number;
}

type ToolArgs = Record<string, unknown>;

const userProperty = {
  type: "string",
  description: "Authenticated username. Omit or use 'Guest' for a temporary, unsaved history.",
} as const;

const sessionIdProperty = {
  type: "string",
  description: "Chat session id (UUID) as returned by chat or list_sessions.",
} as const;

const TOOLS = [
  {
    name: "chat",
    description:
      "Send a message to the knowledge assistant. Answers are grounded in passages retrieved from the knowledge base; the exchange is appended to the session.",
    inputSchema: {
      type: "object" as const,
      properties: {
        user: userProperty,
        session_id: {
          ...sessionIdProperty,
          description: "Session to continue. Omit to start a new chat.",
        },
        message: { type: "string", description: "The user's question." },
      },
      required: ["message"],
    },
  },
  {
    name: "list_sessions",
    description: "List the user's chat sessions, most recent first.",
    inputSchema: { type: "object" as const, properties: { user: userProperty } },
  },
  {
    name: "get_session",
    description: "Return one chat session with its full message history.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty, session_id: sessionIdProperty },
      required: ["session_id"],
    },
  },
  {
    name: "delete_session",
    description: "Delete a chat session. Deleting an unknown id succeeds.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty, session_id: sessionIdProperty },
      required: ["session_id"],
    },
  },
  {
    name: "search_knowledge",
    description: "Semantically search the knowledge base and return the matching passages.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Natural language search query." },
        top_k: {
          type: "number",
          description: "Maximum number of passages to return (1-50). Defaults to 4.",
          minimum: 1,
          maximum: 50,
        },
      },
      required: ["query"],
    },
  },
];

/**
 * Construct a new MCP Server instance with tool handlers. One instance is
 * created per transport session; it owns that connection's anonymous
 * conversation scope, which is discarded with it.
 */
export function createServer(deps: ServerDeps): Server {
  const server = new Server(
    { name: "kb-chat-server", version: APP_VERSION || "0.0.0" },
    { capabilities: { tools: {} } },
  );
  const guestStore = deps.stores.createAnonymous();

  async function contextFor(args: ToolArgs): Promise<InteractionContext> {
    const user = optionalString(args, "user");
    if (user === undefined || isAnonymous(user)) {
      return { identity: guestStore.identity, store: guestStore };
    }
    const store: ConversationStore = await deps.stores.open(user);
    return { identity: store.identity, store };
  }

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const args: ToolArgs = req.params.arguments ?? {};
    try {
      switch (req.params.name) {
        case "chat": {
          const message = requireString(args, "message");
          const sessionId = optionalString(args, "session_id");
          const ctx = await contextFor(args);
          const turn = await deps.orchestrator.send(ctx, sessionId, message);
          return json({ session_id: turn.session.id, title: turn.session.title, reply: turn.reply });
        }
        case "list_sessions": {
          const ctx = await contextFor(args);
          return json({ sessions: ctx.store.listSessions() });
        }
        case "get_session": {
          const sessionId = requireString(args, "session_id");
          const ctx = await contextFor(args);
          return json(ctx.store.get(sessionId));
        }
        case "delete_session": {
          const sessionId = requireString(args, "session_id");
          const ctx = await contextFor(args);
          await ctx.store.delete(sessionId);
          return json({ deleted: sessionId });
        }
        case "search_knowledge": {
          const query = requireString(args, "query");
          const topK = optionalNumber(args, "top_k") ?? deps.defaultTopK ?? 4;
          const k = Math.max(1, Math.min(50, Math.floor(topK)));
          return json({ passages: await deps.retriever.retrieve(query, k) });
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      if (
        e instanceof CompletionServiceError ||
        e instanceof SessionNotFoundError ||
        e instanceof SessionStoreError
      ) {
        console.error(`[RAG] ${req.params.name} failed:`, e);
        return { content: [{ type: "text", text: describeError(e) }], isError: true };
      }
      throw e;
    }
  });

  return server;
}

function json(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function requireString(args: ToolArgs, key: string): string {
  const v = args[key];
  if (typeof v !== "string" || !v.trim()) {
    throw new McpError(ErrorCode.InvalidParams, `Missing or empty '${key}'`);
  }
  return v;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string") throw new McpError(ErrorCode.InvalidParams, `'${key}' must be a string`);
  return v;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new McpError(ErrorCode.InvalidParams, `'${key}' must be a number`);
  }
  return v;
}
