/**
 * Application entry point.
 *
 * 1. Load environment configuration (see `getConfig` for every knob).
 * 2. Wire the embedding gateway, knowledge indexer, retriever, completion
 *    service and conversation stores.
 * 3. Start a Model Context Protocol server over either STDIO (default) or
 *    streamable HTTP (MCP_TRANSPORT=http|streamable-http, adds /health).
 *
 * The knowledge index is loaded or built lazily on the first retrieval, so a
 * missing knowledge file only means answers come without context.
 *
 * Exposed tools: chat, list_sessions, get_session, delete_session, search_knowledge.
 */
import { createApp } from "./app";
import { getConfig } from "./config";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();
if (!config.GOOGLE_API_KEY) {
  console.error("[RAG] GOOGLE_API_KEY is not set: retrieval and chat will report errors.");
}

const app = createApp(config);
const factory = () =>
  createServer({
    orchestrator: app.orchestrator,
    retriever: app.retriever,
    stores: app.stores,
    defaultTopK: config.RETRIEVAL_TOP_K,
  });

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(factory);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(factory);
}
