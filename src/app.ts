import type { CompletionService } from "./completion";
import { GeminiCompletionService } from "./completion";
import type { Config } from "./config";
import { ConversationStoreRegistry } from "./conversation-store";
import { Embeddings, type EmbeddingProvider } from "./embeddings";
import { Indexer } from "./indexer";
import { ChatOrchestrator } from "./orchestrator";
import { Retriever } from "./retriever";
import { statusManager } from "./status";

/** Process-wide collaborators shared by every connection. */
export interface App {
  embeddings: EmbeddingProvider;
  completion: CompletionService;
  indexer: Indexer;
  retriever: Retriever;
  orchestrator: ChatOrchestrator;
  stores: ConversationStoreRegistry;
}

/** Optional overrides, mainly for tests that must not reach the network. */
export interface AppOverrides {
  embeddings?: EmbeddingProvider;
  completion?: CompletionService;
}

export function createApp(config: Config, overrides: AppOverrides = {}): App {
  const embeddings =
    overrides.embeddings ??
    new Embeddings({
      apiKey: config.GOOGLE_API_KEY,
      modelName: config.EMBEDDING_MODEL,
      batchSize: config.EMBED_BATCH_SIZE,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
    });
  const completion =
    overrides.completion ??
    new GeminiCompletionService({
      apiKey: config.GOOGLE_API_KEY,
      model: config.CHAT_MODEL,
      generation: config.GENERATION,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
    });

  statusManager.setCorpusPath(config.KNOWLEDGE_PATH);
  statusManager.setModels(embeddings.model, completion.model);

  const indexer = new Indexer({
    corpusPath: config.KNOWLEDGE_PATH,
    storePath: config.INDEX_STORE_PATH,
    embeddings,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    batchSize: config.EMBED_BATCH_SIZE,
    verbose: config.VERBOSE,
    lockStaleMs: config.INDEX_LOCK_STALE_MS,
  });
  const retriever = new Retriever({
    embeddings,
    source: indexer,
    defaultK: config.RETRIEVAL_TOP_K,
    verbose: config.VERBOSE,
  });
  const orchestrator = new ChatOrchestrator({
    retriever,
    completion,
    preamble: config.SYSTEM_PREAMBLE,
    verbose: config.VERBOSE,
  });
  const stores = new ConversationStoreRegistry(config.HISTORY_DIR);

  return { embeddings, completion, indexer, retriever, orchestrator, stores };
}
