/**
 * Offline index build: `npm run build-index`.
 *
 * Rebuilds the knowledge index from KNOWLEDGE_PATH and atomically replaces the
 * artifact at INDEX_STORE_PATH. A running server picks it up after restart.
 */
import { createApp } from "./app";
import { getConfig } from "./config";
import { errorMessage } from "./embeddings";

const config = getConfig();
const { indexer } = createApp(config);

try {
  console.error(`[RAG] Loading knowledge base from ${config.KNOWLEDGE_PATH}...`);
  const index = await indexer.rebuild();
  console.error(
    `[RAG] Success! ${index.size} passages (dimension ${index.meta.dimension}) saved to ${config.INDEX_STORE_PATH}.`,
  );
} catch (e) {
  console.error(`[RAG] Index build failed: ${errorMessage(e)}`);
  process.exitCode = 1;
}
