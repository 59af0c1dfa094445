import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// Centralized single dotenv.config() call.
// When a project-root .env exists next to src/, prefer it; otherwise use the cwd default.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Failed to resolve project .env, falling back to cwd:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json (empty when unreadable). */
export const APP_VERSION: string = (() => {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const parsed: unknown = JSON.parse(fsSync.readFileSync(pkgPath, "utf8"));
    if (parsed && typeof parsed === "object" && "version" in parsed) {
      return typeof parsed.version === "string" ? parsed.version : "";
    }
  } catch {
    /* version is informational only */
  }
  return "";
})();

export const DEFAULT_PREAMBLE = [
  "You are a helpful and friendly Office Assistant AI.",
  "Answer questions based ONLY on the provided context below.",
  "Keep answers short and professional.",
].join("\n");

export interface GenerationSettings {
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface Config {
  GOOGLE_API_KEY: string;
  KNOWLEDGE_PATH: string;
  INDEX_STORE_PATH: string;
  HISTORY_DIR: string;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  EMBEDDING_MODEL: string;
  EMBED_BATCH_SIZE: number;
  CHAT_MODEL: string;
  GENERATION: GenerationSettings;
  RETRIEVAL_TOP_K: number;
  REQUEST_TIMEOUT_MS: number;
  INDEX_LOCK_STALE_MS: number;
  SYSTEM_PREAMBLE: string;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

function intFrom(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

function floatFrom(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

/**
 * Parse and normalize runtime configuration. Every knob is optional; invalid
 * values fall back to defaults rather than failing startup.
 */
export function getConfig(env: Env = process.env): Config {
  // Key is optional at parse time: without it retrieval degrades and chat reports the failure.
  const GOOGLE_API_KEY = env.GOOGLE_API_KEY?.trim() || env.GEMINI_API_KEY?.trim() || "";

  const KNOWLEDGE_PATH = path.resolve(env.KNOWLEDGE_PATH?.trim() || "knowledge.txt");
  const INDEX_STORE_PATH = path.resolve(env.INDEX_STORE_PATH?.trim() || "knowledge-index.json");
  const HISTORY_DIR = path.resolve(env.HISTORY_DIR?.trim() || ".");

  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = intFrom(env.CHUNK_SIZE, 1000, 1, 8000);
  let CHUNK_OVERLAP = intFrom(env.CHUNK_OVERLAP, 200, 0, 4000);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[RAG] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || "text-embedding-004";
  // The embedding API accepts at most 100 requests per batch call.
  const EMBED_BATCH_SIZE = intFrom(env.EMBED_BATCH_SIZE, 100, 1, 100);

  const CHAT_MODEL = env.CHAT_MODEL?.trim() || "gemini-flash-latest";
  const GENERATION: GenerationSettings = {
    temperature: floatFrom(env.TEMPERATURE, 1, 0, 2),
    topP: floatFrom(env.TOP_P, 0.95, 0, 1),
    topK: intFrom(env.TOP_K, 64, 1, 1000),
    maxOutputTokens: intFrom(env.MAX_OUTPUT_TOKENS, 8192, 1, 65536),
  };

  const RETRIEVAL_TOP_K = intFrom(env.RETRIEVAL_TOP_K, 4, 1, 50);
  const REQUEST_TIMEOUT_MS = intFrom(env.REQUEST_TIMEOUT_MS, 30_000, 1, 600_000);
  const INDEX_LOCK_STALE_MS = intFrom(env.INDEX_LOCK_STALE_MS, 600_000, 1_000, 86_400_000);

  const SYSTEM_PREAMBLE = env.SYSTEM_PREAMBLE?.trim() || DEFAULT_PREAMBLE;

  // Verbosity toggle with tolerant truthy parsing.
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    GOOGLE_API_KEY,
    KNOWLEDGE_PATH,
    INDEX_STORE_PATH,
    HISTORY_DIR,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    EMBEDDING_MODEL,
    EMBED_BATCH_SIZE,
    CHAT_MODEL,
    GENERATION,
    RETRIEVAL_TOP_K,
    REQUEST_TIMEOUT_MS,
    INDEX_LOCK_STALE_MS,
    SYSTEM_PREAMBLE,
    VERBOSE,
    MCP_TRANSPORT,
  };
}
