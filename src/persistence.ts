import fs from "node:fs/promises";
import path from "node:path";
import { isNotFound } from "./errors";
import type { Passage } from "./types";

/** Metadata stored alongside a persisted index to allow compatibility checks. */
export interface IndexMeta {
  modelName: string;
  dimension: number;
  chunkSize: number;
  chunkOverlap: number;
}

export interface IndexEntry {
  passage: Passage;
  vector: Float32Array;
}

export interface IndexSnapshot {
  meta: IndexMeta;
  entries: IndexEntry[];
}

/** Fields that must match for a stored index to be reused. */
export type ExpectedMeta = Omit<IndexMeta, "dimension">;

/**
 * Reads and writes the index artifact: one JSON document whose vectors are
 * base64-encoded little-endian float32 buffers (exact round trip).
 */
export class Persistence {
  private readonly storePath: string;
  private readonly verbose: boolean;

  /**
   * @param storePath File path of the persisted index.
   * @param verbose   Whether to emit verbose logging.
   */
  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public getStorePath(): string {
    return this.storePath;
  }

  /**
   * Load a previously persisted index. Returns null when the file is absent,
   * unreadable, malformed, or incompatible with `expected`.
   */
  public async load(expected?: ExpectedMeta): Promise<IndexSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (!isNotFound(e)) console.error(`[RAG] Failed to read index store at ${this.storePath}:`, e);
      return null;
    }
    try {
      return this.parse(raw, expected);
    } catch (e) {
      console.error(`[RAG] Failed to parse index store at ${this.storePath}:`, e);
      return null;
    }
  }

  private parse(raw: string, expected?: ExpectedMeta): IndexSnapshot | null {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed) || !Array.isArray(parsed.docs) || !isRecord(parsed.meta)) return null;
    const { modelName, dimension, chunkSize, chunkOverlap } = parsed.meta;
    if (
      typeof modelName !== "string" ||
      typeof dimension !== "number" ||
      typeof chunkSize !== "number" ||
      typeof chunkOverlap !== "number"
    )
      return null;
    if (
      expected &&
      (expected.chunkSize !== chunkSize ||
        expected.chunkOverlap !== chunkOverlap ||
        expected.modelName !== modelName)
    ) {
      console.error(`[RAG] Stored index incompatible (model/chunk params differ). Rebuilding.`);
      return null;
    }
    const entries: IndexEntry[] = [];
    for (const d of parsed.docs) {
      if (!isRecord(d)) return null;
      const { text, offset, emb } = d;
      if (typeof text !== "string" || typeof offset !== "number" || typeof emb !== "string") {
        return null;
      }
      const vector = decodeVector(emb);
      // A single bad row means the artifact is not the one we wrote.
      if (!vector || vector.length !== dimension) return null;
      entries.push({ passage: { text, offset }, vector });
    }
    console.error(`[RAG] Loaded persisted index: ${entries.length} passages.`);
    if (this.verbose) console.error(`[RAG][verbose] Loaded from ${this.storePath}`);
    return { meta: { modelName, dimension, chunkSize, chunkOverlap }, entries };
  }

  /**
   * Persist an index. Writes a temp file beside the target then renames it
   * into place, so a reader never observes a partial artifact and a failed
   * write leaves any previous artifact untouched.
   */
  public async save(snapshot: IndexSnapshot): Promise<void> {
    const out = {
      version: 1,
      meta: {
        ...snapshot.meta,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      docs: snapshot.entries.map((e) => ({
        text: e.passage.text,
        offset: e.passage.offset,
        emb: encodeVector(e.vector),
      })),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    await writeFileAtomic(this.storePath, JSON.stringify(out));
    if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
  }
}

/** Write `data` to `target` through a sibling temp file and an atomic rename. */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tmp, data, "utf8");
    await fs.rename(tmp, target);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

function encodeVector(v: Float32Array): string {
  const le = Buffer.alloc(v.length * 4);
  for (let i = 0; i < v.length; i++) le.writeFloatLE(v[i], i * 4);
  return le.toString("base64");
}

function decodeVector(b64: string): Float32Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
