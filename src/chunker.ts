import fs from "node:fs/promises";
import { CorpusNotFoundError, isNotFound } from "./errors";
import type { Passage } from "./types";

/**
 * Read the knowledge corpus as UTF-8.
 *
 * @throws {CorpusNotFoundError} If the path does not exist or is not a file.
 */
export async function loadCorpus(corpusPath: string): Promise<string> {
  try {
    const st = await fs.stat(corpusPath);
    if (!st.isFile()) throw new CorpusNotFoundError(corpusPath);
  } catch (e) {
    if (e instanceof CorpusNotFoundError) throw e;
    if (isNotFound(e)) throw new CorpusNotFoundError(corpusPath);
    throw e;
  }
  return fs.readFile(corpusPath, "utf8");
}

/**
 * Split text into fixed-size character windows. Each window starts
 * `size - overlap` characters after the previous one, so neighbours share
 * exactly `overlap` characters; the final window may be shorter. Stops as soon
 * as a window reaches the end of the text, so a text shorter than `size`
 * yields a single passage.
 *
 * Characters are code points, so a surrogate pair is never cut in half;
 * `offset` counts code points too.
 *
 * @param size Maximum characters per passage.
 * @param overlap Characters shared with the previous passage. Must be < size.
 */
export function splitPassages(text: string, size: number, overlap: number): Passage[] {
  if (!Number.isInteger(size) || size < 1) throw new RangeError(`Invalid chunk size: ${size}`);
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new RangeError(`Chunk overlap must be in [0, ${size}), got ${overlap}`);
  }
  const chars = Array.from(text);
  const out: Passage[] = [];
  const step = size - overlap;
  for (let i = 0; i < chars.length; i += step) {
    const end = Math.min(chars.length, i + size);
    out.push({ text: chars.slice(i, end).join(""), offset: i });
    if (end === chars.length) break;
  }
  return out;
}
