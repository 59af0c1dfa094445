import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EmbeddingServiceError, IndexUnavailableError } from "./errors";
import { Indexer, removeLockIfUnchanged, type IndexerOptions } from "./indexer";
import { StatusManager } from "./status";
import { FakeEmbeddings, makeTempDir, removeDir } from "./test-helpers";
import { VectorIndex } from "./vector-index";

const CORPUS = "The printer is on floor 2. Floor 2 also has a kitchen. ".repeat(4);

describe("Indexer", () => {
  let dir: string;
  let corpusPath: string;
  let storePath: string;

  const make = (overrides: Partial<IndexerOptions> = {}) => {
    const embeddings = overrides.embeddings ?? new FakeEmbeddings();
    const status = overrides.status ?? new StatusManager();
    const indexer = new Indexer({
      corpusPath,
      storePath,
      embeddings,
      chunkSize: 60,
      chunkOverlap: 10,
      batchSize: 100,
      lockPollMs: 10,
      status,
      ...overrides,
    });
    return { indexer, embeddings, status };
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    corpusPath = path.join(dir, "knowledge.txt");
    storePath = path.join(dir, "knowledge-index.json");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reports IndexUnavailableError when there is no corpus and no stored index", async () => {
    const { indexer, status } = make();
    await expect(indexer.getIndex()).rejects.toBeInstanceOf(IndexUnavailableError);
    expect(status.getStatus().indexing.state).toBe("unavailable");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("builds from the corpus, persists, and reuses the artifact", async () => {
    await fs.writeFile(corpusPath, CORPUS, "utf8");
    const first = make();
    const built = await first.indexer.getIndex();
    // 220 characters, windows of 60 advancing by 50.
    expect(built.size).toBe(5);
    expect(first.status.getStatus().indexing).toEqual({
      state: "ready",
      passagesTotal: 5,
      passagesEmbedded: 5,
    });

    const embeddings = new FakeEmbeddings();
    const second = make({ embeddings });
    const loaded = await second.indexer.getIndex();
    expect(embeddings.batchSizes).toEqual([]);
    expect(loaded.passages).toEqual(built.passages);
  });

  it("shares one build between concurrent callers", async () => {
    await fs.writeFile(corpusPath, CORPUS, "utf8");
    const embeddings = new FakeEmbeddings();
    const { indexer } = make({ embeddings });
    const [a, b, c] = await Promise.all([indexer.getIndex(), indexer.getIndex(), indexer.getIndex()]);
    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(embeddings.batchSizes).toEqual([5]);
    expect(indexer.isReady()).toBe(true);
  });

  it("does not cache failures", async () => {
    const { indexer } = make();
    await expect(indexer.getIndex()).rejects.toBeInstanceOf(IndexUnavailableError);
    await fs.writeFile(corpusPath, "Parking is behind the building.", "utf8");
    const index = await indexer.getIndex();
    expect(index.passages).toEqual([{ text: "Parking is behind the building.", offset: 0 }]);
  });

  it("keeps the previous artifact when a rebuild fails to embed", async () => {
    await fs.writeFile(corpusPath, CORPUS, "utf8");
    await make().indexer.getIndex();
    const before = await fs.readFile(storePath, "utf8");

    await fs.writeFile(corpusPath, "Entirely new content.", "utf8");
    const failing = new FakeEmbeddings();
    failing.failWith = new EmbeddingServiceError("quota exceeded");
    const { indexer, status } = make({ embeddings: failing });
    await expect(indexer.rebuild()).rejects.toBeInstanceOf(EmbeddingServiceError);

    expect(await fs.readFile(storePath, "utf8")).toBe(before);
    expect(status.getStatus().indexing.state).toBe("unavailable");
    expect((await fs.readdir(dir)).sort()).toEqual(["knowledge-index.json", "knowledge.txt"]);
  });

  it("rebuild replaces a stored index with one built from the current corpus", async () => {
    await fs.writeFile(corpusPath, CORPUS, "utf8");
    const { indexer } = make();
    await indexer.getIndex();
    await fs.writeFile(corpusPath, "Visitors sign in at reception.", "utf8");
    const rebuilt = await indexer.rebuild();
    expect(rebuilt.passages).toEqual([{ text: "Visitors sign in at reception.", offset: 0 }]);
    expect(await indexer.getIndex()).toBe(rebuilt);
    const reloaded = await make().indexer.getIndex();
    expect(reloaded.passages).toEqual(rebuilt.passages);
  });

  it("waits for another process's build lock and then loads its artifact", async () => {
    const lockPath = `${storePath}.lock`;
    await fs.writeFile(lockPath, "99999\n", "utf8");
    const embeddings = new FakeEmbeddings();
    const { indexer } = make({ embeddings });
    const pending = indexer.getIndex();

    await new Promise((resolve) => setTimeout(resolve, 50));
    const other = await VectorIndex.build(
      [{ text: "Built elsewhere.", offset: 0 }],
      new FakeEmbeddings(),
      { chunkSize: 60, chunkOverlap: 10 },
    );
    await other.save(storePath);
    await fs.rm(lockPath);

    const index = await pending;
    expect(index.passages).toEqual([{ text: "Built elsewhere.", offset: 0 }]);
    expect(embeddings.batchSizes).toEqual([]);
  });

  it("breaks a stale build lock", async () => {
    await fs.writeFile(corpusPath, CORPUS, "utf8");
    const lockPath = `${storePath}.lock`;
    await fs.writeFile(lockPath, "99999\n", "utf8");
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, old, old);

    const { indexer } = make({ lockStaleMs: 1_000 });
    const index = await indexer.getIndex();
    expect(index.size).toBe(5);
    await expect(fs.stat(lockPath)).rejects.toThrow();
  });

  it("reloads from disk after invalidate()", async () => {
    await fs.writeFile(corpusPath, CORPUS, "utf8");
    const embeddings = new FakeEmbeddings();
    const { indexer } = make({ embeddings });
    const first = await indexer.getIndex();
    indexer.invalidate();
    expect(indexer.isReady()).toBe(false);
    const second = await indexer.getIndex();
    expect(second).not.toBe(first);
    expect(second.passages).toEqual(first.passages);
    expect(embeddings.batchSizes).toEqual([5]);
  });
});

describe("removeLockIfUnchanged", () => {
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    lockPath = path.join(dir, "knowledge-index.json.lock");
    await fs.writeFile(lockPath, "99999\n", "utf8");
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, old, old);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("removes the lock that was judged stale", async () => {
    const judged = await fs.stat(lockPath);
    expect(await removeLockIfUnchanged(lockPath, judged)).toBe(true);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("keeps a lock that was refreshed after it was judged stale", async () => {
    const judged = await fs.stat(lockPath);
    await fs.writeFile(lockPath, "12345\n", "utf8");
    const fresh = new Date();
    await fs.utimes(lockPath, fresh, fresh);

    expect(await removeLockIfUnchanged(lockPath, judged)).toBe(false);
    expect(await fs.readFile(lockPath, "utf8")).toBe("12345\n");
    expect(await fs.readdir(dir)).toEqual(["knowledge-index.json.lock"]);
  });

  it("asks for a retry when the lock is already gone", async () => {
    const judged = await fs.stat(lockPath);
    await fs.rm(lockPath);
    expect(await removeLockIfUnchanged(lockPath, judged)).toBe(true);
  });
});
