import { describe, expect, it } from "vitest";
import { IndexUnavailableError } from "./errors";
import { Retriever, type IndexSource } from "./retriever";
import { BrokenEmbeddings, FakeEmbeddings } from "./test-helpers";
import { VectorIndex } from "./vector-index";

const PASSAGES = [
  "The printer is on floor 2.",
  "Lunch is served at noon in the cafeteria.",
  "Parking passes are issued at reception.",
];

async function sourceOf(texts: string[]): Promise<IndexSource> {
  const index = await VectorIndex.build(
    texts.map((text, i) => ({ text, offset: i * 100 })),
    new FakeEmbeddings(),
    { chunkSize: 100, chunkOverlap: 10 },
  );
  return { getIndex: async () => index };
}

const unavailable: IndexSource = {
  getIndex: async (): Promise<VectorIndex> => {
    throw new IndexUnavailableError();
  },
};

describe("Retriever", () => {
  it("returns passage texts, most similar first", async () => {
    const retriever = new Retriever({ embeddings: new FakeEmbeddings(), source: await sourceOf(PASSAGES) });
    await expect(retriever.retrieve("Where is the printer?")).resolves.toEqual(PASSAGES);
    await expect(retriever.retrieve("lunch cafeteria", 2)).resolves.toEqual([
      PASSAGES[1],
      PASSAGES[0],
    ]);
    await expect(retriever.retrieve("parking reception", 1)).resolves.toEqual([PASSAGES[2]]);
  });

  it("uses the configured default k", async () => {
    const retriever = new Retriever({
      embeddings: new FakeEmbeddings(),
      source: await sourceOf(PASSAGES),
      defaultK: 1,
    });
    await expect(retriever.retrieve("Where is the printer?")).resolves.toEqual([PASSAGES[0]]);
  });

  it("is deterministic for a fixed index", async () => {
    const retriever = new Retriever({ embeddings: new FakeEmbeddings(), source: await sourceOf(PASSAGES) });
    const a = await retriever.retrieve("reception parking lunch");
    const b = await retriever.retrieve("reception parking lunch");
    expect(a).toEqual(b);
  });

  it("returns nothing when the embedding service fails on every call", async () => {
    const retriever = new Retriever({ embeddings: new BrokenEmbeddings(), source: await sourceOf(PASSAGES) });
    await expect(retriever.retrieve("Where is the printer?")).resolves.toEqual([]);
  });

  it("returns nothing when no index is available", async () => {
    const retriever = new Retriever({ embeddings: new FakeEmbeddings(), source: unavailable });
    await expect(retriever.retrieve("Where is the printer?")).resolves.toEqual([]);
  });

  it("skips embedding for a blank query or an empty index", async () => {
    const embeddings = new FakeEmbeddings();
    const retriever = new Retriever({ embeddings, source: await sourceOf([]) });
    await expect(retriever.retrieve("   ")).resolves.toEqual([]);
    await expect(retriever.retrieve("printer")).resolves.toEqual([]);
    expect(embeddings.embedCalls).toBe(0);
  });
});
