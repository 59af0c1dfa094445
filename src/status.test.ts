import { describe, expect, it } from "vitest";
import { StatusManager } from "./status";

describe("StatusManager", () => {
  it("tracks index lifecycle and clears the error once ready", () => {
    const status = new StatusManager({ version: "1.2.3", startedAt: "2024-01-01T00:00:00.000Z" });
    status.markTransport("http");
    status.setModels("text-embedding-004", "gemini-flash-latest");
    status.setIndexState("unavailable", "Knowledge corpus not found at /kb.txt");
    expect(status.getStatus().indexing).toEqual({
      state: "unavailable",
      passagesTotal: 0,
      passagesEmbedded: 0,
      lastError: "Knowledge corpus not found at /kb.txt",
    });

    status.setIndexState("building");
    status.setIndexProgress(3, 5);
    status.setIndexState("ready");
    expect(JSON.parse(JSON.stringify(status))).toEqual({
      version: "1.2.3",
      corpusPath: "",
      embeddingModel: "text-embedding-004",
      chatModel: "gemini-flash-latest",
      transport: "http",
      startedAt: "2024-01-01T00:00:00.000Z",
      indexing: { state: "ready", passagesTotal: 5, passagesEmbedded: 3 },
    });
  });
});
