import { GoogleGenerativeAIFetchError } from "@google/generative-ai";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { GeminiCompletionService, isRateLimited, toGeminiHistory } from "./completion";
import { CompletionServiceError, describeError } from "./errors";

const mocks = vi.hoisted(() => ({
  getGenerativeModel: vi.fn(),
  startChat: vi.fn(),
  sendMessage: vi.fn(),
}));

vi.mock("@google/generative-ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@google/generative-ai")>();
  return {
    ...actual,
    GoogleGenerativeAI: class {
      public getGenerativeModel(...args: unknown[]) {
        return mocks.getGenerativeModel(...args);
      }
    },
  };
});

const generation = { temperature: 1, topP: 0.95, topK: 64, maxOutputTokens: 8192 };

describe("GeminiCompletionService", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.getGenerativeModel.mockReturnValue({ startChat: mocks.startChat });
    mocks.startChat.mockReturnValue({ sendMessage: mocks.sendMessage });
  });

  it("sends the system instruction, mapped history and message", async () => {
    mocks.sendMessage.mockResolvedValue({ response: { text: () => "It is on floor 2." } });
    const service = new GeminiCompletionService({
      apiKey: "test-key",
      model: "gemini-test",
      generation,
      timeoutMs: 5000,
    });
    const reply = await service.complete({
      systemInstruction: "Be brief.\n\nCONTEXT:\nThe printer is on floor 2.",
      history: [
        { role: "user", content: "hi" },
        { role: "assistant", content: "hello" },
      ],
      message: "Where is the printer?",
    });

    expect(reply).toBe("It is on floor 2.");
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith(
      {
        model: "gemini-test",
        systemInstruction: "Be brief.\n\nCONTEXT:\nThe printer is on floor 2.",
        generationConfig: { ...generation, responseMimeType: "text/plain" },
      },
      { timeout: 5000 },
    );
    expect(mocks.startChat).toHaveBeenCalledWith({
      history: [
        { role: "user", parts: [{ text: "hi" }] },
        { role: "model", parts: [{ text: "hello" }] },
      ],
    });
    expect(mocks.sendMessage).toHaveBeenCalledWith("Where is the printer?");
  });

  it("flags rate limiting", async () => {
    mocks.sendMessage.mockRejectedValue(
      new GoogleGenerativeAIFetchError("[429 Too Many Requests] slow down", 429, "Too Many Requests"),
    );
    const service = new GeminiCompletionService({ apiKey: "test-key", model: "m", generation });
    const err = await service
      .complete({ systemInstruction: "s", history: [], message: "m" })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CompletionServiceError);
    expect(err instanceof CompletionServiceError && err.rateLimited).toBe(true);
    expect(describeError(err)).toBe("Too many requests! Please wait a moment.");
  });

  it("reports other failures as ordinary completion errors", async () => {
    mocks.sendMessage.mockRejectedValue(new Error("fetch failed"));
    const service = new GeminiCompletionService({ apiKey: "test-key", model: "m", generation });
    const err = await service
      .complete({ systemInstruction: "s", history: [], message: "m" })
      .catch((e: unknown) => e);
    expect(err instanceof CompletionServiceError && err.rateLimited).toBe(false);
    expect(describeError(err)).toBe("An error occurred: Completion request failed: fetch failed");
  });

  it("fails fast without an API key", async () => {
    const service = new GeminiCompletionService({ apiKey: "", model: "m", generation });
    await expect(
      service.complete({ systemInstruction: "s", history: [], message: "m" }),
    ).rejects.toBeInstanceOf(CompletionServiceError);
    expect(mocks.getGenerativeModel).not.toHaveBeenCalled();
  });
});

describe("toGeminiHistory", () => {
  it("maps assistant turns to the model role", () => {
    expect(toGeminiHistory([{ role: "assistant", content: "a" }])).toEqual([
      { role: "model", parts: [{ text: "a" }] },
    ]);
  });
});

describe("isRateLimited", () => {
  it("recognises quota and 429 signals in messages", () => {
    expect(isRateLimited(new Error("Resource has been exhausted (e.g. check quota)."))).toBe(true);
    expect(isRateLimited(new Error("[GoogleGenerativeAI Error]: [429 ] rate"))).toBe(true);
    expect(isRateLimited(new Error("[500 Internal Server Error]"))).toBe(false);
    expect(isRateLimited("timeout")).toBe(false);
  });
});
