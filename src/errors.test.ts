import { describe, expect, it } from "vitest";
import {
  CompletionServiceError,
  describeError,
  isNotFound,
  SessionNotFoundError,
  SessionStoreError,
} from "./errors";

describe("describeError", () => {
  it("maps known failures to user-facing text", () => {
    expect(describeError(new CompletionServiceError("429", { rateLimited: true }))).toBe(
      "Too many requests! Please wait a moment.",
    );
    expect(describeError(new SessionNotFoundError("abc"))).toBe("Chat not found: abc");
    expect(describeError(new SessionStoreError("Failed to write history_bob.json"))).toBe(
      "Could not save your chat history: Failed to write history_bob.json",
    );
    expect(describeError(new CompletionServiceError("timeout"))).toBe("An error occurred: timeout");
    expect(describeError("boom")).toBe("An error occurred: boom");
  });
});

describe("isNotFound", () => {
  it("recognizes missing-path errors only", () => {
    expect(isNotFound(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFound(Object.assign(new Error("x"), { code: "EACCES" }))).toBe(false);
    expect(isNotFound("ENOENT")).toBe(false);
  });
});
