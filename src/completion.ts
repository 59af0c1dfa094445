import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  type Content,
} from "@google/generative-ai";
import type { GenerationSettings } from "./config";
import { errorMessage } from "./embeddings";
import { CompletionServiceError } from "./errors";
import type { Message } from "./types";

export interface CompletionRequest {
  systemInstruction: string;
  /** Prior turns, oldest first, excluding `message`. */
  history: readonly Message[];
  message: string;
}

/** History-aware text completion. Implementations throw {@link CompletionServiceError}. */
export interface CompletionService {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface GeminiCompletionOptions {
  apiKey: string;
  model: string;
  generation: GenerationSettings;
  timeoutMs?: number;
}

/** Chat completions through Google's Gemini API. */
export class GeminiCompletionService implements CompletionService {
  public readonly model: string;
  private readonly apiKey: string;
  private readonly generation: GenerationSettings;
  private readonly timeoutMs: number;
  private client: GoogleGenerativeAI | null = null;

  public constructor(opts: GeminiCompletionOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.generation = opts.generation;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  public async complete(request: CompletionRequest): Promise<string> {
    if (!this.apiKey) throw new CompletionServiceError("GOOGLE_API_KEY is not configured");
    this.client ??= new GoogleGenerativeAI(this.apiKey);
    const model = this.client.getGenerativeModel(
      {
        model: this.model,
        systemInstruction: request.systemInstruction,
        generationConfig: { ...this.generation, responseMimeType: "text/plain" },
      },
      { timeout: this.timeoutMs },
    );
    try {
      const chat = model.startChat({ history: toGeminiHistory(request.history) });
      const result = await chat.sendMessage(request.message);
      return result.response.text();
    } catch (e) {
      throw new CompletionServiceError(`Completion request failed: ${errorMessage(e)}`, {
        cause: e,
        rateLimited: isRateLimited(e),
      });
    }
  }
}

/** Provider history: `assistant` turns are called `model`. */
export function toGeminiHistory(history: readonly Message[]): Content[] {
  return history.map((m) => ({
    role: m.role === "user" ? "user" : "model",
    parts: [{ text: m.content }],
  }));
}

/** True when the provider signalled HTTP 429 or quota exhaustion. */
export function isRateLimited(e: unknown): boolean {
  if (e instanceof GoogleGenerativeAIFetchError && e.status === 429) return true;
  const msg = errorMessage(e);
  return /\b429\b/.test(msg) || /quota|rate limit|resource.?exhausted/i.test(msg);
}
