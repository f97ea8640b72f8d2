import { GoogleGenAI } from "@google/genai";
import { SummarizationError } from "../errors.js";
import { logExternalCall, type Logger } from "../logger.js";
import type { Summarizer, Summary } from "../types.js";

/** The slice of the Gemini SDK this client calls */
export interface GenerateContentClient {
  models: Pick<GoogleGenAI["models"], "generateContent">;
}

export interface GeminiSummarizerOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  logger: Logger;
  retry?: { maxRetries?: number; initialDelayMs?: number };
  /** Injected SDK client; built from apiKey/timeoutMs when omitted */
  client?: GenerateContentClient;
}

const MAX_RETRIES = 3;
const INITIAL_DELAY_MS = 1000;
const BACKOFF_FACTOR = 2;

function isRetryable(error: unknown): boolean {
  if (error instanceof Error) {
    const msg = error.message;
    if (msg.includes("429") || msg.includes("rate limit")) return true;
    if (/\b5\d{2}\b/.test(msg)) return true;
  }
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number") {
      if (status === 429 || (status >= 500 && status < 600)) return true;
    }
  }
  return false;
}

async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number,
  initialDelayMs: number,
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === maxRetries || !isRetryable(error)) throw error;
      const delay = initialDelayMs * BACKOFF_FACTOR ** attempt;
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw lastError;
}

export function buildSummaryPrompt(text: string): string {
  return (
    "Summarize the following text and format it to be sent as the HTML body " +
    "of an email. Do not wrap the result in triple backticks and do not " +
    "include HEAD or BODY tags, only the HTML fragment itself.\n\n" +
    `${text}\n\nSummary:`
  );
}

/** Remove a single ``` or ```html fence wrapped around the whole reply. */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/.exec(trimmed);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

export function createGeminiSummarizer(
  options: GeminiSummarizerOptions,
): Summarizer {
  const { model, logger } = options;
  const client =
    options.client ??
    new GoogleGenAI({
      apiKey: options.apiKey,
      httpOptions: { timeout: options.timeoutMs },
    });
  const maxRetries = options.retry?.maxRetries ?? MAX_RETRIES;
  const initialDelayMs = options.retry?.initialDelayMs ?? INITIAL_DELAY_MS;

  return {
    async summarize(text: string): Promise<Summary> {
      const start = performance.now();
      try {
        const response = await withRetry(
          () =>
            client.models.generateContent({
              model,
              contents: buildSummaryPrompt(text),
            }),
          maxRetries,
          initialDelayMs,
        );

        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
          throw new SummarizationError(
            `Gemini blocked the prompt: ${blockReason}`,
          );
        }

        const summary = stripCodeFences(response.text ?? "");
        if (summary.length === 0) {
          throw new SummarizationError("Gemini returned an empty summary");
        }

        logExternalCall(
          logger,
          "gemini",
          "generate_content",
          Math.round(performance.now() - start),
        );
        return { text: summary };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logExternalCall(
          logger,
          "gemini",
          "generate_content",
          Math.round(performance.now() - start),
          message,
        );
        if (err instanceof SummarizationError) throw err;
        throw new SummarizationError(`Gemini request failed: ${message}`, {
          cause: err,
        });
      }
    },
  };
}
