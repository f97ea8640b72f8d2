// =============================================================================
// Test fakes for the worker package
// =============================================================================
// In-process stand-ins for the source, summarizer and notifier, plus a
// manually driven sleep so tests decide when an interval has elapsed.
// =============================================================================

import { vi } from "vitest";
import {
  type ContentItem,
  type Digest,
  type Summary,
  createLogger,
} from "@postwatch/shared";
import type { PipelineDeps } from "../pipeline.js";

export const silentLogger = createLogger({ sink: () => {} });

/** Resolves after every queued microtask has run */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let settle: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}

export function createPipelineFakes(initialId = "p1") {
  let currentId = initialId;

  const fetchLatest = vi.fn(
    async (): Promise<ContentItem> => ({
      identifier: currentId,
      body: `Body of ${currentId}`,
    }),
  );
  const summarize = vi.fn(
    async (text: string): Promise<Summary> => ({ text: `Summary: ${text}` }),
  );
  const send = vi.fn(
    async (_digest: Digest, _recipients: readonly string[]): Promise<void> => {},
  );

  const deps: PipelineDeps = {
    source: { fetchLatest },
    summarizer: { summarize },
    notifier: { send },
    recipients: ["a@example.com", "b@example.com"],
    logger: silentLogger,
  };

  return {
    deps,
    fetchLatest,
    summarize,
    send,
    /** Make the source report a different newest item */
    publish(identifier: string) {
      currentId = identifier;
    },
  };
}

export function createManualSleep() {
  const waiting: Array<() => void> = [];

  const sleep = vi.fn(
    (_ms: number, signal: AbortSignal) =>
      new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        const wake = () => {
          signal.removeEventListener("abort", wake);
          resolve();
        };
        signal.addEventListener("abort", wake, { once: true });
        waiting.push(wake);
      }),
  );

  return {
    sleep,
    /** End every sleep currently in progress */
    elapse() {
      for (const wake of waiting.splice(0)) wake();
    },
  };
}
