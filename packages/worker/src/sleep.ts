/**
 * Waits `ms` milliseconds, or less if `signal` aborts first. Never rejects:
 * an abort is a request to wake up, not a failure.
 */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const interruptibleSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const timer = setTimeout(wake, ms);

    function wake(): void {
      clearTimeout(timer);
      signal.removeEventListener("abort", wake);
      resolve();
    }

    signal.addEventListener("abort", wake, { once: true });
  });
