import { FetchTimeoutError } from "../errors.js";

export const MAX_BACKOFF_MS = 60_000;

/** `min(60s, 2^attempt s + jitter)`, jitter in [0, 1s). */
export function backoffMs(attempt: number, random: () => number = Math.random): number {
  return Math.min(MAX_BACKOFF_MS, 2 ** attempt * 1000 + random() * 1000);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `work` under a deadline. On expiry the signal handed to `work` is
 * aborted and the returned promise rejects with {@link FetchTimeoutError}.
 */
export function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      const err = new FetchTimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    let running: Promise<T>;
    try {
      running = work(controller.signal);
    } catch (err) {
      running = Promise.reject(err);
    }

    running.then(
      (value) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(err instanceof Error ? err : new Error(String(err)));
      },
    );
  });
}
