import { setTimeout as sleep } from "node:timers/promises";

export type RetryOptions = {
  attempts: number;
  delayMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, lastError: string) => void;
};

export type RetryResult<T> = { ok: true; value: T; attempts: number } | { ok: false; error: string; attempts: number };

/**
 * Bounded retry. `fn` reports failure as a value; it is retried until it
 * succeeds, attempts run out, or the signal fires.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<{ ok: true; value: T } | { ok: false; error: string }>,
  opts: RetryOptions,
): Promise<RetryResult<T>> {
  let lastError = "no attempts made";
  const attempts = Math.max(1, opts.attempts);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (opts.signal?.aborted) return { ok: false, error: "aborted", attempts: attempt - 1 };

    const res = await fn(attempt);
    if (res.ok) return { ok: true, value: res.value, attempts: attempt };
    lastError = res.error;

    if (attempt < attempts) {
      opts.onRetry?.(attempt, lastError);
      if (opts.delayMs > 0) {
        try {
          await sleep(opts.delayMs, undefined, { signal: opts.signal });
        } catch {
          return { ok: false, error: "aborted", attempts: attempt };
        }
      }
    }
  }

  return { ok: false, error: lastError, attempts };
}
