/**
 * Bounded retry with exponential backoff
 */

import type { Sleep } from "../types";

export type AttemptOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; error: string }
  | { kind: "fatal"; error: string };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: string; attempts: number };

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before retry n is baseDelayMs * 2^n */
  baseDelayMs: number;
  sleep: Sleep;
  onRetry?: (attempt: number, delayMs: number, error: string) => void | Promise<void>;
}

export async function withRetry<T>(
  attempt: (n: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy,
): Promise<RetryResult<T>> {
  let lastError = "No attempts made";

  for (let n = 1; n <= policy.maxAttempts; n++) {
    const outcome = await attempt(n);

    if (outcome.kind === "success") {
      return { ok: true, value: outcome.value, attempts: n };
    }

    lastError = outcome.error;
    if (outcome.kind === "fatal" || n === policy.maxAttempts) {
      return { ok: false, error: lastError, attempts: n };
    }

    const delayMs = policy.baseDelayMs * 2 ** n;
    await policy.onRetry?.(n, delayMs, outcome.error);
    await policy.sleep(delayMs);
  }

  return { ok: false, error: lastError, attempts: 0 };
}
