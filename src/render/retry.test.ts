import { describe, it, expect } from "vitest";
import { withRetry, type AttemptOutcome } from "./retry";
import { recordingSleep } from "../testing/fakes";

function scripted(outcomes: AttemptOutcome<string>[]) {
  const calls: number[] = [];
  return {
    calls,
    attempt: async (n: number) => {
      calls.push(n);
      return outcomes[Math.min(n - 1, outcomes.length - 1)];
    },
  };
}

describe("withRetry", () => {
  it("returns the first success", async () => {
    const { sleep, delays } = recordingSleep();
    const script = scripted([{ kind: "success", value: "done" }]);

    const result = await withRetry(script.attempt, { maxAttempts: 3, baseDelayMs: 1000, sleep });

    expect(result).toEqual({ ok: true, value: "done", attempts: 1 });
    expect(delays).toEqual([]);
  });

  it("backs off exponentially between retryable failures", async () => {
    const { sleep, delays } = recordingSleep();
    const retries: Array<[number, number]> = [];
    const script = scripted([
      { kind: "retryable", error: "timeout" },
      { kind: "retryable", error: "timeout" },
      { kind: "success", value: "done" },
    ]);

    const result = await withRetry(script.attempt, {
      maxAttempts: 3,
      baseDelayMs: 1000,
      sleep,
      onRetry: (attempt, delayMs) => {
        retries.push([attempt, delayMs]);
      },
    });

    expect(result).toEqual({ ok: true, value: "done", attempts: 3 });
    expect(delays).toEqual([2000, 4000]);
    expect(retries).toEqual([
      [1, 2000],
      [2, 4000],
    ]);
  });

  it("stops at the first fatal failure", async () => {
    const { sleep, delays } = recordingSleep();
    const script = scripted([{ kind: "fatal", error: "bad input" }]);

    const result = await withRetry(script.attempt, { maxAttempts: 3, baseDelayMs: 1000, sleep });

    expect(result).toEqual({ ok: false, error: "bad input", attempts: 1 });
    expect(delays).toEqual([]);
  });

  it("gives up after the budget with the last error", async () => {
    const { sleep, delays } = recordingSleep();
    const script = scripted([
      { kind: "retryable", error: "first" },
      { kind: "retryable", error: "second" },
      { kind: "retryable", error: "third" },
    ]);

    const result = await withRetry(script.attempt, { maxAttempts: 3, baseDelayMs: 1000, sleep });

    expect(result).toEqual({ ok: false, error: "third", attempts: 3 });
    expect(script.calls).toEqual([1, 2, 3]);
    expect(delays).toEqual([2000, 4000]);
  });
});
