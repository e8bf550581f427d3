import { describe, it, expect } from "vitest";
import { waitForContent, waitForStableBox, type ContentProbe, type PollClock } from "./stabilization";
import { recordingSleep } from "../testing/fakes";
import type { BoundingBox } from "./engine";

function box(width: number, height: number): BoundingBox {
  return { x: 0, y: 0, width, height };
}

function sequence<T>(values: T[]): () => Promise<T> {
  let index = 0;
  return async () => values[Math.min(index++, values.length - 1)];
}

describe("waitForContent", () => {
  it("resolves once the probe reports ready", async () => {
    const { sleep, delays } = recordingSleep();
    const clock: PollClock = { elapsedMs: 0 };
    const probes: ContentProbe[] = [{ kind: "pending" }, { kind: "pending" }, { kind: "ready" }];

    const result = await waitForContent(sequence(probes), { timeoutMs: 5000, intervalMs: 100, sleep }, clock);

    expect(result).toEqual({ kind: "ready" });
    expect(clock.elapsedMs).toBe(200);
    expect(delays).toEqual([100, 100]);
  });

  it("returns render errors without waiting", async () => {
    const { sleep } = recordingSleep();
    const clock: PollClock = { elapsedMs: 0 };

    const result = await waitForContent(
      sequence<ContentProbe>([{ kind: "error", message: "Parse error on line 2" }]),
      { timeoutMs: 5000, intervalMs: 100, sleep },
      clock,
    );

    expect(result).toEqual({ kind: "error", message: "Parse error on line 2" });
    expect(clock.elapsedMs).toBe(0);
  });

  it("times out after the budget", async () => {
    const { sleep, delays } = recordingSleep();
    const clock: PollClock = { elapsedMs: 0 };

    const result = await waitForContent(
      sequence<ContentProbe>([{ kind: "pending" }]),
      { timeoutMs: 500, intervalMs: 100, sleep },
      clock,
    );

    expect(result).toEqual({ kind: "timeout" });
    expect(delays).toHaveLength(5);
    expect(clock.elapsedMs).toBe(500);
  });
});

describe("waitForStableBox", () => {
  const options = { timeoutMs: 5000, intervalMs: 50, checks: 3, tolerancePx: 1 };

  it("needs consecutive unchanged samples", async () => {
    const { sleep } = recordingSleep();
    const clock: PollClock = { elapsedMs: 0 };
    const measure = sequence([box(100, 50), box(100, 50), box(100, 50), box(100, 50)]);

    const stable = await waitForStableBox(measure, { ...options, sleep }, clock);

    // First sample has nothing to compare with
    expect(stable).toBe(true);
    expect(clock.elapsedMs).toBe(200);
  });

  it("restarts the count when the size changes", async () => {
    const { sleep } = recordingSleep();
    const clock: PollClock = { elapsedMs: 0 };
    const measure = sequence([
      box(100, 50),
      box(100, 50),
      box(140, 50),
      box(140, 50),
      box(140, 50),
      box(140, 50),
    ]);

    const stable = await waitForStableBox(measure, { ...options, sleep }, clock);

    expect(stable).toBe(true);
    expect(clock.elapsedMs).toBe(300);
  });

  it("shares the budget with the appearance phase", async () => {
    const { sleep } = recordingSleep();
    const clock: PollClock = { elapsedMs: 4900 };
    let width = 100;
    const growing = async () => box(width++ * 2, 50);

    const stable = await waitForStableBox(growing, { ...options, sleep }, clock);

    expect(stable).toBe(false);
    expect(clock.elapsedMs).toBe(5000);
  });
});
