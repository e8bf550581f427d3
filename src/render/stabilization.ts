/**
 * Polling waits for script-driven rendering
 *
 * Elapsed time is accumulated from the configured intervals rather than read
 * from the wall clock, so both phases share one budget and tests can inject
 * an instant sleep.
 */

import type { Sleep } from "../types";
import type { BoundingBox } from "./engine";

export interface PollClock {
  elapsedMs: number;
}

export type ContentProbe =
  | { kind: "pending" }
  | { kind: "ready" }
  | { kind: "error"; message: string };

export type AppearanceResult =
  | { kind: "ready" }
  | { kind: "error"; message: string }
  | { kind: "timeout" };

export interface AppearanceOptions {
  timeoutMs: number;
  intervalMs: number;
  sleep: Sleep;
}

export async function waitForContent(
  probe: () => Promise<ContentProbe>,
  options: AppearanceOptions,
  clock: PollClock,
): Promise<AppearanceResult> {
  while (clock.elapsedMs < options.timeoutMs) {
    const state = await probe();
    if (state.kind === "ready") return { kind: "ready" };
    if (state.kind === "error") return { kind: "error", message: state.message };

    await options.sleep(options.intervalMs);
    clock.elapsedMs += options.intervalMs;
  }
  return { kind: "timeout" };
}

export interface StabilityOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Consecutive unchanged samples required */
  checks: number;
  tolerancePx: number;
  sleep: Sleep;
}

/**
 * Resolves true once `checks` consecutive samples differ from the previous
 * one by less than the tolerance in both width and height. Any larger change
 * resets the count.
 */
export async function waitForStableBox(
  measure: () => Promise<BoundingBox | null>,
  options: StabilityOptions,
  clock: PollClock,
): Promise<boolean> {
  let stableCount = 0;
  let last: BoundingBox | null = null;

  while (clock.elapsedMs < options.timeoutMs && stableCount < options.checks) {
    await options.sleep(options.intervalMs);
    const current = await measure();

    if (current && last) {
      const widthStable = Math.abs(current.width - last.width) < options.tolerancePx;
      const heightStable = Math.abs(current.height - last.height) < options.tolerancePx;
      stableCount = widthStable && heightStable ? stableCount + 1 : 0;
    }

    last = current;
    clock.elapsedMs += options.intervalMs;
  }

  return stableCount >= options.checks;
}
