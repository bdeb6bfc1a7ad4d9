import { setTimeout as delay } from "node:timers/promises";

export type PacingOptions = {
  minDelayMinutes: number;
  maxDelayMinutes: number;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const MINUTE_MS = 60_000;

/**
 * Whole minutes drawn uniformly from the inclusive range, in ms.
 * `random` must return values in [0, 1), like Math.random.
 */
export function pickDelayMs(pacing: PacingOptions, random: () => number = Math.random): number {
  const span = pacing.maxDelayMinutes - pacing.minDelayMinutes + 1;
  const minutes = pacing.minDelayMinutes + Math.min(Math.floor(random() * span), span - 1);
  return minutes * MINUTE_MS;
}

/** Timer-based wait; only the awaiting task is suspended. Rejects with AbortError on abort. */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};
