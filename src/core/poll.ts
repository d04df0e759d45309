/**
 * Clock abstraction and poll-with-deadline loop.
 *
 * Every settle delay and polling loop in the device layer goes through a
 * Clock, so tests can run protocol sequences against a virtual clock.
 */

import { setTimeout as sleep } from "node:timers/promises";

export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms) => {
    if (ms > 0) await sleep(ms);
  },
};

/**
 * Outcome of one poll attempt.
 *   - "done": stop polling, condition met
 *   - "progress": data arrived, poll again without waiting
 *   - "idle": nothing arrived, wait one interval before the next attempt
 */
export type PollStep = "done" | "progress" | "idle";

export interface PollOptions {
  clock: Clock;
  /** Overall wall-clock budget in ms. */
  timeoutMs: number;
  /** Wait between idle attempts in ms. */
  intervalMs: number;
  /** Optional cap on the number of attempts. */
  maxAttempts?: number;
  /** Wait after a "progress" attempt too. Default: false. */
  pauseOnProgress?: boolean;
  /** Stop at the first "idle" attempt instead of waiting. Default: false. */
  stopWhenIdle?: boolean;
}

export interface PollResult {
  /** True if an attempt returned "done". */
  completed: boolean;
  attempts: number;
}

/**
 * Run `attempt` until it reports "done", the deadline passes, or the attempt
 * cap is reached.
 */
export async function pollUntil(attempt: () => PollStep, options: PollOptions): Promise<PollResult> {
  const { clock, timeoutMs, intervalMs } = options;
  const maxAttempts = options.maxAttempts ?? Number.POSITIVE_INFINITY;
  const deadline = clock.now() + timeoutMs;
  let attempts = 0;

  while (attempts < maxAttempts && clock.now() < deadline) {
    attempts++;
    const step = attempt();
    if (step === "done") return { completed: true, attempts };
    if (step === "idle") {
      if (options.stopWhenIdle) break;
      await clock.sleep(intervalMs);
    } else if (options.pauseOnProgress) {
      await clock.sleep(intervalMs);
    }
  }
  return { completed: false, attempts };
}
