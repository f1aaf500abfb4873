/**
 * Shared Async Utilities
 *
 * One polling primitive for every externally observed condition, parameterised
 * per call site. Time flows through a Clock so retry budgets can be exercised
 * without waiting.
 */

import type { Logger } from 'pino';

export interface Clock {
  sleep(ms: number): Promise<void>;
  now(): number;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  sleep,
  now: () => Date.now(),
};

export type PollResult<T> =
  | { status: 'ready'; value: T; attempts: number }
  | { status: 'exhausted'; attempts: number; lastError?: Error };

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  clock?: Clock;
  /** Called after every unsuccessful attempt, before the pause */
  onAttempt?: (attempt: number, maxAttempts: number) => void;
  logger?: Logger;
  /** Label used in debug logs */
  label?: string;
}

/**
 * Probe outcome: `undefined` or `false` means "not yet", anything else is the ready value
 */
export type Probe<T> = (attempt: number) => Promise<T | false | undefined>;

/**
 * Call `probe` until it yields a value or the attempt budget is spent.
 *
 * The pause happens between attempts only, so `maxAttempts` checks cost
 * `maxAttempts - 1` intervals. A probe that throws counts as "not yet"; the last
 * error is returned with the exhausted result.
 */
export async function pollUntil<T>(probe: Probe<T>, options: PollOptions): Promise<PollResult<T>> {
  const { intervalMs, maxAttempts, clock = systemClock, onAttempt, logger, label } = options;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await probe(attempt);
      if (value !== undefined && value !== false) {
        return { status: 'ready', value, attempts: attempt };
      }
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger?.debug({ label, attempt, error: lastError.message }, 'Poll attempt failed');
    }

    onAttempt?.(attempt, maxAttempts);

    if (attempt < maxAttempts) {
      await clock.sleep(intervalMs);
    }
  }

  logger?.debug({ label, maxAttempts }, 'Poll budget exhausted');

  return lastError
    ? { status: 'exhausted', attempts: maxAttempts, lastError }
    : { status: 'exhausted', attempts: maxAttempts };
}
