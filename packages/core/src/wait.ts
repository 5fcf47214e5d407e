/**
 * Bounded polling
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { ActionError, TimeoutError, errorMessage } from './errors.js';

export type Condition = () => boolean | Promise<boolean>;

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Multiplier applied to the interval after each miss. 1 keeps it fixed. */
  backoff?: number;
  maxIntervalMs?: number;
  /** Used for the TimeoutError message and its `action`. */
  message?: string;
  action?: string;
}

/**
 * Polls `condition` until it returns true or `timeoutMs` elapses.
 *
 * The condition is checked once immediately and once more after the deadline
 * is reached, so a TimeoutError is never raised before the full timeout.
 * Errors thrown by the condition count as misses, except a disconnected
 * driver, which ends the wait at once.
 */
export async function waitUntil(condition: Condition, options: WaitOptions): Promise<true> {
  if (!(options.timeoutMs > 0)) {
    throw new RangeError(`timeoutMs must be > 0, got ${options.timeoutMs}`);
  }
  const backoff = options.backoff ?? 1;
  const maxInterval = options.maxIntervalMs ?? Number.POSITIVE_INFINITY;
  let interval = Math.max(1, options.intervalMs);
  let lastError: unknown;
  const startedAt = Date.now();

  for (;;) {
    try {
      if (await condition()) return true;
    } catch (err) {
      if (err instanceof ActionError && err.kind === 'driver-disconnected') throw err;
      lastError = err;
    }

    const elapsed = Date.now() - startedAt;
    if (elapsed >= options.timeoutMs) {
      const what = options.message ?? 'condition';
      const reason = lastError === undefined ? '' : ` (last error: ${errorMessage(lastError)})`;
      throw new TimeoutError(
        options.action ?? 'waitFor',
        `Timed out after ${options.timeoutMs}ms waiting for ${what}${reason}`,
        { timeoutMs: options.timeoutMs, elapsedMs: elapsed, cause: lastError }
      );
    }

    await sleep(Math.max(1, Math.min(interval, options.timeoutMs - elapsed)));
    interval = Math.min(interval * backoff, maxInterval);
  }
}
