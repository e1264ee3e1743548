/**
 * Async timing utilities for Cadence
 *
 * Promise-based sleep (optionally raced against a cancellation token)
 * and an externally resolvable deferred.
 */

import type { CancellationToken } from '../core/cancellation.js';

/** Longest delay a single Node timer honours; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Sleep for a specified duration
 *
 * @param ms - Duration in milliseconds
 */
export async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  do {
    const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
    remaining -= chunk;
    await new Promise((resolve) => setTimeout(resolve, chunk));
  } while (remaining > 0);
}

/**
 * Sleep that can be interrupted by cancellation.
 * Resolves `true` if the full duration elapsed, `false` if the token was
 * cancelled first (including when it was already cancelled).
 * Durations past MAX_TIMER_DELAY_MS are slept as a chain of timers.
 */
export function cancellableSleep(ms: number, token: CancellationToken): Promise<boolean> {
  return new Promise((resolve) => {
    if (token.isCancelled) {
      resolve(false);
      return;
    }

    let remaining = ms;
    let timer: NodeJS.Timeout | undefined;

    const unsubscribe = token.onCancel(() => {
      clearTimeout(timer);
      resolve(false);
    });

    const arm = () => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        unsubscribe();
        resolve(true);
      }, chunk);
    };
    arm();
  });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

/**
 * Create a deferred promise that can be resolved/rejected externally
 */
export function deferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (error: unknown) => void;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}
