/**
 * Race a promise against an absolute deadline.
 */

import { Logger } from '@datagrep/shared/Utils/logger.js';

const logger = new Logger('sandbox:deadline');

export type DeadlineOutcome<T> = { expired: false; value: T } | { expired: true };

/**
 * Resolve with the promise's value, or with `{ expired: true }` once
 * `deadline` (epoch ms) passes. A rejection that arrives after the
 * deadline is logged, never left unhandled.
 */
export async function withDeadline<T>(
  promise: Promise<T>,
  deadline: number,
): Promise<DeadlineOutcome<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let expired = false;

  const expiry = new Promise<DeadlineOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      expired = true;
      resolve({ expired: true });
    }, Math.max(0, deadline - Date.now()));
  });

  const settled = promise.then(
    (value): DeadlineOutcome<T> => ({ expired: false, value }),
    (err: unknown): DeadlineOutcome<T> => {
      if (expired) {
        logger.debug('Rejection after deadline', err);
        return { expired: true };
      }
      throw err;
    },
  );

  try {
    return await Promise.race([settled, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/** Seconds, rounded to two decimals. */
export function elapsedSeconds(startedAt: number, now: number = Date.now()): number {
  return Math.round(((now - startedAt) / 1000) * 100) / 100;
}
