export type RetryDecision =
  | { kind: 'retry'; delaySeconds: number }
  | { kind: 'exhausted' };

/**
 * Decide what happens to a job after a failed run.
 * `attempts` is the count including the failure that just happened.
 */
export function nextAttempt(
  attempts: number,
  retryLimit: number,
  backoffBase: number,
  maxDelaySeconds?: number
): RetryDecision {
  if (attempts >= retryLimit) return { kind: 'exhausted' };
  const delay = Math.pow(backoffBase, attempts);
  return {
    kind: 'retry',
    delaySeconds: maxDelaySeconds === undefined ? delay : Math.min(delay, maxDelaySeconds),
  };
}

/** Latest instant that still sorts correctly as an ISO-8601 string. */
export const LATEST_RUN_AT = new Date(Date.UTC(9999, 11, 31, 23, 59, 59, 999));

/**
 * When a retry becomes eligible. Delays past year 9999, or not finite,
 * are pinned to LATEST_RUN_AT.
 */
export function retryAt(now: Date, delaySeconds: number): Date {
  const ms = now.getTime() + delaySeconds * 1000;
  if (!Number.isFinite(ms) || ms > LATEST_RUN_AT.getTime()) return new Date(LATEST_RUN_AT.getTime());
  return new Date(ms);
}
