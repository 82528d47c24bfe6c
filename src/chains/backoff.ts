/**
 * Backoff policies map the failure history of a chain to the delay before
 * the next attempt, or `null` to give up.
 *
 * `failureOffsetsMs` holds one entry per consecutive failure, relative to the
 * first one, so it always starts with 0.
 */
export type BackoffDecision = number | null;

export type BackoffPolicy<A> = (
  failureOffsetsMs: readonly number[],
  user: string,
  args: A,
  error: unknown
) => BackoffDecision | Promise<BackoffDecision>;

const DEFAULT_STEPS_MS = [30_000, 120_000, 600_000];

/** 30s after the 1st failure, 2m after the 2nd, 10m after the 3rd, then stop. */
export function defaultBackoff(failureOffsetsMs: readonly number[]): BackoffDecision {
  return DEFAULT_STEPS_MS[failureOffsetsMs.length - 1] ?? null;
}

/**
 * `min(capMs, baseMs * 2^N)` where N counts the failures before the latest
 * one, so the first retry waits `baseMs`. Never gives up.
 */
export function exponentialBackoff(baseMs: number, capMs: number): BackoffPolicy<unknown> {
  return (failureOffsetsMs) => Math.min(capMs, baseMs * 2 ** Math.max(0, failureOffsetsMs.length - 1));
}

export function constantBackoff(delayMs: number): BackoffPolicy<unknown> {
  return () => delayMs;
}
