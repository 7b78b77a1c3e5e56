import { isCrawlerError, type ErrorKind } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import { delay } from '../../util/delay.js';

export interface RetryPolicy {
  /** Retries after the first try; `maxRetries = N` allows N + 1 tries in total. */
  maxRetries: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  /** Fraction of the current delay used as symmetric random jitter, e.g. 0.5 for ±50%. */
  jitter: number;
  retryableKinds: ReadonlySet<ErrorKind>;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryRunOptions {
  label?: string;
  signal?: AbortSignal;
  random?: () => number;
}

export const DEFAULT_RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'timeout',
  'transport',
  'upstream',
  'browser',
]);

export function isRetryable(error: unknown, kinds: ReadonlySet<ErrorKind>): boolean {
  return isCrawlerError(error) && kinds.has(error.kind);
}

export function computeBackoffSleep(delayMs: number, jitter: number, random: () => number): number {
  const perturbation = -jitter + 2 * jitter * random();
  return Math.max(0, delayMs * (1 + perturbation));
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * the policy runs out of retries. The failing outcome always carries the
 * last error thrown by `operation` itself.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryRunOptions = {},
): Promise<RetryOutcome<T>> {
  const { label = 'operation', signal, random = Math.random } = options;
  const totalAttempts = policy.maxRetries + 1;
  let currentDelay = policy.baseDelayMs;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (attempt >= totalAttempts || !isRetryable(error, policy.retryableKinds) || signal?.aborted) {
        return { ok: false, error, attempts: attempt };
      }

      const sleepMs = computeBackoffSleep(currentDelay, policy.jitter, random);
      componentLogger('retry').warn(
        {
          label,
          attempt,
          totalAttempts,
          failure: summariseFailure(error),
          sleepMs: Math.round(sleepMs),
        },
        `Attempt ${attempt}/${totalAttempts} for ${label} failed; retrying in ${Math.round(sleepMs)}ms`,
      );

      try {
        await delay(sleepMs, signal);
      } catch (cancelled) {
        return { ok: false, error: cancelled, attempts: attempt };
      }

      currentDelay *= policy.backoffMultiplier;
    }
  }
}

function summariseFailure(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
