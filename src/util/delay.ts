import { createCancelledError } from '../errors.js';

/**
 * Sleeps for `ms`. Rejects with a `cancelled` error as soon as `signal`
 * aborts, clearing the pending timer.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(createCancelledError('Cancelled before sleeping', { delayMs: ms }));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(createCancelledError('Cancelled while sleeping', { delayMs: ms }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfCancelled(signal: AbortSignal | undefined, details: Record<string, unknown> = {}): void {
  if (signal?.aborted) {
    throw createCancelledError('Request cancelled by caller', details);
  }
}
