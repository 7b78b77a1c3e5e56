import pLimit, { type LimitFunction } from 'p-limit';

import { createCancelledError } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import { delay, throwIfCancelled } from '../../util/delay.js';

export interface DomainRateLimiterOptions {
  minDelayMs: number;
  maxDelayMs: number;
  maxConcurrentPerDomain: number;
  /** Soft bound on remembered domains; only idle, cooled-down domains are pruned. */
  maxTrackedDomains: number;
  random?: () => number;
}

export interface DomainPermit {
  readonly domain: string;
  release(): void;
}

interface DomainState {
  readonly permits: LimitFunction;
  readonly spacingLock: LimitFunction;
  readonly held: DomainPermit[];
  lastRequestAt: number;
}

export class DomainRateLimiter {
  private readonly states = new Map<string, DomainState>();
  private readonly random: () => number;

  constructor(private readonly options: DomainRateLimiterOptions) {
    this.random = options.random ?? Math.random;
  }

  /**
   * Resolves once a permit for `domain` is held and the randomised spacing
   * since the previous grant has elapsed. The permit stays held until
   * released.
   */
  acquire(domain: string, signal?: AbortSignal): Promise<DomainPermit> {
    const state = this.stateFor(domain);

    return new Promise<DomainPermit>((resolve, reject) => {
      let settled = false;
      const fail = (error: unknown): void => {
        if (settled) {
          return;
        }

        settled = true;
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      };
      const onAbort = (): void => {
        fail(createCancelledError('Cancelled while waiting for a domain permit', { domain }));
      };

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      state
        .permits(async () => {
          // Abandoned while queued: hand the slot straight to the next waiter.
          if (settled) {
            return;
          }

          try {
            await state.spacingLock(() => this.waitForSpacing(domain, state, signal));
          } catch (error) {
            fail(error);
            return;
          }

          if (settled) {
            return;
          }

          settled = true;
          signal?.removeEventListener('abort', onAbort);
          await new Promise<void>((release) => {
            resolve(this.createPermit(domain, state, release));
          });
        })
        .catch(fail);
    });
  }

  /** Releases the oldest permit still held for `domain`. */
  release(domain: string): void {
    const permit = this.states.get(domain)?.held[0];
    if (!permit) {
      componentLogger('rate-limiter').warn({ domain }, 'Release requested for a domain with no held permit');
      return;
    }

    permit.release();
  }

  async withDomain<T>(domain: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(domain, signal);
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  inFlight(domain: string): number {
    return this.states.get(domain)?.held.length ?? 0;
  }

  get trackedDomains(): number {
    return this.states.size;
  }

  clear(): void {
    this.states.clear();
  }

  private stateFor(domain: string): DomainState {
    const existing = this.states.get(domain);
    if (existing) {
      this.states.delete(domain);
      this.states.set(domain, existing);
      return existing;
    }

    const created: DomainState = {
      permits: pLimit(this.options.maxConcurrentPerDomain),
      spacingLock: pLimit(1),
      held: [],
      lastRequestAt: Number.NEGATIVE_INFINITY,
    };
    this.states.set(domain, created);
    this.pruneIdle(domain);
    return created;
  }

  private async waitForSpacing(domain: string, state: DomainState, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal, { domain });
    const { minDelayMs, maxDelayMs } = this.options;
    const targetMs = minDelayMs + (maxDelayMs - minDelayMs) * this.random();
    const elapsedMs = Date.now() - state.lastRequestAt;

    if (elapsedMs < targetMs) {
      const sleepMs = targetMs - elapsedMs;
      componentLogger('rate-limiter').debug(
        { domain, sleepMs: Math.round(sleepMs), targetMs: Math.round(targetMs) },
        `Spacing requests to ${domain}`,
      );
      await delay(sleepMs, signal);
    }

    state.lastRequestAt = Date.now();
  }

  private createPermit(domain: string, state: DomainState, settle: () => void): DomainPermit {
    let released = false;
    const permit: DomainPermit = {
      domain,
      release: () => {
        if (released) {
          return;
        }

        released = true;
        const index = state.held.indexOf(permit);
        if (index >= 0) {
          state.held.splice(index, 1);
        }
        settle();
      },
    };

    state.held.push(permit);
    return permit;
  }

  private pruneIdle(keep: string): void {
    if (this.states.size <= this.options.maxTrackedDomains) {
      return;
    }

    const now = Date.now();
    for (const [domain, state] of this.states) {
      if (this.states.size <= this.options.maxTrackedDomains) {
        break;
      }

      const idle =
        domain !== keep &&
        state.held.length === 0 &&
        state.permits.activeCount === 0 &&
        state.permits.pendingCount === 0 &&
        now - state.lastRequestAt >= this.options.maxDelayMs;

      if (idle) {
        this.states.delete(domain);
      }
    }
  }
}
