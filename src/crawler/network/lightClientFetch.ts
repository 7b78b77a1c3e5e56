import { fetch, ProxyAgent, type Dispatcher } from 'undici';

import {
  createCancelledError,
  createTimeoutError,
  createTransportError,
  HttpStatusError,
  isCrawlerError,
  type CrawlerError,
} from '../../errors.js';
import { componentLogger } from '../../logger.js';
import type { FetchStrategy, PageResponse, StrategyFetchOptions } from '../../types.js';
import { browserLikeHeaders, pickUserAgent } from './browserProfile.js';

export interface LightClientOptions {
  userAgents: readonly string[];
  proxyUrl?: string;
  /** Falls back to `proxyUrl`. */
  httpsProxyUrl?: string;
}

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Plain GET with a rotated User-Agent and browser-like headers. Redirects are
 * followed and TLS certificates verified. Anything outside 2xx is thrown as an
 * {@link HttpStatusError} that still carries the body.
 */
export class LightClientFetch implements FetchStrategy {
  readonly name = 'light' as const;
  private readonly httpDispatcher?: Dispatcher;
  private readonly httpsDispatcher?: Dispatcher;

  constructor(private readonly options: LightClientOptions) {
    if (options.proxyUrl) {
      this.httpDispatcher = new ProxyAgent(options.proxyUrl);
    }

    if (options.httpsProxyUrl && options.httpsProxyUrl !== options.proxyUrl) {
      this.httpsDispatcher = new ProxyAgent(options.httpsProxyUrl);
    } else {
      this.httpsDispatcher = this.httpDispatcher;
    }
  }

  /** The proxy dispatcher a request to `url` goes through, if any. */
  dispatcherFor(url: string): Dispatcher | undefined {
    return new URL(url).protocol === 'https:' ? this.httpsDispatcher : this.httpDispatcher;
  }

  async fetch(url: string, options: StrategyFetchOptions): Promise<PageResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([controller.signal, options.signal]) : controller.signal;
    const userAgent = pickUserAgent(this.options.userAgents);

    componentLogger('light-client').debug({ url, timeoutMs: options.timeoutMs }, 'Fetching');

    try {
      const response = await fetch(url, {
        redirect: 'follow',
        signal,
        headers: browserLikeHeaders(userAgent),
        dispatcher: this.dispatcherFor(url),
      });

      const body = await response.text();
      const finalUrl = response.url || url;

      if (!response.ok) {
        throw new HttpStatusError(response.status, body, finalUrl);
      }

      return { body, status: response.status, finalUrl };
    } catch (error) {
      if (isCrawlerError(error)) {
        throw error;
      }

      throw classifyFetchError(error, {
        url,
        timeoutMs: options.timeoutMs,
        timedOut: controller.signal.aborted,
        cancelled: options.signal?.aborted ?? false,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    const dispatchers = new Set([this.httpDispatcher, this.httpsDispatcher]);
    await Promise.all([...dispatchers].map((dispatcher) => dispatcher?.close()));
  }
}

export function classifyFetchError(
  error: unknown,
  context: { url: string; timeoutMs: number; timedOut: boolean; cancelled: boolean },
): CrawlerError {
  const err = error instanceof Error ? error : new Error(String(error));
  const code = extractErrorCode(err);
  const details = { url: context.url, timeoutMs: context.timeoutMs, ...(code ? { code } : {}) };

  if (context.cancelled && !context.timedOut) {
    return createCancelledError('Request cancelled by caller', details, { cause: err });
  }

  if (context.timedOut || (code !== undefined && TIMEOUT_ERROR_CODES.has(code))) {
    return createTimeoutError(`Request timed out after ${context.timeoutMs}ms`, details, { cause: err });
  }

  return createTransportError(err.message || 'Request failed', details, { cause: err });
}

export function extractErrorCode(error: Error): string | undefined {
  const directCode = 'code' in error ? error.code : undefined;
  if (typeof directCode === 'string') {
    return directCode;
  }

  if (error.cause instanceof Error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
