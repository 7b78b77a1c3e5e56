import {
  createBrowserError,
  createCancelledError,
  createTimeoutError,
  HttpStatusError,
  isCrawlerError,
} from '../../errors.js';
import { componentLogger } from '../../logger.js';
import { throwIfCancelled } from '../../util/delay.js';
import type { FetchStrategy, PageResponse, StrategyFetchOptions } from '../../types.js';
import type { BrowserPool, RenderingContext } from '../browser/browserPool.js';
import { MASK_AUTOMATION_SCRIPT, pickUserAgent, randomViewport } from './browserProfile.js';

export interface RenderedFetchOptions {
  userAgents: readonly string[];
}

/**
 * Loads a page in a fresh, isolated browser context and returns the
 * serialised DOM once `DOMContentLoaded` fires. Contexts are never reused:
 * each one is closed before the call settles, whatever the outcome.
 */
export class RenderedBrowserFetch implements FetchStrategy {
  readonly name = 'rendered' as const;

  constructor(
    private readonly pool: BrowserPool,
    private readonly options: RenderedFetchOptions,
  ) {}

  async fetch(url: string, options: StrategyFetchOptions): Promise<PageResponse> {
    const logger = componentLogger('rendered');
    const { signal, timeoutMs } = options;
    let context: RenderingContext | undefined;
    let cancelled = false;

    const onAbort = (): void => {
      cancelled = true;
      context?.close().catch((error: unknown) => {
        logger.warn({ err: error, url }, 'Closing context after cancellation failed');
      });
    };

    try {
      throwIfCancelled(signal, { url });
      signal?.addEventListener('abort', onAbort, { once: true });

      const browser = await this.pool.getBrowser();
      throwIfCancelled(signal, { url });
      const viewport = randomViewport();
      context = await browser.newContext({
        userAgent: pickUserAgent(this.options.userAgents),
        viewport,
        javaScriptEnabled: true,
        bypassCSP: true,
      });
      throwIfCancelled(signal, { url });
      await context.addInitScript(MASK_AUTOMATION_SCRIPT);

      const page = await context.newPage();
      logger.debug({ url, timeoutMs, viewport }, 'Navigating');
      const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });

      if (!response) {
        throw createBrowserError('Navigation returned no response', { url });
      }

      const status = response.status();
      const body = await page.content();
      const finalUrl = page.url() || url;

      if (status < 200 || status >= 300) {
        throw new HttpStatusError(status, body, finalUrl);
      }

      return { body, status, finalUrl };
    } catch (error) {
      if (cancelled && !isCrawlerError(error)) {
        throw createCancelledError('Request cancelled by caller', { url }, { cause: error });
      }

      if (isCrawlerError(error)) {
        throw error;
      }

      if (error instanceof Error && error.name === 'TimeoutError') {
        throw createTimeoutError(`Navigation timed out after ${timeoutMs}ms`, { url, timeoutMs }, { cause: error });
      }

      throw createBrowserError(error instanceof Error ? error.message : 'Browser fetch failed', { url }, { cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (context) {
        await closeContext(context, url);
      }
    }
  }
}

async function closeContext(context: RenderingContext, url: string): Promise<void> {
  try {
    await context.close();
  } catch (error) {
    componentLogger('rendered').warn({ err: error, url }, 'Failed to close browser context');
  }
}
