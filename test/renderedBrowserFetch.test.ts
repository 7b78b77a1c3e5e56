import { describe, expect, it } from 'vitest';

import { BrowserPool } from '../src/crawler/browser/browserPool.js';
import { MASK_AUTOMATION_SCRIPT } from '../src/crawler/network/browserProfile.js';
import { RenderedBrowserFetch } from '../src/crawler/network/renderedBrowserFetch.js';
import { FakeBrowser, type FakeNavigation } from './support/fakeBrowser.js';

function setup(navigation: FakeNavigation = {}) {
  const browser = new FakeBrowser(navigation);
  const pool = new BrowserPool({ headless: true, launcher: async () => browser });
  const fetcher = new RenderedBrowserFetch(pool, { userAgents: ['test-agent/1.0'] });
  return { browser, pool, fetcher };
}

describe('RenderedBrowserFetch', () => {
  it('returns the rendered DOM from a fresh, masked context and closes it', async () => {
    const { browser, fetcher } = setup({
      body: '<html><body>from js</body></html>',
      finalUrl: 'https://example.com/landing',
    });

    const page = await fetcher.fetch('https://example.com/', { timeoutMs: 1_000 });

    expect(page).toEqual({
      body: '<html><body>from js</body></html>',
      status: 200,
      finalUrl: 'https://example.com/landing',
    });

    const [context] = browser.contexts;
    expect(browser.contexts).toHaveLength(1);
    expect(context?.closed).toBe(true);
    expect(context?.initScripts).toEqual([MASK_AUTOMATION_SCRIPT]);
    expect(context?.options.userAgent).toBe('test-agent/1.0');
    expect(context?.options.viewport.width).toBeGreaterThanOrEqual(1280);
    expect(context?.options.viewport.width).toBeLessThanOrEqual(1920);
    expect(context?.options.viewport.height).toBeGreaterThanOrEqual(720);
    expect(context?.options.viewport.height).toBeLessThanOrEqual(1080);
  });

  it('uses a new context for every call', async () => {
    const { browser, fetcher } = setup();

    await fetcher.fetch('https://example.com/a', { timeoutMs: 1_000 });
    await fetcher.fetch('https://example.com/b', { timeoutMs: 1_000 });

    expect(browser.contexts).toHaveLength(2);
    expect(browser.contexts.every((context) => context.closed)).toBe(true);
  });

  it('classifies non-2xx navigations like the light client', async () => {
    const notFound = setup({ status: 404, body: 'gone' });
    await expect(notFound.fetcher.fetch('https://example.com/', { timeoutMs: 1_000 })).rejects.toMatchObject({
      kind: 'status',
      status: 404,
      body: 'gone',
    });

    const unavailable = setup({ status: 503 });
    await expect(unavailable.fetcher.fetch('https://example.com/', { timeoutMs: 1_000 })).rejects.toMatchObject({
      kind: 'upstream',
      status: 503,
    });
    expect(unavailable.browser.contexts[0]?.closed).toBe(true);
  });

  it('maps a navigation timeout to a timeout failure and still closes the context', async () => {
    const timeout = new Error('page.goto: Timeout 1000ms exceeded.');
    timeout.name = 'TimeoutError';
    const { browser, fetcher } = setup({ error: timeout });

    await expect(fetcher.fetch('https://example.com/', { timeoutMs: 1_000 })).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Navigation timed out after 1000ms',
    });
    expect(browser.contexts[0]?.closed).toBe(true);
  });

  it('maps other navigation errors to browser failures', async () => {
    const { browser, fetcher } = setup({ error: new Error('net::ERR_NAME_NOT_RESOLVED') });

    await expect(fetcher.fetch('https://example.com/', { timeoutMs: 1_000 })).rejects.toMatchObject({
      kind: 'browser',
      message: 'net::ERR_NAME_NOT_RESOLVED',
    });
    expect(browser.contexts[0]?.closed).toBe(true);
  });

  it('treats a navigation without a response as a browser failure', async () => {
    const { fetcher } = setup({ noResponse: true });

    await expect(fetcher.fetch('https://example.com/', { timeoutMs: 1_000 })).rejects.toMatchObject({
      kind: 'browser',
      message: 'Navigation returned no response',
    });
  });

  it('closes the context early when the caller cancels', async () => {
    const { browser, fetcher } = setup({ hang: true });
    const controller = new AbortController();

    const pending = fetcher.fetch('https://example.com/', { timeoutMs: 60_000, signal: controller.signal });
    await new Promise((resolve) => setTimeout(resolve, 10));
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'cancelled' });
    expect(browser.contexts[0]?.closed).toBe(true);
  });

  it('fails fast when already cancelled', async () => {
    const { browser, fetcher } = setup();

    await expect(
      fetcher.fetch('https://example.com/', { timeoutMs: 1_000, signal: AbortSignal.abort() }),
    ).rejects.toMatchObject({ kind: 'cancelled' });
    expect(browser.contexts).toHaveLength(0);
  });
});
