import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { isHttpStatusError } from '../src/errors.js';
import { classifyFetchError, extractErrorCode, LightClientFetch } from '../src/crawler/network/lightClientFetch.js';
import { startTestServer, type TestServer } from './support/httpServer.js';

let server: TestServer;
const seenUserAgents: string[] = [];

beforeAll(async () => {
  server = await startTestServer((req, res) => {
    seenUserAgents.push(String(req.headers['user-agent']));

    switch (req.url) {
      case '/ok':
        res.setHeader('Content-Type', 'text/html; charset=utf-8');
        res.end('<html><body>hello</body></html>');
        return;
      case '/redirect':
        res.statusCode = 302;
        res.setHeader('Location', '/ok');
        res.end();
        return;
      case '/missing':
        res.statusCode = 404;
        res.end('not here');
        return;
      case '/broken':
        res.statusCode = 503;
        res.end('try later');
        return;
      case '/slow':
        setTimeout(() => res.end('late'), 500);
        return;
      default:
        res.statusCode = 500;
        res.end();
    }
  });
});

afterAll(async () => {
  await server.close();
});

const client = new LightClientFetch({ userAgents: ['test-agent/1.0'] });

describe('LightClientFetch', () => {
  it('returns body, status and final URL for a 2xx response', async () => {
    const page = await client.fetch(`${server.baseUrl}/ok`, { timeoutMs: 2_000 });

    expect(page).toEqual({
      body: '<html><body>hello</body></html>',
      status: 200,
      finalUrl: `${server.baseUrl}/ok`,
    });
    expect(seenUserAgents.at(-1)).toBe('test-agent/1.0');
  });

  it('follows redirects and reports where it landed', async () => {
    const page = await client.fetch(`${server.baseUrl}/redirect`, { timeoutMs: 2_000 });

    expect(page.status).toBe(200);
    expect(page.finalUrl).toBe(`${server.baseUrl}/ok`);
  });

  it('throws a non-retryable status error carrying the body for a 404', async () => {
    const error = await client.fetch(`${server.baseUrl}/missing`, { timeoutMs: 2_000 }).catch((err: unknown) => err);

    expect(isHttpStatusError(error)).toBe(true);
    expect(error).toMatchObject({ kind: 'status', status: 404, body: 'not here' });
  });

  it('classifies a 5xx as an upstream failure', async () => {
    const error = await client.fetch(`${server.baseUrl}/broken`, { timeoutMs: 2_000 }).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: 'upstream', status: 503, body: 'try later' });
  });

  it('times out slow responses', async () => {
    const error = await client.fetch(`${server.baseUrl}/slow`, { timeoutMs: 50 }).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: 'timeout', message: 'Request timed out after 50ms' });
  });

  it('reports caller cancellation separately from a timeout', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const error = await client
      .fetch(`${server.baseUrl}/slow`, { timeoutMs: 2_000, signal: controller.signal })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: 'cancelled' });
  });

  it('maps a refused connection to a transport failure', async () => {
    const closed = await startTestServer((_req, res) => res.end());
    const url = `${closed.baseUrl}/`;
    await closed.close();

    const error = await client.fetch(url, { timeoutMs: 2_000 }).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: 'transport' });
  });
});

describe('classifyFetchError', () => {
  const context = { url: 'https://example.com/', timeoutMs: 1_000, timedOut: false, cancelled: false };

  it('treats timeout error codes as timeouts', () => {
    const cause = Object.assign(new Error('connect timeout'), { code: 'UND_ERR_CONNECT_TIMEOUT' });
    const error = classifyFetchError(new Error('fetch failed', { cause }), context);

    expect(error.kind).toBe('timeout');
    expect(error.details).toEqual({ url: 'https://example.com/', timeoutMs: 1_000, code: 'UND_ERR_CONNECT_TIMEOUT' });
  });

  it('falls back to a transport failure', () => {
    const error = classifyFetchError('socket hang up', context);

    expect(error.kind).toBe('transport');
    expect(error.message).toBe('socket hang up');
  });
});

describe('extractErrorCode', () => {
  it('walks the cause chain', () => {
    const root = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });
    const wrapped = new Error('outer', { cause: new Error('middle', { cause: root }) });

    expect(extractErrorCode(wrapped)).toBe('ECONNREFUSED');
    expect(extractErrorCode(new Error('plain'))).toBeUndefined();
  });
});

describe('LightClientFetch proxy selection', () => {
  it('uses no dispatcher without a proxy', () => {
    const client = new LightClientFetch({ userAgents: ['test-agent/1.0'] });

    expect(client.dispatcherFor('https://example.com/')).toBeUndefined();
    expect(client.dispatcherFor('http://example.com/')).toBeUndefined();
  });

  it('sends both schemes through a single proxy', async () => {
    const client = new LightClientFetch({ userAgents: ['test-agent/1.0'], proxyUrl: 'http://proxy.local:3128/' });

    expect(client.dispatcherFor('http://example.com/')).toBeDefined();
    expect(client.dispatcherFor('https://example.com/')).toBe(client.dispatcherFor('http://example.com/'));
    await client.close();
  });

  it('routes https targets through their own proxy when one is given', async () => {
    const client = new LightClientFetch({
      userAgents: ['test-agent/1.0'],
      proxyUrl: 'http://proxy.local:3128/',
      httpsProxyUrl: 'http://secure-proxy.local:3129/',
    });

    const http = client.dispatcherFor('http://example.com/');
    const https = client.dispatcherFor('https://example.com/');

    expect(http).toBeDefined();
    expect(https).toBeDefined();
    expect(https).not.toBe(http);
    await client.close();
  });
});
