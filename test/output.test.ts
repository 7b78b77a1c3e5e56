import { afterEach, describe, expect, it, vi } from 'vitest';

import type { FetchResult, FetchSummary } from '../src/types.js';
import { formatDuration, logError, writeFetchResult, writeSummary } from '../src/util/output.js';

const result: FetchResult = {
  content: '<html>ok</html>',
  statusCode: 200,
  finalUrl: 'https://example.com/landing',
  challengeDetected: true,
  strategy: 'light',
  attempts: 2,
};

const summary: FetchSummary = {
  fetchesStarted: 3,
  fetchesSucceeded: 1,
  fetchesFailed: 2,
  invalidUrls: 0,
  robotsBlocked: 1,
  retryAttempts: 1,
  challengesDetected: 1,
  statusCounts: { '500': 1, '200': 1, '403': 1 },
  failureReasons: { robots: 1, http_500: 1 },
  durationMs: 1_250,
};

function captureStdout() {
  return vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('output', () => {
  it('writes one text block per result', () => {
    const stdoutSpy = captureStdout();

    writeFetchResult('https://example.com/', result, 'text');

    expect(stdoutSpy).toHaveBeenCalledWith(
      'FETCHED: https://example.com/ -> 200 https://example.com/landing\n' +
        '  strategy=light attempts=2 bytes=15 challenge=yes\n',
    );
  });

  it('writes results as JSON lines', () => {
    const stdoutSpy = captureStdout();

    writeFetchResult('https://example.com/', result, 'json');

    const line = String(stdoutSpy.mock.calls[0]?.[0]);
    expect(JSON.parse(line)).toEqual({ url: 'https://example.com/', ...result });
  });

  it('renders the summary with sorted status codes', () => {
    const stdoutSpy = captureStdout();

    writeSummary(summary, 'text');

    const text = String(stdoutSpy.mock.calls[0]?.[0]);
    expect(text.split('\n')).toEqual([
      '',
      '--- Fetch Summary ---',
      'Fetches started: 3',
      'Succeeded: 1',
      'Failed: 2',
      'Invalid URLs: 0',
      'Blocked by robots.txt: 1',
      'Retry attempts: 1',
      'Challenges detected: 1',
      'Duration: 1.25s (1250 ms)',
      'Status codes:',
      '  200: 1',
      '  403: 1',
      '  500: 1',
      'Failure reasons:',
      '  robots: 1',
      '  http_500: 1',
      '',
    ]);
  });

  it('sends errors to stderr with a trailing newline', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logError('fetch failure: https://example.com/fail');

    expect(stderrSpy).toHaveBeenCalledWith('fetch failure: https://example.com/fail\n');
  });

  it('formats durations', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(420)).toBe('420ms');
    expect(formatDuration(12_340)).toBe('12.3s');
    expect(formatDuration(95_000)).toBe('1m 35s');
  });
});
