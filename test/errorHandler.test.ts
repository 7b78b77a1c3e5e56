import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createConfigurationError,
  createTransportError,
  ensureCrawlerError,
  HttpStatusError,
} from '../src/errors.js';
import { configureLogger, setLoggerInstance } from '../src/logger.js';
import { buildLogMessage, reportCrawlerError } from '../src/util/errorHandler.js';
import { createRecordingLogger } from './support/recordingLogger.js';

let logger: ReturnType<typeof createRecordingLogger>;

beforeEach(() => {
  logger = createRecordingLogger();
  setLoggerInstance(logger);
});

afterEach(() => {
  configureLogger();
});

describe('reportCrawlerError', () => {
  it('logs recoverable errors at warn without throwing', () => {
    const error = createTransportError('connection refused', { url: 'https://example.com' });

    const result = reportCrawlerError(error, { stage: 'fetch', attempt: 1 });

    expect(result).toBe(error);
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]?.level).toBe('warn');
    expect(logger.entries[0]?.args[1]).toBe(
      '[transport/recoverable] connection refused (attempt=1 stage="fetch" url="https://example.com")',
    );
  });

  it('logs fatal errors at fatal with the error attached', () => {
    const error = createConfigurationError('bad config');

    reportCrawlerError(error, { stage: 'cli' });

    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]?.level).toBe('fatal');
    expect(logger.entries[0]?.args[0]).toEqual({ err: error, stage: 'cli' });
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const result = reportCrawlerError('oops', { stage: 'cli' });

    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.message).toBe('oops');
    expect(logger.entries[0]?.level).toBe('fatal');
  });

  it('honours the default kind and severity for foreign errors', () => {
    const result = reportCrawlerError(new Error('nope'), {}, { defaultKind: 'config', defaultSeverity: 'recoverable' });

    expect(result.kind).toBe('config');
    expect(result.severity).toBe('recoverable');
    expect(logger.entries[0]?.level).toBe('warn');
  });
});

describe('error helpers', () => {
  it('classifies HTTP statuses by transience', () => {
    expect(new HttpStatusError(500, '', 'https://example.com/').kind).toBe('upstream');
    expect(new HttpStatusError(429, '', 'https://example.com/').kind).toBe('upstream');
    expect(new HttpStatusError(408, '', 'https://example.com/').kind).toBe('upstream');
    expect(new HttpStatusError(403, '', 'https://example.com/').kind).toBe('status');
  });

  it('keeps crawler errors as they are', () => {
    const error = createTransportError('reset');
    expect(ensureCrawlerError(error)).toBe(error);
  });

  it('omits undefined context values from log messages', () => {
    const message = buildLogMessage(createTransportError('reset'), { url: undefined, domain: 'example.com' });
    expect(message).toBe('[transport/recoverable] reset (domain="example.com")');
  });
});
