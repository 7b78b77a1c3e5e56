#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';
import pLimit from 'p-limit';
import pino from 'pino';

import { createCrawler } from './index.js';
import { createConfigurationError } from './errors.js';
import { configureLogger, isLogLevel } from './logger.js';
import type { CrawlerConfig, FetchRequest } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { logError, writeFetchResult, writeSummary, type OutputFormat } from './util/output.js';

const require = createRequire(import.meta.url);
const pkg: { version?: string } = require('../package.json');

const DEFAULT_CONCURRENCY = 4;

interface CliSettings {
  config: CrawlerConfig;
  concurrency: number;
  format: OutputFormat;
  rendered: boolean;
}

const program = new Command();

program
  .name('polite-fetch')
  .description('Fetch pages politely: robots.txt aware, rate limited per domain, retried on transient failures.')
  .version(pkg.version ?? '0.0.0');

program
  .command('fetch')
  .description('Fetch one or more URLs and report status, final URL and size.')
  .argument('<urls...>', 'URLs to fetch.')
  .option('--rendered', 'Render pages in a headless browser instead of a plain HTTP client.')
  .option('--timeout-ms <number>', 'Timeout per light request in milliseconds. (default: 30000)')
  .option('--rendered-timeout-ms <number>', 'Timeout per rendered navigation. (default: twice --timeout-ms)')
  .option('--min-delay-ms <number>', 'Minimum gap between requests to one domain. (default: 3000)')
  .option('--max-delay-ms <number>', 'Maximum gap between requests to one domain. (default: 10000)')
  .option('--max-per-domain <number>', 'Maximum in-flight requests per domain. (default: 1)')
  .option('--concurrency <number>', `Maximum URLs in flight overall. (default: ${DEFAULT_CONCURRENCY})`)
  .option('--max-retries <number>', 'Retries after the first attempt for transient failures. (default: 3)')
  .option('--no-robots', 'Ignore robots.txt.')
  .option('--robots-user-agent <agent>', 'User-agent token matched against robots.txt groups. (default: *)')
  .option('--proxy <url>', 'Route requests through an HTTP(S) proxy.')
  .option('--https-proxy <url>', 'Separate proxy for https targets. (default: --proxy)')
  .option('--headed', 'Show the browser window for rendered fetches.')
  .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal).')
  .action(async (urls: string[], options: Record<string, unknown>) => {
    try {
      await runFetch(urls, buildSettings(options));
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

async function runFetch(urls: string[], settings: CliSettings): Promise<void> {
  const crawler = createCrawler(settings.config);
  const controller = new AbortController();
  const onSigint = (): void => {
    logError('Interrupted; cancelling outstanding fetches.');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const limit = pLimit(settings.concurrency);
  const requests: FetchRequest[] = urls.map((url) => ({
    url,
    useRenderedFetch: settings.rendered,
    signal: controller.signal,
  }));

  try {
    await Promise.all(
      requests.map((request) =>
        limit(async () => {
          const result = await crawler.fetch(request.url, request.useRenderedFetch, request);
          writeFetchResult(request.url, result, settings.format);
        }),
      ),
    );
    writeSummary(crawler.stats(), settings.format);
  } finally {
    process.removeListener('SIGINT', onSigint);
    await crawler.close();
  }
}

function buildSettings(rawOptions: Record<string, unknown>): CliSettings {
  const config: CrawlerConfig = {};

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.renderedTimeoutMs !== undefined) {
    config.renderedTimeoutMs = asNumber(rawOptions.renderedTimeoutMs, 'rendered-timeout-ms');
  }

  if (rawOptions.minDelayMs !== undefined) {
    config.minDelayMs = asNumber(rawOptions.minDelayMs, 'min-delay-ms');
  }

  if (rawOptions.maxDelayMs !== undefined) {
    config.maxDelayMs = asNumber(rawOptions.maxDelayMs, 'max-delay-ms');
  }

  if (rawOptions.maxPerDomain !== undefined) {
    config.maxConcurrentPerDomain = asNumber(rawOptions.maxPerDomain, 'max-per-domain');
  }

  if (rawOptions.maxRetries !== undefined) {
    config.maxRetries = asNumber(rawOptions.maxRetries, 'max-retries');
  }

  if (rawOptions.robots === false) {
    config.respectRobots = false;
  }

  if (rawOptions.robotsUserAgent !== undefined) {
    config.robotsUserAgent = String(rawOptions.robotsUserAgent);
  }

  if (rawOptions.proxy !== undefined) {
    config.proxyUrl = String(rawOptions.proxy);
  }

  if (rawOptions.httpsProxy !== undefined) {
    config.httpsProxyUrl = String(rawOptions.httpsProxy);
  }

  if (rawOptions.headed === true) {
    config.headless = false;
  }

  const concurrency =
    rawOptions.concurrency !== undefined ? asNumber(rawOptions.concurrency, 'concurrency') : DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw createConfigurationError('concurrency must be a positive integer.', { value: concurrency });
  }

  const format = String(rawOptions.format ?? 'text').toLowerCase();
  if (!isOutputFormat(format)) {
    throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
  }

  if (rawOptions.logLevel !== undefined) {
    const level = String(rawOptions.logLevel);
    if (!isLogLevel(level)) {
      throw createConfigurationError(`Unsupported log level: ${level}`, { value: level });
    }
    // Logs go to stderr so stdout stays machine-readable.
    configureLogger({ level, destination: pino.destination(2) });
  }

  return { config, concurrency, format, rendered: rawOptions.rendered === true };
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}
