import { Crawler, type CrawlerDependencies } from './crawler/crawler.js';
import { DEFAULT_USER_AGENTS } from './crawler/network/browserProfile.js';
import { createConfigurationError } from './errors.js';
import type { CrawlerConfig, CrawlerOptions, RobotsScheme } from './types.js';

export const DEFAULT_OPTIONS: CrawlerOptions = {
  userAgents: DEFAULT_USER_AGENTS,
  timeoutMs: 30_000,
  renderedTimeoutMs: 60_000,
  minDelayMs: 3_000,
  maxDelayMs: 10_000,
  maxConcurrentPerDomain: 1,
  maxTrackedDomains: 10_000,
  maxRetries: 3,
  retryBaseDelayMs: 1_000,
  backoffMultiplier: 2,
  jitter: 0.5,
  respectRobots: true,
  robotsUserAgent: '*',
  robotsFetchUserAgent: 'polite-fetch/0.1 (+robots)',
  robotsCacheSize: 100,
  robotsTimeoutMs: 10_000,
  robotsSchemes: ['https', 'http'],
  proxyUrl: undefined,
  httpsProxyUrl: undefined,
  headless: true,
  useRenderedByDefault: false,
};

const VALID_ROBOTS_SCHEMES: RobotsScheme[] = ['https', 'http'];

export function createCrawler(config: CrawlerConfig = {}, dependencies: CrawlerDependencies = {}): Crawler {
  return new Crawler(resolveCrawlerOptions(config), dependencies);
}

export function resolveCrawlerOptions(config: CrawlerConfig = {}): CrawlerOptions {
  const options: CrawlerOptions = {
    ...DEFAULT_OPTIONS,
    ...config,
  };

  options.timeoutMs = coercePositiveInteger(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout-ms');
  // The rendered timeout follows the light one unless set explicitly.
  options.renderedTimeoutMs = coercePositiveInteger(
    config.renderedTimeoutMs ?? options.timeoutMs * 2,
    'rendered-timeout-ms',
  );
  options.minDelayMs = coerceNonNegativeInteger(config.minDelayMs ?? DEFAULT_OPTIONS.minDelayMs, 'min-delay-ms');
  options.maxDelayMs = coerceNonNegativeInteger(config.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs, 'max-delay-ms');

  if (options.minDelayMs > options.maxDelayMs) {
    throw createConfigurationError('min-delay-ms must not exceed max-delay-ms.', {
      minDelayMs: options.minDelayMs,
      maxDelayMs: options.maxDelayMs,
    });
  }

  options.maxConcurrentPerDomain = coercePositiveInteger(
    config.maxConcurrentPerDomain ?? DEFAULT_OPTIONS.maxConcurrentPerDomain,
    'max-concurrent-per-domain',
  );
  options.maxTrackedDomains = coercePositiveInteger(
    config.maxTrackedDomains ?? DEFAULT_OPTIONS.maxTrackedDomains,
    'max-tracked-domains',
  );
  options.maxRetries = coerceNonNegativeInteger(config.maxRetries ?? DEFAULT_OPTIONS.maxRetries, 'max-retries');
  options.retryBaseDelayMs = coerceNonNegativeInteger(
    config.retryBaseDelayMs ?? DEFAULT_OPTIONS.retryBaseDelayMs,
    'retry-base-delay-ms',
  );

  const multiplier = config.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier;
  if (!Number.isFinite(multiplier) || multiplier < 1) {
    throw createConfigurationError('backoff-multiplier must be a number of at least 1.', { value: multiplier });
  }
  options.backoffMultiplier = multiplier;

  const jitter = config.jitter ?? DEFAULT_OPTIONS.jitter;
  if (!Number.isFinite(jitter) || jitter < 0 || jitter > 1) {
    throw createConfigurationError('jitter must be between 0 and 1.', { value: jitter });
  }
  options.jitter = jitter;

  options.robotsCacheSize = coercePositiveInteger(
    config.robotsCacheSize ?? DEFAULT_OPTIONS.robotsCacheSize,
    'robots-cache-size',
  );
  options.robotsTimeoutMs = coercePositiveInteger(
    config.robotsTimeoutMs ?? DEFAULT_OPTIONS.robotsTimeoutMs,
    'robots-timeout-ms',
  );

  const schemes = config.robotsSchemes ?? DEFAULT_OPTIONS.robotsSchemes;
  if (schemes.length === 0 || schemes.some((scheme) => !VALID_ROBOTS_SCHEMES.includes(scheme))) {
    throw createConfigurationError('robots-schemes must list https and/or http.', { value: schemes });
  }
  options.robotsSchemes = schemes;

  const userAgents = (config.userAgents ?? DEFAULT_OPTIONS.userAgents).filter((agent) => agent.trim().length > 0);
  if (userAgents.length === 0) {
    throw createConfigurationError('At least one User-Agent is required.', {});
  }
  options.userAgents = userAgents;

  if (config.proxyUrl !== undefined) {
    options.proxyUrl = validateProxyUrl(config.proxyUrl);
  }

  if (config.httpsProxyUrl !== undefined) {
    options.httpsProxyUrl = validateProxyUrl(config.httpsProxyUrl);
  }

  return options;
}

function validateProxyUrl(value: string): string {
  let url: URL;

  try {
    url = new URL(value);
  } catch {
    throw createConfigurationError(`Invalid proxy URL: ${value}`, { proxyUrl: value });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Proxy URL must use http or https protocol.', { protocol: url.protocol });
  }

  return url.href;
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { Crawler, statusForError, type CrawlerDependencies } from './crawler/crawler.js';
export { BrowserPool, type BrowserLauncher, type RenderingBrowser } from './crawler/browser/browserPool.js';
export { LightClientFetch } from './crawler/network/lightClientFetch.js';
export { RenderedBrowserFetch } from './crawler/network/renderedBrowserFetch.js';
export { withRetry, type RetryPolicy, type RetryOutcome } from './crawler/network/retryPolicy.js';
export { createRobotsLoader, type RobotsLoader } from './crawler/network/robots.js';
export { DomainRateLimiter, type DomainPermit } from './crawler/politeness/domainRateLimiter.js';
export { RobotsPolicyCache } from './crawler/politeness/robotsPolicyCache.js';
export { detectChallenge } from './crawler/parsing/detectChallenge.js';
export { CrawlerError, HttpStatusError, isCrawlerError } from './errors.js';
export { configureLogger, setLoggerInstance, type LoggerLike } from './logger.js';
export { SYNTHETIC_STATUS } from './types.js';
export type { CrawlerConfig, CrawlerOptions, FetchOverrides, FetchResult, FetchSummary } from './types.js';
