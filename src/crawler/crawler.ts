import { isHttpStatusError, type CrawlerError } from '../errors.js';
import { componentLogger } from '../logger.js';
import type {
  CrawlerOptions,
  FetchOverrides,
  FetchResult,
  FetchStrategy,
  FetchStrategyName,
  FetchSummary,
  PageResponse,
} from '../types.js';
import { SYNTHETIC_STATUS } from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { BrowserPool } from './browser/browserPool.js';
import { LightClientFetch } from './network/lightClientFetch.js';
import { RenderedBrowserFetch } from './network/renderedBrowserFetch.js';
import { DEFAULT_RETRYABLE_KINDS, withRetry, type RetryPolicy } from './network/retryPolicy.js';
import { createRobotsLoader, type RobotsLoader } from './network/robots.js';
import { detectChallenge } from './parsing/detectChallenge.js';
import { DomainRateLimiter } from './politeness/domainRateLimiter.js';
import { RobotsPolicyCache } from './politeness/robotsPolicyCache.js';
import { buildFetchSummary } from './reporting/summary.js';
import { initializeStats, recordFetchMetrics, type FetchOutcomeKind, type FetchStats } from './state/stats.js';
import { parseTarget, type FetchTarget } from './url/parseTarget.js';

/** Seams for tests and embedders; anything left out is built from the options. */
export interface CrawlerDependencies {
  browserPool?: BrowserPool;
  robotsLoader?: RobotsLoader;
  lightStrategy?: FetchStrategy;
  renderedStrategy?: FetchStrategy;
  random?: () => number;
}

/**
 * Fetches single URLs politely: robots.txt is honoured, each domain gets a
 * bounded number of in-flight requests spaced by a random delay, and
 * transient failures are retried with jittered exponential backoff.
 * `fetch` always resolves; every failure is folded into the returned
 * {@link FetchResult}.
 */
export class Crawler {
  private readonly limiter: DomainRateLimiter;
  private readonly robots: RobotsPolicyCache;
  private readonly browserPool: BrowserPool;
  private readonly strategies: Record<FetchStrategyName, FetchStrategy>;
  private readonly retryPolicy: RetryPolicy;
  private readonly random: () => number;
  private readonly counters: FetchStats = initializeStats();
  private readonly startTime = Date.now();
  private closed = false;

  constructor(
    private readonly options: CrawlerOptions,
    dependencies: CrawlerDependencies = {},
  ) {
    this.random = dependencies.random ?? Math.random;
    this.limiter = new DomainRateLimiter({
      minDelayMs: options.minDelayMs,
      maxDelayMs: options.maxDelayMs,
      maxConcurrentPerDomain: options.maxConcurrentPerDomain,
      maxTrackedDomains: options.maxTrackedDomains,
      random: this.random,
    });
    this.robots = new RobotsPolicyCache({
      capacity: options.robotsCacheSize,
      loader:
        dependencies.robotsLoader ??
        createRobotsLoader({
          timeoutMs: options.robotsTimeoutMs,
          userAgent: options.robotsFetchUserAgent,
          schemes: options.robotsSchemes,
        }),
    });
    this.browserPool =
      dependencies.browserPool ?? new BrowserPool({ headless: options.headless, proxyUrl: options.proxyUrl ?? options.httpsProxyUrl });
    this.strategies = {
      light:
        dependencies.lightStrategy ??
        new LightClientFetch({
          userAgents: options.userAgents,
          proxyUrl: options.proxyUrl,
          httpsProxyUrl: options.httpsProxyUrl,
        }),
      rendered:
        dependencies.renderedStrategy ??
        new RenderedBrowserFetch(this.browserPool, { userAgents: options.userAgents }),
    };
    this.retryPolicy = {
      maxRetries: options.maxRetries,
      baseDelayMs: options.retryBaseDelayMs,
      backoffMultiplier: options.backoffMultiplier,
      jitter: options.jitter,
      retryableKinds: DEFAULT_RETRYABLE_KINDS,
    };
  }

  async fetch(
    url: string,
    useRenderedFetch: boolean = this.options.useRenderedByDefault,
    overrides: FetchOverrides = {},
  ): Promise<FetchResult> {
    const strategy = this.strategies[useRenderedFetch ? 'rendered' : 'light'];
    this.counters.fetchesStarted += 1;

    try {
      return await this.run(url, strategy, overrides);
    } catch (error) {
      const crawlerError = reportCrawlerError(error, { stage: 'fetch', url, strategy: strategy.name });
      return this.finish(
        { statusCode: SYNTHETIC_STATUS.internal, finalUrl: url, strategy: strategy.name, attempts: 0 },
        'failure',
        crawlerError.kind,
      );
    }
  }

  async close(): Promise<void> {
    const logger = componentLogger('crawler');
    if (this.closed) {
      logger.debug('Crawler already closed');
      return;
    }

    this.closed = true;
    logger.info('Closing crawler');

    try {
      await Promise.all([
        this.browserPool.shutdown(),
        this.strategies.light.close?.(),
        this.strategies.rendered.close?.(),
      ]);
    } finally {
      this.robots.clear();
      this.limiter.clear();
    }
  }

  stats(): FetchSummary {
    return buildFetchSummary({ stats: this.counters, startTime: this.startTime });
  }

  private async run(url: string, strategy: FetchStrategy, overrides: FetchOverrides): Promise<FetchResult> {
    const logger = componentLogger('crawler');
    let target: FetchTarget;

    try {
      target = parseTarget(url);
    } catch (error) {
      reportCrawlerError(error, { stage: 'validate', url });
      return this.finish(
        { statusCode: SYNTHETIC_STATUS.invalidUrl, finalUrl: url, strategy: strategy.name, attempts: 0 },
        'invalid',
        'input',
      );
    }

    const { url: parsed, domain } = target;
    const href = parsed.href;

    if (this.options.respectRobots && !(await this.robots.canFetch(href, this.options.robotsUserAgent))) {
      logger.info({ url: href, domain, userAgent: this.options.robotsUserAgent }, 'Blocked by robots.txt');
      return this.finish(
        { statusCode: SYNTHETIC_STATUS.robotsDisallowed, finalUrl: url, strategy: strategy.name, attempts: 0 },
        'robots',
        'robots',
      );
    }

    const timeoutMs =
      strategy.name === 'rendered'
        ? overrides.renderedTimeoutMs ?? this.options.renderedTimeoutMs
        : overrides.timeoutMs ?? this.options.timeoutMs;
    const { signal } = overrides;

    const outcome = await withRetry<PageResponse>(
      () => this.limiter.withDomain(domain, () => strategy.fetch(href, { timeoutMs, signal }), signal),
      this.retryPolicy,
      { label: href, signal, random: this.random },
    );

    if (outcome.ok) {
      const { body, status, finalUrl } = outcome.value;
      const challengeDetected = detectChallenge(body);
      if (challengeDetected) {
        logger.warn({ url: href, finalUrl, status }, 'Possible anti-bot challenge in response');
      }

      logger.info({ url: href, status, attempts: outcome.attempts, strategy: strategy.name }, 'Fetched');
      return this.finish(
        {
          content: body,
          statusCode: status,
          finalUrl,
          challengeDetected,
          strategy: strategy.name,
          attempts: outcome.attempts,
        },
        'success',
      );
    }

    const { error, attempts } = outcome;
    if (isHttpStatusError(error)) {
      logger.warn({ url: href, status: error.status, attempts }, 'Fetch finished with non-success status');
      // A rendered error page is still the page the browser showed.
      const content = strategy.name === 'rendered' ? error.body : undefined;
      return this.finish(
        {
          ...(content !== undefined ? { content } : {}),
          statusCode: error.status,
          finalUrl: error.finalUrl,
          challengeDetected: content !== undefined && detectChallenge(content),
          strategy: strategy.name,
          attempts,
        },
        'failure',
        `http_${error.status}`,
      );
    }

    const crawlerError = reportCrawlerError(error, { stage: 'fetch', url: href, attempt: attempts });
    return this.finish(
      { statusCode: statusForError(crawlerError), finalUrl: url, strategy: strategy.name, attempts },
      'failure',
      crawlerError.kind,
    );
  }

  private finish(
    fields: Omit<FetchResult, 'challengeDetected'> & { challengeDetected?: boolean },
    outcome: FetchOutcomeKind,
    failureReason?: string,
  ): FetchResult {
    const result: FetchResult = Object.freeze({ ...fields, challengeDetected: fields.challengeDetected ?? false });
    recordFetchMetrics(this.counters, result, outcome, failureReason);
    return result;
  }
}

export function statusForError(error: CrawlerError): number {
  switch (error.kind) {
    case 'timeout':
      return SYNTHETIC_STATUS.timeout;
    case 'transport':
      return SYNTHETIC_STATUS.transport;
    case 'browser':
      return SYNTHETIC_STATUS.browser;
    case 'cancelled':
      return SYNTHETIC_STATUS.cancelled;
    case 'input':
      return SYNTHETIC_STATUS.invalidUrl;
    default:
      return SYNTHETIC_STATUS.internal;
  }
}
