export type FetchStrategyName = 'light' | 'rendered';

export interface FetchResult {
  /** Page body; absent whenever the fetch did not succeed. */
  readonly content?: string;
  /** Genuine HTTP status, or one of {@link SYNTHETIC_STATUS} for non-HTTP outcomes. */
  readonly statusCode: number;
  readonly finalUrl: string;
  readonly challengeDetected: boolean;
  readonly strategy: FetchStrategyName;
  /** Network attempts made; 0 when the request never left the process. */
  readonly attempts: number;
}

export const SYNTHETIC_STATUS = {
  invalidUrl: 0,
  robotsDisallowed: 403,
  timeout: 408,
  cancelled: 499,
  internal: 597,
  browser: 598,
  transport: 599,
} as const;

export interface FetchOverrides {
  timeoutMs?: number;
  renderedTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface FetchRequest extends FetchOverrides {
  url: string;
  useRenderedFetch?: boolean;
}

/** What a strategy hands back for a successful (2xx) fetch. */
export interface PageResponse {
  body: string;
  status: number;
  finalUrl: string;
}

export interface StrategyFetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface FetchStrategy {
  readonly name: FetchStrategyName;
  fetch(url: string, options: StrategyFetchOptions): Promise<PageResponse>;
  close?(): Promise<void>;
}

export interface CrawlerOptions {
  userAgents: readonly string[];
  timeoutMs: number;
  renderedTimeoutMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  maxConcurrentPerDomain: number;
  maxTrackedDomains: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  backoffMultiplier: number;
  jitter: number;
  respectRobots: boolean;
  robotsUserAgent: string;
  robotsFetchUserAgent: string;
  robotsCacheSize: number;
  robotsTimeoutMs: number;
  robotsSchemes: readonly RobotsScheme[];
  /** Proxy for plain-http targets and the browser; also https targets unless `httpsProxyUrl` is set. */
  proxyUrl?: string;
  httpsProxyUrl?: string;
  headless: boolean;
  useRenderedByDefault: boolean;
}

export type RobotsScheme = 'https' | 'http';

export type CrawlerConfig = Partial<CrawlerOptions>;

export interface FetchSummary {
  fetchesStarted: number;
  fetchesSucceeded: number;
  fetchesFailed: number;
  invalidUrls: number;
  robotsBlocked: number;
  retryAttempts: number;
  challengesDetected: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  durationMs: number;
}
