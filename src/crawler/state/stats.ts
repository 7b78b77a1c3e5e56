import type { FetchResult } from '../../types.js';

export interface FetchStats {
  fetchesStarted: number;
  fetchesSucceeded: number;
  fetchesFailed: number;
  invalidUrls: number;
  robotsBlocked: number;
  retryAttempts: number;
  challengesDetected: number;
  statusCounts: Map<number, number>;
  failureReasons: Map<string, number>;
}

export type FetchOutcomeKind = 'success' | 'invalid' | 'robots' | 'failure';

export function initializeStats(): FetchStats {
  return {
    fetchesStarted: 0,
    fetchesSucceeded: 0,
    fetchesFailed: 0,
    invalidUrls: 0,
    robotsBlocked: 0,
    retryAttempts: 0,
    challengesDetected: 0,
    statusCounts: new Map<number, number>(),
    failureReasons: new Map<string, number>(),
  };
}

export function recordFetchMetrics(
  stats: FetchStats,
  result: FetchResult,
  outcome: FetchOutcomeKind,
  failureReason?: string,
): void {
  stats.retryAttempts += Math.max(0, result.attempts - 1);
  increment(stats.statusCounts, result.statusCode);

  if (result.challengeDetected) {
    stats.challengesDetected += 1;
  }

  switch (outcome) {
    case 'success':
      stats.fetchesSucceeded += 1;
      return;
    case 'invalid':
      stats.invalidUrls += 1;
      break;
    case 'robots':
      stats.robotsBlocked += 1;
      break;
    case 'failure':
      break;
  }

  stats.fetchesFailed += 1;
  if (failureReason) {
    increment(stats.failureReasons, failureReason);
  }
}

function increment<K>(counts: Map<K, number>, key: K): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}
