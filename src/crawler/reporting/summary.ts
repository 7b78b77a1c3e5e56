import type { FetchSummary } from '../../types.js';
import type { FetchStats } from '../state/stats.js';

export function buildFetchSummary(options: {
  stats: FetchStats;
  startTime: number;
  now?: number;
}): FetchSummary {
  const { stats, startTime, now = Date.now() } = options;

  return {
    fetchesStarted: stats.fetchesStarted,
    fetchesSucceeded: stats.fetchesSucceeded,
    fetchesFailed: stats.fetchesFailed,
    invalidUrls: stats.invalidUrls,
    robotsBlocked: stats.robotsBlocked,
    retryAttempts: stats.retryAttempts,
    challengesDetected: stats.challengesDetected,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    durationMs: now - startTime,
  };
}
