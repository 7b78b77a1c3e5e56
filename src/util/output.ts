import type { FetchResult, FetchSummary } from '../types.js';

export type OutputFormat = 'text' | 'json';

export function writeFetchResult(url: string, result: FetchResult, format: OutputFormat): void {
  if (format === 'json') {
    process.stdout.write(`${JSON.stringify({ url, ...result })}\n`);
    return;
  }

  process.stdout.write(renderText(url, result));
}

export function writeSummary(summary: FetchSummary, format: OutputFormat): void {
  if (format === 'json') {
    process.stdout.write(`${JSON.stringify({ summary })}\n`);
    return;
  }

  process.stdout.write(renderTextSummary(summary));
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function renderText(url: string, result: FetchResult): string {
  const lines = [`FETCHED: ${url} -> ${result.statusCode} ${result.finalUrl}`];
  const detail = [
    `strategy=${result.strategy}`,
    `attempts=${result.attempts}`,
    `bytes=${result.content?.length ?? 0}`,
  ];

  if (result.challengeDetected) {
    detail.push('challenge=yes');
  }

  lines.push(`  ${detail.join(' ')}`);
  return `${lines.join('\n')}\n`;
}

export function renderTextSummary(summary: FetchSummary): string {
  const lines: string[] = [
    '',
    '--- Fetch Summary ---',
    `Fetches started: ${summary.fetchesStarted}`,
    `Succeeded: ${summary.fetchesSucceeded}`,
    `Failed: ${summary.fetchesFailed}`,
    `Invalid URLs: ${summary.invalidUrls}`,
    `Blocked by robots.txt: ${summary.robotsBlocked}`,
    `Retry attempts: ${summary.retryAttempts}`,
    `Challenges detected: ${summary.challengesDetected}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
  ];

  const statusEntries = Object.entries(summary.statusCounts).sort(
    ([statusA], [statusB]) => Number(statusA) - Number(statusB),
  );

  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  const failureEntries = Object.entries(summary.failureReasons).sort(([, countA], [, countB]) =>
    countB - countA,
  );

  if (failureEntries.length > 0) {
    lines.push('Failure reasons:');
    for (const [reason, count] of failureEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
