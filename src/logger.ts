import pino, { type DestinationStream, type Level, type LoggerOptions } from 'pino';

/** The pino surface the fetcher logs through; tests swap in a recorder. */
export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export type LogLevel = Level | 'silent';

export interface LoggerConfiguration {
  level?: LogLevel;
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LogLevel = 'silent';
const DEFAULT_BASE = { service: 'polite-fetch' } as const;
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

// Proxy URLs may embed credentials.
const REDACTED_PATHS = ['proxyUrl', 'httpsProxyUrl', 'err.details.proxyUrl', 'err.details.httpsProxyUrl'];

let activeLogger: LoggerLike = createPinoInstance();

/** Replaces the shared logger; silent unless a level is given. */
export function configureLogger(config: LoggerConfiguration = {}): void {
  const { level = DEFAULT_LEVEL, base = DEFAULT_BASE, destination } = config;
  activeLogger = createPinoInstance({ level, base }, destination);
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

/**
 * Resolved on every call so that a logger swapped in later (tests, CLI
 * reconfiguration) is picked up by long-lived components.
 */
export function componentLogger(component: string): LoggerLike {
  return activeLogger.child({ component });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function createPinoInstance(options: Partial<LoggerOptions> = {}, destination?: DestinationStream): LoggerLike {
  const settings: LoggerOptions = {
    level: options.level ?? DEFAULT_LEVEL,
    base: options.base ?? DEFAULT_BASE,
    serializers: { err: pino.stdSerializers.err },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };

  return destination ? pino(settings, destination) : pino(settings);
}
