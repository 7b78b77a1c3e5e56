export type ErrorKind =
  | 'input'
  | 'timeout'
  | 'transport'
  | 'upstream'
  | 'status'
  | 'browser'
  | 'cancelled'
  | 'config'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

const ERROR_NAMES: Record<ErrorKind, string> = {
  input: 'InvalidInputError',
  timeout: 'TimeoutError',
  transport: 'TransportError',
  upstream: 'UpstreamStatusError',
  status: 'HttpStatusError',
  browser: 'BrowserError',
  cancelled: 'CancelledError',
  config: 'ConfigError',
  internal: 'InternalError',
};

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = ERROR_NAMES[kind];
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

/**
 * A non-2xx response. The body and final URL travel with the error so the
 * orchestrator can still report what the origin returned.
 */
export class HttpStatusError extends CrawlerError {
  readonly status: number;
  readonly body: string;
  readonly finalUrl: string;

  constructor(status: number, body: string, finalUrl: string) {
    super({
      message: `HTTP ${status}`,
      kind: isTransientStatus(status) ? 'upstream' : 'status',
      details: { status, url: finalUrl },
    });
    this.status = status;
    this.body = body;
    this.finalUrl = finalUrl;
  }
}

const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

export function isTransientStatus(status: number): boolean {
  return status >= 500 || TRANSIENT_CLIENT_STATUSES.has(status);
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function isHttpStatusError(value: unknown): value is HttpStatusError {
  return value instanceof HttpStatusError;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

type FactoryOptions = { severity?: ErrorSeverity; cause?: unknown };

function recoverable(kind: ErrorKind) {
  return (
    message: string,
    details: Record<string, unknown> = {},
    options: FactoryOptions = {},
  ): CrawlerError =>
    new CrawlerError({
      message,
      kind,
      severity: options.severity ?? 'recoverable',
      details,
      cause: options.cause,
    });
}

export const createInputError = recoverable('input');
export const createTimeoutError = recoverable('timeout');
export const createTransportError = recoverable('transport');
export const createBrowserError = recoverable('browser');
export const createCancelledError = recoverable('cancelled');
/** Misuse of a component, such as work handed to it after shutdown; never retried. */
export const createInternalError = recoverable('internal');

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createInternalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown; severity?: ErrorSeverity } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'internal',
    severity: options.severity ?? 'fatal',
    details,
    cause: options.cause,
  });
}
