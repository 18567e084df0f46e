import { ErrorKind } from '../types/fetch';

export class FetchError extends Error {
  readonly kind: ErrorKind;
  readonly url: string;
  readonly status?: number;
  readonly retryAfterMs?: number;
  attempts: number;

  constructor(
    kind: ErrorKind,
    url: string,
    message: string,
    options: { status?: number; retryAfterMs?: number; attempts?: number; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    this.attempts = options.attempts ?? 1;
  }

  get retryable(): boolean {
    return this.kind === 'NetworkTransient';
  }
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CLOSED'
]);

export function statusErrorKind(status: number): ErrorKind {
  return status === 429 || status >= 500 ? 'NetworkTransient' : 'NetworkFatal';
}

/**
 * Maps a rejection from `fetch` (undici wraps socket errors in a TypeError
 * whose `cause` carries the system error code) onto an error kind.
 */
export function classifyNetworkError(error: unknown, url: string): FetchError {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'ENOTFOUND') {
    return new FetchError('NetworkFatal', url, `DNS lookup failed for ${new URL(url).hostname}`, { cause: error });
  }

  if (code && TRANSIENT_CODES.has(code)) {
    return new FetchError('NetworkTransient', url, `${message} (${code})`, { cause: error });
  }

  // A bare "fetch failed" without a code is a dropped connection more often than not
  if (error instanceof TypeError) {
    return new FetchError('NetworkTransient', url, message, { cause: error });
  }

  return new FetchError('NetworkFatal', url, message, { cause: error });
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return errorCode(error.cause);
  }
  return undefined;
}
