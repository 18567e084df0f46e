import { RetryOptions } from '../types/site';
import { FetchError } from './errors';

export class RetryPolicy {
  static readonly DEFAULTS: RetryOptions = {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 8000
  };

  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private readonly random: () => number;

  constructor(options: Partial<RetryOptions> = {}, random: () => number = Math.random) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? RetryPolicy.DEFAULTS.maxAttempts);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? RetryPolicy.DEFAULTS.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs ?? RetryPolicy.DEFAULTS.maxDelayMs);
    this.random = random;
  }

  shouldRetry(error: FetchError, attempt: number): boolean {
    return error.retryable && attempt + 1 < this.maxAttempts;
  }

  /** Delay before the retry that follows the zero-based `attempt`. */
  delayFor(attempt: number, retryAfterMs?: number): number {
    if (retryAfterMs !== undefined) {
      return Math.min(this.maxDelayMs, retryAfterMs);
    }

    const backoff = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt));
    return backoff + Math.floor(this.random() * this.baseDelayMs);
  }
}

export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  return parseInt(value.trim(), 10) * 1000;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
