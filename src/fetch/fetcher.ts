import { FetchRequestOptions, FetchResponse } from '../types/fetch';
import { RetryOptions } from '../types/site';
import { Logger, createLogger, errorMessage } from '../logger';
import { FetchError, classifyNetworkError, statusErrorKind } from './errors';
import { RetryPolicy, parseRetryAfter, sleep } from './retry';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface PageFetcherOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  retry?: RetryPolicy | Partial<RetryOptions>;
  userAgent?: string;
  logger?: Logger;
}

export class PageFetcher {
  private static readonly DEFAULT_TIMEOUT = 10000;
  private static readonly DEFAULT_MAX_REDIRECTS = 5;

  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly retry: RetryPolicy;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: PageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? PageFetcher.DEFAULT_TIMEOUT;
    this.maxRedirects = options.maxRedirects ?? PageFetcher.DEFAULT_MAX_REDIRECTS;
    this.retry = options.retry instanceof RetryPolicy ? options.retry : new RetryPolicy(options.retry);
    this.logger = options.logger ?? createLogger();
    this.headers = {
      'User-Agent': options.userAgent ?? BROWSER_USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9'
    };
  }

  async fetch(url: string, options: FetchRequestOptions = {}): Promise<FetchResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.performFetch(url, options.timeoutMs ?? this.timeoutMs, options.signal);
        response.attempts = attempt + 1;

        if (options.cache && options.cacheKey) {
          try {
            response.cacheRef = await options.cache.write(options.cacheKey, response.body);
          } catch (error) {
            this.logger.warn(`Failed to cache ${url}: ${errorMessage(error)}`);
          }
        }

        return response;
      } catch (error) {
        const failure = error instanceof FetchError ? error : classifyNetworkError(error, url);
        failure.attempts = attempt + 1;

        if (options.signal?.aborted || !this.retry.shouldRetry(failure, attempt)) {
          throw failure;
        }

        const delay = this.retry.delayFor(attempt, failure.retryAfterMs);
        this.logger.debug(
          `Retrying ${url} in ${delay}ms (attempt ${attempt + 2}/${this.retry.maxAttempts}): ${failure.message}`
        );
        await sleep(delay, options.signal);
      }
    }
  }

  private async performFetch(url: string, timeoutMs: number, signal?: AbortSignal): Promise<FetchResponse> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      let currentUrl = url;
      let redirectCount = 0;
      let response = await this.request(currentUrl, controller.signal);

      while (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        if (!location) break;

        const next = PageFetcher.resolveLocation(location, currentUrl);
        await this.discardBody(response);

        if (redirectCount >= this.maxRedirects) {
          throw new FetchError('NetworkFatal', url, `Too many redirects (more than ${this.maxRedirects})`, {
            status: response.status
          });
        }
        if (!next) {
          throw new FetchError('NetworkFatal', url, `Invalid redirect location: ${location}`, { status: response.status });
        }

        currentUrl = next;
        redirectCount++;
        response = await this.request(currentUrl, controller.signal);
      }

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      if (!response.ok) {
        await this.discardBody(response);
        throw new FetchError(
          statusErrorKind(response.status),
          url,
          `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
          { status: response.status, retryAfterMs: parseRetryAfter(headers['retry-after']) }
        );
      }

      const body = Buffer.from(await response.arrayBuffer());

      return {
        url,
        finalUrl: currentUrl,
        status: response.status,
        contentType: (headers['content-type'] ?? '').toLowerCase(),
        headers,
        body,
        redirectCount,
        fetchTime: Date.now() - startTime,
        attempts: 1
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (timedOut) {
        throw new FetchError('NetworkTransient', url, `Timed out after ${timeoutMs}ms`, { cause: error });
      }
      if (signal?.aborted) {
        throw new FetchError('NetworkFatal', url, 'Request aborted', { cause: error });
      }
      throw classifyNetworkError(error, url);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private static resolveLocation(location: string, base: string): string | null {
    try {
      return new URL(location, base).href;
    } catch {
      return null;
    }
  }

  // Unread bodies hold their connection until collected
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug(`Could not release response body: ${errorMessage(error)}`);
    }
  }

  private request(url: string, signal: AbortSignal): Promise<Response> {
    return fetch(url, {
      method: 'GET',
      redirect: 'manual',
      signal,
      headers: this.headers
    });
  }
}
