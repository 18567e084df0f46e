import { afterEach, describe, it, expect, vi } from 'vitest';
import { PageFetcher, BROWSER_USER_AGENT } from './fetcher';
import { FetchError } from './errors';
import { silentLogger } from '../logger';
import type { ContentStore } from '../types/fetch';

type FetchInput = string | URL | Request;

function requestUrl(input: FetchInput): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
}

function stubFetch(handler: (url: string, init?: RequestInit) => Promise<Response>) {
  const spy = vi.fn((input: FetchInput, init?: RequestInit) => handler(requestUrl(input), init));
  vi.stubGlobal('fetch', spy);
  return spy;
}

function newFetcher(maxAttempts = 3, extra: { timeoutMs?: number; maxRedirects?: number } = {}): PageFetcher {
  return new PageFetcher({
    retry: { maxAttempts, baseDelayMs: 0, maxDelayMs: 0 },
    logger: silentLogger,
    ...extra
  });
}

async function captureError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the fetch to fail');
}

describe('PageFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the body, content type and final URL with a browser identity', async () => {
    const spy = stubFetch(() =>
      Promise.resolve(new Response('<html>ok</html>', { status: 200, headers: { 'Content-Type': 'Text/HTML; charset=UTF-8' } }))
    );

    const response = await newFetcher().fetch('https://example.com/page');

    expect(response.status).toBe(200);
    expect(response.body.toString('utf8')).toBe('<html>ok</html>');
    expect(response.contentType).toBe('text/html; charset=utf-8');
    expect(response.finalUrl).toBe('https://example.com/page');
    expect(response.attempts).toBe(1);

    const init = spy.mock.calls[0][1];
    expect(init?.redirect).toBe('manual');
    expect(init?.headers).toMatchObject({ 'User-Agent': BROWSER_USER_AGENT });
  });

  it('retries a 503 and succeeds on the next attempt', async () => {
    let calls = 0;
    const spy = stubFetch(() => {
      calls++;
      return Promise.resolve(calls === 1 ? new Response('busy', { status: 503 }) : new Response('fine', { status: 200 }));
    });

    const response = await newFetcher().fetch('https://example.com/');

    expect(response.body.toString()).toBe('fine');
    expect(response.attempts).toBe(2);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('surfaces a transient error once the attempts are exhausted', async () => {
    const spy = stubFetch(() => Promise.resolve(new Response('down', { status: 500 })));

    const error = await captureError(newFetcher(3).fetch('https://example.com/'));

    expect(error.kind).toBe('NetworkTransient');
    expect(error.status).toBe(500);
    expect(error.attempts).toBe(3);
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('does not retry a 404', async () => {
    const spy = stubFetch(() => Promise.resolve(new Response('missing', { status: 404, statusText: 'Not Found' })));

    const error = await captureError(newFetcher().fetch('https://example.com/gone'));

    expect(error.kind).toBe('NetworkFatal');
    expect(error.message).toBe('HTTP 404: Not Found');
    expect(error.url).toBe('https://example.com/gone');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('treats 429 as transient', async () => {
    const spy = stubFetch(() => Promise.resolve(new Response('slow down', { status: 429, headers: { 'Retry-After': '0' } })));

    const error = await captureError(newFetcher(2).fetch('https://example.com/'));

    expect(error.kind).toBe('NetworkTransient');
    expect(error.retryAfterMs).toBe(0);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('follows redirects and reports the final URL', async () => {
    stubFetch(url =>
      Promise.resolve(
        url === 'https://example.com/old'
          ? new Response(null, { status: 301, headers: { Location: '/new' } })
          : new Response('moved here', { status: 200, headers: { 'Content-Type': 'text/html' } })
      )
    );

    const response = await newFetcher().fetch('https://example.com/old');

    expect(response.url).toBe('https://example.com/old');
    expect(response.finalUrl).toBe('https://example.com/new');
    expect(response.redirectCount).toBe(1);
  });

  it('fails after too many redirects', async () => {
    const spy = stubFetch(() => Promise.resolve(new Response(null, { status: 302, headers: { Location: '/loop' } })));

    const error = await captureError(newFetcher(3, { maxRedirects: 2 }).fetch('https://example.com/start'));

    expect(error.kind).toBe('NetworkFatal');
    expect(error.message).toBe('Too many redirects (more than 2)');
    expect(spy).toHaveBeenCalledTimes(3);
  });

  it('fails at once on a redirect to an unparseable location', async () => {
    const spy = stubFetch(() => Promise.resolve(new Response(null, { status: 301, headers: { Location: 'http://[oops' } })));

    const error = await captureError(newFetcher(3).fetch('https://example.com/start'));

    expect(error.kind).toBe('NetworkFatal');
    expect(error.message).toBe('Invalid redirect location: http://[oops');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('releases the body of an error response', async () => {
    const response = new Response('gone for good', { status: 404, statusText: 'Not Found' });
    stubFetch(() => Promise.resolve(response));

    const error = await captureError(newFetcher(1).fetch('https://example.com/missing'));

    expect(error.message).toBe('HTTP 404: Not Found');
    expect(response.bodyUsed).toBe(true);
  });

  it('retries a reset connection but not an unknown host', async () => {
    let calls = 0;
    stubFetch(() => {
      calls++;
      if (calls === 1) {
        return Promise.reject(new TypeError('fetch failed', { cause: { code: 'ECONNRESET' } }));
      }
      return Promise.resolve(new Response('back', { status: 200 }));
    });

    const response = await newFetcher().fetch('https://example.com/');
    expect(response.attempts).toBe(2);

    const spy = stubFetch(() => Promise.reject(new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } })));
    const error = await captureError(newFetcher().fetch('https://nowhere.example/'));

    expect(error.kind).toBe('NetworkFatal');
    expect(error.message).toBe('DNS lookup failed for nowhere.example');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('aborts a request that exceeds the per-call timeout', async () => {
    stubFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );

    const error = await captureError(newFetcher(1, { timeoutMs: 20 }).fetch('https://example.com/slow'));

    expect(error.kind).toBe('NetworkTransient');
    expect(error.message).toBe('Timed out after 20ms');
  });

  it('writes the body to the content cache when asked to', async () => {
    stubFetch(() => Promise.resolve(new Response('cached body', { status: 200 })));
    const writes = new Map<string, string>();
    const cache: ContentStore = {
      write: (key, content) => {
        writes.set(key, content.toString());
        return Promise.resolve(`/tmp/cache/${key}.html`);
      }
    };

    const response = await newFetcher().fetch('https://example.com/a', { cache, cacheKey: 'https_--example.com-a' });

    expect(writes.get('https_--example.com-a')).toBe('cached body');
    expect(response.cacheRef).toBe('/tmp/cache/https_--example.com-a.html');
  });
});
