import { describe, it, expect } from 'vitest';
import { canonicalize, classifyUrl, createScope, normalizeUrl, resolveHttpUrl, urlToFilename } from './normalizer';

const scope = createScope('https://example.com/');

describe('normalizeUrl', () => {
  it('treats case, default port, trailing slash and tracking params as the same page', () => {
    const httpScope = createScope('http://example.com');
    const expected = normalizeUrl('http://example.com/a', undefined, httpScope);

    expect(expected).toBe('http://example.com/a');
    expect(normalizeUrl('http://Example.com/a/', undefined, httpScope)).toBe(expected);
    expect(normalizeUrl('http://example.com:80/a', undefined, httpScope)).toBe(expected);
    expect(normalizeUrl('http://example.com/a?utm_source=x', undefined, httpScope)).toBe(expected);
  });

  it('keeps the root slash and drops fragments', () => {
    expect(normalizeUrl('https://example.com', undefined, scope)).toBe('https://example.com/');
    expect(normalizeUrl('https://example.com/page#section', undefined, scope)).toBe('https://example.com/page');
    expect(normalizeUrl('https://Example.com/page/', undefined, scope)).toBe('https://example.com/page');
  });

  it('resolves relative references against the base', () => {
    expect(normalizeUrl('../b/', 'https://example.com/a/c', scope)).toBe('https://example.com/b');
    expect(normalizeUrl('/top', 'https://example.com/a/c', scope)).toBe('https://example.com/top');
    expect(normalizeUrl('//example.com/x', 'https://example.com/', scope)).toBe('https://example.com/x');
  });

  it('sorts remaining query parameters by key and strips every utm_ variant', () => {
    expect(
      normalizeUrl('https://example.com/search?q=shoes&b=2&utm_medium=mail&a=1&gclid=abc', undefined, scope)
    ).toBe('https://example.com/search?a=1&b=2&q=shoes');
  });

  it('keeps the order of repeated keys', () => {
    expect(normalizeUrl('https://example.com/f?tag=z&a=1&tag=y', undefined, scope)).toBe(
      'https://example.com/f?a=1&tag=z&tag=y'
    );
  });

  it('canonicalizes percent-encoding in the path', () => {
    expect(normalizeUrl('https://example.com/%7Euser/%41bc', undefined, scope)).toBe('https://example.com/~user/Abc');
    expect(normalizeUrl('https://example.com/a%2fb', undefined, scope)).toBe('https://example.com/a%2Fb');
  });

  it('rejects other schemes, hosts, asset extensions and comment-reply links', () => {
    expect(normalizeUrl('mailto:team@example.com', undefined, scope)).toBeNull();
    expect(normalizeUrl('javascript:void(0)', undefined, scope)).toBeNull();
    expect(normalizeUrl('https://other.com/page', undefined, scope)).toBeNull();
    expect(normalizeUrl('https://example.com/image.JPG', undefined, scope)).toBeNull();
    expect(normalizeUrl('https://example.com/document.pdf', undefined, scope)).toBeNull();
    expect(normalizeUrl('https://example.com/style.css', undefined, scope)).toBeNull();
    expect(normalizeUrl('https://example.com/page?replytocom=123', undefined, scope)).toBeNull();
    expect(normalizeUrl('', undefined, scope)).toBeNull();
    expect(normalizeUrl('not a url', undefined, scope)).toBeNull();
  });

  it('is idempotent', () => {
    const inputs = [
      'https://example.com/a//',
      'https://EXAMPLE.com:443/x/%7e/?z=1&a=%20b&utm_campaign=c#frag',
      'https://example.com/search?q=a+b',
      'https://example.com/caf%C3%A9/'
    ];

    for (const input of inputs) {
      const once = normalizeUrl(input, undefined, scope);
      expect(once).not.toBeNull();
      expect(normalizeUrl(once ?? '', undefined, scope)).toBe(once);
    }
  });
});

describe('classifyUrl', () => {
  it('reports why a URL was rejected', () => {
    expect(classifyUrl('ftp://example.com/file', undefined, scope)).toEqual({ ok: false, reason: 'scheme' });
    expect(classifyUrl('https://cdn.example.com/', undefined, scope)).toEqual({ ok: false, reason: 'domain' });
    expect(classifyUrl('/logo.svg', 'https://example.com/', scope)).toEqual({ ok: false, reason: 'extension' });
    expect(classifyUrl('http://[bad', undefined, scope)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('honours a custom tracking parameter list', () => {
    const custom = createScope('https://example.com', { trackingParams: ['sessionid'] });
    expect(classifyUrl('https://example.com/a?sessionid=1&utm_source=x', undefined, custom)).toEqual({
      ok: true,
      url: 'https://example.com/a?utm_source=x'
    });
  });
});

describe('canonicalize', () => {
  it('normalizes without scope checks', () => {
    expect(canonicalize('https://Other.com/Sitemap.xml/')).toBe('https://other.com/Sitemap.xml');
    expect(canonicalize('tel:+100')).toBeNull();
  });
});

describe('resolveHttpUrl', () => {
  it('resolves against the base and keeps the URL as written', () => {
    expect(resolveHttpUrl('sitemaps/?b=2&a=1#top', 'https://example.com/x/')).toBe('https://example.com/x/sitemaps/?b=2&a=1');
    expect(resolveHttpUrl('mailto:someone@example.com')).toBeNull();
  });
});

describe('urlToFilename', () => {
  it('maps URLs to file-system-safe names', () => {
    expect(urlToFilename('https://example.com/page')).toBe('https_--example.com-page');
    expect(urlToFilename('http://localhost:8080/a/b.html')).toBe('http_--localhost_8080-a-b.html');
  });

  it('adds a digest when the replaced characters would be ambiguous', () => {
    expect(urlToFilename('https://example.com/page?query=value&param=123')).toBe(
      'https_--example.com-page_query_value_param_123-a5f3506e261427a1'
    );
    expect(urlToFilename('https://example.com/page#fragment')).toBe('https_--example.com-page_fragment-c8f4218d8c92cd35');
    expect(urlToFilename('https://example.com/a/b')).toBe('https_--example.com-a-b');
    expect(urlToFilename('https://example.com/a-b')).toBe('https_--example.com-a-b-0df1d3b2c5765f47');
    expect(urlToFilename('https://example.com/p?id=1')).not.toBe(urlToFilename('https://example.com/p_id_1'));
  });

  it('shortens long names with a digest suffix', () => {
    const long = `https://example.com/${'a'.repeat(300)}`;
    const name = urlToFilename(long);
    expect(name).toHaveLength(150 + 1 + 16);
    expect(name.startsWith('https_--example.com-aaa')).toBe(true);
    expect(urlToFilename(`${long}b`)).not.toBe(name);
  });
});
