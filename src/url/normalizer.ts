import { createHash } from 'node:crypto';
import { UrlScope } from '../types/site';
import excludedExtensions from './excluded-extensions.json';

export const DEFAULT_TRACKING_PARAMS = [
  'utm_*',
  'gclid',
  'fbclid',
  'msclkid',
  'mc_cid',
  'mc_eid',
  '_ga',
  '_gl',
  'yclid',
  'igshid'
];

// Comment-reply links duplicate the article they belong to
export const DEFAULT_REJECTED_PARAMS = ['replytocom'];

export const DEFAULT_EXCLUDED_EXTENSIONS: ReadonlySet<string> = new Set(excludedExtensions);

const ALLOWED_PROTOCOLS = ['http:', 'https:'];
const UNRESERVED = /^[A-Za-z0-9\-._~]$/;
const MAX_FILENAME_LENGTH = 150;
// Names of URLs made only of these characters map back to exactly one URL
const REVERSIBLE_FILENAME = /^[A-Za-z0-9.:/]*$/;

export type RejectReason = 'invalid' | 'scheme' | 'domain' | 'extension' | 'query';

export type UrlClassification =
  | { ok: true; url: string }
  | { ok: false; reason: RejectReason };

export function createScope(
  startUrl: string,
  options: { trackingParams?: string[]; rejectedParams?: string[]; excludedExtensions?: Iterable<string> } = {}
): UrlScope {
  return {
    host: new URL(startUrl).hostname.toLowerCase(),
    trackingParams: options.trackingParams ?? DEFAULT_TRACKING_PARAMS,
    rejectedParams: options.rejectedParams ?? DEFAULT_REJECTED_PARAMS,
    excludedExtensions: options.excludedExtensions
      ? new Set(Array.from(options.excludedExtensions, ext => ext.toLowerCase()))
      : DEFAULT_EXCLUDED_EXTENSIONS
  };
}

/**
 * Canonical form of `raw` resolved against `base`, or null when the URL falls
 * outside `scope`. Both the sitemap and the crawl side go through here, so two
 * URLs naming the same page always compare equal.
 */
export function normalizeUrl(raw: string, base: string | undefined, scope: UrlScope): string | null {
  const result = classifyUrl(raw, base, scope);
  return result.ok ? result.url : null;
}

export function classifyUrl(raw: string, base: string | undefined, scope: UrlScope): UrlClassification {
  const parsed = parseHttpUrl(raw, base);
  if (!parsed.ok) {
    return parsed;
  }

  const url = parsed.value;

  if (url.hostname !== scope.host) {
    return { ok: false, reason: 'domain' };
  }

  const extension = pathExtension(url.pathname);
  if (extension && scope.excludedExtensions.has(extension)) {
    return { ok: false, reason: 'extension' };
  }

  const rejected = new Set(scope.rejectedParams.map(name => name.toLowerCase()));
  for (const key of url.searchParams.keys()) {
    if (rejected.has(key.toLowerCase())) {
      return { ok: false, reason: 'query' };
    }
  }

  return { ok: true, url: buildCanonical(url, scope.trackingParams) };
}

/**
 * Scope-free canonical form, used for sitemap identities and for recording
 * off-site links.
 */
export function canonicalize(raw: string, base?: string, trackingParams: string[] = DEFAULT_TRACKING_PARAMS): string | null {
  const parsed = parseHttpUrl(raw, base);
  return parsed.ok ? buildCanonical(parsed.value, trackingParams) : null;
}

/**
 * Absolute http(s) URL as written, fragment dropped. Sitemap locations are
 * fetched in this form; `canonicalize` only names them.
 */
export function resolveHttpUrl(raw: string, base?: string): string | null {
  const parsed = parseHttpUrl(raw, base);
  if (!parsed.ok) return null;
  parsed.value.hash = '';
  return parsed.value.href;
}

/**
 * File-system-safe cache key. Names that no longer map back to a single URL
 * (any character other than `:` and `/` was replaced, or the name was cut)
 * carry the first 16 hex digits of the URL's SHA-256.
 */
export function urlToFilename(url: string): string {
  const name = url
    .replace(/:/g, '_')
    .replace(/\//g, '-')
    .replace(/[?&=#]/g, '_')
    .replace(/[^A-Za-z0-9._-]/g, '_');

  if (name.length <= MAX_FILENAME_LENGTH && REVERSIBLE_FILENAME.test(url)) {
    return name;
  }

  const digest = createHash('sha256').update(url).digest('hex').substring(0, 16);
  return `${name.substring(0, MAX_FILENAME_LENGTH)}-${digest}`;
}

function parseHttpUrl(
  raw: string,
  base: string | undefined
): { ok: true; value: URL } | { ok: false; reason: RejectReason } {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { ok: false, reason: 'invalid' };
  }

  let url: URL;
  try {
    url = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return { ok: false, reason: 'invalid' };
  }

  if (!ALLOWED_PROTOCOLS.includes(url.protocol)) {
    return { ok: false, reason: 'scheme' };
  }

  return { ok: true, value: url };
}

function buildCanonical(url: URL, trackingParams: string[]): string {
  const canonical = new URL(url.href);
  canonical.hash = '';

  const path = canonicalizePercentEncoding(canonical.pathname).replace(/\/+$/, '');
  canonical.pathname = path || '/';

  const kept = Array.from(canonical.searchParams.entries())
    .filter(([key]) => !isTrackingParam(key, trackingParams))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  canonical.search = kept.length > 0 ? new URLSearchParams(kept).toString() : '';

  return canonical.href;
}

function canonicalizePercentEncoding(path: string): string {
  return path.replace(/%([0-9a-fA-F]{2})/g, (_match, hex: string) => {
    const char = String.fromCharCode(parseInt(hex, 16));
    return UNRESERVED.test(char) ? char : `%${hex.toUpperCase()}`;
  });
}

function isTrackingParam(key: string, trackingParams: string[]): boolean {
  const name = key.toLowerCase();
  return trackingParams.some(param => {
    const pattern = param.toLowerCase();
    return pattern.endsWith('*') ? name.startsWith(pattern.slice(0, -1)) : name === pattern;
  });
}

function pathExtension(pathname: string): string | null {
  const lastSegment = pathname.substring(pathname.lastIndexOf('/') + 1);
  const dot = lastSegment.lastIndexOf('.');
  if (dot <= 0 || dot === lastSegment.length - 1) {
    return null;
  }
  return lastSegment.substring(dot + 1).toLowerCase();
}
