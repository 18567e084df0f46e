import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runScan } from './scan';
import { ScanConfigValidator } from './config/validator';
import { RunStore } from './storage/runs';
import { parseCsvRecords } from './storage/csv';
import { silentLogger } from './logger';
import type { ScanConfigInput } from './config/validator';

type FetchInput = string | URL | Request;

function requestUrl(input: FetchInput): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
}

const html = (...hrefs: string[]) =>
  `<html><body>${hrefs.map(href => `<a href="${href}">link</a>`).join('')}</body></html>`;

const urlset = (...paths: string[]) =>
  `<?xml version="1.0"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${paths
    .map(p => `<url><loc>https://example.com${p}</loc></url>`)
    .join('')}</urlset>`;

function stubSite(routes: Record<string, { body: string; type: string }>): void {
  vi.stubGlobal(
    'fetch',
    vi.fn((input: FetchInput) => {
      const route = routes[requestUrl(input)];
      return Promise.resolve(
        route
          ? new Response(route.body, { status: 200, headers: { 'Content-Type': route.type } })
          : new Response('not found', { status: 404, statusText: 'Not Found' })
      );
    })
  );
}

const page = (...hrefs: string[]) => ({ body: html(...hrefs), type: 'text/html' });
const sitemap = (...paths: string[]) => ({ body: urlset(...paths), type: 'application/xml' });

describe('runScan', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'sitemap-gap-scan-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(root, { recursive: true, force: true });
  });

  function config(overrides: ScanConfigInput = {}) {
    return ScanConfigValidator.resolve({
      startUrl: 'https://example.com/',
      outputPrefix: root,
      workers: 2,
      fetchOptions: { retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 } },
      ...overrides
    });
  }

  const at = (iso: string) => () => new Date(iso);
  const read = (...parts: string[]) => fs.readFile(path.join(root, 'example.com', ...parts), 'utf8');

  it('writes both lists and their differences, then compares the next run with it', async () => {
    stubSite({
      'https://example.com/sitemap.xml': sitemap('/', '/a', '/dead'),
      'https://example.com/': page('/a', '/orphan', 'https://other.example/x'),
      'https://example.com/a': page('/'),
      'https://example.com/orphan': page()
    });

    const first = await runScan(config(), { logger: silentLogger, now: at('2026-01-01T00:00:00Z') });

    expect(first.exitCode).toBe(0);
    expect(first.runDirectory).toBe(path.join(root, 'example.com', '2026-01-01_00-00-00'));
    expect(await read('2026-01-01_00-00-00', 'missing_from_sitemap.csv')).toBe(
      'Source,URL\r\nhttps://example.com/,https://example.com/orphan\r\n'
    );
    expect(await read('2026-01-01_00-00-00', 'missing_from_site.csv')).toBe(
      'Source,URL\r\nhttps://example.com/sitemap.xml,https://example.com/dead\r\n'
    );
    expect(await read('2026-01-01_00-00-00', 'site_urls.csv')).toBe(
      'Source,URL\r\n' +
        'https://example.com/,https://example.com/\r\n' +
        'https://example.com/,https://example.com/a\r\n' +
        'https://example.com/,https://example.com/orphan\r\n'
    );
    expect(first.summary.previousRun).toBeNull();
    await expect(read('2026-01-01_00-00-00', 'comparison_missing_from_sitemap.csv')).rejects.toThrow();

    const cached = await fs.readdir(path.join(first.runDirectory, 'cache'));
    expect(cached.sort()).toEqual(['https_--example.com-.html.gz', 'https_--example.com-a.html.gz', 'https_--example.com-orphan.html.gz']);
    expect(await fs.readdir(path.join(first.runDirectory, 'cache-xml'))).toEqual(['https_--example.com-sitemap.xml.xml']);

    const log = parseCsvRecords(await read('2026-01-01_00-00-00', 'crawl_log.csv'));
    expect(log.map(row => [row.URL, row.Origin, row.CacheRef])).toEqual([
      ['https://example.com/', 'both', path.join('cache', 'https_--example.com-.html.gz')],
      ['https://example.com/a', 'both', path.join('cache', 'https_--example.com-a.html.gz')],
      ['https://example.com/orphan', 'crawl', path.join('cache', 'https_--example.com-orphan.html.gz')]
    ]);
    expect(await read('2026-01-01_00-00-00', 'offsite_links.csv')).toBe('URL\r\nhttps://other.example/x\r\n');
    expect(first.summary.crawl.offsiteLinks).toBe(1);

    stubSite({
      'https://example.com/sitemap.xml': sitemap('/', '/a', '/dead', '/new-dead'),
      'https://example.com/': page('/a', '/orphan2'),
      'https://example.com/a': page('/'),
      'https://example.com/orphan2': page()
    });

    const second = await runScan(config(), { logger: silentLogger, now: at('2026-01-02T00:00:00Z') });

    expect(second.summary.previousRun).toBe('2026-01-01_00-00-00');
    expect(await read('2026-01-02_00-00-00', 'comparison_missing_from_sitemap.csv')).toBe(
      'Status,URL\r\nNew,https://example.com/orphan2\r\nFixed,https://example.com/orphan\r\n'
    );
    expect(await read('2026-01-02_00-00-00', 'comparison_missing_from_site.csv')).toBe(
      'Status,URL\r\nNew,https://example.com/new-dead\r\nExisting,https://example.com/dead\r\n'
    );

    const summary = JSON.parse(await read('2026-01-02_00-00-00', 'summary.json'));
    expect(summary.missingFromSite).toBe(2);
    expect(summary.crawl.visitedOk).toBe(3);
  });

  it('skips the comparison when asked to', async () => {
    stubSite({ 'https://example.com/': page() });

    await runScan(config(), { logger: silentLogger, now: at('2026-01-01T00:00:00Z') });
    const second = await runScan(config({ comparePrevious: false }), {
      logger: silentLogger,
      now: at('2026-01-02T00:00:00Z')
    });

    expect(second.summary.previousRun).toBeNull();
    expect(second.report?.history).toBeUndefined();
  });

  it('degrades to a crawl-only run when there is no sitemap', async () => {
    stubSite({ 'https://example.com/': page('/a'), 'https://example.com/a': page() });

    const outcome = await runScan(config(), { logger: silentLogger, now: at('2026-01-01T00:00:00Z') });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.report?.missingFromSitemap).toEqual(['https://example.com/', 'https://example.com/a']);
    expect(outcome.summary.diagnostics).toContain('No sitemap found for https://example.com');
  });

  it('fails when the start URL cannot be fetched and leaves no run to compare against', async () => {
    stubSite({ 'https://example.com/sitemap.xml': sitemap('/') });

    const outcome = await runScan(config(), { logger: silentLogger, now: at('2026-01-01T00:00:00Z') });

    expect(outcome.exitCode).toBe(1);
    expect(outcome.summary.diagnostics).toContain('Start URL unreachable: HTTP 404: Not Found');
    expect(outcome.summary.errors.NetworkFatal).toBe(1);
    expect(await new RunStore(root, silentLogger).listRuns('example.com')).toEqual([]);
  });
});
