import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PreviousRun, ScanSummary } from '../types/report';
import { UrlRecord } from '../types/crawl';
import { UrlScope } from '../types/site';
import { Logger, createLogger } from '../logger';
import { normalizeUrl } from '../url/normalizer';
import { StatusRow } from '../reconcile/reconciler';
import { formatCsv, parseCsvRecords } from './csv';
import { isNotFound } from './cache';

export const RUN_FILES = {
  sitemapUrls: 'sitemap_urls.csv',
  siteUrls: 'site_urls.csv',
  missingFromSitemap: 'missing_from_sitemap.csv',
  missingFromSite: 'missing_from_site.csv',
  comparisonMissingFromSitemap: 'comparison_missing_from_sitemap.csv',
  comparisonMissingFromSite: 'comparison_missing_from_site.csv',
  crawlLog: 'crawl_log.csv',
  offsiteLinks: 'offsite_links.csv',
  summary: 'summary.json'
} as const;

export const CACHE_DIR = 'cache';
export const XML_CACHE_DIR = 'cache-xml';

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/;

/** UTC `YYYY-MM-DD_HH-mm-ss`; string order is chronological. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().substring(0, 19).replace('T', '_').replace(/:/g, '-');
}

export function domainDirectoryName(startUrl: string): string {
  return new URL(startUrl).host.toLowerCase().replace(/:/g, '_');
}

export class RunStore {
  private readonly root: string;
  private readonly logger: Logger;

  constructor(root: string, logger: Logger = createLogger()) {
    this.root = root;
    this.logger = logger;
  }

  domainDirectory(domain: string): string {
    return path.join(this.root, domain);
  }

  runDirectory(domain: string, timestamp: string): string {
    return path.join(this.root, domain, timestamp);
  }

  async createRun(domain: string, timestamp: string): Promise<string> {
    const directory = this.runDirectory(domain, timestamp);
    await fs.mkdir(directory, { recursive: true });
    return directory;
  }

  async writeSourcedList(directory: string, file: string, urls: Iterable<string>, sources: ReadonlyMap<string, string>): Promise<void> {
    const rows = Array.from(urls)
      .sort()
      .map(url => [sources.get(url) ?? '', url]);
    await fs.writeFile(path.join(directory, file), formatCsv(['Source', 'URL'], rows), 'utf8');
  }

  async writeStatusList(directory: string, file: string, rows: StatusRow[]): Promise<void> {
    await fs.writeFile(
      path.join(directory, file),
      formatCsv(['Status', 'URL'], rows.map(row => [row.status, row.url])),
      'utf8'
    );
  }

  async writeUrlList(directory: string, file: string, urls: Iterable<string>): Promise<void> {
    const rows = Array.from(urls).sort().map(url => [url]);
    await fs.writeFile(path.join(directory, file), formatCsv(['URL'], rows), 'utf8');
  }

  /** One row per crawl record; `CacheRef` is relative to the run directory. */
  async writeCrawlLog(directory: string, records: UrlRecord[]): Promise<void> {
    const rows = records.map(record => [
      record.url,
      record.state,
      record.status === undefined ? '' : String(record.status),
      String(record.depth),
      record.source,
      record.referrer,
      record.contentType ?? '',
      record.contentHash ?? '',
      record.cacheRef ? path.relative(directory, record.cacheRef) : '',
      record.error ? `${record.error.kind}: ${record.error.message}` : ''
    ]);
    await fs.writeFile(
      path.join(directory, RUN_FILES.crawlLog),
      formatCsv(
        ['URL', 'State', 'Status', 'Depth', 'Origin', 'Source', 'ContentType', 'ContentHash', 'CacheRef', 'Error'],
        rows
      ),
      'utf8'
    );
  }

  async writeSummary(directory: string, summary: ScanSummary): Promise<void> {
    await fs.writeFile(path.join(directory, RUN_FILES.summary), `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
  }

  /** Completed runs of a domain (both raw lists present), oldest first. */
  async listRuns(domain: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.domainDirectory(domain));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const runs: string[] = [];
    for (const name of names.filter(entry => TIMESTAMP_PATTERN.test(entry)).sort()) {
      const directory = this.runDirectory(domain, name);
      if (
        (await exists(path.join(directory, RUN_FILES.sitemapUrls))) &&
        (await exists(path.join(directory, RUN_FILES.siteUrls)))
      ) {
        runs.push(name);
      }
    }
    return runs;
  }

  async findPreviousRun(domain: string, current: string): Promise<string | null> {
    const earlier = (await this.listRuns(domain)).filter(name => name < current);
    return earlier.length > 0 ? earlier[earlier.length - 1] : null;
  }

  /**
   * Loads a prior run's raw result sets. URLs are re-normalized under `scope`
   * so lists written under older normalization rules compare cleanly.
   */
  async loadRun(domain: string, name: string, scope?: UrlScope): Promise<PreviousRun> {
    const directory = this.runDirectory(domain, name);
    const [sitemapUrls, crawledUrls] = await Promise.all([
      this.readUrlList(path.join(directory, RUN_FILES.sitemapUrls), scope),
      this.readUrlList(path.join(directory, RUN_FILES.siteUrls), scope)
    ]);
    this.logger.debug(`Loaded previous run ${name}: ${sitemapUrls.size} sitemap URLs, ${crawledUrls.size} site URLs`);
    return { name, sitemapUrls, crawledUrls };
  }

  async readUrlList(file: string, scope?: UrlScope): Promise<Set<string>> {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return new Set();
      throw error;
    }

    const urls = new Set<string>();
    for (const record of parseCsvRecords(text)) {
      const raw = record.URL ?? Object.values(record)[0];
      if (!raw) continue;

      const url = scope ? normalizeUrl(raw, undefined, scope) : raw.trim();
      if (url) urls.add(url);
    }
    return urls;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}
