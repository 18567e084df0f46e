import { PageFetcher } from '../fetch/fetcher';
import { ContentStore, FetchResponse } from '../types/fetch';
import { SitemapDocument, SitemapResolution } from '../types/sitemap';
import { UrlScope } from '../types/site';
import { Logger, createLogger, errorMessage } from '../logger';
import { canonicalize, normalizeUrl, resolveHttpUrl, urlToFilename } from '../url/normalizer';
import { SitemapDiscovery } from './discovery';
import { SitemapParser } from './parser';

export interface SitemapResolverOptions {
  fetcher: PageFetcher;
  scope: UrlScope;
  maxDepth?: number;
  cache?: ContentStore;
  logger?: Logger;
}

interface WorkItem {
  url: string;
  depth: number;
}

/**
 * Expands sitemap roots into a flat set of canonical page URLs. Documents are
 * processed from an explicit worklist and fetched by the URL they were
 * declared with; the canonical form of that URL is visited at most once, so
 * an index that references itself or an ancestor terminates.
 */
export class SitemapResolver {
  static readonly DEFAULT_MAX_DEPTH = 3;

  private readonly fetcher: PageFetcher;
  private readonly scope: UrlScope;
  private readonly maxDepth: number;
  private readonly cache?: ContentStore;
  private readonly logger: Logger;
  private readonly discovery: SitemapDiscovery;

  constructor(options: SitemapResolverOptions) {
    this.fetcher = options.fetcher;
    this.scope = options.scope;
    this.maxDepth = options.maxDepth ?? SitemapResolver.DEFAULT_MAX_DEPTH;
    this.cache = options.cache;
    this.logger = options.logger ?? createLogger();
    this.discovery = new SitemapDiscovery(this.fetcher, this.logger);
  }

  async resolve(target: { startUrl: string; sitemapUrl?: string }): Promise<SitemapResolution> {
    const discovered = await this.discovery.discover(target.startUrl, target.sitemapUrl);
    const resolution: SitemapResolution = {
      roots: discovered.roots,
      urls: new Set(),
      sources: new Map(),
      documents: [],
      diagnostics: [...discovered.diagnostics],
      errors: { fetchFailed: 0, malformed: 0, scopeRejected: 0 }
    };

    const visited = new Set<string>(discovered.roots.map(sitemapKey));
    const worklist: WorkItem[] = discovered.roots.map(url => ({ url, depth: 0 }));

    while (worklist.length > 0) {
      const item = worklist.shift();
      if (!item) break;

      const response = discovered.prefetched.get(item.url) ?? (await this.fetchDocument(item.url, resolution));
      if (!response) continue;

      if (discovered.prefetched.has(item.url)) {
        await this.store(item.url, response.body);
      }

      this.processDocument(item, response, resolution, visited, worklist);
    }

    this.logger.info(
      `Sitemap resolution: ${resolution.urls.size} URLs from ${resolution.documents.length} document(s)` +
        (resolution.errors.fetchFailed ? `, ${resolution.errors.fetchFailed} failed` : '') +
        (resolution.errors.malformed ? `, ${resolution.errors.malformed} malformed` : '')
    );

    return resolution;
  }

  private processDocument(
    item: WorkItem,
    response: FetchResponse,
    resolution: SitemapResolution,
    visited: Set<string>,
    worklist: WorkItem[]
  ): void {
    let text: string;
    try {
      text = SitemapParser.decodeBody(response.body);
    } catch (error) {
      resolution.errors.malformed++;
      resolution.diagnostics.push(`Could not decode sitemap ${item.url}: ${errorMessage(error)}`);
      this.logger.warn(`Could not decode sitemap ${item.url}: ${errorMessage(error)}`);
      return;
    }

    const parsed = SitemapParser.parseSitemap(text);
    if (parsed.malformed) {
      resolution.errors.malformed++;
      resolution.diagnostics.push(`Malformed sitemap ${item.url}: ${parsed.error ?? 'unreadable'}`);
      this.logger.warn(`Malformed sitemap ${item.url}, recovered ${parsed.urls.length + parsed.sitemaps.length} <loc> value(s)`);
    } else if (parsed.kind === 'unknown') {
      resolution.diagnostics.push(`${item.url} is not a sitemap: ${parsed.error ?? 'unrecognised root element'}`);
    }

    const document: SitemapDocument = {
      url: item.url,
      depth: item.depth,
      kind: parsed.kind,
      malformed: parsed.malformed,
      pageUrls: 0,
      childSitemaps: 0
    };
    resolution.documents.push(document);

    for (const loc of parsed.sitemaps) {
      const child = resolveHttpUrl(loc, item.url);
      if (!child || visited.has(sitemapKey(child))) continue;

      if (item.depth + 1 > this.maxDepth) {
        resolution.diagnostics.push(`Skipping ${child}: deeper than ${this.maxDepth} levels of sitemap indexes`);
        continue;
      }

      visited.add(sitemapKey(child));
      worklist.push({ url: child, depth: item.depth + 1 });
      document.childSitemaps++;
    }

    for (const entry of parsed.urls) {
      const url = normalizeUrl(entry.loc, item.url, this.scope);
      if (!url) {
        resolution.errors.scopeRejected++;
        continue;
      }

      document.pageUrls++;
      resolution.urls.add(url);
      if (!resolution.sources.has(url)) {
        resolution.sources.set(url, item.url);
      }
    }

    this.logger.debug(
      `Parsed ${item.url} (depth ${item.depth}): ${document.pageUrls} page(s), ${document.childSitemaps} child sitemap(s)`
    );
  }

  private async fetchDocument(url: string, resolution: SitemapResolution): Promise<FetchResponse | null> {
    try {
      return await this.fetcher.fetch(url, this.cache ? { cache: this.cache, cacheKey: urlToFilename(url) } : {});
    } catch (error) {
      resolution.errors.fetchFailed++;
      resolution.diagnostics.push(`Failed to fetch sitemap ${url}: ${errorMessage(error)}`);
      this.logger.warn(`Failed to fetch sitemap ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async store(url: string, body: Buffer): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.write(urlToFilename(url), body);
    } catch (error) {
      this.logger.warn(`Failed to cache sitemap ${url}: ${errorMessage(error)}`);
    }
  }
}

function sitemapKey(url: string): string {
  return canonicalize(url) ?? url;
}
