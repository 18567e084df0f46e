import robotsParser from 'robots-parser';
import { PageFetcher } from '../fetch/fetcher';
import { FetchError } from '../fetch/errors';
import { FetchResponse } from '../types/fetch';
import { Logger, createLogger, errorMessage } from '../logger';
import { canonicalize, resolveHttpUrl } from '../url/normalizer';
import { SitemapParser } from './parser';

export type DiscoveryMethod = 'explicit' | 'robots' | 'conventional' | 'none';

export interface DiscoveredSitemaps {
  method: DiscoveryMethod;
  roots: string[];
  // Documents already downloaded while probing, keyed by the URL fetched
  prefetched: Map<string, FetchResponse>;
  diagnostics: string[];
}

export class SitemapDiscovery {
  static readonly CONVENTIONAL_PATHS = [
    '/sitemap.xml',
    '/sitemap_index.xml',
    '/sitemap-index.xml',
    '/wp-sitemap.xml',
    '/sitemap/sitemap.xml',
    '/sitemaps/sitemap.xml'
  ];

  private readonly fetcher: PageFetcher;
  private readonly logger: Logger;

  constructor(fetcher: PageFetcher, logger: Logger = createLogger()) {
    this.fetcher = fetcher;
    this.logger = logger;
  }

  async discover(startUrl: string, sitemapUrl?: string): Promise<DiscoveredSitemaps> {
    const prefetched = new Map<string, FetchResponse>();
    const diagnostics: string[] = [];

    if (sitemapUrl) {
      const root = resolveHttpUrl(sitemapUrl, startUrl);
      if (root) {
        return { method: 'explicit', roots: [root], prefetched, diagnostics };
      }
      diagnostics.push(`Ignoring invalid sitemap URL ${sitemapUrl}`);
    }

    const fromRobots = await this.fromRobots(startUrl, diagnostics);
    if (fromRobots.length > 0) {
      this.logger.info(`Found ${fromRobots.length} sitemap(s) in robots.txt`);
      return { method: 'robots', roots: fromRobots, prefetched, diagnostics };
    }

    const origin = new URL(startUrl).origin;
    for (const path of SitemapDiscovery.CONVENTIONAL_PATHS) {
      const candidate = `${origin}${path}`;
      try {
        const response = await this.fetcher.fetch(candidate);
        const parsed = SitemapParser.parseSitemap(SitemapParser.decodeBody(response.body));
        if (SitemapParser.isSitemap(parsed)) {
          this.logger.info(`Found sitemap at ${candidate}`);
          prefetched.set(candidate, response);
          return { method: 'conventional', roots: [candidate], prefetched, diagnostics };
        }
        this.logger.debug(`${candidate} is not a sitemap`);
      } catch (error) {
        this.logger.debug(`No sitemap at ${candidate}: ${errorMessage(error)}`);
      }
    }

    diagnostics.push(`No sitemap found for ${origin}`);
    this.logger.warn(`No sitemap found for ${origin}, continuing with the crawl only`);
    return { method: 'none', roots: [], prefetched, diagnostics };
  }

  private async fromRobots(startUrl: string, diagnostics: string[]): Promise<string[]> {
    const robotsUrl = new URL('/robots.txt', startUrl).href;

    let text: string;
    try {
      const response = await this.fetcher.fetch(robotsUrl);
      text = response.body.toString('utf8');
    } catch (error) {
      const detail = error instanceof FetchError && error.status ? `HTTP ${error.status}` : errorMessage(error);
      this.logger.debug(`No robots.txt at ${robotsUrl}: ${detail}`);
      return [];
    }

    const roots: string[] = [];
    const seen = new Set<string>();
    for (const declared of robotsParser(robotsUrl, text).getSitemaps()) {
      const root = resolveHttpUrl(declared, robotsUrl);
      if (!root) {
        diagnostics.push(`Ignoring invalid Sitemap directive ${declared}`);
        continue;
      }
      const key = canonicalize(root) ?? root;
      if (!seen.has(key)) {
        seen.add(key);
        roots.push(root);
      }
    }
    return roots;
  }
}
