export { runScan } from './scan';
export type { ScanOptions, ScanOutcome } from './scan';

export {
  createScope,
  normalizeUrl,
  classifyUrl,
  canonicalize,
  resolveHttpUrl,
  urlToFilename,
  DEFAULT_TRACKING_PARAMS,
  DEFAULT_EXCLUDED_EXTENSIONS
} from './url/normalizer';
export type { RejectReason, UrlClassification } from './url/normalizer';

export { PageFetcher, BROWSER_USER_AGENT } from './fetch/fetcher';
export type { PageFetcherOptions } from './fetch/fetcher';
export { RetryPolicy } from './fetch/retry';
export { FetchError, ConfigError } from './fetch/errors';

export { SitemapParser } from './sitemap/parser';
export { SitemapDiscovery } from './sitemap/discovery';
export { SitemapResolver } from './sitemap/resolver';
export type { SitemapResolverOptions } from './sitemap/resolver';

export { CrawlerEngine } from './crawl/crawler';
export type { CrawlerEngineOptions } from './crawl/crawler';
export { Frontier } from './crawl/frontier';
export { extractLinks, isHtmlContentType } from './crawl/links';

export { Reconciler } from './reconcile/reconciler';
export type { StatusRow } from './reconcile/reconciler';
export { applyFilters, isPaginationUrl, isTaxonomyUrl } from './reconcile/filters';

export { ContentNormalizer } from './content/normalizer';
export { FileContentStore } from './storage/cache';
export { RunStore, RUN_FILES, formatTimestamp, domainDirectoryName } from './storage/runs';
export { formatCsv, parseCsv, parseCsvRecords } from './storage/csv';

export { ScanConfigValidator } from './config/validator';
export type { ScanConfigInput } from './config/validator';

export { ReportGenerator } from './report/generator';
export { ReportCollector } from './report/collector';

export { createLogger, silentLogger } from './logger';
export type { Logger } from './logger';

export type * from './types/site';
export type * from './types/crawl';
export type * from './types/fetch';
export type * from './types/sitemap';
export type * from './types/report';
