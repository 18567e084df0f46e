export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ScanConfig {
  startUrl: string;
  sitemapUrl?: string;
  outputPrefix: string;
  workers: number;
  maxPages: number;
  // Budget for one crawl task (fetch + parse), in milliseconds
  taskTimeoutMs: number;
  fetchOptions: {
    timeout: number;
    maxRedirects: number;
    retry: RetryOptions;
  };
  comparePrevious: boolean;
  filters: ComparisonFilters;
  compressCache: boolean;
  verbose: boolean;
  // Query parameters dropped during normalization (exact names or prefixes ending in '*')
  trackingParams?: string[];
}

export interface ComparisonFilters {
  ignorePagination: boolean;
  ignoreTaxonomy: boolean;
}

export interface UrlScope {
  host: string;
  trackingParams: string[];
  rejectedParams: string[];
  excludedExtensions: ReadonlySet<string>;
}
