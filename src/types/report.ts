export interface ResultSets {
  sitemapUrls: ReadonlySet<string>;
  crawledUrls: ReadonlySet<string>;
}

export interface ListDelta {
  new: string[];
  existing: string[];
  fixed: string[];
}

export interface HistoricalDelta {
  previousRun: string;
  missingFromSitemap: ListDelta;
  missingFromSite: ListDelta;
}

export interface ComparisonReport {
  missingFromSitemap: string[];
  missingFromSite: string[];
  filtered: {
    pagination: number;
    taxonomy: number;
  };
  history?: HistoricalDelta;
}

export interface PreviousRun extends ResultSets {
  name: string;
}

export type ComparisonStatus = 'New' | 'Existing' | 'Fixed';

export interface ScanSummary {
  domain: string;
  timestamp: string;
  startUrl: string;
  sitemapRoots: string[];
  sitemapUrls: number;
  crawledUrls: number;
  missingFromSitemap: number;
  missingFromSite: number;
  filtered: ComparisonReport['filtered'];
  previousRun: string | null;
  errors: Record<string, number>;
  crawl: {
    enqueued: number;
    visitedOk: number;
    visitedError: number;
    timedOut: number;
    nonHtml: number;
    offsiteLinks: number;
    capReached: boolean;
  };
  diagnostics: string[];
  executionTime: number;
}
