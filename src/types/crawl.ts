import { ErrorKind } from './fetch';

export type UrlSource = 'sitemap' | 'crawl' | 'both';

export type CrawlState = 'queued' | 'in_flight' | 'visited_ok' | 'visited_error' | 'timed_out';

export type TerminalState = Extract<CrawlState, 'visited_ok' | 'visited_error' | 'timed_out'>;

export interface UrlRecord {
  url: string;
  source: UrlSource;
  depth: number;
  referrer: string;
  state: CrawlState;
  status?: number;
  contentType?: string;
  contentHash?: string;
  cacheRef?: string;
  // Canonical URL after redirects, when it differs from url
  resolvedUrl?: string;
  error?: {
    kind: ErrorKind;
    message: string;
  };
}

export interface TaskOutcome {
  state: TerminalState;
  status?: number;
  contentType?: string;
  contentHash?: string;
  cacheRef?: string;
  resolvedUrl?: string;
  error?: UrlRecord['error'];
}

export interface CrawlOptions {
  seedUrl: string;
  maxPages: number;
  workers: number;
  taskTimeoutMs: number;
}

export interface CrawlStats {
  enqueued: number;
  visitedOk: number;
  visitedError: number;
  timedOut: number;
  nonHtml: number;
  scopeRejected: number;
  capReached: boolean;
  executionTime: number;
}

export interface CrawlResult {
  seedUrl: string;
  seedReachable: boolean;
  urls: Set<string>;
  // Canonical URL -> page that linked to it (the seed is its own source)
  sources: Map<string, string>;
  records: UrlRecord[];
  offsiteLinks: Set<string>;
  stats: CrawlStats;
}
