export interface UrlEntry {
  loc: string;
  lastmod?: string;
  changefreq?: string;
  priority?: number;
}

export type SitemapKind = 'urlset' | 'sitemapindex' | 'unknown';

export interface SitemapParseResult {
  kind: SitemapKind;
  urls: UrlEntry[];
  sitemaps: string[];
  // True when the document failed XML validation and <loc> values were pattern-extracted
  malformed: boolean;
  error?: string;
}

export interface SitemapDocument {
  url: string;
  depth: number;
  kind: SitemapKind;
  malformed: boolean;
  pageUrls: number;
  childSitemaps: number;
}

export interface SitemapResolution {
  roots: string[];
  urls: Set<string>;
  // Canonical URL -> sitemap that first declared it
  sources: Map<string, string>;
  documents: SitemapDocument[];
  diagnostics: string[];
  errors: {
    fetchFailed: number;
    malformed: number;
    scopeRejected: number;
  };
}
