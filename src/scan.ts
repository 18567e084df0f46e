import path from 'node:path';
import { PageFetcher } from './fetch/fetcher';
import { SitemapResolver } from './sitemap/resolver';
import { CrawlerEngine } from './crawl/crawler';
import { Reconciler } from './reconcile/reconciler';
import { FileContentStore } from './storage/cache';
import { CACHE_DIR, RUN_FILES, RunStore, XML_CACHE_DIR, domainDirectoryName, formatTimestamp } from './storage/runs';
import { createScope } from './url/normalizer';
import { Logger, createLogger, errorMessage } from './logger';
import { ScanConfig } from './types/site';
import { ErrorKind } from './types/fetch';
import { CrawlResult } from './types/crawl';
import { SitemapResolution } from './types/sitemap';
import { ComparisonReport, PreviousRun, ScanSummary } from './types/report';

export interface ScanOptions {
  logger?: Logger;
  now?: () => Date;
}

export interface ScanOutcome {
  exitCode: 0 | 1;
  runDirectory: string;
  summary: ScanSummary;
  report: ComparisonReport | null;
}

/**
 * One full run: resolve the sitemap, crawl the site, reconcile the two sets
 * and persist everything under `<outputPrefix>/<domain>/<timestamp>/`.
 */
export async function runScan(config: ScanConfig, options: ScanOptions = {}): Promise<ScanOutcome> {
  const logger = options.logger ?? createLogger({ verbose: config.verbose });
  const startTime = Date.now();
  const timestamp = formatTimestamp((options.now ?? (() => new Date()))());
  const domain = domainDirectoryName(config.startUrl);
  const scope = createScope(config.startUrl, { trackingParams: config.trackingParams });

  const store = new RunStore(config.outputPrefix, logger);
  const runDirectory = await store.createRun(domain, timestamp);
  logger.info(`Scanning ${config.startUrl} into ${runDirectory}`);

  const fetcher = new PageFetcher({
    timeoutMs: config.fetchOptions.timeout,
    maxRedirects: config.fetchOptions.maxRedirects,
    retry: config.fetchOptions.retry,
    logger
  });

  const resolution = await new SitemapResolver({
    fetcher,
    scope,
    cache: new FileContentStore({ directory: path.join(runDirectory, XML_CACHE_DIR), extension: 'xml', logger }),
    logger
  }).resolve({ startUrl: config.startUrl, sitemapUrl: config.sitemapUrl });

  const crawl = await new CrawlerEngine({
    fetcher,
    scope,
    cache: new FileContentStore({
      directory: path.join(runDirectory, CACHE_DIR),
      extension: 'html',
      compress: config.compressCache,
      logger
    }),
    logger
  }).crawl({
    seedUrl: config.startUrl,
    maxPages: config.maxPages,
    workers: config.workers,
    taskTimeoutMs: config.taskTimeoutMs
  });

  for (const record of crawl.records) {
    if (resolution.urls.has(record.resolvedUrl ?? record.url)) {
      record.source = 'both';
    }
  }
  await Promise.all([
    store.writeCrawlLog(runDirectory, crawl.records),
    store.writeUrlList(runDirectory, RUN_FILES.offsiteLinks, crawl.offsiteLinks)
  ]);

  if (!crawl.seedReachable) {
    const seedError = crawl.records[0]?.error?.message ?? 'outside the crawl scope';
    logger.error(`Start URL ${config.startUrl} is unreachable: ${seedError}`);
    const summary = buildSummary({ config, domain, timestamp, resolution, crawl, report: null, previous: null, startTime });
    summary.diagnostics.push(`Start URL unreachable: ${seedError}`);
    await store.writeSummary(runDirectory, summary);
    return { exitCode: 1, runDirectory, summary, report: null };
  }

  let previous: PreviousRun | null = null;
  if (config.comparePrevious) {
    const previousName = await store.findPreviousRun(domain, timestamp);
    if (previousName) {
      try {
        previous = await store.loadRun(domain, previousName, scope);
        logger.info(`Comparing with previous run ${previousName}`);
      } catch (error) {
        logger.warn(`Could not load previous run ${previousName}: ${errorMessage(error)}`);
      }
    } else {
      logger.info('No previous run to compare with');
    }
  }

  const report = Reconciler.reconcile(
    { sitemapUrls: resolution.urls, crawledUrls: crawl.urls },
    config.filters,
    previous ?? undefined
  );

  await Promise.all([
    store.writeSourcedList(runDirectory, RUN_FILES.sitemapUrls, resolution.urls, resolution.sources),
    store.writeSourcedList(runDirectory, RUN_FILES.siteUrls, crawl.urls, crawl.sources),
    store.writeSourcedList(runDirectory, RUN_FILES.missingFromSitemap, report.missingFromSitemap, crawl.sources),
    store.writeSourcedList(runDirectory, RUN_FILES.missingFromSite, report.missingFromSite, resolution.sources)
  ]);

  if (report.history) {
    await Promise.all([
      store.writeStatusList(
        runDirectory,
        RUN_FILES.comparisonMissingFromSitemap,
        Reconciler.statusRows(report.history.missingFromSitemap)
      ),
      store.writeStatusList(
        runDirectory,
        RUN_FILES.comparisonMissingFromSite,
        Reconciler.statusRows(report.history.missingFromSite)
      )
    ]);
  }

  const summary = buildSummary({ config, domain, timestamp, resolution, crawl, report, previous, startTime });
  await store.writeSummary(runDirectory, summary);

  logger.info(
    `Done: ${summary.sitemapUrls} sitemap URLs, ${summary.crawledUrls} crawled URLs, ` +
      `${summary.missingFromSitemap} missing from sitemap, ${summary.missingFromSite} missing from site`
  );
  const errorCounts = Object.entries(summary.errors).filter(([, count]) => count > 0);
  if (errorCounts.length > 0) {
    logger.info(`Errors: ${errorCounts.map(([kind, count]) => `${kind}=${count}`).join(', ')}`);
  }

  return { exitCode: 0, runDirectory, summary, report };
}

function buildSummary(input: {
  config: ScanConfig;
  domain: string;
  timestamp: string;
  resolution: SitemapResolution;
  crawl: CrawlResult;
  report: ComparisonReport | null;
  previous: PreviousRun | null;
  startTime: number;
}): ScanSummary {
  const { resolution, crawl, report } = input;

  const errors: Record<ErrorKind, number> = {
    NetworkTransient: 0,
    NetworkFatal: 0,
    ParseMalformed: 0,
    ScopeRejected: 0,
    TaskTimeout: 0
  };
  for (const record of crawl.records) {
    if (record.error) {
      errors[record.error.kind]++;
    }
  }
  errors.ParseMalformed += resolution.errors.malformed;
  errors.ScopeRejected += resolution.errors.scopeRejected + crawl.stats.scopeRejected;

  const diagnostics = [...resolution.diagnostics];
  if (crawl.stats.capReached) {
    diagnostics.push(`Crawl stopped accepting URLs at the ${input.config.maxPages} page limit`);
  }

  return {
    domain: input.domain,
    timestamp: input.timestamp,
    startUrl: input.config.startUrl,
    sitemapRoots: resolution.roots,
    sitemapUrls: resolution.urls.size,
    crawledUrls: crawl.urls.size,
    missingFromSitemap: report?.missingFromSitemap.length ?? 0,
    missingFromSite: report?.missingFromSite.length ?? 0,
    filtered: report?.filtered ?? { pagination: 0, taxonomy: 0 },
    previousRun: input.previous?.name ?? null,
    errors,
    crawl: {
      enqueued: crawl.stats.enqueued,
      visitedOk: crawl.stats.visitedOk,
      visitedError: crawl.stats.visitedError,
      timedOut: crawl.stats.timedOut,
      nonHtml: crawl.stats.nonHtml,
      offsiteLinks: crawl.offsiteLinks.size,
      capReached: crawl.stats.capReached
    },
    diagnostics,
    executionTime: Date.now() - input.startTime
  };
}
