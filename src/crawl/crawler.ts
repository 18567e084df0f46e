import { PageFetcher } from '../fetch/fetcher';
import { FetchError } from '../fetch/errors';
import { ContentNormalizer } from '../content/normalizer';
import { ContentStore } from '../types/fetch';
import { UrlScope } from '../types/site';
import { CrawlOptions, CrawlResult, CrawlStats, TaskOutcome, UrlRecord } from '../types/crawl';
import { Logger, createLogger, errorMessage } from '../logger';
import { canonicalize, classifyUrl, normalizeUrl, urlToFilename } from '../url/normalizer';
import { Frontier, FrontierEntry } from './frontier';
import { extractLinks, isHtmlContentType } from './links';

export interface CrawlerEngineOptions {
  fetcher: PageFetcher;
  scope: UrlScope;
  cache?: ContentStore;
  logger?: Logger;
}

interface CrawlRun {
  frontier: Frontier;
  records: Map<string, UrlRecord>;
  sources: Map<string, string>;
  offsiteLinks: Set<string>;
  scopeRejected: number;
  wake: () => void;
}

export class CrawlerEngine {
  private static readonly PROGRESS_INTERVAL = 100;

  private readonly fetcher: PageFetcher;
  private readonly scope: UrlScope;
  private readonly cache?: ContentStore;
  private readonly logger: Logger;

  constructor(options: CrawlerEngineOptions) {
    this.fetcher = options.fetcher;
    this.scope = options.scope;
    this.cache = options.cache;
    this.logger = options.logger ?? createLogger();
  }

  async crawl(options: CrawlOptions): Promise<CrawlResult> {
    const startTime = Date.now();
    const waiters: Array<() => void> = [];
    const run: CrawlRun = {
      frontier: new Frontier(options.maxPages),
      records: new Map(),
      sources: new Map(),
      offsiteLinks: new Set(),
      scopeRejected: 0,
      wake: () => {
        for (const resolve of waiters.splice(0)) resolve();
      }
    };

    const seed = normalizeUrl(options.seedUrl, undefined, this.scope);
    if (!seed) {
      this.logger.error(`Seed URL ${options.seedUrl} is outside the crawl scope`);
      return this.buildResult(options.seedUrl, run, startTime);
    }

    this.enqueue(run, { url: seed, depth: 0, referrer: seed });
    this.logger.info(`Crawling ${seed} with ${options.workers} worker(s), up to ${options.maxPages} page(s)`);

    let inFlight = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      for (;;) {
        const entry = run.frontier.take();
        if (entry) {
          inFlight++;
          try {
            await this.runTask(run, entry, options.taskTimeoutMs);
          } finally {
            inFlight--;
            completed++;
            if (completed % CrawlerEngine.PROGRESS_INTERVAL === 0) {
              this.logger.info(`Crawled ${completed} page(s), ${run.frontier.pending} queued`);
            }
            run.wake();
          }
          continue;
        }

        if (inFlight === 0) {
          run.wake();
          return;
        }

        await new Promise<void>(resolve => waiters.push(resolve));
      }
    };

    await Promise.all(Array.from({ length: Math.max(1, options.workers) }, () => worker()));

    return this.buildResult(seed, run, startTime);
  }

  private enqueue(run: CrawlRun, entry: FrontierEntry): boolean {
    if (run.frontier.offer(entry) !== 'accepted') {
      return false;
    }

    run.records.set(entry.url, {
      url: entry.url,
      source: 'crawl',
      depth: entry.depth,
      referrer: entry.referrer,
      state: 'queued'
    });
    if (!run.sources.has(entry.url)) {
      run.sources.set(entry.url, entry.referrer);
    }
    run.wake();
    return true;
  }

  private async runTask(run: CrawlRun, entry: FrontierEntry, timeoutMs: number): Promise<void> {
    const record = run.records.get(entry.url);
    if (!record || record.state !== 'queued') return;
    record.state = 'in_flight';

    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<TaskOutcome>(resolve => {
      timeoutId = setTimeout(() => {
        controller.abort();
        resolve({
          state: 'timed_out',
          error: { kind: 'TaskTimeout', message: `Task exceeded ${timeoutMs}ms` }
        });
      }, timeoutMs);
    });

    const outcome = await Promise.race([this.visit(run, entry, controller.signal), timeout]);
    clearTimeout(timeoutId);

    // Terminal states are final; an abandoned task that settles later changes nothing
    if (record.state !== 'in_flight') return;
    Object.assign(record, outcome);

    if (outcome.state === 'timed_out') {
      this.logger.warn(`Timed out: ${entry.url}`);
    } else if (outcome.state === 'visited_error') {
      this.logger.debug(`Failed: ${entry.url} (${outcome.error?.message ?? 'unknown error'})`);
    } else {
      this.logger.debug(`Visited: ${entry.url} [${outcome.status ?? '-'}]`);
    }
  }

  /** Fetch and parse one page. Never rejects. */
  private async visit(run: CrawlRun, entry: FrontierEntry, signal: AbortSignal): Promise<TaskOutcome> {
    try {
      const response = await this.fetcher.fetch(entry.url, {
        signal,
        ...(this.cache && { cache: this.cache, cacheKey: urlToFilename(entry.url) })
      });

      let pageUrl = entry.url;
      let resolvedUrl: string | undefined;

      if (response.redirectCount > 0) {
        const target = normalizeUrl(response.finalUrl, undefined, this.scope);
        if (!target) {
          return {
            state: 'visited_error',
            status: response.status,
            error: { kind: 'ScopeRejected', message: `Redirected out of scope to ${response.finalUrl}` }
          };
        }
        if (target !== entry.url) {
          resolvedUrl = target;
          if (!run.frontier.claim(target)) {
            // The target is crawled on its own account
            return { state: 'visited_ok', status: response.status, contentType: response.contentType, resolvedUrl };
          }
          pageUrl = target;
          if (!run.sources.has(target)) {
            run.sources.set(target, entry.referrer);
          }
        }
      }

      const outcome: TaskOutcome = {
        state: 'visited_ok',
        status: response.status,
        contentType: response.contentType,
        cacheRef: response.cacheRef,
        resolvedUrl
      };

      if (!isHtmlContentType(response.contentType)) {
        outcome.contentHash = ContentNormalizer.calculateHash(response.body);
        return outcome;
      }

      const html = response.body.toString('utf8');
      outcome.contentHash = await ContentNormalizer.calculateNormalizedHash(html, this.logger);

      if (!signal.aborted) {
        this.followLinks(run, html, response.finalUrl, pageUrl, entry.depth + 1);
      }

      return outcome;
    } catch (error) {
      if (error instanceof FetchError) {
        return {
          state: 'visited_error',
          status: error.status,
          error: { kind: error.kind, message: error.message }
        };
      }
      return {
        state: 'visited_error',
        error: { kind: 'NetworkFatal', message: errorMessage(error) }
      };
    }
  }

  private followLinks(run: CrawlRun, html: string, documentUrl: string, pageUrl: string, depth: number): void {
    for (const link of extractLinks(html, documentUrl)) {
      const result = classifyUrl(link, undefined, this.scope);
      if (result.ok) {
        this.enqueue(run, { url: result.url, depth, referrer: pageUrl });
        continue;
      }

      if (result.reason === 'domain') {
        const offsite = canonicalize(link);
        if (offsite) run.offsiteLinks.add(offsite);
      } else {
        run.scopeRejected++;
      }
    }
  }

  private buildResult(seedUrl: string, run: CrawlRun, startTime: number): CrawlResult {
    const records = Array.from(run.records.values());
    const urls = new Set<string>();
    const stats: CrawlStats = {
      enqueued: run.frontier.enqueued,
      visitedOk: 0,
      visitedError: 0,
      timedOut: 0,
      nonHtml: 0,
      scopeRejected: run.scopeRejected,
      capReached: run.frontier.capReached,
      executionTime: Date.now() - startTime
    };

    for (const record of records) {
      if (record.state === 'visited_ok') {
        stats.visitedOk++;
        if (isHtmlContentType(record.contentType)) {
          urls.add(record.resolvedUrl ?? record.url);
        } else {
          stats.nonHtml++;
        }
      } else if (record.state === 'visited_error') {
        stats.visitedError++;
      } else if (record.state === 'timed_out') {
        stats.timedOut++;
      }
    }

    const seedRecord = run.records.get(seedUrl);
    const seedReachable = seedRecord?.state === 'visited_ok';

    this.logger.info(
      `Crawl finished: ${urls.size} page(s), ${stats.visitedError} error(s), ${stats.timedOut} timeout(s)` +
        (stats.capReached ? ` (stopped at ${stats.enqueued} URLs)` : '')
    );

    return {
      seedUrl,
      seedReachable,
      urls,
      sources: run.sources,
      records,
      offsiteLinks: run.offsiteLinks,
      stats
    };
  }
}
