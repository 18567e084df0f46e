import { ComparisonFilters } from '../types/site';
import { ComparisonReport, ComparisonStatus, ListDelta, PreviousRun, ResultSets } from '../types/report';
import { applyFilters } from './filters';

export interface StatusRow {
  status: ComparisonStatus;
  url: string;
}

export class Reconciler {
  /**
   * Set differences between what the sitemap declares and what the crawl
   * reached. Both inputs must already be canonical. Filters narrow
   * missing-from-sitemap only, and run before any comparison with a prior run.
   */
  static reconcile(
    current: ResultSets,
    filters: ComparisonFilters,
    previous?: PreviousRun
  ): ComparisonReport {
    const { missingFromSitemap, missingFromSite, filtered } = this.differences(current, filters);
    const report: ComparisonReport = { missingFromSitemap, missingFromSite, filtered };

    if (previous) {
      const prior = this.differences(previous, filters);
      report.history = {
        previousRun: previous.name,
        missingFromSitemap: this.compareLists(missingFromSitemap, prior.missingFromSitemap),
        missingFromSite: this.compareLists(missingFromSite, prior.missingFromSite)
      };
    }

    return report;
  }

  static difference(left: ReadonlySet<string>, right: ReadonlySet<string>): string[] {
    const result: string[] = [];
    for (const url of left) {
      if (!right.has(url)) {
        result.push(url);
      }
    }
    return result.sort();
  }

  static compareLists(current: string[], previous: string[]): ListDelta {
    const currentSet = new Set(current);
    const previousSet = new Set(previous);

    return {
      new: this.difference(currentSet, previousSet),
      existing: current.filter(url => previousSet.has(url)).sort(),
      fixed: this.difference(previousSet, currentSet)
    };
  }

  static statusRows(delta: ListDelta): StatusRow[] {
    return [
      ...delta.new.map(url => ({ status: 'New' as const, url })),
      ...delta.existing.map(url => ({ status: 'Existing' as const, url })),
      ...delta.fixed.map(url => ({ status: 'Fixed' as const, url }))
    ];
  }

  private static differences(sets: ResultSets, filters: ComparisonFilters) {
    const filteredOut = applyFilters(this.difference(sets.crawledUrls, sets.sitemapUrls), filters);
    return {
      missingFromSitemap: filteredOut.kept,
      missingFromSite: this.difference(sets.sitemapUrls, sets.crawledUrls),
      filtered: { pagination: filteredOut.pagination, taxonomy: filteredOut.taxonomy }
    };
  }
}
