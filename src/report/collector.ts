import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ComparisonStatus } from '../types/report';
import { Logger, createLogger } from '../logger';
import { parseCsvRecords } from '../storage/csv';
import { isNotFound } from '../storage/cache';
import { RUN_FILES, TIMESTAMP_PATTERN } from '../storage/runs';
import { StatusRow } from '../reconcile/reconciler';

export interface SourcedUrl {
  source: string;
  url: string;
}

export interface ScanDetail {
  timestamp: string;
  missingFromSite: SourcedUrl[];
  missingFromSitemap: SourcedUrl[];
  comparison?: {
    missingFromSite: StatusRow[];
    missingFromSitemap: StatusRow[];
  };
}

export interface DomainScans {
  domain: string;
  // Oldest first
  scans: ScanDetail[];
}

const STATUSES: readonly ComparisonStatus[] = ['New', 'Existing', 'Fixed'];

/** Reads the persisted runs under a sites directory back into memory. */
export class ReportCollector {
  private readonly sitesDir: string;
  private readonly logger: Logger;

  constructor(sitesDir: string, logger: Logger = createLogger()) {
    this.sitesDir = sitesDir;
    this.logger = logger;
  }

  async collect(): Promise<DomainScans[]> {
    const domains = await this.listDirectories(this.sitesDir);
    const result: DomainScans[] = [];

    for (const domain of domains.sort()) {
      const timestamps = (await this.listDirectories(path.join(this.sitesDir, domain)))
        .filter(name => TIMESTAMP_PATTERN.test(name))
        .sort();
      if (timestamps.length === 0) {
        this.logger.debug(`Skipping ${domain}: no scans`);
        continue;
      }

      const scans: ScanDetail[] = [];
      for (const timestamp of timestamps) {
        scans.push(await this.readScan(path.join(this.sitesDir, domain, timestamp), timestamp));
      }
      this.logger.debug(`Collected ${scans.length} scan(s) for ${domain}`);
      result.push({ domain, scans });
    }

    return result;
  }

  async readScan(directory: string, timestamp: string): Promise<ScanDetail> {
    const [missingFromSite, missingFromSitemap, comparisonSite, comparisonSitemap] = await Promise.all([
      this.readSourced(path.join(directory, RUN_FILES.missingFromSite)),
      this.readSourced(path.join(directory, RUN_FILES.missingFromSitemap)),
      this.readStatus(path.join(directory, RUN_FILES.comparisonMissingFromSite)),
      this.readStatus(path.join(directory, RUN_FILES.comparisonMissingFromSitemap))
    ]);

    const detail: ScanDetail = { timestamp, missingFromSite, missingFromSitemap };
    if (comparisonSite && comparisonSitemap) {
      detail.comparison = { missingFromSite: comparisonSite, missingFromSitemap: comparisonSitemap };
    }
    return detail;
  }

  private async readSourced(file: string): Promise<SourcedUrl[]> {
    const records = await this.readRecords(file);
    return (records ?? [])
      .map(record => ({ source: record.Source ?? '', url: record.URL ?? '' }))
      .filter(row => row.url);
  }

  private async readStatus(file: string): Promise<StatusRow[] | null> {
    const records = await this.readRecords(file);
    if (!records) return null;

    const rows: StatusRow[] = [];
    for (const record of records) {
      const status = STATUSES.find(candidate => candidate === record.Status);
      if (status && record.URL) {
        rows.push({ status, url: record.URL });
      }
    }
    return rows;
  }

  private async readRecords(file: string) {
    try {
      return parseCsvRecords(await fs.readFile(file, 'utf8'));
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  private async listDirectories(directory: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}
