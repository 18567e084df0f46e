import { promises as fs } from 'node:fs';
import path from 'node:path';
import { Logger, createLogger } from '../logger';
import { ReportCollector } from './collector';
import { ReportTemplates } from './templates';

export interface ReportGeneratorOptions {
  sitesDir: string;
  outputDir: string;
  logger?: Logger;
}

export interface GeneratedReport {
  domains: number;
  pages: string[];
}

export class ReportGenerator {
  private readonly sitesDir: string;
  private readonly outputDir: string;
  private readonly logger: Logger;

  constructor(options: ReportGeneratorOptions) {
    this.sitesDir = options.sitesDir;
    this.outputDir = options.outputDir;
    this.logger = options.logger ?? createLogger();
  }

  async generate(): Promise<GeneratedReport> {
    const domains = await new ReportCollector(this.sitesDir, this.logger).collect();
    const pages: string[] = [];

    const write = async (relative: string, html: string) => {
      const target = path.join(this.outputDir, relative);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, html, 'utf8');
      pages.push(relative);
    };

    await write('index.html', ReportTemplates.mainIndex(domains));

    for (const { domain, scans } of domains) {
      await write(path.join(domain, 'index.html'), ReportTemplates.domainIndex(domain, scans));
      for (const scan of scans) {
        await write(path.join(domain, `${scan.timestamp}.html`), ReportTemplates.scanPage(domain, scan));
      }
      this.logger.info(`Generated report for ${domain} (${scans.length} scan(s))`);
    }

    this.logger.info(`Report written to ${path.join(this.outputDir, 'index.html')}`);
    return { domains: domains.length, pages };
  }
}
