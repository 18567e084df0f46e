#!/usr/bin/env node
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { ReportGenerator } from './report/generator';
import { openInBrowser } from './report/browser';
import { createLogger, errorMessage } from './logger';

export const REPORT_USAGE = `Usage: sitemap-gap-report [options]

Render HTML reports from the scans stored by sitemap-gap.

Options:
  --sites <dir>        Directory holding the scans (default: sites)
  --output-dir <dir>   Where to write the report (default: reports)
  --open-browser       Open the main index in the default browser
  --verbose            Debug logging
  -h, --help           Show this help
`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const parsed = readReportArgs(argv);
  if (typeof parsed === 'string') {
    console.error(`Error: ${parsed}`);
    console.error('Run with --help for usage.');
    return 2;
  }

  const { values } = parsed;
  if (values.help) {
    console.log(REPORT_USAGE);
    return 0;
  }

  const logger = createLogger({ verbose: values.verbose });
  try {
    await new ReportGenerator({ sitesDir: values.sites, outputDir: values['output-dir'], logger }).generate();
    if (values['open-browser']) {
      await openInBrowser(pathToFileURL(path.resolve(values['output-dir'], 'index.html')).href, logger);
    }
    return 0;
  } catch (error) {
    logger.error(`Report generation failed: ${errorMessage(error)}`);
    return 1;
  }
}

function readReportArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      options: {
        'sites': { type: 'string', default: 'sites' },
        'output-dir': { type: 'string', default: 'reports' },
        'open-browser': { type: 'boolean', default: false },
        'verbose': { type: 'boolean', default: false },
        'help': { type: 'boolean', short: 'h', default: false }
      }
    });
  } catch (error) {
    return errorMessage(error);
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(error);
      process.exitCode = 1;
    });
}
