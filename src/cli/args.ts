import { parseArgs } from 'node:util';
import { ConfigError } from '../fetch/errors';
import { ScanConfigInput, ScanConfigValidator } from '../config/validator';
import { ScanConfig } from '../types/site';

export const USAGE = `Usage: sitemap-gap <start_url> [options]

Compare the URLs a site declares in its sitemap with the URLs a crawl reaches.

Options:
  --sitemap-url <url>          Sitemap to read instead of discovering one
  --output-prefix <dir>        Root directory for scan output (default: sites)
  --workers <n>                Concurrent crawl workers, 1-64 (default: 4)
  --max-pages <n>              Maximum number of URLs to crawl (default: 10000)
  --thread-timeout <seconds>   Time allowed for one page fetch and parse (default: 30)
  --fetch-timeout <seconds>    Time allowed for one HTTP request (default: 10)
  --retries <n>                Attempts per request, 1-10 (default: 3)
  --compare-previous           Compare with the previous scan (default)
  --no-compare-previous        Skip the comparison with the previous scan
  --ignore-pagination          Leave paging URLs out of the missing-from-sitemap list
  --ignore-categories-tags     Leave category and tag archives out of the missing-from-sitemap list
  --compress-cache             Gzip cached pages (default)
  --no-compress-cache          Store cached pages uncompressed
  --verbose                    Debug logging
  -h, --help                   Show this help
`;

export type CliCommand = { kind: 'help' } | { kind: 'scan'; config: ScanConfig };

const BOOLEAN_FLAGS = ['compare-previous', 'compress-cache', 'ignore-pagination', 'ignore-categories-tags', 'verbose'];
const NEGATABLE_FLAGS = new Set(['compare-previous', 'compress-cache']);
const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Rewrites `--flag=true|false` into the bare and `--no-` forms the option
 * parser understands.
 */
export function normalizeBooleanArgs(argv: string[]): string[] {
  const errors: string[] = [];
  const result: string[] = [];

  for (const arg of argv) {
    const match = /^--([a-z-]+)=(.*)$/.exec(arg);
    if (!match || !BOOLEAN_FLAGS.includes(match[1])) {
      result.push(arg);
      continue;
    }

    const [, name, raw] = match;
    const value = raw.toLowerCase();
    if (TRUE_VALUES.has(value)) {
      result.push(`--${name}`);
    } else if (FALSE_VALUES.has(value)) {
      if (NEGATABLE_FLAGS.has(name)) result.push(`--no-${name}`);
    } else {
      errors.push(`Invalid value for --${name}: ${raw}`);
    }
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return result;
}

export function parseScanArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  const errors: string[] = [];
  if (positionals.length === 0) {
    errors.push('Missing <start_url>');
  } else if (positionals.length > 1) {
    errors.push(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const numeric = (name: string, value: string | undefined): number | undefined => {
    if (value === undefined) return undefined;
    const parsedValue = Number(value);
    if (!value.trim() || Number.isNaN(parsedValue)) {
      errors.push(`Invalid value for --${name}: ${value}`);
      return undefined;
    }
    return parsedValue;
  };
  const seconds = (name: string, value: string | undefined): number | undefined => {
    const parsedValue = numeric(name, value);
    return parsedValue === undefined ? undefined : Math.round(parsedValue * 1000);
  };

  const input: ScanConfigInput = {
    startUrl: positionals[0],
    sitemapUrl: values['sitemap-url'],
    outputPrefix: values['output-prefix'],
    workers: numeric('workers', values.workers),
    maxPages: numeric('max-pages', values['max-pages']),
    taskTimeoutMs: seconds('thread-timeout', values['thread-timeout']),
    fetchOptions: {
      timeout: seconds('fetch-timeout', values['fetch-timeout']),
      retry: { maxAttempts: numeric('retries', values.retries) }
    },
    comparePrevious: flag(values['compare-previous'], values['no-compare-previous']),
    compressCache: flag(values['compress-cache'], values['no-compress-cache']),
    filters: {
      ignorePagination: values['ignore-pagination'],
      ignoreTaxonomy: values['ignore-categories-tags']
    },
    verbose: values.verbose
  };

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return { kind: 'scan', config: ScanConfigValidator.resolve(input) };
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: normalizeBooleanArgs(argv),
      allowPositionals: true,
      strict: true,
      options: {
        'sitemap-url': { type: 'string' },
        'output-prefix': { type: 'string' },
        'workers': { type: 'string' },
        'max-pages': { type: 'string' },
        'thread-timeout': { type: 'string' },
        'fetch-timeout': { type: 'string' },
        'retries': { type: 'string' },
        'compare-previous': { type: 'boolean' },
        'no-compare-previous': { type: 'boolean' },
        'compress-cache': { type: 'boolean' },
        'no-compress-cache': { type: 'boolean' },
        'ignore-pagination': { type: 'boolean' },
        'ignore-categories-tags': { type: 'boolean' },
        'verbose': { type: 'boolean' },
        'help': { type: 'boolean', short: 'h' }
      }
    });
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError([error instanceof Error ? error.message : String(error)]);
  }
}

function flag(enabled: boolean | undefined, disabled: boolean | undefined): boolean | undefined {
  if (disabled) return false;
  if (enabled) return true;
  return undefined;
}
