import { ComparisonFilters, RetryOptions, ScanConfig } from '../types/site';
import { ConfigError } from '../fetch/errors';

export interface ScanConfigInput extends Partial<Omit<ScanConfig, 'fetchOptions' | 'filters'>> {
  fetchOptions?: Partial<Omit<ScanConfig['fetchOptions'], 'retry'>> & { retry?: Partial<RetryOptions> };
  filters?: Partial<ComparisonFilters>;
}

export class ScanConfigValidator {
  static readonly MAX_WORKERS = 64;
  static readonly MAX_ATTEMPTS = 10;

  static validateUrl(url: string): boolean {
    try {
      const parsed = new URL(url);
      return ['http:', 'https:'].includes(parsed.protocol);
    } catch {
      return false;
    }
  }

  static validateFetchOptions(options: ScanConfig['fetchOptions']): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!(options.timeout > 0)) {
      errors.push('Fetch timeout must be greater than 0');
    }

    if (!Number.isInteger(options.maxRedirects) || options.maxRedirects < 0 || options.maxRedirects > 20) {
      errors.push('Max redirects must be between 0 and 20');
    }

    const { maxAttempts, baseDelayMs, maxDelayMs } = options.retry;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > this.MAX_ATTEMPTS) {
      errors.push(`Retries must be between 1 and ${this.MAX_ATTEMPTS}`);
    }

    if (!(baseDelayMs >= 0) || !(maxDelayMs >= baseDelayMs)) {
      errors.push('Retry delays must satisfy 0 <= base delay <= max delay');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  static validateFullConfig(config: ScanConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!this.validateUrl(config.startUrl)) {
      errors.push('Start URL must be a valid HTTP/HTTPS URL');
    }

    if (config.sitemapUrl !== undefined && !this.validateUrl(config.sitemapUrl)) {
      errors.push('Sitemap URL must be a valid HTTP/HTTPS URL');
    }

    if (!config.outputPrefix.trim()) {
      errors.push('Output prefix must not be empty');
    }

    if (!Number.isInteger(config.workers) || config.workers < 1 || config.workers > this.MAX_WORKERS) {
      errors.push(`Workers must be an integer between 1 and ${this.MAX_WORKERS}`);
    }

    if (!Number.isInteger(config.maxPages) || config.maxPages < 1) {
      errors.push('Max pages must be a positive integer');
    }

    if (!(config.taskTimeoutMs > 0)) {
      errors.push('Thread timeout must be greater than 0');
    }

    const fetchValidation = this.validateFetchOptions(config.fetchOptions);
    if (!fetchValidation.valid) {
      errors.push(...fetchValidation.errors);
    }

    if (config.trackingParams?.some(param => !param.trim())) {
      errors.push('Tracking parameter names must not be empty');
    }

    return { valid: errors.length === 0, errors };
  }

  static sanitizeConfig(config: ScanConfigInput): ScanConfig {
    return {
      startUrl: config.startUrl?.trim() ?? '',
      outputPrefix: config.outputPrefix ?? 'sites',
      workers: config.workers ?? 4,
      maxPages: config.maxPages ?? 10000,
      taskTimeoutMs: config.taskTimeoutMs ?? 30000,
      fetchOptions: {
        timeout: config.fetchOptions?.timeout ?? 10000,
        maxRedirects: config.fetchOptions?.maxRedirects ?? 5,
        retry: {
          maxAttempts: config.fetchOptions?.retry?.maxAttempts ?? 3,
          baseDelayMs: config.fetchOptions?.retry?.baseDelayMs ?? 500,
          maxDelayMs: config.fetchOptions?.retry?.maxDelayMs ?? 8000
        }
      },
      comparePrevious: config.comparePrevious ?? true,
      filters: {
        ignorePagination: config.filters?.ignorePagination ?? false,
        ignoreTaxonomy: config.filters?.ignoreTaxonomy ?? false
      },
      compressCache: config.compressCache ?? true,
      verbose: config.verbose ?? false,
      ...(config.sitemapUrl ? { sitemapUrl: config.sitemapUrl.trim() } : {}),
      ...(config.trackingParams ? { trackingParams: config.trackingParams } : {})
    };
  }

  /** Fills in defaults and throws a ConfigError listing every problem. */
  static resolve(config: ScanConfigInput): ScanConfig {
    const sanitized = this.sanitizeConfig(config);
    const { valid, errors } = this.validateFullConfig(sanitized);
    if (!valid) {
      throw new ConfigError(errors);
    }
    return sanitized;
  }
}
