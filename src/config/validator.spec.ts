import { describe, it, expect } from 'vitest';
import { ScanConfigValidator } from './validator';
import { ConfigError } from '../fetch/errors';

describe('ScanConfigValidator', () => {
  it('fills in defaults', () => {
    const config = ScanConfigValidator.sanitizeConfig({ startUrl: ' https://example.com/ ' });

    expect(config).toEqual({
      startUrl: 'https://example.com/',
      outputPrefix: 'sites',
      workers: 4,
      maxPages: 10000,
      taskTimeoutMs: 30000,
      fetchOptions: { timeout: 10000, maxRedirects: 5, retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 } },
      comparePrevious: true,
      filters: { ignorePagination: false, ignoreTaxonomy: false },
      compressCache: true,
      verbose: false
    });
    expect(ScanConfigValidator.validateFullConfig(config)).toEqual({ valid: true, errors: [] });
  });

  it('keeps explicit zero values so they can be rejected', () => {
    const config = ScanConfigValidator.sanitizeConfig({ startUrl: 'https://example.com', workers: 0, maxPages: 0 });

    expect(ScanConfigValidator.validateFullConfig(config).errors).toEqual([
      'Workers must be an integer between 1 and 64',
      'Max pages must be a positive integer'
    ]);
  });

  it('reports every invalid field', () => {
    const config = ScanConfigValidator.sanitizeConfig({
      startUrl: 'ftp://example.com',
      sitemapUrl: 'not a url',
      workers: 2.5,
      taskTimeoutMs: -1,
      fetchOptions: { timeout: 0, retry: { maxAttempts: 11 } }
    });

    expect(ScanConfigValidator.validateFullConfig(config).errors).toEqual([
      'Start URL must be a valid HTTP/HTTPS URL',
      'Sitemap URL must be a valid HTTP/HTTPS URL',
      'Workers must be an integer between 1 and 64',
      'Thread timeout must be greater than 0',
      'Fetch timeout must be greater than 0',
      'Retries must be between 1 and 10'
    ]);
  });

  it('throws a ConfigError from resolve', () => {
    expect(() => ScanConfigValidator.resolve({})).toThrow(ConfigError);
    expect(() => ScanConfigValidator.resolve({})).toThrow('Invalid configuration: Start URL must be a valid HTTP/HTTPS URL');
    expect(ScanConfigValidator.resolve({ startUrl: 'http://example.com', workers: 8 }).workers).toBe(8);
  });
});
