import { afterEach, describe, it, expect, vi } from 'vitest';
import { main, REPORT_USAGE } from './report-cli';

describe('report CLI', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage, including the browser option', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(await main(['--help'])).toBe(0);
    expect(log).toHaveBeenCalledWith(REPORT_USAGE);
    expect(REPORT_USAGE).toContain('--open-browser');
  });

  it('rejects unknown options with exit code 2', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await main(['--bogus'])).toBe(2);
    expect(error).toHaveBeenLastCalledWith('Run with --help for usage.');
  });
});
