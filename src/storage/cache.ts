import { promises as fs } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import { gzip } from 'node:zlib';
import { ContentStore } from '../types/fetch';
import { Logger, createLogger } from '../logger';

const gzipAsync = promisify(gzip);

export interface FileContentStoreOptions {
  directory: string;
  extension: string;
  compress?: boolean;
  logger?: Logger;
}

/**
 * One file per key under a single directory. Writes to distinct keys never
 * touch each other's files; a write lands in a temporary file first and is
 * renamed into place.
 */
export class FileContentStore implements ContentStore {
  private static sequence = 0;

  private readonly directory: string;
  private readonly extension: string;
  private readonly compress: boolean;
  private readonly logger: Logger;
  private ready: Promise<void> | null = null;

  constructor(options: FileContentStoreOptions) {
    this.directory = options.directory;
    this.extension = options.extension.replace(/^\./, '');
    this.compress = options.compress ?? false;
    this.logger = options.logger ?? createLogger();
  }

  pathFor(key: string): string {
    const suffix = this.compress ? `${this.extension}.gz` : this.extension;
    return path.join(this.directory, `${key}.${suffix}`);
  }

  async write(key: string, content: Buffer): Promise<string> {
    await this.ensureDirectory();

    const target = this.pathFor(key);
    const data = this.compress ? await gzipAsync(content) : content;
    const temporary = `${target}.${process.pid}.${FileContentStore.sequence++}.tmp`;

    await fs.writeFile(temporary, data);
    await fs.rename(temporary, target);
    this.logger.debug(`Cached ${key} (${data.length} bytes)`);
    return target;
  }

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.directory, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
