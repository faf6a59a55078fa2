import { createHash } from 'crypto';
import { mkdir, readFile, readdir, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { CacheEntry, type Clock } from './cacheEntry.js';

const FILE_SUFFIX = '.json';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

function parseEntry(raw: string): CacheEntry | null {
  try {
    return CacheEntry.fromRecord(JSON.parse(raw));
  } catch {
    return null;
  }
}

/**
 * Durable tier: one JSON file per key, named by the key's sha256 digest.
 *
 * Files that cannot be read back, fail to parse or have expired are removed
 * when they are next touched. Payloads must survive `JSON.stringify`.
 */
export class DiskCache {
  constructor(
    readonly cacheDir: string,
    private readonly clock: Clock = Date.now,
  ) {}

  pathFor(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex');
    return path.join(this.cacheDir, `${digest}${FILE_SUFFIX}`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const file = this.pathFor(key);
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      logger.warn({ file, key, error: errorMessage(error) }, 'Unreadable cache file, removing');
      await this.remove(file);
      return undefined;
    }

    const entry = parseEntry(raw);
    if (!entry) {
      logger.warn({ file, key }, 'Corrupt cache file, removing');
      await this.remove(file);
      return undefined;
    }
    if (entry.isExpired(this.clock())) {
      await this.remove(file);
      return undefined;
    }
    return entry;
  }

  /**
   * Last writer wins. A failed write only costs a future miss.
   */
  async set(key: string, entry: CacheEntry): Promise<void> {
    const file = this.pathFor(key);
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(file, JSON.stringify({ key, ...entry.toRecord() }), 'utf8');
    } catch (error) {
      logger.warn({ file, key, error: errorMessage(error) }, 'Failed to write cache file');
    }
  }

  /**
   * Whether a file existed for the key
   */
  async delete(key: string): Promise<boolean> {
    return this.remove(this.pathFor(key));
  }

  async clear(): Promise<number> {
    const files = await this.listFiles();
    const removed = await Promise.all(files.map((file) => this.remove(file)));
    return removed.filter(Boolean).length;
  }

  /**
   * Sweeps expired and unparseable files
   */
  async cleanupExpired(): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const file of await this.listFiles()) {
      let raw: string;
      try {
        raw = await readFile(file, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) continue;
        logger.warn({ file, error: errorMessage(error) }, 'Unreadable cache file, removing');
        if (await this.remove(file)) removed++;
        continue;
      }
      const entry = parseEntry(raw);
      if (!entry || entry.isExpired(now)) {
        if (await this.remove(file)) removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return (await this.listFiles()).length;
  }

  private async listFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return names.filter((name) => name.endsWith(FILE_SUFFIX)).map((name) => path.join(this.cacheDir, name));
  }

  private async remove(file: string): Promise<boolean> {
    try {
      await unlink(file);
      return true;
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn({ file, error: errorMessage(error) }, 'Failed to remove cache file');
      }
      return false;
    }
  }
}
