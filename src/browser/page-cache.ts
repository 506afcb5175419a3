import { createHash } from 'crypto';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { z } from 'zod';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { CachedFetch } from '../types/paper.js';

const log = createLogger('cache');

const cachedFetchSchema = z.object({
  timestamp: z.number(),
  url: z.string(),
  data: z.unknown(),
});

export interface PageCacheOptions {
  /** seconds */
  ttl: number;
  now?: () => number;
}

/**
 * Scrape results on disk, one `{sha256(url)}.json` file per URL.
 * Entries older than the TTL are ignored, never deleted. Concurrent writers
 * of the same URL are not coordinated; the last write wins.
 */
export class PageCache {
  private dir: string;
  private ttl: number;
  private now: () => number;

  constructor(dir: string, options: PageCacheOptions) {
    this.dir = dir;
    this.ttl = options.ttl;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  pathFor(url: string): string {
    return join(this.dir, `${createHash('sha256').update(url).digest('hex')}.json`);
  }

  private open(url: string): Low<unknown> {
    return new Low<unknown>(new JSONFile<unknown>(this.pathFor(url)), null);
  }

  async get(url: string): Promise<CachedFetch | null> {
    const db = this.open(url);
    try {
      await db.read();
    } catch (error) {
      log.warn(`Unreadable cache entry for ${url}`, { error: errorMessage(error) });
      return null;
    }

    if (db.data === null) return null;

    const entry = cachedFetchSchema.safeParse(db.data);
    if (!entry.success) {
      log.warn(`Malformed cache entry for ${url}`);
      return null;
    }
    if (this.now() - entry.data.timestamp > this.ttl) {
      log.debug(`Cache entry expired for ${url}`);
      return null;
    }
    const { timestamp, url: storedUrl, data } = entry.data;
    return { timestamp, url: storedUrl, data };
  }

  async set(url: string, data: unknown): Promise<void> {
    mkdirSync(this.dir, { recursive: true });
    const db = this.open(url);
    const entry: CachedFetch = { timestamp: this.now(), url, data };
    db.data = entry;
    await db.write();
  }
}
