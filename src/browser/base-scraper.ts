import { z } from 'zod';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { type RetryPolicy, SCRAPER_RETRY, withRetry } from '../lib/retry.js';
import type { PageSource, ScrapePage } from './manager.js';
import type { PageCache } from './page-cache.js';

const log = createLogger('scraper');

export interface ScraperOptions {
  /** Omit to disable caching. */
  cache?: PageCache;
  /** Navigation timeout, milliseconds. */
  timeout: number;
  retry?: RetryPolicy;
}

export interface ScrapeOptions {
  useCache?: boolean;
}

export abstract class BaseScraper<T> {
  protected pages: PageSource;
  protected cache?: PageCache;
  protected timeout: number;
  protected retryPolicy: RetryPolicy;

  /** Shape of a cached result; entries that do not match are refetched. */
  protected abstract readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(pages: PageSource, options: ScraperOptions) {
    this.pages = pages;
    this.cache = options.cache;
    this.timeout = options.timeout;
    this.retryPolicy = options.retry ?? SCRAPER_RETRY;
  }

  protected abstract fetchPage(page: ScrapePage, url: string): Promise<T>;

  /** Whether a fresh result is worth keeping. */
  protected isCacheable(_data: T): boolean {
    return true;
  }

  private async cached(url: string): Promise<T | null> {
    if (!this.cache) return null;
    const entry = await this.cache.get(url);
    if (!entry) return null;

    const parsed = this.schema.safeParse(entry.data);
    if (!parsed.success) {
      log.warn(`Ignoring cache entry with unexpected shape for ${url}`);
      return null;
    }
    log.info(`Cache hit: ${url}`);
    return parsed.data;
  }

  async scrape(url: string, options: ScrapeOptions = {}): Promise<T> {
    if (options.useCache ?? true) {
      const hit = await this.cached(url);
      if (hit !== null) return hit;
    }

    const data = await withRetry(
      () => this.pages.withPage((page) => this.fetchPage(page, url)),
      this.retryPolicy,
      { label: `scrape ${url}` }
    );

    if (this.cache && this.isCacheable(data)) {
      try {
        await this.cache.set(url, data);
      } catch (error) {
        log.warn(`Failed to save cache for ${url}`, { error: errorMessage(error) });
      }
    }
    return data;
  }
}
