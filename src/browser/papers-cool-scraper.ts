import { z } from 'zod';
import { PageLoadError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { parseKimiText } from '../parsers/kimi-summary.js';
import type { ExternalSummary } from '../types/paper.js';
import { BaseScraper, type ScrapeOptions, type ScraperOptions } from './base-scraper.js';
import type { PageSource, ScrapePage } from './manager.js';

const log = createLogger('papers.cool-browser');

const NETWORK_IDLE_TIMEOUT_MS = 10000;
const DIGEST_SETTLE_MS = 3000;

const externalSummarySchema = z.object({
  paperId: z.string(),
  summary: z.string(),
  keyPoints: z.array(z.string()),
  methods: z.string().optional(),
  contributions: z.string().optional(),
  rawHtml: z.string(),
});

export interface PapersCoolScraperOptions extends ScraperOptions {
  baseUrl?: string;
}

export class PapersCoolScraper extends BaseScraper<ExternalSummary> {
  protected readonly schema = externalSummarySchema;
  private baseUrl: string;

  constructor(pages: PageSource, options: PapersCoolScraperOptions) {
    super(pages, options);
    this.baseUrl = (options.baseUrl ?? 'https://papers.cool').replace(/\/+$/, '');
  }

  protected async fetchPage(page: ScrapePage, url: string): Promise<ExternalSummary> {
    const paperId = url.match(/\/arxiv\/(\d+\.\d+)/)?.[1] ?? '';

    log.info(`Loading ${url}`);
    const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeout });
    if (response && response.status() >= 400) {
      throw new PageLoadError(response.status(), url);
    }
    try {
      await page.waitForLoadState('networkidle', { timeout: NETWORK_IDLE_TIMEOUT_MS });
    } catch (error) {
      log.debug(`Network still busy on ${url}, continuing`, { error: errorMessage(error) });
    }

    // The digest is rendered on demand behind a per-paper button
    const button = page.locator(`a[id='kimi-${paperId}']`);
    if ((await button.count()) > 0) {
      log.info(`Opening Kimi digest for ${paperId}`);
      await button.click();
      await page.waitForTimeout(DIGEST_SETTLE_MS);
    } else {
      log.warn(`Kimi button not found for ${paperId}`);
    }

    return parseKimiText(paperId, await page.innerText('body'));
  }

  protected isCacheable(data: ExternalSummary): boolean {
    return data.summary.length > 0;
  }

  async getKimiSummary(paperId: string, options: ScrapeOptions = {}): Promise<ExternalSummary> {
    const summary = await this.scrape(`${this.baseUrl}/arxiv/${paperId}`, options);
    if (!summary.summary) {
      log.warn(`Kimi summary for ${paperId} is empty`);
    }
    return summary;
  }
}
