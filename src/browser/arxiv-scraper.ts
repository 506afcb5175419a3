import { z } from 'zod';
import { formatTemplate } from '../api/arxiv-client.js';
import { PageLoadError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { type ArxivPageData, parseArxivPage } from '../parsers/arxiv-page.js';
import { type PaperMetadata, createPaperMetadata } from '../types/paper.js';
import { BaseScraper, type ScrapeOptions, type ScraperOptions } from './base-scraper.js';
import type { PageSource, ScrapePage } from './manager.js';

const log = createLogger('arxiv-browser');

const arxivPageSchema = z.object({
  paperId: z.string(),
  title: z.string(),
  authors: z.array(z.string()),
  abstract: z.string(),
  categories: z.array(z.string()),
  publishedDate: z.string(),
  doi: z.string().optional(),
  pdfUrl: z.string(),
  comment: z.string().optional(),
});

export interface ArxivScraperOptions extends ScraperOptions {
  absUrl?: string;
  pdfUrl?: string;
}

/** Reads an abstract page when the Atom API is unreachable. */
export class ArxivScraper extends BaseScraper<ArxivPageData> {
  protected readonly schema = arxivPageSchema;
  private absUrl: string;
  private pdfUrl: string;

  constructor(pages: PageSource, options: ArxivScraperOptions) {
    super(pages, options);
    this.absUrl = options.absUrl ?? 'https://arxiv.org/abs/{id}';
    this.pdfUrl = options.pdfUrl ?? 'https://arxiv.org/pdf/{id}.pdf';
  }

  protected async fetchPage(page: ScrapePage, url: string): Promise<ArxivPageData> {
    log.info(`Loading ${url}`);
    const response = await page.goto(url, { waitUntil: 'networkidle', timeout: this.timeout });
    if (response && response.status() >= 400) {
      throw new PageLoadError(response.status(), url);
    }
    return parseArxivPage(await page.content(), page.url() || url);
  }

  protected isCacheable(data: ArxivPageData): boolean {
    return data.title.length > 0;
  }

  async getPaper(paperId: string, options: ScrapeOptions = {}): Promise<PaperMetadata> {
    const data = await this.scrape(formatTemplate(this.absUrl, paperId), options);

    return createPaperMetadata({
      id: data.paperId || paperId,
      title: data.title,
      authors: data.authors,
      abstract: data.abstract,
      categories: data.categories,
      published: data.publishedDate,
      updated: data.publishedDate,
      pdfUrl: data.pdfUrl || formatTemplate(this.pdfUrl, paperId),
      doi: data.doi,
      comment: data.comment,
      source: 'browser',
    });
  }
}
