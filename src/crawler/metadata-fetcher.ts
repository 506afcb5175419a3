import { assertArxivId } from '../api/arxiv-client.js';
import type { ScrapeOptions } from '../browser/base-scraper.js';
import type { Config } from '../config/index.js';
import type { PaperMetadata } from '../types/paper.js';
import { firstAvailable, orderSources } from './fallback.js';

export interface FetchOptions {
  /** Set false to keep the browser out of the chain for this call. */
  useBrowser?: boolean;
  useCache?: boolean;
}

/** Satisfied by `ArxivClient` and `ArxivScraper`. */
export interface MetadataSource {
  getPaper(paperId: string, options?: ScrapeOptions): Promise<PaperMetadata>;
}

export interface MetadataSources {
  api: MetadataSource;
  /** Absent when no browser is available. */
  scraper?: MetadataSource;
}

export function browserUnavailable(
  browser: Config['browser'],
  hasScraper: boolean,
  useBrowser: boolean
): string | null {
  if (!browser.enabled) return 'browser disabled in config';
  if (!useBrowser) return 'browser disabled for this call';
  if (!hasScraper) return 'no browser configured';
  return null;
}

export class MetadataFetcher {
  private config: Config;
  private sources: MetadataSources;

  constructor(config: Config, sources: MetadataSources) {
    this.config = config;
    this.sources = sources;
  }

  async fetchMetadata(paperId: string, options: FetchOptions = {}): Promise<PaperMetadata> {
    assertArxivId(paperId);
    const { api, scraper } = this.sources;
    const { flexMode } = this.config;

    const steps = orderSources<PaperMetadata>({
      order: this.config.arxiv.order,
      api: () => api.getPaper(paperId),
      browser: async () => {
        if (!scraper) throw new Error('no browser configured');
        return scraper.getPaper(paperId, { useCache: options.useCache ?? this.config.browser.cacheEnabled });
      },
      browserDisabled: browserUnavailable(this.config.browser, scraper !== undefined, options.useBrowser ?? true),
      apiFallbackAllowed: flexMode.enabled && flexMode.arxivApi,
      rejectBrowser: (paper) => (paper.title ? null : 'page had no title'),
    });

    return firstAvailable(`arXiv paper ${paperId}`, steps);
  }
}
