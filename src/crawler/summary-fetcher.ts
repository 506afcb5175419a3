import { assertArxivId } from '../api/arxiv-client.js';
import type { ScrapeOptions } from '../browser/base-scraper.js';
import type { Config } from '../config/index.js';
import type { ExternalSummary } from '../types/paper.js';
import { firstAvailable, orderSources } from './fallback.js';
import { type FetchOptions, browserUnavailable } from './metadata-fetcher.js';

/** Satisfied by `PapersCoolClient` and `PapersCoolScraper`. */
export interface SummarySource {
  getKimiSummary(paperId: string, options?: ScrapeOptions): Promise<ExternalSummary>;
}

export interface SummarySources {
  api: SummarySource;
  scraper?: SummarySource;
}

/** An empty digest is still an answer; only failures move down the chain. */
export class SummaryFetcher {
  private config: Config;
  private sources: SummarySources;

  constructor(config: Config, sources: SummarySources) {
    this.config = config;
    this.sources = sources;
  }

  async fetchSummary(paperId: string, options: FetchOptions = {}): Promise<ExternalSummary> {
    assertArxivId(paperId);
    const { api, scraper } = this.sources;
    const { flexMode } = this.config;

    const steps = orderSources<ExternalSummary>({
      order: this.config.papersCool.order,
      api: () => api.getKimiSummary(paperId),
      browser: async () => {
        if (!scraper) throw new Error('no browser configured');
        return scraper.getKimiSummary(paperId, { useCache: options.useCache ?? this.config.browser.cacheEnabled });
      },
      browserDisabled: browserUnavailable(this.config.browser, scraper !== undefined, options.useBrowser ?? true),
      apiFallbackAllowed: flexMode.enabled && flexMode.papersCoolApi,
      rejectBrowser: (summary) => (summary.summary ? null : 'page had no digest'),
    });

    return firstAvailable(`Kimi summary of ${paperId}`, steps);
  }
}
