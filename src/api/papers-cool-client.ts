import { BaseApiClient, type BaseClientOptions } from './base-client.js';
import { assertArxivId } from './arxiv-client.js';
import type { Config } from '../config/index.js';
import { createLogger } from '../lib/logger.js';
import { type RetryPolicy, SCRAPER_RETRY } from '../lib/retry.js';
import { parseKimiHtml } from '../parsers/kimi-summary.js';
import type { ExternalSummary } from '../types/paper.js';

const log = createLogger('papers.cool');

export interface PapersCoolClientOptions {
  proxy?: string;
  retry?: RetryPolicy;
  adapter?: BaseClientOptions['adapter'];
}

export class PapersCoolClient extends BaseApiClient {
  private endpoint: string;

  constructor(settings: Config['papersCool'], options: PapersCoolClientOptions = {}) {
    super({
      baseURL: settings.baseUrl.replace(/\/+$/, ''),
      timeout: settings.timeout * 1000,
      headers: {
        'User-Agent': 'PaperDigestBot/1.0',
        Accept: 'text/html,application/xhtml+xml',
      },
      proxy: options.proxy,
      retry: options.retry ?? SCRAPER_RETRY,
      adapter: options.adapter,
    });
    this.endpoint = settings.kimiEndpoint;
  }

  /** The digest as the service renders it, parsed; may be empty. */
  async getKimiSummary(paperId: string): Promise<ExternalSummary> {
    assertArxivId(paperId);

    log.info(`Fetching Kimi summary for ${paperId} via API`);
    const html = await this.request<string>({
      method: 'POST',
      url: this.endpoint,
      params: { paper: paperId },
      responseType: 'text',
    });

    const summary = parseKimiHtml(paperId, html);
    if (summary.summary) {
      log.info(`Fetched Kimi summary for ${paperId} via API`, { keyPoints: summary.keyPoints.length });
    } else {
      log.warn(`Kimi summary for ${paperId} is empty`);
    }
    return summary;
  }
}
