import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { assertArxivId } from '../api/arxiv-client.js';
import type { Config } from '../config/index.js';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { CollectedPaperData, ExternalSummary, PaperMetadata, SourceOutcome } from '../types/paper.js';
import type { FetchOptions } from './metadata-fetcher.js';
import { type PdfDownloader, downloadPdf, extractPdfText } from './pdf.js';

const log = createLogger('collector');

export interface CollectorSources {
  metadata: { fetchMetadata(paperId: string, options?: FetchOptions): Promise<PaperMetadata> };
  summary: { fetchSummary(paperId: string, options?: FetchOptions): Promise<ExternalSummary> };
  pdf: PdfDownloader;
  /** Defaults to pdfjs extraction. */
  extractText?: (pdfPath: string) => Promise<string>;
}

export interface CollectOptions extends FetchOptions {
  download?: boolean;
  force?: boolean;
}

interface Settled<T> {
  value?: T;
  outcome: SourceOutcome;
}

async function settle<T>(label: string, run: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { value: await run(), outcome: { status: 'ok' } };
  } catch (error) {
    log.warn(`Failed to fetch ${label}`, { error: errorMessage(error) });
    return { outcome: { status: 'error', reason: errorMessage(error) } };
  }
}

/** Text of `{commentsDir}/{id}.md`, or '' when there is none. */
export function loadLocalComment(commentsDir: string, paperId: string): string {
  const file = join(commentsDir, `${paperId}.md`);
  return existsSync(file) ? readFileSync(file, 'utf-8') : '';
}

export class DataCollector {
  private config: Config;
  private sources: CollectorSources;

  constructor(config: Config, sources: CollectorSources) {
    this.config = config;
    this.sources = sources;
  }

  /**
   * Fetch metadata and the external summary together, then the PDF. Source
   * failures are recorded in `outcomes`; only a malformed ID throws.
   */
  async collectPaperData(paperId: string, options: CollectOptions = {}): Promise<CollectedPaperData> {
    assertArxivId(paperId);
    const fetchOptions: FetchOptions = { useBrowser: options.useBrowser, useCache: options.useCache };

    const [metadata, summary] = await Promise.all([
      settle('arXiv metadata', () => this.sources.metadata.fetchMetadata(paperId, fetchOptions)),
      settle('Kimi summary', () => this.sources.summary.fetchSummary(paperId, fetchOptions)),
    ]);

    let summaryOutcome = summary.outcome;
    if (summary.value && !summary.value.summary) {
      summaryOutcome = { status: 'absent', reason: 'digest was empty' };
    }

    const localComment = loadLocalComment(this.config.paths.commentsDir, paperId);

    let pdfPath: string | undefined;
    let pdfText = '';
    let pdfOutcome: SourceOutcome;

    if (!(options.download ?? true)) {
      pdfOutcome = { status: 'absent', reason: 'download not requested' };
    } else if (!metadata.value) {
      pdfOutcome = { status: 'absent', reason: 'no metadata' };
    } else {
      try {
        pdfPath = await downloadPdf(this.sources.pdf, paperId, this.config.paths.pdfDir, { force: options.force });
        pdfText = await this.extract(pdfPath);
        pdfOutcome = { status: 'ok' };
      } catch (error) {
        log.warn(`PDF unavailable for ${paperId}`, { error: errorMessage(error) });
        pdfOutcome = { status: 'error', reason: errorMessage(error) };
      }
    }

    return {
      paperId,
      metadata: metadata.value,
      externalSummary: summary.value,
      localComment,
      pdfText,
      pdfPath,
      outcomes: { metadata: metadata.outcome, summary: summaryOutcome, pdf: pdfOutcome },
    };
  }

  private extract(pdfPath: string): Promise<string> {
    if (this.sources.extractText) {
      return this.sources.extractText(pdfPath);
    }
    return extractPdfText(pdfPath, { maxPages: this.config.pdf.maxPages, maxChars: this.config.pdf.maxChars });
  }
}
