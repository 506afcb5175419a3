import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ArxivClient } from '../api/arxiv-client.js';
import { PapersCoolClient } from '../api/papers-cool-client.js';
import { ArxivScraper } from '../browser/arxiv-scraper.js';
import { BrowserManager } from '../browser/manager.js';
import { PageCache } from '../browser/page-cache.js';
import { PapersCoolScraper } from '../browser/papers-cool-scraper.js';
import type { Config } from '../config/index.js';
import { DataCollector } from '../crawler/data-collector.js';
import { MetadataFetcher } from '../crawler/metadata-fetcher.js';
import { processPdf } from '../crawler/pdf.js';
import { SummaryFetcher } from '../crawler/summary-fetcher.js';
import { RunHistory } from '../database/history.js';
import { exportToPptx } from '../exporter/pptx.js';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { summaryText } from '../parsers/kimi-summary.js';
import { type CollectedPaperData, paperFields, paperTags } from '../types/paper.js';
import { LLMClient } from './llm-client.js';

const log = createLogger('generator');

export interface GenerateOptions {
  download?: boolean;
  force?: boolean;
  /** Condense the PDF for the prompt. */
  usePdfLlm?: boolean;
  /** Appended to the comment file, in order. */
  extraComments?: string[];
  pptx?: boolean;
  useBrowser?: boolean;
}

export interface GenerateResult {
  paperId: string;
  summary: string;
  outputPath: string;
  slidesPath?: string;
  data: CollectedPaperData;
}

export function mergeComments(fileComment: string, extra: string[]): string {
  return [fileComment, ...extra].filter((part) => part.length > 0).join('\n\n');
}

export interface SummaryGeneratorDeps {
  collector: Pick<DataCollector, 'collectPaperData'>;
  llm: Pick<LLMClient, 'generateAcademicSummary' | 'analyzePdf'>;
  history?: RunHistory;
}

export class SummaryGenerator {
  private config: Config;
  private deps: SummaryGeneratorDeps;

  constructor(config: Config, deps: SummaryGeneratorDeps) {
    this.config = config;
    this.deps = deps;
  }

  async generate(paperId: string, options: GenerateOptions = {}): Promise<GenerateResult> {
    const runId = await this.recordStart(paperId);

    try {
      const result = await this.run(paperId, options);
      await this.recordFinish(runId, {
        outputPath: result.outputPath,
        slidesPath: result.slidesPath,
        outcomes: result.data.outcomes,
      });
      return result;
    } catch (error) {
      await this.recordFinish(runId, { error: errorMessage(error) });
      throw error;
    }
  }

  // History is bookkeeping: a failure to record is logged, never fatal.
  private async recordStart(paperId: string): Promise<string | undefined> {
    if (!this.deps.history) return undefined;
    try {
      const run = await this.deps.history.startRun(paperId, this.config.summary.mode);
      return run.id;
    } catch (error) {
      log.warn(`Could not record run for ${paperId}`, { error: errorMessage(error) });
      return undefined;
    }
  }

  private async recordFinish(runId: string | undefined, result: Parameters<RunHistory['finishRun']>[1]): Promise<void> {
    if (!this.deps.history || runId === undefined) return;
    try {
      await this.deps.history.finishRun(runId, result);
    } catch (error) {
      log.warn(`Could not update run ${runId}`, { error: errorMessage(error) });
    }
  }

  private async run(paperId: string, options: GenerateOptions): Promise<GenerateResult> {
    const data = await this.deps.collector.collectPaperData(paperId, {
      download: options.download ?? true,
      force: options.force ?? false,
      useBrowser: options.useBrowser,
    });

    const kimiSummary = data.externalSummary ? summaryText(data.externalSummary) : '';
    const pdfSummary = await this.pdfSummary(data, options.usePdfLlm ?? true);
    const localComment = mergeComments(data.localComment, options.extraComments ?? []);

    const { title, authors, abstract } = paperFields(data);
    const summary = await this.deps.llm.generateAcademicSummary({
      paperId,
      title,
      authors,
      originalAbstract: abstract,
      tags: data.metadata ? paperTags(data.metadata) : '',
      kimiSummary,
      localComment,
      pdfSummary,
    });

    const outputPath = this.saveSummary(paperId, summary);

    let slidesPath: string | undefined;
    if (options.pptx) {
      slidesPath = await exportToPptx(summary, { paperId, title, authors }, this.config.paths.slidesDir);
    }

    return { paperId, summary, outputPath, slidesPath, data };
  }

  private async pdfSummary(data: CollectedPaperData, usePdfLlm: boolean): Promise<string> {
    if (!usePdfLlm || !data.pdfPath || this.config.summary.mode === 'lightweight') {
      return '';
    }
    try {
      return await processPdf(data.pdfPath, {
        direct: this.config.pdf.directLlm,
        analyzer: this.deps.llm,
        pdfText: data.pdfText,
        extract: { maxPages: this.config.pdf.maxPages, maxChars: this.config.pdf.maxChars },
      });
    } catch (error) {
      log.warn(`Failed to process PDF for ${data.paperId}`, { error: errorMessage(error) });
      return '';
    }
  }

  private saveSummary(paperId: string, summary: string): string {
    const dir = this.config.paths.summariesDir;
    mkdirSync(dir, { recursive: true });
    const outputPath = join(dir, `${paperId}_summary.md`);
    writeFileSync(outputPath, summary, 'utf-8');
    log.info(`Summary saved to ${outputPath}`);
    return outputPath;
  }
}

export interface Pipeline {
  generator: SummaryGenerator;
  history: RunHistory;
  /** Close when done; launched lazily. */
  browser: BrowserManager;
}

/** Wire the production clients from configuration. */
export function createPipeline(config: Config, options: { apiKey?: string } = {}): Pipeline {
  const proxy = config.browser.proxy || undefined;
  const browser = new BrowserManager(config.browser);
  const cache = config.browser.cacheEnabled
    ? new PageCache(config.browser.cacheDir, { ttl: config.browser.cacheTtl })
    : undefined;
  const scraperOptions = { cache, timeout: config.browser.timeout };

  const arxiv = new ArxivClient(config.arxiv, { proxy });
  const metadata = new MetadataFetcher(config, {
    api: arxiv,
    scraper: new ArxivScraper(browser, { ...scraperOptions, absUrl: config.arxiv.absUrl, pdfUrl: config.arxiv.pdfUrl }),
  });
  const summary = new SummaryFetcher(config, {
    api: new PapersCoolClient(config.papersCool, { proxy }),
    scraper: new PapersCoolScraper(browser, { ...scraperOptions, baseUrl: config.papersCool.baseUrl }),
  });

  const history = new RunHistory(config.paths.historyFile);
  const generator = new SummaryGenerator(config, {
    collector: new DataCollector(config, { metadata, summary, pdf: arxiv }),
    llm: new LLMClient(config, { apiKey: options.apiKey, proxy }),
    history,
  });

  return { generator, history, browser };
}
