import { readFileSync } from 'fs';
import { basename } from 'path';
import { apiKeyEnvName } from '../config/index.js';
import type { Config } from '../config/index.js';
import { ConfigurationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { LLM_RETRY, type RetryPolicy, withRetry } from '../lib/retry.js';
import { PromptRenderer, TemplateNotFoundError, phaseTemplate } from './prompt-renderer.js';
import { type ChatMessage, type ChatResponse, type LLMProvider, type ProviderOptions, createProvider } from './providers.js';

const log = createLogger('llm');

export const LIGHTWEIGHT_TEMPLATE = 'lightweight_summary.md.njk';
const LIGHTWEIGHT_MAX_TOKENS = 1024;
const PHASE2_MAX_TOKENS = 2048;
const LIGHTWEIGHT_TEMPERATURE = 0.3;
const PDF_ANALYSIS_TEMPERATURE = 0.1;
const PDF_ANALYSIS_MAX_TOKENS = 4096;

export const NOT_PROVIDED = 'Not provided';
export const NONE = 'None';

export const DEFAULT_PDF_PROMPT =
  'Analyse this paper in detail: its problem, method, experimental setup, main results ' +
  '(including figures, tables and formulas) and stated limitations.';

export interface ChatOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface SummaryFields {
  paperId: string;
  title: string;
  authors: string;
  originalAbstract: string;
  /** Leading categories, comma-separated. */
  tags?: string;
  kimiSummary: string;
  localComment?: string;
  pdfSummary?: string;
}

export interface LLMClientOptions extends ProviderOptions {
  /** Overrides `api.api_key`. */
  apiKey?: string;
  retry?: RetryPolicy;
  /** Injected transports; built from config otherwise. */
  textProvider?: LLMProvider;
  vlProvider?: LLMProvider;
  renderer?: PromptRenderer;
}

export class LLMClient {
  private config: Config;
  private text: LLMProvider;
  private vl: LLMProvider;
  private renderer: PromptRenderer;
  private retryPolicy: RetryPolicy;

  constructor(config: Config, options: LLMClientOptions = {}) {
    const apiKey = options.apiKey || config.api.apiKey;
    if (!apiKey) {
      throw new ConfigurationError(
        `API key not configured. Set ${apiKeyEnvName(config.api.text.provider)} or pass --api-key`
      );
    }

    this.config = config;
    this.text = options.textProvider ?? createProvider(config.api.text, apiKey, options);
    this.vl = options.vlProvider ?? createProvider(config.api.vl, apiKey, options);
    this.renderer = options.renderer ?? new PromptRenderer(config.paths.templatesDir);
    this.retryPolicy = options.retry ?? { ...LLM_RETRY, attempts: config.summary.maxRetries };
  }

  private complete(provider: LLMProvider, label: string, run: () => Promise<ChatResponse>): Promise<ChatResponse> {
    return withRetry(run, this.retryPolicy, {
      // every failure, up to summary.max_retries attempts
      retryIf: () => true,
      label: `${label} (${provider.kind})`,
    });
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const response = await this.complete(this.text, 'chat', () =>
      this.text.complete({
        messages,
        system: options.system,
        temperature: options.temperature ?? this.config.summary.temperature,
        maxTokens: options.maxTokens ?? this.config.summary.maxTokens,
      })
    );
    log.debug('Chat completed', { model: response.model, ...response.usage });
    return response;
  }

  /** Let the vision model read the PDF itself. */
  async analyzePdf(pdfPath: string, prompt: string = DEFAULT_PDF_PROMPT): Promise<string> {
    const pdf = { filename: basename(pdfPath), base64: readFileSync(pdfPath).toString('base64') };

    log.info(`Sending ${pdf.filename} to ${this.config.api.vl.model}`);
    const response = await this.complete(this.vl, 'PDF analysis', () =>
      this.vl.complete({
        messages: [{ role: 'user', content: prompt }],
        temperature: PDF_ANALYSIS_TEMPERATURE,
        maxTokens: PDF_ANALYSIS_MAX_TOKENS,
        pdf,
      })
    );
    return response.content;
  }

  private async ask(prompt: string, maxTokens: number, temperature: number): Promise<string> {
    const response = await this.chat([{ role: 'user', content: prompt }], { temperature, maxTokens });
    return response.content;
  }

  async generateAcademicSummary(fields: SummaryFields): Promise<string> {
    const { mode, pdfEnhanceEnabled, template, temperature, maxTokens } = this.config.summary;
    const base = {
      paper_id: fields.paperId,
      title: fields.title,
      authors: fields.authors,
      kimi_summary: fields.kimiSummary || NOT_PROVIDED,
    };

    if (mode === 'lightweight') {
      log.info(`Generating lightweight summary for ${fields.paperId}`);
      const prompt = this.renderer.render(LIGHTWEIGHT_TEMPLATE, base);
      return this.ask(prompt, LIGHTWEIGHT_MAX_TOKENS, LIGHTWEIGHT_TEMPERATURE);
    }

    if (mode === 'two_phase' && pdfEnhanceEnabled) {
      let phase1Template = phaseTemplate(template, 1);
      if (!this.renderer.has(phase1Template)) {
        log.warn(`${phase1Template} missing, using ${LIGHTWEIGHT_TEMPLATE} for phase 1`);
        phase1Template = LIGHTWEIGHT_TEMPLATE;
      }
      log.info(`Generating phase 1 draft for ${fields.paperId}`);
      const draft = await this.ask(this.renderer.render(phase1Template, base), LIGHTWEIGHT_MAX_TOKENS, LIGHTWEIGHT_TEMPERATURE);

      let phase2Prompt: string;
      try {
        phase2Prompt = this.renderer.render(phaseTemplate(template, 2), {
          ...base,
          phase1_output: draft,
          pdf_summary: fields.pdfSummary ?? '',
        });
      } catch (error) {
        if (error instanceof TemplateNotFoundError) {
          log.warn(`${error.template} missing, returning the phase 1 draft`);
          return draft;
        }
        throw error;
      }
      log.info(`Generating phase 2 summary for ${fields.paperId}`);
      return this.ask(phase2Prompt, PHASE2_MAX_TOKENS, LIGHTWEIGHT_TEMPERATURE);
    }

    log.info(`Generating full summary for ${fields.paperId}`, { template });
    const prompt = this.renderer.render(template, {
      ...base,
      original_abstract: fields.originalAbstract || NOT_PROVIDED,
      tags: fields.tags || NOT_PROVIDED,
      local_comment: fields.localComment || NONE,
      pdf_summary: fields.pdfSummary ?? '',
    });
    return this.ask(prompt, maxTokens, temperature);
  }
}
