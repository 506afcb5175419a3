import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { BaseApiClient, type BaseClientOptions } from './base-client.js';
import type { Config } from '../config/index.js';
import { ValidationError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { ARXIV_API_RETRY, PDF_RETRY, type RetryPolicy, withRetry } from '../lib/retry.js';
import { ARXIV_ID_PATTERN, type PaperMetadata, createPaperMetadata } from '../types/paper.js';

const log = createLogger('arxiv');

const PDF_TIMEOUT_MS = 120000;

// xml2js: text nodes are plain strings, or `{ _: text, $: attrs }` when attributes are present
const xmlText = z.union([z.string(), z.object({ _: z.string().optional() }).passthrough()]);
type XmlText = z.infer<typeof xmlText>;

const atomEntrySchema = z.object({
  id: z.array(xmlText).optional(),
  title: z.array(xmlText).optional(),
  summary: z.array(xmlText).optional(),
  published: z.array(xmlText).optional(),
  updated: z.array(xmlText).optional(),
  author: z.array(z.object({ name: z.array(xmlText).optional() }).passthrough()).optional(),
  link: z.array(z.object({
    $: z.object({
      href: z.string().optional(),
      title: z.string().optional(),
      type: z.string().optional(),
    }).passthrough(),
  }).passthrough()).optional(),
  category: z.array(z.object({ $: z.object({ term: z.string().optional() }).passthrough() }).passthrough()).optional(),
  'arxiv:doi': z.array(xmlText).optional(),
  'arxiv:journal_ref': z.array(xmlText).optional(),
  'arxiv:comment': z.array(xmlText).optional(),
}).passthrough();

const atomFeedSchema = z.object({
  feed: z.object({
    entry: z.array(atomEntrySchema).optional(),
  }).passthrough(),
});

type AtomEntry = z.infer<typeof atomEntrySchema>;

function textOf(node: XmlText | undefined): string {
  if (node === undefined) return '';
  return (typeof node === 'string' ? node : node._ ?? '').trim();
}

function first(nodes: XmlText[] | undefined): string {
  return textOf(nodes?.[0]);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function assertArxivId(paperId: string): void {
  if (!ARXIV_ID_PATTERN.test(paperId)) {
    throw new ValidationError(`Invalid arXiv ID format: ${paperId}`);
  }
}

export function formatTemplate(template: string, paperId: string): string {
  return template.split('{id}').join(paperId);
}

/** `http://arxiv.org/abs/2301.12345v2` -> `2301.12345` */
export function extractArxivId(idUrl: string): string {
  const tail = idUrl.includes('/abs/') ? idUrl.split('/abs/').pop() ?? idUrl : idUrl;
  return tail.replace(/v\d+$/, '');
}

function mapEntry(entry: AtomEntry, paperId: string, pdfTemplate: string): PaperMetadata {
  const idText = first(entry.id);
  if (idText.includes('/api/errors')) {
    throw new ValidationError(`arXiv rejected ${paperId}: ${collapse(first(entry.summary)) || idText}`);
  }

  const links = (entry.link ?? []).map((l) => l.$);
  const pdfLink = links.find((l) => l.title === 'pdf' || l.type === 'application/pdf');

  const doi = first(entry['arxiv:doi']);
  const journalRef = collapse(first(entry['arxiv:journal_ref']));
  const comment = collapse(first(entry['arxiv:comment']));
  const id = idText ? extractArxivId(idText) : paperId;

  return createPaperMetadata({
    id,
    title: collapse(first(entry.title)),
    authors: (entry.author ?? []).map((a) => collapse(first(a.name))).filter((name) => name.length > 0),
    abstract: collapse(first(entry.summary)),
    published: first(entry.published),
    updated: first(entry.updated),
    pdfUrl: pdfLink?.href || formatTemplate(pdfTemplate, id),
    categories: (entry.category ?? [])
      .map((c) => c.$.term ?? '')
      .filter((term) => term.length > 0),
    doi: doi || undefined,
    journalRef: journalRef || undefined,
    comment: comment || undefined,
    source: 'api',
  });
}

/** Parse an arXiv Atom response for a single `id_list` query. */
export async function parseAtomEntry(
  xml: string,
  paperId: string,
  pdfTemplate = 'https://arxiv.org/pdf/{id}.pdf'
): Promise<PaperMetadata> {
  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xml);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Malformed Atom response for ${paperId}: ${reason}`);
  }

  const feed = atomFeedSchema.safeParse(parsed);
  if (!feed.success) {
    throw new ValidationError(`Unexpected Atom document for ${paperId}`);
  }

  const entry = feed.data.feed.entry?.[0];
  if (!entry) {
    throw new ValidationError(`Paper ${paperId} not found`);
  }

  return mapEntry(entry, paperId, pdfTemplate);
}

export interface ArxivClientOptions {
  proxy?: string;
  retry?: RetryPolicy;
  pdfRetry?: RetryPolicy;
  adapter?: BaseClientOptions['adapter'];
}

export class ArxivClient extends BaseApiClient {
  private settings: Config['arxiv'];
  private pdfRetry: RetryPolicy;

  constructor(settings: Config['arxiv'], options: ArxivClientOptions = {}) {
    super({
      timeout: settings.timeout * 1000,
      headers: { 'User-Agent': settings.userAgent },
      // arXiv asks clients to keep to a single connection
      concurrency: 1,
      proxy: options.proxy,
      retry: options.retry ?? ARXIV_API_RETRY,
      adapter: options.adapter,
    });
    this.settings = settings;
    this.pdfRetry = options.pdfRetry ?? PDF_RETRY;
  }

  async getPaper(paperId: string): Promise<PaperMetadata> {
    assertArxivId(paperId);

    log.info(`Fetching arXiv paper ${paperId} via API`);
    const xml = await this.request<string>({
      method: 'GET',
      url: this.settings.apiUrl,
      params: { id_list: paperId },
      responseType: 'text',
      headers: { Accept: 'application/atom+xml' },
    });

    const paper = await parseAtomEntry(xml, paperId, this.settings.pdfUrl);
    log.info(`Fetched ${paperId} via API`, { title: paper.title });
    return paper;
  }

  pdfUrlFor(paperId: string): string {
    return formatTemplate(this.settings.pdfUrl, paperId);
  }

  /** Stream the PDF to `savePath`; a partial file never survives a failure. */
  async downloadPdf(paperId: string, savePath: string): Promise<string> {
    assertArxivId(paperId);
    const url = this.pdfUrlFor(paperId);
    const partPath = `${savePath}.part`;

    fs.mkdirSync(path.dirname(savePath), { recursive: true });

    await withRetry(async () => {
      try {
        const response = await this.send<Readable>({
          method: 'GET',
          url,
          responseType: 'stream',
          timeout: PDF_TIMEOUT_MS,
        });
        await pipeline(response.data, fs.createWriteStream(partPath));
      } catch (error) {
        fs.rmSync(partPath, { force: true });
        throw error;
      }
    }, this.pdfRetry, { label: `download ${url}` });

    fs.renameSync(partPath, savePath);
    log.info(`Downloaded PDF for ${paperId}`, { path: savePath });
    return savePath;
  }
}
