import { existsSync, mkdirSync, readFileSync } from 'fs';
import { createRequire } from 'module';
import { dirname, join, sep } from 'path';
import { pathToFileURL } from 'url';
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api.js';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('pdf');

const require = createRequire(import.meta.url);
const workerPath = require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');
const standardFontPath = join(dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts');
const standardFontDataUrl = standardFontPath.endsWith(sep) ? standardFontPath : `${standardFontPath}${sep}`;

GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).toString();

export const TRUNCATION_MARKER = '\n\n... (content truncated)';

export interface ExtractOptions {
  /** 0 reads every page. */
  maxPages?: number;
  maxChars?: number;
}

function pageBlock(index: number, text: string): string {
  return `[Page ${index + 1}]\n${text}`;
}

/**
 * Join page texts into `[Page n]` blocks. Blank pages are dropped, no page
 * is added once `maxChars` is reached, and the result is cut to `maxChars`
 * followed by {@link TRUNCATION_MARKER}.
 */
export function assemblePageText(pages: string[], maxChars: number): string {
  const blocks: string[] = [];
  let total = 0;

  for (const [index, text] of pages.entries()) {
    if (total >= maxChars) break;
    if (!text.trim()) continue;
    const block = pageBlock(index, text);
    blocks.push(block);
    total += block.length;
  }

  const full = blocks.join('\n\n');
  return full.length > maxChars ? full.slice(0, maxChars) + TRUNCATION_MARKER : full;
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

export async function extractPdfText(pdfPath: string, options: ExtractOptions = {}): Promise<string> {
  const maxPages = options.maxPages ?? 0;
  const maxChars = options.maxChars ?? 50000;

  const data = new Uint8Array(readFileSync(pdfPath));
  const pdf = await getDocument({ data, standardFontDataUrl }).promise;

  try {
    const pageCount = maxPages > 0 ? Math.min(pdf.numPages, maxPages) : pdf.numPages;
    const pages: string[] = [];
    let total = 0;

    for (let pageNumber = 1; pageNumber <= pageCount && total < maxChars; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const text = content.items
        .filter(isTextItem)
        .map((item) => item.str + (item.hasEOL ? '\n' : ' '))
        .join('')
        .trim();
      pages.push(text);
      if (text) total += pageBlock(pageNumber - 1, text).length;
    }

    const result = assemblePageText(pages, maxChars);
    log.info(`Extracted ${result.length} chars from ${pages.length} pages`, { path: pdfPath });
    return result;
  } finally {
    await pdf.destroy();
  }
}

const SECTION_ORDER = ['abstract', 'introduction', 'method', 'conclusion'] as const;
type SectionName = (typeof SECTION_ORDER)[number];

const SECTION_LIMITS: Record<SectionName, number> = {
  abstract: 5,
  introduction: 10,
  method: 15,
  conclusion: 10,
};

const SECTION_TITLES: Record<SectionName, string> = {
  abstract: 'Abstract',
  introduction: 'Introduction',
  method: 'Method',
  conclusion: 'Conclusion',
};

const MIN_CONTENT_LINE = 50;
const MAX_HEADING_LINE = 80;

const MARKDOWN_HEADING = /^\s*#+\s*\w+/;
const NUMBERED_HEADING = /^\s*(?:\d+(?:\.\d+)*\.?|[IVX]+\.)\s+[A-Za-z]/;
const BARE_HEADING = /^\s*(abstract|introduction|methods?|methodology|approach|conclusions?|future work)\s*$/i;

function isHeading(line: string): boolean {
  if (MARKDOWN_HEADING.test(line) || BARE_HEADING.test(line)) return true;
  return line.trim().length <= MAX_HEADING_LINE && NUMBERED_HEADING.test(line);
}

function classifyHeading(line: string): SectionName | null {
  const lower = line.toLowerCase();
  if (lower.includes('abstract')) return 'abstract';
  if (lower.includes('intro')) return 'introduction';
  if (/\b(method|methodology|approach|proposal)/.test(lower)) return 'method';
  if (lower.includes('conclusion') || lower.includes('future')) return 'conclusion';
  return null;
}

/** Abstract, introduction, method and conclusion lines of an extracted paper. */
export function extractKeySections(text: string): string {
  const sections: Record<SectionName, string[]> = {
    abstract: [],
    introduction: [],
    method: [],
    conclusion: [],
  };
  let current: SectionName | null = null;

  for (const line of text.split('\n')) {
    if (isHeading(line)) {
      current = classifyHeading(line);
      continue;
    }
    const content = line.trim();
    if (current && content.length > MIN_CONTENT_LINE) {
      sections[current].push(content);
    }
  }

  const parts: string[] = [];
  for (const name of SECTION_ORDER) {
    const lines = sections[name].slice(0, SECTION_LIMITS[name]);
    if (lines.length === 0) continue;
    parts.push(`${parts.length > 0 ? '\n' : ''}## ${SECTION_TITLES[name]}`);
    parts.push(lines.join(' '));
  }
  return parts.join('\n');
}

export interface PdfDownloader {
  downloadPdf(paperId: string, savePath: string): Promise<string>;
}

export interface DownloadOptions {
  force?: boolean;
}

/** `{pdfDir}/{id}.pdf`, downloaded unless already present. */
export async function downloadPdf(
  downloader: PdfDownloader,
  paperId: string,
  pdfDir: string,
  options: DownloadOptions = {}
): Promise<string> {
  mkdirSync(pdfDir, { recursive: true });
  const savePath = join(pdfDir, `${paperId}.pdf`);

  if (!options.force && existsSync(savePath)) {
    log.info(`PDF already present for ${paperId}`, { path: savePath });
    return savePath;
  }
  return downloader.downloadPdf(paperId, savePath);
}

export interface PdfAnalyzer {
  analyzePdf(pdfPath: string, prompt?: string): Promise<string>;
}

export interface ProcessPdfOptions {
  /** Ask the vision model to read the PDF itself. */
  direct: boolean;
  analyzer?: PdfAnalyzer;
  /** Already-extracted text; extracted from the file when absent. */
  pdfText?: string;
  extract?: ExtractOptions;
}

/** A condensed reading of the paper: the vision model's, or its key sections. */
export async function processPdf(pdfPath: string, options: ProcessPdfOptions): Promise<string> {
  if (options.direct && options.analyzer) {
    try {
      return await options.analyzer.analyzePdf(pdfPath);
    } catch (error) {
      log.warn('Direct PDF analysis failed, falling back to text extraction', { error: errorMessage(error) });
    }
  }

  const text = options.pdfText || (await extractPdfText(pdfPath, options.extract));
  return extractKeySections(text);
}
