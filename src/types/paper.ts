import type { SourceKind } from '../lib/errors.js';

export const ARXIV_ID_PATTERN = /^\d{4}\.\d{4,5}$/;

export interface PaperMetadata {
  readonly id: string; // e.g. 2301.12345
  readonly title: string;
  readonly authors: readonly string[];
  readonly abstract: string;
  readonly categories: readonly string[];
  readonly published: string;
  readonly updated: string;
  readonly pdfUrl: string;
  readonly doi?: string;
  readonly journalRef?: string;
  readonly comment?: string;

  readonly arxivUrl: string;
  readonly source: SourceKind;
}

export type PaperMetadataFields = Omit<PaperMetadata, 'arxivUrl'>;

export function createPaperMetadata(fields: PaperMetadataFields): PaperMetadata {
  return Object.freeze({
    ...fields,
    authors: Object.freeze([...fields.authors]),
    categories: Object.freeze([...fields.categories]),
    arxivUrl: `https://arxiv.org/abs/${fields.id}`,
  });
}

/** First three categories, comma-separated. */
export function paperTags(paper: PaperMetadata): string {
  return paper.categories.slice(0, 3).join(', ');
}

/** FAQ-style digest from papers.cool */
export interface ExternalSummary {
  paperId: string;
  summary: string;
  keyPoints: string[];
  methods?: string;
  contributions?: string;
  rawHtml: string;
}

export type SourceOutcome =
  | { status: 'ok' }
  | { status: 'absent'; reason: string }
  | { status: 'error'; reason: string };

export interface CollectionOutcomes {
  metadata: SourceOutcome;
  summary: SourceOutcome;
  pdf: SourceOutcome;
}

export interface CollectedPaperData {
  paperId: string;
  metadata?: PaperMetadata;
  externalSummary?: ExternalSummary;
  localComment: string;
  pdfText: string;
  pdfPath?: string;
  outcomes: CollectionOutcomes;
}

/** Title/authors/abstract of a collection, empty when metadata is missing. */
export function paperFields(data: CollectedPaperData): { title: string; authors: string; abstract: string } {
  return {
    title: data.metadata?.title ?? '',
    authors: data.metadata?.authors.join(', ') ?? '',
    abstract: data.metadata?.abstract ?? '',
  };
}

export interface CachedFetch<T = unknown> {
  timestamp: number; // epoch seconds
  url: string;
  data: T;
}

export interface RunRecord {
  id: string;
  paperId: string;
  mode: string;
  status: 'running' | 'completed' | 'failed';
  startedAt: string;
  completedAt?: string;
  outputPath?: string;
  slidesPath?: string;
  outcomes?: CollectionOutcomes;
  errors: string[];
}
