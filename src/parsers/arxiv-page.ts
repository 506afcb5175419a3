import { JSDOM } from 'jsdom';

/** Fields read from an arXiv abstract page's `citation_*` meta tags. */
export interface ArxivPageData {
  paperId: string;
  title: string;
  authors: string[];
  abstract: string;
  categories: string[];
  publishedDate: string;
  doi?: string;
  pdfUrl: string;
  comment?: string;
}

function meta(document: Document, name: string): string {
  return document.querySelector(`meta[name="${name}"]`)?.getAttribute('content')?.trim() ?? '';
}

function metaAll(document: Document, name: string): string[] {
  return Array.from(document.querySelectorAll(`meta[name="${name}"]`))
    .map((el) => el.getAttribute('content')?.trim() ?? '')
    .filter((value) => value.length > 0);
}

function splitList(text: string, separator: string | RegExp): string[] {
  return text
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function parseArxivPage(html: string, pageUrl: string): ArxivPageData {
  const { document } = new JSDOM(html, { url: pageUrl }).window;

  const keywords = meta(document, 'citation_keywords');
  const subjects = document.querySelector('.subjects')?.textContent ?? '';
  const categories = keywords ? splitList(keywords, ',') : splitList(subjects, ';');

  const pdfAnchor = document.querySelector<HTMLAnchorElement>('a[href*="/pdf/"], a[href$=".pdf"]');
  const commentText = document.querySelector('.comments')?.textContent ?? '';
  const comment = commentText.replace(/^\s*Comments:/, '').replace(/\s+/g, ' ').trim();
  const idMatch = pageUrl.match(/(\d{4}\.\d{4,5})/);

  return {
    paperId: idMatch ? idMatch[1] : '',
    title: meta(document, 'citation_title'),
    authors: metaAll(document, 'citation_author'),
    abstract: meta(document, 'citation_abstract').replace(/\s+/g, ' '),
    categories,
    publishedDate: meta(document, 'citation_date') || meta(document, 'citation_publication_date'),
    doi: meta(document, 'citation_doi') || undefined,
    pdfUrl: meta(document, 'citation_pdf_url') || pdfAnchor?.href || '',
    comment: comment || undefined,
  };
}
