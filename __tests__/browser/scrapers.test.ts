import { join } from 'path';
import { describe, it, expect } from 'vitest';
import { ArxivScraper } from '../../src/browser/arxiv-scraper.js';
import { PageCache } from '../../src/browser/page-cache.js';
import { PapersCoolScraper } from '../../src/browser/papers-cool-scraper.js';
import { PageLoadError } from '../../src/lib/errors.js';
import { immediate } from '../../src/lib/retry.js';
import { tempDir } from '../helpers/config.js';
import { FakePages } from '../helpers/pages.js';

const ABS_PAGE = `<html><head>
<meta name="citation_title" content="Test Paper" />
<meta name="citation_author" content="Doe, Jane" />
<meta name="citation_date" content="2023/01/29" />
<meta name="citation_abstract" content="An abstract." />
<meta name="citation_keywords" content="cs.LG" />
</head><body><a href="/pdf/2301.12345">View PDF</a></body></html>`;

describe('ArxivScraper', () => {
  it('should read metadata from the abstract page', async () => {
    const pages = new FakePages({ html: ABS_PAGE });
    const scraper = new ArxivScraper(pages, { timeout: 1000, retry: immediate(1) });

    const paper = await scraper.getPaper('2301.12345');

    expect(pages.pages[0].visited).toEqual(['https://arxiv.org/abs/2301.12345']);
    expect(paper).toEqual({
      id: '2301.12345',
      title: 'Test Paper',
      authors: ['Doe, Jane'],
      abstract: 'An abstract.',
      categories: ['cs.LG'],
      published: '2023/01/29',
      updated: '2023/01/29',
      pdfUrl: 'https://arxiv.org/pdf/2301.12345',
      doi: undefined,
      comment: undefined,
      arxivUrl: 'https://arxiv.org/abs/2301.12345',
      source: 'browser',
    });
  });

  it('should use the PDF template when the page has no link', async () => {
    const pages = new FakePages({ html: '<html><head><meta name="citation_title" content="T" /></head></html>' });
    const scraper = new ArxivScraper(pages, {
      timeout: 1000,
      retry: immediate(1),
      pdfUrl: 'https://mirror.example/pdf/{id}',
    });

    expect((await scraper.getPaper('2301.12345')).pdfUrl).toBe('https://mirror.example/pdf/2301.12345');
  });

  it('should retry and then fail on an error status', async () => {
    const pages = new FakePages({ status: 404, html: ABS_PAGE });
    const scraper = new ArxivScraper(pages, { timeout: 1000, retry: immediate(2) });

    const failure = scraper.getPaper('2301.12345');

    await expect(failure).rejects.toBeInstanceOf(PageLoadError);
    await expect(failure).rejects.toThrow('HTTP 404: https://arxiv.org/abs/2301.12345');
    expect(pages.pages).toHaveLength(2);
  });

  it('should serve repeat calls from the cache', async () => {
    const pages = new FakePages({ html: ABS_PAGE });
    const cache = new PageCache(join(tempDir(), 'html'), { ttl: 60 });
    const scraper = new ArxivScraper(pages, { cache, timeout: 1000, retry: immediate(1) });

    await scraper.getPaper('2301.12345');
    const cached = await scraper.getPaper('2301.12345');

    expect(cached.title).toBe('Test Paper');
    expect(pages.pages).toHaveLength(1);

    await scraper.getPaper('2301.12345', { useCache: false });
    expect(pages.pages).toHaveLength(2);
  });

  it('should not cache a page without a title', async () => {
    const pages = new FakePages({ html: '<html><body>Just a moment...</body></html>' });
    const cache = new PageCache(join(tempDir(), 'html'), { ttl: 60 });
    const scraper = new ArxivScraper(pages, { cache, timeout: 1000, retry: immediate(1) });

    await scraper.getPaper('2301.12345');

    expect(await cache.get('https://arxiv.org/abs/2301.12345')).toBeNull();
  });
});

describe('PapersCoolScraper', () => {
  const button = "a[id='kimi-2301.12345']";

  it('should open the digest and parse the page text', async () => {
    const pages = new FakePages({ bodyText: 'Q1: problem text Q2: related text', present: [button] });
    const scraper = new PapersCoolScraper(pages, { timeout: 1000, retry: immediate(1), baseUrl: 'https://papers.cool/' });

    const summary = await scraper.getKimiSummary('2301.12345');

    expect(pages.pages[0].visited).toEqual(['https://papers.cool/arxiv/2301.12345']);
    expect(pages.pages[0].clicked).toEqual([button]);
    expect(summary.paperId).toBe('2301.12345');
    expect(summary.summary).toBe('problem text\n\nrelated text');
  });

  it('should still parse the page when the button is missing', async () => {
    const pages = new FakePages({ bodyText: 'Q1: already open' });
    const scraper = new PapersCoolScraper(pages, { timeout: 1000, retry: immediate(1) });

    const summary = await scraper.getKimiSummary('2301.12345');

    expect(pages.pages[0].clicked).toEqual([]);
    expect(summary.summary).toBe('already open');
  });

  it('should not cache an empty digest', async () => {
    const pages = new FakePages({ bodyText: '' });
    const cache = new PageCache(join(tempDir(), 'html'), { ttl: 60 });
    const scraper = new PapersCoolScraper(pages, { cache, timeout: 1000, retry: immediate(1) });

    const summary = await scraper.getKimiSummary('2301.12345');

    expect(summary.summary).toBe('');
    expect(await cache.get('https://papers.cool/arxiv/2301.12345')).toBeNull();
  });
});
