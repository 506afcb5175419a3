import { describe, it, expect, vi } from 'vitest';
import type { Config } from '../../src/config/index.js';
import type { ScrapeOptions } from '../../src/browser/base-scraper.js';
import { MetadataFetcher } from '../../src/crawler/metadata-fetcher.js';
import { ConnectivityError, ValidationError } from '../../src/lib/errors.js';
import type { PaperMetadata } from '../../src/types/paper.js';
import { testConfig } from '../helpers/config.js';
import { samplePaper } from '../helpers/papers.js';

function source(result: PaperMetadata | Error) {
  return {
    getPaper: vi.fn(async (_paperId: string, _options?: ScrapeOptions): Promise<PaperMetadata> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

function configWith(update: (config: Config) => void): Config {
  const config = testConfig();
  update(config);
  return config;
}

const ID = '2301.12345';

describe('MetadataFetcher', () => {
  it('should use the API when it answers', async () => {
    const api = source(samplePaper());
    const scraper = source(samplePaper({ source: 'browser' }));

    const paper = await new MetadataFetcher(testConfig(), { api, scraper }).fetchMetadata(ID);

    expect(paper.source).toBe('api');
    expect(api.getPaper).toHaveBeenCalledWith(ID);
    expect(scraper.getPaper).not.toHaveBeenCalled();
  });

  it('should fall back to the browser when the API fails', async () => {
    const api = source(new Error('socket hang up'));
    const scraper = source(samplePaper({ source: 'browser' }));

    const paper = await new MetadataFetcher(testConfig(), { api, scraper }).fetchMetadata(ID);

    expect(paper.source).toBe('browser');
    expect(scraper.getPaper).toHaveBeenCalledWith(ID, { useCache: true });
  });

  it('should fall back even when the API cannot find the paper', async () => {
    const api = source(new ValidationError(`Paper ${ID} not found`));
    const scraper = source(samplePaper({ source: 'browser' }));

    await expect(new MetadataFetcher(testConfig(), { api, scraper }).fetchMetadata(ID)).resolves.toMatchObject({
      source: 'browser',
    });
  });

  it('should report every source when all fail', async () => {
    const config = configWith((c) => { c.browser.enabled = false; });
    const api = source(new Error('socket hang up'));

    const failure = new MetadataFetcher(config, { api, scraper: source(samplePaper()) }).fetchMetadata(ID);

    await expect(failure).rejects.toBeInstanceOf(ConnectivityError);
    await expect(failure).rejects.toThrow(
      `All sources failed for arXiv paper ${ID} (tried: api). ` +
        'api error: socket hang up; browser skipped (browser disabled in config)'
    );
  });

  it('should reject a browser answer without a title', async () => {
    const api = source(new Error('socket hang up'));
    const scraper = source(samplePaper({ title: '', source: 'browser' }));

    const failure = new MetadataFetcher(testConfig(), { api, scraper }).fetchMetadata(ID);

    await expect(failure).rejects.toMatchObject({
      attempts: [
        { source: 'api', reason: 'socket hang up', skipped: false },
        { source: 'browser', reason: 'page had no title', skipped: false },
      ],
    });
  });

  it('should not touch the API in browser_first mode without flex mode', async () => {
    const config = configWith((c) => { c.arxiv.order = 'browser_first'; });
    const api = source(samplePaper());
    const scraper = source(new Error('Timeout 30000ms exceeded'));

    const failure = new MetadataFetcher(config, { api, scraper }).fetchMetadata(ID);

    await expect(failure).rejects.toMatchObject({
      attempts: [
        { source: 'browser', reason: 'Timeout 30000ms exceeded', skipped: false },
        { source: 'api', reason: 'API fallback not enabled in flex_mode', skipped: true },
      ],
    });
    expect(api.getPaper).not.toHaveBeenCalled();
  });

  it('should fall back to the API in browser_first mode with flex mode', async () => {
    const config = configWith((c) => {
      c.arxiv.order = 'browser_first';
      c.flexMode.enabled = true;
    });
    const api = source(samplePaper());
    const scraper = source(new Error('Timeout 30000ms exceeded'));

    await expect(new MetadataFetcher(config, { api, scraper }).fetchMetadata(ID)).resolves.toMatchObject({
      source: 'api',
    });
    expect(scraper.getPaper).toHaveBeenCalledTimes(1);
  });

  it('should prefer the browser in browser_first mode', async () => {
    const config = configWith((c) => { c.arxiv.order = 'browser_first'; });
    const api = source(samplePaper());
    const scraper = source(samplePaper({ source: 'browser' }));

    await expect(new MetadataFetcher(config, { api, scraper }).fetchMetadata(ID)).resolves.toMatchObject({
      source: 'browser',
    });
    expect(api.getPaper).not.toHaveBeenCalled();
  });

  it('should skip the browser when the call or setup rules it out', async () => {
    const api = source(new Error('socket hang up'));

    await expect(
      new MetadataFetcher(testConfig(), { api, scraper: source(samplePaper()) }).fetchMetadata(ID, { useBrowser: false })
    ).rejects.toMatchObject({ attempts: [{ source: 'api' }, { source: 'browser', reason: 'browser disabled for this call' }] });

    await expect(new MetadataFetcher(testConfig(), { api }).fetchMetadata(ID)).rejects.toMatchObject({
      attempts: [{ source: 'api' }, { source: 'browser', reason: 'no browser configured', skipped: true }],
    });
  });

  it('should pass the cache choice to the browser', async () => {
    const api = source(new Error('socket hang up'));
    const scraper = source(samplePaper({ source: 'browser' }));

    await new MetadataFetcher(testConfig(), { api, scraper }).fetchMetadata(ID, { useCache: false });

    expect(scraper.getPaper).toHaveBeenCalledWith(ID, { useCache: false });
  });

  it('should reject a malformed ID before any source runs', async () => {
    const api = source(samplePaper());

    await expect(new MetadataFetcher(testConfig(), { api }).fetchMetadata('2301')).rejects.toBeInstanceOf(ValidationError);
    expect(api.getPaper).not.toHaveBeenCalled();
  });
});
