import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { type Config, parseConfig } from '../../src/config/index.js';

export function tempDir(prefix = 'paper-digest-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Defaults with every path under a fresh temporary directory. */
export function testConfig(root: string = tempDir()): Config {
  const config = parseConfig({}, {});
  config.paths = {
    cacheDir: join(root, 'cache'),
    pdfDir: join(root, 'pdfs'),
    summariesDir: join(root, 'summaries'),
    slidesDir: join(root, 'slides'),
    commentsDir: join(root, 'comments'),
    templatesDir: join(root, 'templates'),
    historyFile: join(root, 'history.json'),
  };
  config.browser.cacheDir = join(root, 'html');
  return config;
}
