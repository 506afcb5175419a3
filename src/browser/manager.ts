import { chromium, type Browser, type BrowserContext, type LaunchOptions } from 'playwright';
import type { Config } from '../config/index.js';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('browser');

type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/** The slice of a Playwright `Page` the scrapers use. */
export interface ScrapePage {
  goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<{ status(): number } | null>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  locator(selector: string): { count(): Promise<number>; click(): Promise<void> };
  content(): Promise<string>;
  innerText(selector: string): Promise<string>;
  url(): string;
}

export interface PageSource {
  /** Run `fn` against a fresh page that is closed afterwards. */
  withPage<T>(fn: (page: ScrapePage) => Promise<T>): Promise<T>;
}

// Headless runs inside containers and WSL need these
const LAUNCH_ARGS = [
  '--ignore-certificate-errors',
  '--disable-setuid-sandbox',
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--no-first-run',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-sync',
  '--mute-audio',
];

interface Session {
  browser: Browser;
  context: BrowserContext;
}

/**
 * Owns one Chromium instance and one context, launched on first use.
 * Callers must `close()` it; nothing is registered on process exit.
 */
export class BrowserManager implements PageSource {
  private settings: Config['browser'];
  private session: Promise<Session> | null = null;
  private pageCount = 0;

  constructor(settings: Config['browser']) {
    this.settings = settings;
  }

  get isLaunched(): boolean {
    return this.session !== null;
  }

  private launch(): Promise<Session> {
    if (!this.session) {
      this.session = this.start().catch((error: unknown) => {
        this.session = null;
        throw error;
      });
    }
    return this.session;
  }

  private async start(): Promise<Session> {
    log.info('Launching Chromium', { headless: this.settings.headless, proxy: this.settings.proxy || undefined });

    const options: LaunchOptions = {
      headless: this.settings.headless,
      args: LAUNCH_ARGS,
    };
    if (this.settings.proxy) {
      options.proxy = { server: this.settings.proxy };
    }

    const browser = await chromium.launch(options);
    try {
      const context = await browser.newContext({
        userAgent: this.settings.userAgent,
        viewport: { width: 1280, height: 800 },
        ignoreHTTPSErrors: true,
      });
      return { browser, context };
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async withPage<T>(fn: (page: ScrapePage) => Promise<T>): Promise<T> {
    const { context } = await this.launch();
    const page = await context.newPage();
    page.setDefaultTimeout(this.settings.timeout);
    this.pageCount++;

    try {
      return await fn(page);
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    const pending = this.session;
    if (!pending) return;
    this.session = null;

    let browser: Browser;
    try {
      ({ browser } = await pending);
    } catch (error) {
      log.debug('Browser was never launched', { error: errorMessage(error) });
      return;
    }
    log.info(`Closing browser (created ${this.pageCount} pages)`);
    await browser.close();
  }
}
