import type { PageSource, ScrapePage } from '../../src/browser/manager.js';

export interface FakePageOptions {
  status?: number;
  html?: string;
  bodyText?: string;
  /** Selectors that match one element. */
  present?: string[];
}

/** A rendered page served from memory. */
export class FakePage implements ScrapePage {
  readonly visited: string[] = [];
  readonly clicked: string[] = [];
  private options: FakePageOptions;

  constructor(options: FakePageOptions = {}) {
    this.options = options;
  }

  async goto(url: string): Promise<{ status(): number }> {
    this.visited.push(url);
    const status = this.options.status ?? 200;
    return { status: () => status };
  }

  async waitForLoadState(): Promise<void> {
    return undefined;
  }

  async waitForTimeout(): Promise<void> {
    return undefined;
  }

  locator(selector: string): { count(): Promise<number>; click(): Promise<void> } {
    const present = (this.options.present ?? []).includes(selector);
    return {
      count: async () => (present ? 1 : 0),
      click: async () => {
        this.clicked.push(selector);
      },
    };
  }

  async content(): Promise<string> {
    return this.options.html ?? '<html><body></body></html>';
  }

  async innerText(): Promise<string> {
    return this.options.bodyText ?? '';
  }

  url(): string {
    return this.visited[this.visited.length - 1] ?? '';
  }
}

/** Hands out a new {@link FakePage} per call and keeps them for inspection. */
export class FakePages implements PageSource {
  readonly pages: FakePage[] = [];
  private options: FakePageOptions;

  constructor(options: FakePageOptions = {}) {
    this.options = options;
  }

  async withPage<T>(fn: (page: ScrapePage) => Promise<T>): Promise<T> {
    const page = new FakePage(this.options);
    this.pages.push(page);
    return fn(page);
  }
}
