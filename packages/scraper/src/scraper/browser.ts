import { chromium } from 'playwright-core';
import type { Browser, BrowserContext, Page } from 'playwright-core';

export interface BrowserOptions {
  headless?: boolean;
  userAgent?: string;
  locale?: string;
  /** Chromium binary; defaults to the one Playwright manages. */
  executablePath?: string | undefined;
}

const DEFAULT_OPTIONS = {
  headless: true,
  userAgent: 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36 cinefeed',
  locale: 'en-US',
};

/**
 * Lazily launched browser shared by every page opened during a job.
 */
export class BrowserManager {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private launching: Promise<BrowserContext> | null = null;

  constructor(private readonly options: BrowserOptions = {}) {}

  async ensureContext(): Promise<BrowserContext> {
    if (this.context) return this.context;
    // Concurrent workers must share one launch
    this.launching ??= this.launch();
    try {
      return await this.launching;
    } finally {
      this.launching = null;
    }
  }

  private async launch(): Promise<BrowserContext> {
    if (!this.browser) {
      this.browser = await chromium.launch({
        headless: this.options.headless ?? DEFAULT_OPTIONS.headless,
        ...(this.options.executablePath && { executablePath: this.options.executablePath }),
      });
    }
    const context = await this.browser.newContext({
      userAgent: this.options.userAgent ?? DEFAULT_OPTIONS.userAgent,
      locale: this.options.locale ?? DEFAULT_OPTIONS.locale,
      viewport: { width: 1280, height: 720 },
    });

    await context.route('**/*.{png,jpg,jpeg,gif,webp,svg,ico}', (route) => route.abort());
    await context.route('**/*.{woff,woff2,ttf,eot}', (route) => route.abort());

    this.context = context;
    return context;
  }

  /**
   * Opens a page, hands it to `fn` and always closes it afterwards.
   * Aborting `signal` closes the page early, which makes pending
   * navigation and evaluation calls in `fn` reject.
   */
  async withPage<T>(fn: (page: Page) => Promise<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted();
    const context = await this.ensureContext();
    const page = await context.newPage();

    let closing: Promise<void> | null = null;
    const closePage = (): Promise<void> => {
      closing ??= page.close();
      return closing;
    };
    const onAbort = (): void => {
      // Awaited again in finally, where a close failure surfaces
      closePage().catch(() => undefined);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      signal?.throwIfAborted();
      return await fn(page);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await closePage();
    }
  }

  async close(): Promise<void> {
    if (this.context) {
      await this.context.close();
      this.context = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
