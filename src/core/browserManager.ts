/**
 * browserManager.ts — One shared headless Chromium per batch run.
 *
 * Launching Chromium costs seconds and hundreds of MB, so the rendered fetch
 * path reuses one browser and opens a fresh incognito context per page.  The
 * browser launches lazily on the first rendered fetch: a run that only needs
 * static pages never starts it.
 *
 * puppeteer-extra wraps `puppeteer-core` (no bundled browser download); the
 * binary comes from CHROME_EXECUTABLE_PATH or the locally installed Chrome
 * channel.
 *
 * Callers get a RenderSession rather than a raw puppeteer Page: the handful
 * of page operations the rendered fetcher needs, with puppeteer's
 * TimeoutError already turned into a `false` result.
 */

import puppeteerCore, { TimeoutError } from 'puppeteer-core';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { Logger } from './logger';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

/** Page operations used by the rendered fetch path. */
export interface RenderSession {
  /** Navigate and resolve with the HTTP status (0 when the browser reports none). */
  goto(url: string, timeoutMs: number): Promise<number>;
  /** `false` when `selector` did not appear within `timeoutMs`. */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  /** Click the first match; `false` when nothing matches. */
  click(selector: string): Promise<boolean>;
  countRows(): Promise<number>;
  /** `false` when the row count did not grow past `previous` within `timeoutMs`. */
  waitForMoreRows(previous: number, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
}

/** Something that can lend out sessions and be shut down. */
export interface SessionProvider {
  withSession<T>(fn: (session: RenderSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface BrowserManagerOptions {
  userAgent: string;
  /** Chromium binary; falls back to the installed stable Chrome channel. */
  executablePath?: string;
  viewport?: { width: number; height: number };
}

const ROW_SELECTOR = 'tbody tr';

export class BrowserManager implements SessionProvider {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;

  constructor(private readonly options: BrowserManagerOptions) {}

  // ── Core API ───────────────────────────────────────────

  /**
   * Execute `fn` with a prepared page session, then dispose its context
   * whatever `fn` does.
   */
  async withSession<T>(fn: (session: RenderSession) => Promise<T>): Promise<T> {
    const browser = await this.ensureBrowser();

    const context: BrowserContext = await browser.createBrowserContext();
    try {
      const page: Page = await context.newPage();
      await page.setViewport(this.options.viewport ?? { width: 1440, height: 900 });
      await page.setUserAgent(this.options.userAgent);
      await page.setExtraHTTPHeaders({ 'accept-language': 'en-US,en;q=0.9' });

      return await fn(new PageSession(page));
    } finally {
      await context.close().catch((err: unknown) => {
        logger.warn(`Could not close browser context: ${String(err)}`);
      });
    }
  }

  /** Gracefully shut down the browser, if one was launched. */
  async close(): Promise<void> {
    const browser = this.browser ?? (this.launching ? await this.launching : null);
    this.browser = null;
    this.launching = null;
    if (browser) {
      logger.info('Closing headless browser');
      await browser.close();
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.connected) return this.browser;

    if (!this.launching) {
      logger.info('Launching headless browser for rendered pages…');
      this.launching = puppeteer.launch({
        headless: true,
        ...(this.options.executablePath
          ? { executablePath: this.options.executablePath }
          : { channel: 'chrome' }),
        args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--lang=en-US'],
      });
    }

    try {
      this.browser = await this.launching;
      return this.browser;
    } finally {
      this.launching = null;
    }
  }
}

/** RenderSession over a live puppeteer Page. */
class PageSession implements RenderSession {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<number> {
    const response = await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: timeoutMs,
    });
    return response?.status() ?? 0;
  }

  waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    return untilTimeout(this.page.waitForSelector(selector, { timeout: timeoutMs }));
  }

  async click(selector: string): Promise<boolean> {
    const handle = await this.page.$(selector);
    if (!handle) return false;
    await handle.click();
    return true;
  }

  countRows(): Promise<number> {
    return this.page.$$eval(ROW_SELECTOR, (rows) => rows.length);
  }

  waitForMoreRows(previous: number, timeoutMs: number): Promise<boolean> {
    return untilTimeout(
      this.page.waitForFunction(
        (selector: string, count: number) => document.querySelectorAll(selector).length > count,
        { timeout: timeoutMs },
        ROW_SELECTOR,
        previous,
      ),
    );
  }

  content(): Promise<string> {
    return this.page.content();
  }
}

/** `true` once `wait` settles, `false` on a puppeteer timeout; other errors propagate. */
async function untilTimeout(wait: Promise<unknown>): Promise<boolean> {
  try {
    await wait;
    return true;
  } catch (err) {
    if (err instanceof TimeoutError) return false;
    throw err;
  }
}
