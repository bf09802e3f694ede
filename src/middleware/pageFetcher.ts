/**
 * pageFetcher.ts — Mode-aware fetch layer used by SeasonJob.
 *
 * FETCH STRATEGY
 * ──────────────
 * 1. **Compliance gate:**  robots.txt check, then wait for the host's turn
 *    in its Bottleneck queue.
 * 2. **Backend by mode:**  `static` → got-scraping GET, `rendered` →
 *    headless Chromium with a bounded wait for the ready selector.
 * 3. **Status handling:**  non-2xx answers become FetchErrors.  402, 404 and
 *    410 are marked non-retryable; everything else is left for SeasonJob to
 *    retry.
 *
 * The mode is chosen by the caller; this layer never falls back from one
 * backend to the other on its own.
 */

import { BrowserManager } from '../core/browserManager';
import type { ScraperConfig } from '../core/config';
import { FetchError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { FetchHints, PageDocument, RenderingMode } from '../core/types';
import { ComplianceGate, isPaywallResponse, isSuccessStatus } from './compliance';
import { lightFetch, type LightFetchFn, type LightFetchResult } from './lightFetcher';
import {
  BrowserRenderedFetcher,
  type RenderedBackend,
  type RenderedFetchResult,
} from './renderedFetcher';

const logger = new Logger('PageFetcher');

/** The capability SeasonJob depends on. */
export interface PageFetcher {
  fetch(url: string, mode: RenderingMode, hints?: FetchHints): Promise<PageDocument>;
  /** Release any browser or limiter resources. */
  close(): Promise<void>;
}

export interface SitePageFetcherDeps {
  compliance: ComplianceGate;
  lightFetch: LightFetchFn;
  rendered: RenderedBackend;
  requestTimeoutMs: number;
}

const PERMANENT_STATUSES = new Set([402, 404, 410]);

type Backend = (url: string, hints: FetchHints) => Promise<PageDocument>;

export class SitePageFetcher implements PageFetcher {
  private readonly backends: Record<RenderingMode, Backend>;

  constructor(private readonly deps: SitePageFetcherDeps) {
    this.backends = {
      static: (url) => this.fetchStatic(url),
      rendered: (url, hints) => this.fetchRendered(url, hints),
    };
  }

  async fetch(url: string, mode: RenderingMode, hints: FetchHints = {}): Promise<PageDocument> {
    if (!(await this.deps.compliance.isAllowed(url))) {
      throw new FetchError(`robots.txt disallows ${url}`, { retryable: false });
    }

    logger.info(`Fetching ${url} (${mode})`);
    return this.deps.compliance.schedule(url, () => this.backends[mode](url, hints));
  }

  async close(): Promise<void> {
    await this.deps.compliance.dispose();
    await this.deps.rendered.close();
  }

  // ── Backends ───────────────────────────────────────────

  private async fetchStatic(url: string): Promise<PageDocument> {
    let result: LightFetchResult;
    try {
      result = await this.deps.lightFetch(url, {
        timeoutMs: this.deps.requestTimeoutMs,
        headers: { referer: new URL(url).origin + '/' },
      });
    } catch (err) {
      throw new FetchError(`GET ${url} failed: ${describeError(err)}`, { cause: err });
    }

    assertStatus(url, result.statusCode);
    return { url, html: result.body, statusCode: result.statusCode, mode: 'static' };
  }

  private async fetchRendered(url: string, hints: FetchHints): Promise<PageDocument> {
    let result: RenderedFetchResult;
    try {
      result = await this.deps.rendered.fetch(url, hints);
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(`Browser fetch of ${url} failed: ${describeError(err)}`, { cause: err });
    }

    // 0 means the browser could not report a status (e.g. served from cache).
    if (result.statusCode !== 0) assertStatus(url, result.statusCode);
    return { url, html: result.html, statusCode: result.statusCode, mode: 'rendered' };
  }
}

function assertStatus(url: string, statusCode: number): void {
  if (isSuccessStatus(statusCode)) return;

  if (isPaywallResponse(statusCode)) {
    logger.warn(`HTTP 402 Pay-to-Crawl firewall for ${url} — not retrying`);
  }
  throw new FetchError(`HTTP ${statusCode} for ${url}`, {
    statusCode,
    retryable: !PERMANENT_STATUSES.has(statusCode),
  });
}

/** Wire the production fetch stack from configuration. */
export function createPageFetcher(config: ScraperConfig): SitePageFetcher {
  const browser = new BrowserManager({
    userAgent: config.userAgent,
    executablePath: config.chromeExecutablePath,
  });

  return new SitePageFetcher({
    compliance: new ComplianceGate({
      userAgent: config.userAgent,
      rateLimitMs: config.rateLimitMs,
      respectRobots: config.respectRobots,
      fetchText: lightFetch,
      robotsTimeoutMs: Math.min(config.requestTimeoutMs, 5_000),
    }),
    lightFetch,
    rendered: new BrowserRenderedFetcher(browser, {
      navigationTimeoutMs: config.requestTimeoutMs,
      renderWaitMs: config.renderWaitMs,
      maxLoadMoreClicks: config.loadMoreClicks,
    }),
    requestTimeoutMs: config.requestTimeoutMs,
  });
}
