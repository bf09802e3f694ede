/**
 * renderedFetcher.ts — Browser path for pages whose tables are injected by
 * client-side scripts.
 *
 * After navigation the fetcher waits (bounded) for the category's ready
 * selector.  If the element never appears the fetch fails with a
 * RenderTimeout rather than handing an empty shell to the extractor.  When
 * a "show more" control is configured it is clicked until it disappears so
 * paginated stat tables come back complete.
 */

import type { SessionProvider, RenderSession } from '../core/browserManager';
import { FetchError } from '../core/errors';
import { Logger } from '../core/logger';
import type { FetchHints } from '../core/types';

const logger = new Logger('RenderedFetcher');

export interface RenderedFetchOptions {
  navigationTimeoutMs: number;
  renderWaitMs: number;
  maxLoadMoreClicks: number;
}

export interface RenderedFetchResult {
  html: string;
  statusCode: number;
}

/** What the page fetcher needs from a rendering backend. */
export interface RenderedBackend {
  fetch(url: string, hints: FetchHints): Promise<RenderedFetchResult>;
  close(): Promise<void>;
}

export class BrowserRenderedFetcher implements RenderedBackend {
  constructor(
    private readonly sessions: SessionProvider,
    private readonly options: RenderedFetchOptions,
  ) {}

  async fetch(url: string, hints: FetchHints): Promise<RenderedFetchResult> {
    logger.debug(`Browser-fetching ${url}…`);

    return this.sessions.withSession(async (session) => {
      const statusCode = await session.goto(url, this.options.navigationTimeoutMs);

      if (hints.readySelector) {
        const ready = await session.waitFor(hints.readySelector, this.options.renderWaitMs);
        if (!ready) {
          throw new FetchError(
            `"${hints.readySelector}" did not appear within ${this.options.renderWaitMs} ms on ${url}`,
            { kind: 'RenderTimeout' },
          );
        }
      }
      if (hints.loadMoreSelector) {
        await this.expandLoadMore(session, hints.loadMoreSelector);
      }

      const html = await session.content();
      logger.debug(`Browser fetch complete — HTTP ${statusCode} for ${url}`);
      return { html, statusCode };
    });
  }

  close(): Promise<void> {
    return this.sessions.close();
  }

  // ── Helpers ────────────────────────────────────────────

  /**
   * Click `selector` until it is gone, the row count stops growing, or the
   * click budget runs out.  Returns the number of clicks that added rows.
   */
  private async expandLoadMore(session: RenderSession, selector: string): Promise<number> {
    for (let click = 0; click < this.options.maxLoadMoreClicks; click++) {
      const rowsBefore = await session.countRows();
      if (!(await session.click(selector))) return click;

      if (!(await session.waitForMoreRows(rowsBefore, this.options.renderWaitMs))) {
        logger.debug(`No new rows after clicking "${selector}" — table fully expanded`);
        return click;
      }
    }
    logger.warn(
      `Stopped expanding after ${this.options.maxLoadMoreClicks} "${selector}" clicks; the table may be truncated`,
    );
    return this.options.maxLoadMoreClicks;
  }
}
