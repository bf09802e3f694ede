/**
 * seasonJob.ts — One (season, category) unit of work.
 *
 *   1. FETCH   → PageFetcher in the category's mode, retried with backoff
 *   2. EXTRACT → the category's extractor turns HTML into rows
 *
 * Whatever happens, run() resolves with a JobOutcome; it never throws.
 * Cancelling the run while a retry is pending gives a skipped outcome.
 * Only transport-level failures are retried: a layout mismatch will not fix
 * itself on the next request.
 */

import type { RetryPolicy } from '../core/config';
import { ExtractionError, FetchError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import { seasonLabel } from '../core/season';
import type {
  Category,
  ExtractionResult,
  FailureKind,
  JobFailure,
  JobOutcome,
  PageDocument,
  RowRecord,
  Season,
} from '../core/types';
import type { ExtractorRegistry } from '../extractors';
import type { PageFetcher } from '../middleware/pageFetcher';
import { CATEGORY_STRATEGIES, categoryUrl, resolveMode } from './categories';
import { RetryCancelledError, RetryExhaustedError, withRetry } from './retry';

const logger = new Logger('SeasonJob');

export interface SeasonJobOptions {
  fetcher: PageFetcher;
  extractors: ExtractorRegistry;
  baseUrl: string;
  retry: RetryPolicy;
  /** Render every category in a browser, whatever its default mode. */
  forceRendered?: boolean;
  signal?: AbortSignal;
}

export class SeasonJob {
  constructor(private readonly options: SeasonJobOptions) {}

  async run(season: Season, category: Category): Promise<JobOutcome> {
    const strategy = CATEGORY_STRATEGIES[category];
    const mode = resolveMode(category, this.options.forceRendered ?? false);
    const url = categoryUrl(this.options.baseUrl, category, season);
    const tag = `${seasonLabel(season)} ${strategy.label}`;

    // ── Stage 1: FETCH ─────────────────────────────────────

    let page: PageDocument;
    let attempts: number;
    try {
      const fetched = await withRetry(
        () => this.options.fetcher.fetch(url, mode, strategy.hints),
        this.options.retry,
        isRetryable,
        ({ attempt, error, delayMs }) => {
          logger.warn(
            `${tag}: attempt ${attempt}/${this.options.retry.maxAttempts} failed ` +
              `(${describeError(error)}), retrying in ${delayMs} ms`,
          );
        },
        this.options.signal,
      );
      page = fetched.value;
      attempts = fetched.attempts;
    } catch (err) {
      if (err instanceof RetryCancelledError) {
        logger.warn(`${tag}: run cancelled after ${err.attempts} attempt(s), skipping`);
        return { status: 'skipped', season, category, reason: 'run cancelled' };
      }
      const lastError = err instanceof RetryExhaustedError ? err.lastError : err;
      const tries = err instanceof RetryExhaustedError ? err.attempts : 1;
      const kind: FailureKind = lastError instanceof FetchError ? lastError.kind : 'Transport';
      return this.fail(season, category, kind, describeError(lastError), tries);
    }

    // ── Stage 2: EXTRACT ───────────────────────────────────

    let result: ExtractionResult<RowRecord>;
    try {
      result = this.options.extractors[category].extract(page.html, season);
    } catch (err) {
      const message =
        err instanceof ExtractionError ? err.message : `extractor crashed: ${describeError(err)}`;
      return this.fail(season, category, 'Layout', message, attempts);
    }

    logger.info(
      `${tag}: extracted ${result.rows.length} row(s)` +
        (result.skippedRows > 0 ? `, skipped ${result.skippedRows}` : '') +
        ` via ${page.mode} fetch`,
    );

    return {
      status: 'success',
      season,
      category,
      rowCount: result.rows.length,
      rows: result.rows,
      skippedRows: result.skippedRows,
      attempts,
    };
  }

  private fail(
    season: Season,
    category: Category,
    kind: FailureKind,
    message: string,
    attempts: number,
  ): JobFailure {
    logger.error(
      `${seasonLabel(season)} ${CATEGORY_STRATEGIES[category].label} failed ` +
        `[${kind}] after ${attempts} attempt(s): ${message}`,
    );
    return { status: 'failure', season, category, kind, message, attempts };
  }
}

/** Non-FetchErrors from the fetch layer are treated as transient transport noise. */
function isRetryable(error: unknown): boolean {
  return error instanceof FetchError ? error.retryable : true;
}
