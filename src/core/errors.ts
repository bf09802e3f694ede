/**
 * errors.ts — Error classes thrown below the season-job boundary.
 *
 * SeasonJob is the only place that inspects these: transport errors are
 * retried, extraction errors are not, and both end up as a failure outcome.
 */

import type { Category, Season } from './types';

export type FetchErrorKind = 'Transport' | 'RenderTimeout';

/** Network, HTTP, or rendering failure while retrieving a page. */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  /** `false` for answers that will not change on retry (402, robots.txt). */
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      kind?: FetchErrorKind;
      retryable?: boolean;
      statusCode?: number;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = options.kind ?? 'Transport';
    this.retryable = options.retryable ?? true;
    this.statusCode = options.statusCode;
  }
}

/** The page was fetched but the expected table or columns are not there. */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/** A season file could not be written. */
export class WriteError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'WriteError';
    this.path = path;
  }
}

/** Raised by the season loader when a requested CSV does not exist. */
export class SeasonDataNotFoundError extends Error {
  readonly season: Season;
  readonly category: Category;

  constructor(season: Season, category: Category, path: string) {
    super(`No ${category} file for season ${season} at ${path}`);
    this.name = 'SeasonDataNotFoundError';
    this.season = season;
    this.category = category;
  }
}

/** Best-effort message for anything caught in a `catch` clause. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
