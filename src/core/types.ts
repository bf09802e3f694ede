/**
 * types.ts — Shared type definitions for the scraping pipeline.
 *
 * Every layer (fetchers, extractors, the season job, the orchestrator and the
 * CSV sink) agrees on the shapes declared here.  Adding a stat column or a new
 * category starts in this file and propagates outward.
 */

// ─── Season ────────────────────────────────────────────────

/** An academic year of play, identified by the calendar year the tournament concludes. */
export type Season = number;

/** Inclusive, ascending range of seasons requested by the caller. */
export interface SeasonRange {
  start: Season;
  end: Season;
}

// ─── Category / rendering mode ─────────────────────────────

export const CATEGORIES = ['team_stats', 'opponent_stats', 'rankings'] as const;

/** One of the three data kinds scraped per season. */
export type Category = (typeof CATEGORIES)[number];

/**
 * `static`   — the data is present in the initial HTML document.
 * `rendered` — the data is injected by page scripts and needs a browser.
 */
export type RenderingMode = 'static' | 'rendered';

// ─── Row records ───────────────────────────────────────────

/**
 * Marker for a cell that was present on the page but could not be parsed.
 * Serialised verbatim into CSV so pandas and friends read it as NaN.
 */
export const MISSING = 'NA' as const;
export type Missing = typeof MISSING;

export type StatValue = number | Missing;

/**
 * `null` means the team is unranked in that poll (a valid absence);
 * MISSING means a rank cell existed but was unreadable.
 */
export type RankValue = number | null | Missing;

export const STAT_COLUMNS = [
  'gp',
  'pts',
  'fgm',
  'fga',
  'fg_pct',
  'three_pm',
  'three_pa',
  'three_pct',
  'ftm',
  'fta',
  'ft_pct',
  'oreb',
  'dreb',
  'reb',
  'ast',
  'stl',
  'blk',
  'tov',
  'pf',
] as const;

export type StatColumn = (typeof STAT_COLUMNS)[number];

/** One team's season line (offensive or opponent-allowed numbers). */
export type StatsRow = { team: string } & Record<StatColumn, StatValue>;

/** Every stat column set to MISSING; rows start from this and fill in what they can read. */
export const EMPTY_STATS: Readonly<Record<StatColumn, StatValue>> = {
  gp: MISSING,
  pts: MISSING,
  fgm: MISSING,
  fga: MISSING,
  fg_pct: MISSING,
  three_pm: MISSING,
  three_pa: MISSING,
  three_pct: MISSING,
  ftm: MISSING,
  fta: MISSING,
  ft_pct: MISSING,
  oreb: MISSING,
  dreb: MISSING,
  reb: MISSING,
  ast: MISSING,
  stl: MISSING,
  blk: MISSING,
  tov: MISSING,
  pf: MISSING,
};

/** One team's poll positions for a season. */
export interface RankingRow {
  team: string;
  ap_rank: RankValue;
  coaches_rank: RankValue;
}

export const RANKING_COLUMNS = ['ap_rank', 'coaches_rank'] as const;

/** Row shape produced for each category. */
export interface RowsByCategory {
  team_stats: StatsRow;
  opponent_stats: StatsRow;
  rankings: RankingRow;
}

export type RowRecord = RowsByCategory[Category];

/** CSV column order, team name first, per category. */
export const COLUMN_ORDER: Record<Category, readonly string[]> = {
  team_stats: ['team', ...STAT_COLUMNS],
  opponent_stats: ['team', ...STAT_COLUMNS],
  rankings: ['team', ...RANKING_COLUMNS],
};

// ─── Fetched document ──────────────────────────────────────

/** What a PageFetcher hands to an extractor. */
export interface PageDocument {
  url: string;
  html: string;
  /** HTTP status of the primary navigation, 0 when unknown. */
  statusCode: number;
  /** Which backend actually produced the document. */
  mode: RenderingMode;
}

/** Per-category hints the rendered backend needs to know the page is ready. */
export interface FetchHints {
  /**
   * CSS selector that must exist before the page counts as rendered.  Point
   * it at the table, not its rows: an empty table has to reach the
   * extractor so it fails as a layout problem instead of a timeout.
   */
  readySelector?: string;
  /** "Show more" control clicked repeatedly until the table is fully expanded. */
  loadMoreSelector?: string;
}

// ─── Extraction result ─────────────────────────────────────

export interface ExtractionResult<Row extends RowRecord = RowRecord> {
  rows: Row[];
  /** Data rows dropped individually (blank team name, duplicate team). */
  skippedRows: number;
}

// ─── Job outcomes ──────────────────────────────────────────

/**
 * `Transport`     — network / HTTP / timeout, retried inside the job.
 * `RenderTimeout` — rendered page never produced the expected element.
 * `Layout`        — the page structure no longer matches the extractor.
 * `Write`         — the CSV destination could not be written.
 */
export type FailureKind = 'Transport' | 'RenderTimeout' | 'Layout' | 'Write';

interface OutcomeBase {
  season: Season;
  category: Category;
}

export interface JobSuccess extends OutcomeBase {
  status: 'success';
  rowCount: number;
  rows: readonly RowRecord[];
  skippedRows: number;
  attempts: number;
  /** Set by the orchestrator once the rows are on disk. */
  outputPath?: string;
}

export interface JobFailure extends OutcomeBase {
  status: 'failure';
  kind: FailureKind;
  message: string;
  attempts: number;
}

export interface JobSkipped extends OutcomeBase {
  status: 'skipped';
  reason: string;
}

export type JobOutcome = JobSuccess | JobFailure | JobSkipped;

// ─── Run summary ───────────────────────────────────────────

export interface FailedJob {
  season: Season;
  category: Category;
  kind: FailureKind;
  message: string;
}

/** What BatchOrchestrator.run() resolves with. */
export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Every outcome, in execution order. */
  outcomes: readonly JobOutcome[];
  failures: readonly FailedJob[];
}
