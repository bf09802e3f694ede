import { afterEach, describe, it, expect, vi } from 'vitest';
import { ZodError } from 'zod';
import {
  SCRAPE_ALL_USAGE,
  UsageError,
  parseScrapeAllArgs,
  parseScrapeCategoryArgs,
} from '../cli/args';
import { formatRunReport } from '../cli/report';
import { runCli, type ArgParser, type BatchExecutor } from '../cli/runner';
import type { JobOutcome, RunSummary } from '../core/types';

const CURRENT = 2026;

describe('parseScrapeAllArgs', () => {
  it('defaults to the last five seasons plus the current one', () => {
    expect(parseScrapeAllArgs([], CURRENT)).toEqual({
      kind: 'run',
      options: {
        seasons: { start: 2021, end: 2026 },
        categories: ['team_stats', 'opponent_stats', 'rankings'],
        outputDir: 'data',
        forceRendered: false,
        pacingMs: 2000,
        logFile: undefined,
      },
    });
  });

  it('applies explicit flags', () => {
    const command = parseScrapeAllArgs(
      [
        '--start-year', '2019',
        '--end-year', '2020',
        '--output-dir', 'out',
        '--use-browser',
        '--no-opponent-stats',
        '--wait-time', '0.5',
        '--log-file', 'run.log',
      ],
      CURRENT,
    );

    expect(command).toEqual({
      kind: 'run',
      options: {
        seasons: { start: 2019, end: 2020 },
        categories: ['team_stats', 'rankings'],
        outputDir: 'out',
        forceRendered: true,
        pacingMs: 500,
        logFile: 'run.log',
      },
    });
  });

  it('returns usage text for --help', () => {
    expect(parseScrapeAllArgs(['--help'], CURRENT)).toEqual({ kind: 'help', text: SCRAPE_ALL_USAGE });
  });

  it('rejects a start year after the end year', () => {
    expect(() => parseScrapeAllArgs(['--start-year', '2024', '--end-year', '2023'], CURRENT)).toThrow(
      '--start-year must not be after --end-year',
    );
  });

  it('rejects non-integer years and negative waits', () => {
    expect(() => parseScrapeAllArgs(['--start-year', '2020.5'], CURRENT)).toThrow(UsageError);
    expect(() => parseScrapeAllArgs(['--wait-time=-1'], CURRENT)).toThrow(
      '--wait-time must be a non-negative number of seconds',
    );
  });

  it('rejects a run with every category disabled', () => {
    expect(() =>
      parseScrapeAllArgs(['--no-team-stats', '--no-opponent-stats', '--no-rankings'], CURRENT),
    ).toThrow('every category is disabled; nothing to scrape');
  });

  it('rejects unknown flags', () => {
    expect(() => parseScrapeAllArgs(['--season', '2020'], CURRENT)).toThrow(UsageError);
  });
});

describe('parseScrapeCategoryArgs', () => {
  it('accepts the dashed category name and defaults to the last two seasons', () => {
    expect(parseScrapeCategoryArgs(['opponent-stats', '--use-selenium'], CURRENT)).toEqual({
      kind: 'run',
      options: {
        seasons: { start: 2025, end: 2026 },
        categories: ['opponent_stats'],
        outputDir: 'data',
        forceRendered: true,
        pacingMs: 2000,
        logFile: undefined,
      },
    });
  });

  it('requires a known category', () => {
    expect(() => parseScrapeCategoryArgs([], CURRENT)).toThrow(UsageError);
    expect(() => parseScrapeCategoryArgs(['schedules'], CURRENT)).toThrow(
      'unknown category "schedules" (expected team-stats, opponent-stats or rankings)',
    );
  });
});

describe('formatRunReport', () => {
  it('lists counts per category, the failures and the seasons to re-run', () => {
    const summary: RunSummary = {
      startedAt: '2026-03-01T12:00:00.000Z',
      finishedAt: '2026-03-01T12:01:00.000Z',
      succeeded: 2,
      failed: 2,
      skipped: 1,
      outcomes: [
        { status: 'success', season: 2021, category: 'team_stats', rowCount: 1, rows: [], skippedRows: 0, attempts: 1 },
        { status: 'failure', season: 2021, category: 'rankings', kind: 'Layout', message: 'no poll table', attempts: 1 },
        { status: 'success', season: 2022, category: 'team_stats', rowCount: 1, rows: [], skippedRows: 0, attempts: 1 },
        { status: 'failure', season: 2022, category: 'rankings', kind: 'Transport', message: 'HTTP 503', attempts: 3 },
        { status: 'skipped', season: 2023, category: 'team_stats', reason: 'run cancelled' },
      ],
      failures: [
        { season: 2021, category: 'rankings', kind: 'Layout', message: 'no poll table' },
        { season: 2022, category: 'rankings', kind: 'Transport', message: 'HTTP 503' },
      ],
    };

    expect(formatRunReport(summary)).toBe(
      [
        'Scrape summary: 2 succeeded, 2 failed, 1 skipped',
        '  team_stats      ok 2  failed 0  skipped 1',
        '  rankings        ok 0  failed 2  skipped 0',
        'Failed jobs:',
        '  2021 rankings [Layout] no poll table',
        '  2022 rankings [Transport] HTTP 503',
        'Re-run failed seasons:',
        '  rankings: 2021, 2022',
      ].join('\n'),
    );
  });
});

describe('runCli', () => {
  const RUN: ArgParser = () => ({
    kind: 'run',
    options: {
      seasons: { start: 2024, end: 2025 },
      categories: ['rankings'],
      outputDir: 'out',
      forceRendered: false,
      pacingMs: 0,
    },
  });

  function summaryOf(outcomes: JobOutcome[]): RunSummary {
    return {
      startedAt: '2026-03-01T12:00:00.000Z',
      finishedAt: '2026-03-01T12:00:10.000Z',
      succeeded: outcomes.filter((o) => o.status === 'success').length,
      failed: outcomes.filter((o) => o.status === 'failure').length,
      skipped: outcomes.filter((o) => o.status === 'skipped').length,
      outcomes,
      failures: outcomes.flatMap((o) =>
        o.status === 'failure'
          ? [{ season: o.season, category: o.category, kind: o.kind, message: o.message }]
          : [],
      ),
    };
  }

  function capture() {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    return { stdout, stderr };
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('exits 0 and prints the report when every job succeeded', async () => {
    const { stdout } = capture();
    const summary = summaryOf([
      { status: 'success', season: 2024, category: 'rankings', rowCount: 1, rows: [], skippedRows: 0, attempts: 1 },
    ]);
    const execute = vi.fn<Parameters<BatchExecutor>, ReturnType<BatchExecutor>>(async () => summary);

    const code = await runCli(RUN, [], execute);

    expect(code).toBe(0);
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute.mock.calls[0][0].seasons).toEqual({ start: 2024, end: 2025 });
    expect(stdout).toHaveBeenCalledWith(formatRunReport(summary));
  });

  it('exits 1 when a job failed and still prints the report', async () => {
    const { stdout } = capture();
    const summary = summaryOf([
      { status: 'success', season: 2024, category: 'rankings', rowCount: 1, rows: [], skippedRows: 0, attempts: 1 },
      { status: 'failure', season: 2025, category: 'rankings', kind: 'Layout', message: 'no poll table', attempts: 1 },
    ]);

    const code = await runCli(RUN, [], async () => summary);

    expect(code).toBe(1);
    expect(stdout).toHaveBeenCalledWith(formatRunReport(summary));
  });

  it('exits 0 when the remaining jobs were skipped by cancellation', async () => {
    capture();
    const summary = summaryOf([
      { status: 'success', season: 2024, category: 'rankings', rowCount: 1, rows: [], skippedRows: 0, attempts: 1 },
      { status: 'skipped', season: 2025, category: 'rankings', reason: 'run cancelled' },
    ]);

    expect(await runCli(RUN, [], async () => summary)).toBe(0);
  });

  it('exits 2 on a usage error without running anything', async () => {
    const { stderr } = capture();
    const execute = vi.fn<Parameters<BatchExecutor>, ReturnType<BatchExecutor>>();
    const parse: ArgParser = () => {
      throw new UsageError('unknown option --season');
    };

    const code = await runCli(parse, ['--season'], execute);

    expect(code).toBe(2);
    expect(stderr).toHaveBeenCalledWith('error: unknown option --season');
    expect(execute).not.toHaveBeenCalled();
  });

  it('exits 2 on an invalid configuration', async () => {
    const { stderr } = capture();
    const invalid = new ZodError([{ code: 'custom', path: ['RATE_LIMIT_MS'], message: 'Expected number' }]);

    const code = await runCli(RUN, [], async () => {
      throw invalid;
    });

    expect(code).toBe(2);
    expect(stderr).toHaveBeenCalledWith('error: invalid configuration: RATE_LIMIT_MS: Expected number');
  });

  it('exits 0 after printing help', async () => {
    const { stdout } = capture();
    const help: ArgParser = () => ({ kind: 'help', text: SCRAPE_ALL_USAGE });

    expect(await runCli(help, ['--help'])).toBe(0);
    expect(stdout).toHaveBeenCalledWith(SCRAPE_ALL_USAGE);
  });
});
