import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { WriteError } from '../core/errors';
import { Logger } from '../core/logger';
import type { Category, JobOutcome, RowRecord, Season, StatsRow } from '../core/types';
import { EMPTY_STATS } from '../core/types';
import { createExtractors } from '../extractors';
import type { PageFetcher } from '../middleware/pageFetcher';
import { BatchOrchestrator, planJobs, type JobRunner } from '../pipeline/batchOrchestrator';
import { SeasonJob } from '../pipeline/seasonJob';
import { CsvOutputSink, type OutputSink } from '../storage/csvOutputSink';

const ALL: Category[] = ['team_stats', 'opponent_stats', 'rankings'];

function statsRow(team: string): StatsRow {
  return { ...EMPTY_STATS, team, gp: 30 };
}

function success(season: Season, category: Category): JobOutcome {
  const rows: RowRecord[] =
    category === 'rankings'
      ? [{ team: 'Alpha State', ap_rank: 1, coaches_rank: null }]
      : [statsRow('Alpha State')];
  return { status: 'success', season, category, rowCount: rows.length, rows, skippedRows: 0, attempts: 1 };
}

/** Runner that records the order it was called in. */
class ScriptedRunner implements JobRunner {
  readonly calls: string[] = [];

  constructor(private readonly script: (season: Season, category: Category) => JobOutcome = success) {}

  async run(season: Season, category: Category): Promise<JobOutcome> {
    this.calls.push(`${season}:${category}`);
    return this.script(season, category);
  }
}

class MemorySink implements OutputSink {
  readonly written: string[] = [];

  async write(season: Season, category: Category): Promise<string> {
    const path = `${season}/${category}.csv`;
    this.written.push(path);
    return path;
  }
}

describe('planJobs', () => {
  it('orders jobs season-major with categories in fixed order', () => {
    const jobs = planJobs({ start: 2020, end: 2021 }, ['rankings', 'team_stats']);
    expect(jobs).toEqual([
      { season: 2020, category: 'team_stats' },
      { season: 2020, category: 'rankings' },
      { season: 2021, category: 'team_stats' },
      { season: 2021, category: 'rankings' },
    ]);
  });
});

describe('BatchOrchestrator', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'ncaab-batch-'));
  });

  afterEach(() => {
    Logger.setLogFile(null);
    vi.restoreAllMocks();
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('keeps going past a failed job and writes every success', async () => {
    const runner = new ScriptedRunner((season, category) =>
      season === 2021 && category === 'rankings'
        ? {
            status: 'failure',
            season,
            category,
            kind: 'Layout',
            message: 'no poll table',
            attempts: 1,
          }
        : success(season, category),
    );
    const orchestrator = new BatchOrchestrator(runner, new CsvOutputSink(outputDir));

    const summary = await orchestrator.run({
      seasons: { start: 2021, end: 2022 },
      categories: ALL,
      pacingMs: 0,
    });

    expect(runner.calls).toEqual([
      '2021:team_stats',
      '2021:opponent_stats',
      '2021:rankings',
      '2022:team_stats',
      '2022:opponent_stats',
      '2022:rankings',
    ]);
    expect(summary.succeeded).toBe(5);
    expect(summary.failed).toBe(1);
    expect(summary.skipped).toBe(0);
    expect(summary.failures).toEqual([
      { season: 2021, category: 'rankings', kind: 'Layout', message: 'no poll table' },
    ]);

    const files = [
      '2021/team_stats.csv',
      '2021/opponent_stats.csv',
      '2022/team_stats.csv',
      '2022/opponent_stats.csv',
      '2022/rankings.csv',
    ];
    for (const file of files) {
      expect(existsSync(join(outputDir, file))).toBe(true);
    }
    expect(existsSync(join(outputDir, '2021/rankings.csv'))).toBe(false);
  });

  it('writes the seasons that have polls and fails the one that has none', async () => {
    const polls = (rows: string) =>
      `<section class="Rankings"><div class="tabs__content"><table><tbody>${rows}</tbody></table></div></section>`;
    const pages: Record<string, string> = {
      2021: polls(
        '<tr><td>1</td><td><a href="/t/1">Alpha State</a></td></tr>' +
          '<tr><td>2</td><td><a href="/t/2">Beta Tech</a></td></tr>',
      ),
      2022: polls(''),
    };
    const fetcher: PageFetcher = {
      async fetch(url, mode) {
        const season = /year\/(\d{4})/.exec(url)?.[1] ?? '';
        return { url, html: pages[season] ?? '', statusCode: 200, mode };
      },
      async close() {},
    };
    const job = new SeasonJob({
      fetcher,
      extractors: createExtractors(),
      baseUrl: 'https://stats.test',
      retry: { maxAttempts: 3, backoffBaseMs: 0 },
    });

    const summary = await new BatchOrchestrator(job, new CsvOutputSink(outputDir)).run({
      seasons: { start: 2021, end: 2022 },
      categories: ['rankings'],
      pacingMs: 0,
    });

    expect(readFileSync(join(outputDir, '2021', 'rankings.csv'), 'utf8')).toBe(
      'team,ap_rank,coaches_rank\nAlpha State,1,\nBeta Tech,2,\n',
    );
    expect(existsSync(join(outputDir, '2022', 'rankings.csv'))).toBe(false);
    expect(summary.outcomes.map((o) => o.status)).toEqual(['success', 'failure']);
    expect(summary.failures[0]).toMatchObject({ season: 2022, kind: 'Layout' });
  });

  it('records the output path of each written job', async () => {
    const sink = new MemorySink();
    const summary = await new BatchOrchestrator(new ScriptedRunner(), sink).run({
      seasons: { start: 2024, end: 2024 },
      categories: ['team_stats'],
      pacingMs: 0,
    });

    expect(summary.outcomes[0]).toMatchObject({
      status: 'success',
      outputPath: '2024/team_stats.csv',
    });
  });

  it('turns a write error into a Write failure for that job only', async () => {
    const sink: OutputSink = {
      async write(season, category) {
        if (season === 2023) throw new WriteError('disk full', `/out/${season}/${category}.csv`);
        return `/out/${season}/${category}.csv`;
      },
    };

    const summary = await new BatchOrchestrator(new ScriptedRunner(), sink).run({
      seasons: { start: 2023, end: 2024 },
      categories: ['team_stats'],
      pacingMs: 0,
    });

    expect(summary.succeeded).toBe(1);
    expect(summary.failures).toEqual([
      { season: 2023, category: 'team_stats', kind: 'Write', message: 'disk full' },
    ]);
  });

  it('skips the remaining jobs once the run is cancelled', async () => {
    const controller = new AbortController();
    const runner = new ScriptedRunner((season, category) => {
      controller.abort();
      return success(season, category);
    });

    const summary = await new BatchOrchestrator(runner, new MemorySink()).run({
      seasons: { start: 2020, end: 2022 },
      categories: ['team_stats'],
      pacingMs: 60_000,
      signal: controller.signal,
    });

    expect(runner.calls).toEqual(['2020:team_stats']);
    expect(summary.outcomes).toHaveLength(3);
    expect(summary.outcomes.slice(1)).toEqual([
      { status: 'skipped', season: 2021, category: 'team_stats', reason: 'run cancelled' },
      { status: 'skipped', season: 2022, category: 'team_stats', reason: 'run cancelled' },
    ]);
    expect(summary.skipped).toBe(2);
  });

  it('finishes the batch when the log file cannot be written', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logFile = join(outputDir, 'missing-dir', 'run.log');
    Logger.setLogFile(logFile);

    const summary = await new BatchOrchestrator(new ScriptedRunner(), new MemorySink()).run({
      seasons: { start: 2023, end: 2024 },
      categories: ['team_stats'],
      pacingMs: 0,
    });

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(0);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0]).startsWith(`Could not write log file ${logFile}: `)).toBe(
      true,
    );
    expect(existsSync(logFile)).toBe(false);
  });
});
