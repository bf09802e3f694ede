/**
 * batchOrchestrator.ts — Runs every (season, category) job of a request.
 *
 * ARCHITECTURE OVERVIEW
 * ─────────────────────
 * For each job, in season-major order:
 *
 *   1. RUN     → SeasonJob fetches and extracts (retries live there)
 *   2. PERSIST → OutputSink writes the rows before the next job starts
 *   3. RECORD  → the outcome is appended to the run's outcome list
 *   4. PACE    → abortable sleep before the next job (none after the last)
 *
 * A failing job is recorded and the batch moves on.  Once the AbortSignal
 * fires, every job not yet started is recorded as skipped.
 */

import { WriteError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import { seasonLabel, seasonRange } from '../core/season';
import type {
  Category,
  FailedJob,
  JobOutcome,
  RunSummary,
  Season,
  SeasonRange,
} from '../core/types';
import type { OutputSink } from '../storage/csvOutputSink';
import { CATEGORY_ORDER, CATEGORY_STRATEGIES } from './categories';
import { pause } from './retry';

const logger = new Logger('BatchOrchestrator');

/** The part of SeasonJob the orchestrator needs; tests pass a fake. */
export interface JobRunner {
  run(season: Season, category: Category): Promise<JobOutcome>;
}

export interface BatchRequest {
  seasons: SeasonRange;
  categories: readonly Category[];
  /** Sleep between consecutive jobs. */
  pacingMs: number;
  signal?: AbortSignal;
}

export interface PlannedJob {
  season: Season;
  category: Category;
}

/**
 * The Cartesian product of seasons and enabled categories, all categories of
 * one season before the next season, categories in their fixed order.
 */
export function planJobs(seasons: SeasonRange, categories: readonly Category[]): PlannedJob[] {
  const enabled = CATEGORY_ORDER.filter((category) => categories.includes(category));
  return seasonRange(seasons).flatMap((season) =>
    enabled.map((category) => ({ season, category })),
  );
}

export class BatchOrchestrator {
  constructor(
    private readonly runner: JobRunner,
    private readonly sink: OutputSink,
  ) {}

  async run(request: BatchRequest): Promise<RunSummary> {
    const startedAt = new Date().toISOString();
    const jobs = planJobs(request.seasons, request.categories);
    const outcomes: JobOutcome[] = [];

    logger.info(
      `Starting batch: ${jobs.length} job(s) for seasons ` +
        `${request.seasons.start}–${request.seasons.end} ` +
        `(${request.categories.join(', ')})`,
    );

    for (const [index, job] of jobs.entries()) {
      if (request.signal?.aborted) {
        outcomes.push({ status: 'skipped', ...job, reason: 'run cancelled' });
        continue;
      }

      // ── Stage 1: RUN ───────────────────────────────────────
      const outcome = await this.runner.run(job.season, job.category);

      // ── Stage 2–3: PERSIST + RECORD ────────────────────────
      outcomes.push(await this.persist(outcome));

      // ── Stage 4: PACE ──────────────────────────────────────
      const isLast = index === jobs.length - 1;
      if (!isLast) await pause(request.pacingMs, request.signal);
    }

    const summary = summarize(outcomes, startedAt);
    logger.info(
      `Batch finished: ${summary.succeeded} succeeded, ${summary.failed} failed, ` +
        `${summary.skipped} skipped`,
    );
    return summary;
  }

  // ── Helpers ──────────────────────────────────────────────

  private async persist(outcome: JobOutcome): Promise<JobOutcome> {
    if (outcome.status !== 'success') return outcome;

    try {
      const outputPath = await this.sink.write(outcome.season, outcome.category, outcome.rows);
      return { ...outcome, outputPath };
    } catch (err) {
      const message = err instanceof WriteError ? err.message : describeError(err);
      logger.error(
        `${seasonLabel(outcome.season)} ${CATEGORY_STRATEGIES[outcome.category].label} ` +
          `could not be saved: ${message}`,
      );
      return {
        status: 'failure',
        season: outcome.season,
        category: outcome.category,
        kind: 'Write',
        message,
        attempts: outcome.attempts,
      };
    }
  }
}

function summarize(outcomes: JobOutcome[], startedAt: string): RunSummary {
  const failures: FailedJob[] = [];
  let succeeded = 0;
  let skipped = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'success':
        succeeded++;
        break;
      case 'skipped':
        skipped++;
        break;
      case 'failure':
        failures.push({
          season: outcome.season,
          category: outcome.category,
          kind: outcome.kind,
          message: outcome.message,
        });
        break;
    }
  }

  return {
    startedAt,
    finishedAt: new Date().toISOString(),
    succeeded,
    failed: failures.length,
    skipped,
    outcomes,
    failures,
  };
}
