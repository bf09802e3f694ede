/**
 * report.ts — End-of-run summary printed by both runners.
 */

import type { Category, RunSummary, Season } from '../core/types';
import { CATEGORY_ORDER } from '../pipeline/categories';

interface CategoryTally {
  succeeded: number;
  failed: number;
  skipped: number;
}

/**
 * Render `summary` as plain text:
 *
 *   Scrape summary: 5 succeeded, 1 failed, 0 skipped
 *     team_stats      ok 2  failed 0  skipped 0
 *     ...
 *   Failed jobs:
 *     2022 rankings [Layout] no AP poll table
 *   Re-run failed seasons:
 *     rankings: 2022
 */
export function formatRunReport(summary: RunSummary): string {
  const tallies = new Map<Category, CategoryTally>();
  for (const outcome of summary.outcomes) {
    const tally = tallies.get(outcome.category) ?? { succeeded: 0, failed: 0, skipped: 0 };
    if (outcome.status === 'success') tally.succeeded++;
    else if (outcome.status === 'failure') tally.failed++;
    else tally.skipped++;
    tallies.set(outcome.category, tally);
  }

  const lines = [
    `Scrape summary: ${summary.succeeded} succeeded, ${summary.failed} failed, ` +
      `${summary.skipped} skipped`,
  ];

  for (const category of CATEGORY_ORDER) {
    const tally = tallies.get(category);
    if (!tally) continue;
    lines.push(
      `  ${category.padEnd(15)} ok ${tally.succeeded}  failed ${tally.failed}  skipped ${tally.skipped}`,
    );
  }

  if (summary.failures.length > 0) {
    lines.push('Failed jobs:');
    for (const failure of summary.failures) {
      lines.push(`  ${failure.season} ${failure.category} [${failure.kind}] ${failure.message}`);
    }

    const retry = new Map<Category, Season[]>();
    for (const failure of summary.failures) {
      const seasons = retry.get(failure.category) ?? [];
      if (!seasons.includes(failure.season)) seasons.push(failure.season);
      retry.set(failure.category, seasons);
    }
    lines.push('Re-run failed seasons:');
    for (const category of CATEGORY_ORDER) {
      const seasons = retry.get(category);
      if (seasons) lines.push(`  ${category}: ${seasons.join(', ')}`);
    }
  }

  return lines.join('\n');
}
