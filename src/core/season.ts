/**
 * season.ts — Season arithmetic.
 *
 * A season is named after the calendar year its tournament concludes, so
 * games played in November and December 2023 belong to season 2024.  The
 * rollover is evaluated in US Eastern time, where the source site publishes.
 */

import { DateTime } from 'luxon';
import type { Season, SeasonRange } from './types';

export const SOURCE_TIMEZONE = 'America/New_York';

/** First month (1-based) that belongs to the *next* season. */
const SEASON_ROLLOVER_MONTH = 11;

/**
 * The season in progress (or most recently finished) at `now`.
 *
 * @example currentSeason(DateTime.fromISO('2023-11-20')) // 2024
 */
export function currentSeason(now: DateTime = DateTime.now()): Season {
  const local = now.setZone(SOURCE_TIMEZONE);
  return local.month >= SEASON_ROLLOVER_MONTH ? local.year + 1 : local.year;
}

/** Expand an inclusive range into ascending seasons. */
export function seasonRange({ start, end }: SeasonRange): Season[] {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new RangeError(`Season bounds must be integers (got ${start}..${end})`);
  }
  if (start > end) {
    throw new RangeError(`Start season ${start} is after end season ${end}`);
  }

  const seasons: Season[] = [];
  for (let season = start; season <= end; season++) {
    seasons.push(season);
  }
  return seasons;
}

/** "2023-24" style label used in log lines. */
export function seasonLabel(season: Season): string {
  return `${season - 1}-${String(season % 100).padStart(2, '0')}`;
}
