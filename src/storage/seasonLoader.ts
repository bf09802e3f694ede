/**
 * seasonLoader.ts — Reads persisted season files back into typed rows.
 *
 * The inverse of CsvOutputSink: `NA` becomes MISSING again and an empty rank
 * cell becomes `null` (unranked).  Header names are matched exactly; a file
 * whose header does not carry the category's columns is rejected.
 */

import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import { z } from 'zod';
import { SeasonDataNotFoundError } from '../core/errors';
import { Logger } from '../core/logger';
import {
  COLUMN_ORDER,
  EMPTY_STATS,
  MISSING,
  STAT_COLUMNS,
  type Category,
  type RankValue,
  type RankingRow,
  type RowsByCategory,
  type Season,
  type StatValue,
  type StatsRow,
} from '../core/types';
import { CsvOutputSink } from './csvOutputSink';

const logger = new Logger('SeasonLoader');

const NUMERIC = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

const rawRowSchema = z.record(z.string());

function toStatValue(cell: string | undefined): StatValue {
  const text = (cell ?? '').trim();
  return NUMERIC.test(text) ? Number(text) : MISSING;
}

function toRank(cell: string | undefined): RankValue {
  const text = (cell ?? '').trim();
  if (text === '') return null;
  return NUMERIC.test(text) ? Number(text) : MISSING;
}

type RowParser<C extends Category> = (raw: Record<string, string>) => RowsByCategory[C];

const statsParser = (raw: Record<string, string>): StatsRow => {
  const row: StatsRow = { team: raw.team ?? '', ...EMPTY_STATS };
  for (const column of STAT_COLUMNS) {
    row[column] = toStatValue(raw[column]);
  }
  return row;
};

const rankingsParser: RowParser<'rankings'> = (raw): RankingRow => ({
  team: raw.team ?? '',
  ap_rank: toRank(raw.ap_rank),
  coaches_rank: toRank(raw.coaches_rank),
});

const ROW_PARSERS: { [C in Category]: RowParser<C> } = {
  team_stats: statsParser,
  opponent_stats: statsParser,
  rankings: rankingsParser,
};

/** Parse CSV text written by CsvOutputSink for `category`. */
export function parseSeasonCsv<C extends Category>(
  csv: string,
  category: C,
): RowsByCategory[C][] {
  const parsed = Papa.parse<unknown>(csv, { header: true, skipEmptyLines: true });
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`Malformed ${category} CSV at row ${first.row}: ${first.message}`);
  }

  const fields = parsed.meta.fields ?? [];
  const absent = COLUMN_ORDER[category].filter((column) => !fields.includes(column));
  if (absent.length > 0) {
    throw new Error(`${category} CSV is missing column(s): ${absent.join(', ')}`);
  }

  const parseRow: RowParser<C> = ROW_PARSERS[category];
  return parsed.data.map((record) => parseRow(rawRowSchema.parse(record)));
}

/**
 * Load one season's rows for `category` from `outputDir`.
 *
 * @throws SeasonDataNotFoundError when the file has not been scraped yet.
 */
export async function loadSeason<C extends Category>(
  outputDir: string,
  season: Season,
  category: C,
): Promise<RowsByCategory[C][]> {
  const path = new CsvOutputSink(outputDir).pathFor(season, category);

  let csv: string;
  try {
    csv = await readFile(path, 'utf8');
  } catch (err) {
    if (isNotFound(err)) throw new SeasonDataNotFoundError(season, category, path);
    throw err;
  }
  return parseSeasonCsv(csv, category);
}

/**
 * Load several seasons at once.  Seasons without a file are skipped with a
 * warning; the returned map only holds seasons that were found.
 */
export async function loadSeasons<C extends Category>(
  outputDir: string,
  seasons: readonly Season[],
  category: C,
): Promise<Map<Season, RowsByCategory[C][]>> {
  const loaded = new Map<Season, RowsByCategory[C][]>();

  for (const season of seasons) {
    try {
      loaded.set(season, await loadSeason(outputDir, season, category));
    } catch (err) {
      if (!(err instanceof SeasonDataNotFoundError)) throw err;
      logger.warn(`${err.message}, skipping season`);
    }
  }

  return loaded;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
