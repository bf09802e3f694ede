/**
 * csvOutputSink.ts — Persists one (season, category) row set as CSV.
 *
 * Layout: `<outputDir>/<season>/<category file>`, header row first, columns
 * in COLUMN_ORDER, `\n` line endings, trailing newline.  The file is written
 * to a temp name in the same directory and renamed over the target, so a
 * crash mid-write never leaves a half-written season file behind and the
 * same rows always produce the same bytes.
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';
import { WriteError, describeError } from '../core/errors';
import { Logger } from '../core/logger';
import {
  COLUMN_ORDER,
  STAT_COLUMNS,
  type Category,
  type RankValue,
  type RankingRow,
  type RowRecord,
  type Season,
  type StatValue,
} from '../core/types';
import { CATEGORY_STRATEGIES } from '../pipeline/categories';

const logger = new Logger('CsvOutputSink');

export interface OutputSink {
  /** Write `rows` and resolve with the final file path. Rejects with WriteError. */
  write(season: Season, category: Category, rows: readonly RowRecord[]): Promise<string>;
}

type Cell = string | StatValue | RankValue;

export class CsvOutputSink implements OutputSink {
  constructor(readonly outputDir: string) {}

  /** Where `write(season, category, …)` puts its file. */
  pathFor(season: Season, category: Category): string {
    return join(this.outputDir, String(season), CATEGORY_STRATEGIES[category].fileName);
  }

  async write(season: Season, category: Category, rows: readonly RowRecord[]): Promise<string> {
    const target = this.pathFor(season, category);
    const temp = `${target}.${process.pid}.tmp`;
    const csv = serializeRows(category, rows);

    try {
      await mkdir(join(this.outputDir, String(season)), { recursive: true });
      await writeFile(temp, csv, 'utf8');
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn(`Could not remove temp file ${temp}: ${describeError(cleanupErr)}`);
      });
      throw new WriteError(`Could not write ${target}: ${describeError(err)}`, target, err);
    }

    logger.info(`Wrote ${rows.length} row(s) to ${target}`);
    return target;
  }
}

// ── Serialization ──────────────────────────────────────────

/** Header plus one line per row, in the category's fixed column order. */
export function serializeRows(category: Category, rows: readonly RowRecord[]): string {
  const body = Papa.unparse(
    {
      fields: [...COLUMN_ORDER[category]],
      data: rows.map((row) => rowCells(row).map(formatCell)),
    },
    { newline: '\n' },
  );
  return `${body}\n`;
}

function isRankingRow(row: RowRecord): row is RankingRow {
  return 'ap_rank' in row;
}

function rowCells(row: RowRecord): Cell[] {
  if (isRankingRow(row)) {
    return [row.team, row.ap_rank, row.coaches_rank];
  }
  return [row.team, ...STAT_COLUMNS.map((column) => row[column])];
}

/** MISSING is already the string `NA`; unranked (`null`) is an empty cell. */
function formatCell(value: Cell): string {
  if (value === null) return '';
  return String(value);
}
