/**
 * statsTableExtractor.ts — Team and opponent season stats.
 *
 * The team-stats and opponent-stats pages share one template, so a single
 * class serves both categories.  Two layouts are recognised:
 *
 *   1. Split layout: two `div.ResponsiveTable` blocks side by side, the first
 *      a frozen column of team names, the second the stat grid.  Rows pair up
 *      by position.
 *   2. Single table: one `<table>` with a `Team` header next to the stat
 *      headers (older seasons and the mobile template).
 */

import type * as cheerio from 'cheerio';
import { ExtractionError } from '../core/errors';
import {
  cleanTeamName,
  headerKey,
  mapStatHeaders,
  parseStatNumber,
} from '../core/statNormalizer';
import {
  EMPTY_STATS,
  STAT_COLUMNS,
  type ExtractionResult,
  type Season,
  type StatColumn,
  type StatsRow,
} from '../core/types';
import { BaseExtractor, type RowSnapshot, type TableSnapshot } from './baseExtractor';

type StatsCategory = 'team_stats' | 'opponent_stats';

const SPLIT_TABLE_SELECTOR = 'div.ResponsiveTable';

/** Names table + stat grid, aligned row by row. */
interface StatsLayout {
  teamRows: RowSnapshot[];
  teamColumn: number;
  statRows: RowSnapshot[];
  statColumns: Map<StatColumn, number>;
}

export class StatsTableExtractor extends BaseExtractor<StatsRow> {
  constructor(category: StatsCategory) {
    super(category);
  }

  extract(html: string, season: Season): ExtractionResult<StatsRow> {
    const $ = this.load(html);
    const layout = this.locateLayout($, season);

    if (layout.statColumns.size < STAT_COLUMNS.length) {
      const absent = STAT_COLUMNS.filter((c) => !layout.statColumns.has(c));
      this.logger.debug(
        `${season} ${this.category}: ${absent.length} stat column(s) absent on page (${absent.join(', ')})`,
      );
    }

    const rows: StatsRow[] = [];
    let skipped = 0;

    layout.teamRows.forEach((teamRow, index) => {
      const team = teamNameFrom(teamRow, layout.teamColumn);
      if (!team) {
        skipped++;
        this.logger.warn(
          `Row ${index + 1} of ${this.category} for ${season} has no team name — skipping row`,
        );
        return;
      }
      rows.push(this.buildRow(team, layout.statRows[index], layout.statColumns));
    });

    const deduped = this.dedupeByTeam(rows, season);
    this.requireRows(deduped.rows, season);

    return { rows: deduped.rows, skippedRows: skipped + deduped.dropped };
  }

  // ── Layout detection ───────────────────────────────────

  private locateLayout($: cheerio.CheerioAPI, season: Season): StatsLayout {
    if ($(SPLIT_TABLE_SELECTOR).length >= 2) {
      return this.splitLayout($, season);
    }
    return this.singleTableLayout($, season);
  }

  private splitLayout($: cheerio.CheerioAPI, season: Season): StatsLayout {
    const names = this.snapshotTable($, SPLIT_TABLE_SELECTOR, 0);
    const stats = this.snapshotTable($, SPLIT_TABLE_SELECTOR, 1);
    if (!names || !stats) {
      throw new ExtractionError(
        `${this.category} ${season}: ResponsiveTable blocks contain no <table>`,
      );
    }

    const statColumns = this.requireStatHeaders(stats, season);
    if (names.rows.length !== stats.rows.length) {
      throw new ExtractionError(
        `${this.category} ${season}: team count (${names.rows.length}) ` +
          `does not match stats count (${stats.rows.length})`,
      );
    }

    return {
      teamRows: names.rows,
      teamColumn: teamColumnIndex(names),
      statRows: stats.rows,
      statColumns,
    };
  }

  private singleTableLayout($: cheerio.CheerioAPI, season: Season): StatsLayout {
    const tableCount = $('table').length;

    for (let index = 0; index < tableCount; index++) {
      const table = this.snapshotTable($, 'table', index);
      if (!table) continue;

      const teamColumn = table.headers.findIndex((h) => headerKey(h) === 'team');
      const statColumns = mapStatHeaders(table.headers);
      if (teamColumn === -1 || statColumns.size === 0) continue;

      return { teamRows: table.rows, teamColumn, statRows: table.rows, statColumns };
    }

    throw new ExtractionError(
      `${this.category} ${season}: no table with a Team column and stat headers ` +
        `(found ${tableCount} table(s))`,
    );
  }

  private requireStatHeaders(
    table: TableSnapshot,
    season: Season,
  ): Map<StatColumn, number> {
    const statColumns = mapStatHeaders(table.headers);
    if (statColumns.size === 0) {
      throw new ExtractionError(
        `${this.category} ${season}: no recognisable stat headers ` +
          `(saw: ${table.headers.join(', ') || 'none'})`,
      );
    }
    return statColumns;
  }

  // ── Row building ───────────────────────────────────────

  private buildRow(
    team: string,
    statRow: RowSnapshot,
    statColumns: Map<StatColumn, number>,
  ): StatsRow {
    const row: StatsRow = { team, ...EMPTY_STATS };
    for (const column of STAT_COLUMNS) {
      const index = statColumns.get(column);
      if (index === undefined) continue;
      row[column] = parseStatNumber(statRow.cells[index]?.text);
    }
    return row;
  }
}

// ── Helpers ────────────────────────────────────────────────

/** The `Team` column when labelled, otherwise the last column of the names table. */
function teamColumnIndex(names: TableSnapshot): number {
  const labelled = names.headers.findIndex((h) => headerKey(h) === 'team');
  if (labelled !== -1) return labelled;
  const width = names.rows[0]?.cells.length ?? 1;
  return Math.max(0, width - 1);
}

function teamNameFrom(row: RowSnapshot, column: number): string {
  if (row.teamLabel) return row.teamLabel;
  const cell = row.cells[column];
  return cleanTeamName(cell?.linkText || cell?.text);
}
