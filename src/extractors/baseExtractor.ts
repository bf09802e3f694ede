/**
 * baseExtractor.ts — Abstract base class + table helpers for the extractors.
 *
 * Concrete extractors only decide *which* table to read and how to turn its
 * cells into rows.  Reading a table into plain strings, enforcing one row per
 * team, and treating an empty result as layout drift are shared here.
 */

import * as cheerio from 'cheerio';
import { ExtractionError } from '../core/errors';
import { Logger } from '../core/logger';
import { cleanTeamName } from '../core/statNormalizer';
import type {
  Category,
  ExtractionResult,
  RowRecord,
  Season,
} from '../core/types';

/** Text views of one `<td>`. */
export interface CellSnapshot {
  /** Full text content, whitespace collapsed. */
  text: string;
  /** Text of the last non-empty link in the cell ('' when there is none). */
  linkText: string;
  /** Text of the first `<span>` in the cell, or `text` when there is none. */
  leadText: string;
}

export interface RowSnapshot {
  cells: CellSnapshot[];
  /** Text of an explicit team-name element (`span.ml4`, `.TeamLink__Name`). */
  teamLabel: string;
}

/** A table reduced to strings so extractors never juggle DOM nodes. */
export interface TableSnapshot {
  headers: string[];
  rows: RowSnapshot[];
}

const TEAM_LABEL_SELECTOR = 'span.ml4, .TeamLink__Name';

export abstract class BaseExtractor<Row extends RowRecord> {
  protected readonly logger: Logger;

  constructor(readonly category: Category) {
    this.logger = new Logger(`Extractor:${category}`);
  }

  /**
   * Parse `html` for `season` into rows.
   *
   * @throws ExtractionError when the expected table is absent, malformed,
   *   or yields no rows.
   */
  abstract extract(html: string, season: Season): ExtractionResult<Row>;

  // ── Shared helpers ─────────────────────────────────────

  protected load(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Snapshot the `index`-th element matching `scope`.  When that element is
   * a wrapper (e.g. `div.ResponsiveTable`), its first nested `<table>` is
   * read.  Returns `null` when nothing matches.
   */
  protected snapshotTable(
    $: cheerio.CheerioAPI,
    scope: string,
    index = 0,
  ): TableSnapshot | null {
    const container = $(scope).eq(index);
    if (container.length === 0) return null;

    const table = container.is('table')
      ? container
      : container.find('table').first();
    if (table.length === 0) return null;

    // Multi-row headers (group labels above column labels) keep the last row.
    // Without a <thead>, the first row of <th> cells is the header.
    const headerRow =
      table.find('thead tr').length > 0
        ? table.find('thead tr').last()
        : table
            .find('tr')
            .filter((_, tr) => $(tr).children('th').length > 0)
            .first();
    const headers = headerRow
      .children('th, td')
      .map((_, th) => cleanTeamName($(th).text()))
      .get();

    const rows: RowSnapshot[] = [];
    const bodyRows =
      table.find('tbody tr').length > 0 ? table.find('tbody tr') : table.find('tr');

    bodyRows.each((_, tr) => {
      const $tr = $(tr);
      const cells = $tr
        .find('td')
        .map((_, td): CellSnapshot => {
          const $td = $(td);
          const links = $td
            .find('a')
            .map((_, a) => cleanTeamName($(a).text()))
            .get()
            .filter((text) => text !== '');
          const firstSpan = $td.find('span').first();
          const text = cleanTeamName($td.text());
          return {
            text,
            linkText: links.length > 0 ? links[links.length - 1] : '',
            leadText:
              firstSpan.length > 0 ? cleanTeamName(firstSpan.text()) : text,
          };
        })
        .get();

      // Header rows repeated inside <tbody> have no <td>.
      if (cells.length === 0) return;

      rows.push({
        cells,
        teamLabel: cleanTeamName($tr.find(TEAM_LABEL_SELECTOR).first().text()),
      });
    });

    return { headers, rows };
  }

  /**
   * Keep the first row for each team name.  Returns the kept rows and how
   * many were dropped.
   */
  protected dedupeByTeam(
    rows: readonly Row[],
    season: Season,
  ): { rows: Row[]; dropped: number } {
    const seen = new Set<string>();
    const kept: Row[] = [];
    let dropped = 0;

    for (const row of rows) {
      if (seen.has(row.team)) {
        dropped++;
        this.logger.warn(
          `Duplicate team "${row.team}" in ${this.category} for ${season} — keeping the first row`,
        );
        continue;
      }
      seen.add(row.team);
      kept.push(row);
    }

    return { rows: kept, dropped };
  }

  /** Zero rows after extraction means the page template moved. */
  protected requireRows(rows: readonly Row[], season: Season): void {
    if (rows.length === 0) {
      throw new ExtractionError(
        `No ${this.category} rows found for season ${season}; the page layout may have changed`,
      );
    }
  }
}
