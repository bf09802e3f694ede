/**
 * rankingsExtractor.ts — AP and Coaches poll positions for one season.
 *
 * The rankings page renders each poll in its own tab panel
 * (`section.Rankings div.tabs__content`): AP first, Coaches second.  Both are
 * merged into one row per team.  A team missing from a poll is unranked
 * there (`null`); a rank cell that cannot be read is MISSING.
 */

import type * as cheerio from 'cheerio';
import { ExtractionError } from '../core/errors';
import { classifyRank, cleanTeamName, toRankValue } from '../core/statNormalizer';
import type {
  ExtractionResult,
  RankValue,
  RankingRow,
  Season,
} from '../core/types';
import { BaseExtractor, type RowSnapshot, type TableSnapshot } from './baseExtractor';

const POLL_PANEL_SELECTOR = 'section.Rankings div.tabs__content';

type Poll = 'ap' | 'coaches';

interface PollEntry {
  team: string;
  rank: RankValue;
}

export class RankingsExtractor extends BaseExtractor<RankingRow> {
  constructor() {
    super('rankings');
  }

  extract(html: string, season: Season): ExtractionResult<RankingRow> {
    const $ = this.load(html);
    const [apTable, coachesTable] = this.locatePolls($, season);

    let skipped = 0;
    const ap = this.readPoll(apTable, 'ap', season);
    skipped += ap.skipped;

    const merged = new Map<string, RankingRow>();
    for (const entry of ap.entries) {
      merged.set(entry.team, { team: entry.team, ap_rank: entry.rank, coaches_rank: null });
    }

    if (coachesTable) {
      const coaches = this.readPoll(coachesTable, 'coaches', season);
      skipped += coaches.skipped;
      for (const entry of coaches.entries) {
        const existing = merged.get(entry.team);
        if (existing) {
          existing.coaches_rank = entry.rank;
        } else {
          merged.set(entry.team, { team: entry.team, ap_rank: null, coaches_rank: entry.rank });
        }
      }
    } else {
      this.logger.warn(`No Coaches poll panel for ${season} — coaches_rank left unranked`);
    }

    const rows = [...merged.values()];
    this.requireRows(rows, season);
    return { rows, skippedRows: skipped };
  }

  // ── Layout ─────────────────────────────────────────────

  /** AP panel (required) and Coaches panel (optional). */
  private locatePolls(
    $: cheerio.CheerioAPI,
    season: Season,
  ): [TableSnapshot, TableSnapshot | null] {
    const scope = $(POLL_PANEL_SELECTOR).length > 0 ? POLL_PANEL_SELECTOR : 'table';
    if (scope === 'table') {
      this.logger.debug(`No poll tab panels for ${season}; falling back to bare tables`);
    }

    const ap = this.snapshotTable($, scope, 0);
    if (!ap) {
      throw new ExtractionError(
        `rankings ${season}: no poll table found (no release for this season yet, or the layout changed)`,
      );
    }
    return [ap, this.snapshotTable($, scope, 1)];
  }

  // ── Poll rows ──────────────────────────────────────────

  private readPoll(
    table: TableSnapshot,
    poll: Poll,
    season: Season,
  ): { entries: PollEntry[]; skipped: number } {
    const entries: PollEntry[] = [];
    const seen = new Set<string>();
    let skipped = 0;

    table.rows.forEach((row, index) => {
      const team = pollTeamName(row);
      if (!team) {
        skipped++;
        this.logger.warn(`${poll.toUpperCase()} row ${index + 1} for ${season} has no team — skipping row`);
        return;
      }
      if (seen.has(team)) {
        skipped++;
        this.logger.warn(`${team} listed twice in the ${poll.toUpperCase()} poll for ${season} — keeping the first`);
        return;
      }
      seen.add(team);

      const parse = classifyRank(row.cells[0]?.leadText);
      if (parse.kind === 'unparsable') {
        this.logger.warn(
          `Unreadable ${poll.toUpperCase()} rank "${parse.raw}" for ${team} in ${season} — recorded as missing`,
        );
      }
      entries.push({ team, rank: toRankValue(parse) });
    });

    return { entries, skipped };
  }
}

/**
 * Team label element first, then the first linked name after the rank
 * cell, then the second cell's text.
 */
function pollTeamName(row: RowSnapshot): string {
  if (row.teamLabel) return row.teamLabel;
  const linked = row.cells.slice(1).find((cell) => cell.linkText !== '');
  if (linked) return linked.linkText;
  return cleanTeamName(row.cells[1]?.text);
}
