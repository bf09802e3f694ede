/**
 * statNormalizer.ts — Turn scraped cell text into the stable row schema.
 *
 * The source pages vary in small ways between seasons: header spellings
 * (`3PM` vs `3FGM`), thousands separators, trailing `%` signs, dashes for
 * "no data", tie markers on poll ranks.  Everything that maps raw text onto
 * the canonical columns and value types goes through here, so extractors
 * never call `Number()` themselves.
 */

import { z } from 'zod';
import rawStatColumns from './stat-columns.json';
import {
  MISSING,
  STAT_COLUMNS,
  type RankValue,
  type StatColumn,
  type StatValue,
} from './types';

const StatColumnsFileSchema = z.object({
  aliases: z.record(z.enum(STAT_COLUMNS)),
});

const HEADER_ALIASES: Readonly<Record<string, StatColumn>> =
  StatColumnsFileSchema.parse(rawStatColumns).aliases;

// ── Headers ────────────────────────────────────────────────

/** Lowercase and strip whitespace: `" FG % "` → `"fg%"`. */
export function headerKey(header: string): string {
  return header.toLowerCase().replace(/\s+/g, '');
}

/** Canonical stat column for a page header, or `undefined` when unknown. */
export function canonicalStatColumn(header: string): StatColumn | undefined {
  return HEADER_ALIASES[headerKey(header)];
}

/**
 * Map each canonical stat column to the index of the page column that feeds
 * it.  The first header claiming a column wins; unknown headers are ignored.
 */
export function mapStatHeaders(
  headers: readonly string[],
): Map<StatColumn, number> {
  const mapping = new Map<StatColumn, number>();
  headers.forEach((header, index) => {
    const column = canonicalStatColumn(header);
    if (column && !mapping.has(column)) {
      mapping.set(column, index);
    }
  });
  return mapping;
}

// ── Values ─────────────────────────────────────────────────

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a stat cell.  Anything that is not a plain decimal number after
 * removing thousands separators and a trailing `%` is MISSING, never 0.
 *
 * @example parseStatNumber('1,234') // 1234
 * @example parseStatNumber('.452')  // 0.452
 * @example parseStatNumber('--')    // 'NA'
 */
export function parseStatNumber(text: string | undefined): StatValue {
  if (text === undefined) return MISSING;
  const cleaned = text.trim().replace(/,/g, '').replace(/%$/, '');
  if (!NUMBER_PATTERN.test(cleaned)) return MISSING;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : MISSING;
}

const UNRANKED_TOKENS = new Set(['', 'nr', 'ur', '-', '--', '—', '–', 'rv']);

export type RankParse =
  | { kind: 'ranked'; value: number }
  | { kind: 'unranked' }
  | { kind: 'unparsable'; raw: string };

/**
 * Classify a poll-rank cell.  Tie markers (`T-5`, `T5`) resolve to the
 * shared rank.
 */
export function classifyRank(text: string | undefined): RankParse {
  const cleaned = (text ?? '').trim();
  if (UNRANKED_TOKENS.has(cleaned.toLowerCase())) {
    return { kind: 'unranked' };
  }
  const match = /^(?:T-?)?(\d{1,3})\.?$/i.exec(cleaned);
  if (match) {
    const value = Number(match[1]);
    if (value > 0) return { kind: 'ranked', value };
  }
  return { kind: 'unparsable', raw: cleaned };
}

/** `classifyRank` collapsed onto the stored value type. */
export function toRankValue(parse: RankParse): RankValue {
  switch (parse.kind) {
    case 'ranked':
      return parse.value;
    case 'unranked':
      return null;
    case 'unparsable':
      return MISSING;
  }
}

// ── Team names ─────────────────────────────────────────────

/** Collapse internal whitespace and trim; an empty result means "no team". */
export function cleanTeamName(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}
