/**
 * args.ts — Command-line parsing for `scrape-all` and `scrape-category`.
 *
 * `node:util` parseArgs tokenises argv; a zod schema then checks the values
 * (integer years, start <= end, non-negative wait, at least one category)
 * and applies defaults relative to the current season.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { describeError } from '../core/errors';
import { CATEGORIES, type Category, type Season, type SeasonRange } from '../core/types';
import { CATEGORY_ORDER, parseCategory } from '../pipeline/categories';

/** Bad flags or values; the runners map it to exit code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface RunOptions {
  seasons: SeasonRange;
  categories: Category[];
  outputDir: string;
  forceRendered: boolean;
  pacingMs: number;
  logFile?: string;
}

export type ParsedCommand =
  | { kind: 'run'; options: RunOptions }
  | { kind: 'help'; text: string };

// ── Schema ─────────────────────────────────────────────────

const yearSchema = (flag: string) =>
  z
    .string()
    .regex(/^\d{4}$/, `${flag} must be a four-digit year`)
    .transform(Number);

const RunOptionsSchema = z
  .object({
    startYear: yearSchema('--start-year'),
    endYear: yearSchema('--end-year'),
    outputDir: z.string().min(1, '--output-dir must not be empty'),
    forceRendered: z.boolean(),
    waitTime: z
      .string()
      .regex(/^\d+(?:\.\d+)?$/, '--wait-time must be a non-negative number of seconds')
      .transform(Number),
    logFile: z.string().min(1).optional(),
    categories: z
      .array(z.enum(CATEGORIES))
      .min(1, 'every category is disabled; nothing to scrape'),
  })
  .refine((o) => o.startYear <= o.endYear, {
    message: '--start-year must not be after --end-year',
  })
  .transform(
    (o): RunOptions => ({
      seasons: { start: o.startYear, end: o.endYear },
      categories: o.categories,
      outputDir: o.outputDir,
      forceRendered: o.forceRendered,
      pacingMs: Math.round(o.waitTime * 1000),
      logFile: o.logFile,
    }),
  );

const COMMON_OPTIONS = {
  'start-year': { type: 'string' },
  'end-year': { type: 'string' },
  'output-dir': { type: 'string' },
  'use-selenium': { type: 'boolean' },
  'use-browser': { type: 'boolean' },
  'wait-time': { type: 'string' },
  'log-file': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

const SCRAPE_ALL_OPTIONS = {
  ...COMMON_OPTIONS,
  'no-team-stats': { type: 'boolean' },
  'no-opponent-stats': { type: 'boolean' },
  'no-rankings': { type: 'boolean' },
} as const;

const COMMON_HELP = [
  '  --start-year YEAR    first season (year the season ends)',
  '  --end-year YEAR      last season, inclusive (default: current season)',
  '  --output-dir PATH    where season folders are written (default: data)',
  '  --use-selenium       render every page in a headless browser (alias --use-browser)',
  '  --wait-time SECONDS  pause between requests (default: 2)',
  '  --log-file PATH      also append log lines to PATH',
];

export const SCRAPE_ALL_USAGE = [
  'Usage: scrape-all [options]',
  '',
  'Scrape team stats, opponent stats and rankings for a range of seasons.',
  '',
  ...COMMON_HELP,
  '  --no-team-stats      skip team stats',
  '  --no-opponent-stats  skip opponent stats',
  '  --no-rankings        skip rankings',
].join('\n');

export const SCRAPE_CATEGORY_USAGE = [
  'Usage: scrape-category <team-stats|opponent-stats|rankings> [options]',
  '',
  'Scrape one category for a range of seasons.',
  '',
  ...COMMON_HELP,
].join('\n');

// ── Parsers ────────────────────────────────────────────────

interface CommonValues {
  'start-year'?: string;
  'end-year'?: string;
  'output-dir'?: string;
  'use-selenium'?: boolean;
  'use-browser'?: boolean;
  'wait-time'?: string;
  'log-file'?: string;
}

/** `scrape-all`: seasons default to the last five plus the current one. */
export function parseScrapeAllArgs(argv: readonly string[], current: Season): ParsedCommand {
  const { values } = tokenize(() =>
    parseArgs({ args: [...argv], options: SCRAPE_ALL_OPTIONS, strict: true }),
  );
  if (values.help) return { kind: 'help', text: SCRAPE_ALL_USAGE };

  const categories = CATEGORY_ORDER.filter(
    (category) =>
      !(
        (category === 'team_stats' && values['no-team-stats']) ||
        (category === 'opponent_stats' && values['no-opponent-stats']) ||
        (category === 'rankings' && values['no-rankings'])
      ),
  );

  return { kind: 'run', options: validate(values, categories, current - 5, current) };
}

/** `scrape-category <name>`: seasons default to the previous and the current one. */
export function parseScrapeCategoryArgs(argv: readonly string[], current: Season): ParsedCommand {
  const { values, positionals } = tokenize(() =>
    parseArgs({
      args: [...argv],
      options: COMMON_OPTIONS,
      strict: true,
      allowPositionals: true,
    }),
  );
  if (values.help) return { kind: 'help', text: SCRAPE_CATEGORY_USAGE };

  if (positionals.length !== 1) {
    throw new UsageError('expected exactly one category: team-stats, opponent-stats or rankings');
  }
  const category = parseCategory(positionals[0]);
  if (!category) {
    throw new UsageError(
      `unknown category "${positionals[0]}" (expected team-stats, opponent-stats or rankings)`,
    );
  }

  return { kind: 'run', options: validate(values, [category], current - 1, current) };
}

function tokenize<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new UsageError(describeError(err));
  }
}

function validate(
  values: CommonValues,
  categories: Category[],
  defaultStart: Season,
  defaultEnd: Season,
): RunOptions {
  const result = RunOptionsSchema.safeParse({
    startYear: values['start-year'] ?? String(defaultStart),
    endYear: values['end-year'] ?? String(defaultEnd),
    outputDir: values['output-dir'] ?? 'data',
    forceRendered: Boolean(values['use-selenium'] || values['use-browser']),
    waitTime: values['wait-time'] ?? '2',
    logFile: values['log-file'],
    categories,
  });

  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}
