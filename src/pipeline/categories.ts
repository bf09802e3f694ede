/**
 * categories.ts — Per-category scrape strategy, as data.
 *
 * Everything that differs between team stats, opponent stats and rankings
 * (page URL, default rendering mode, readiness hints, output file name) is
 * a row in CATEGORY_STRATEGIES.  Flipping a category to the browser path or
 * adding a new one is an edit here, not a new branch in the pipeline.
 */

import type {
  Category,
  FetchHints,
  RenderingMode,
  Season,
} from '../core/types';

export interface CategoryStrategy {
  /** Human label for logs and reports. */
  label: string;
  defaultMode: RenderingMode;
  /** File written under `<outputDir>/<season>/`. */
  fileName: string;
  /** Page for one season, relative to the configured base URL. */
  path(season: Season): string;
  hints: FetchHints;
}

const STATS_HINTS: FetchHints = {
  readySelector: 'div.ResponsiveTable table',
  loadMoreSelector: 'a.loadMore__link',
};

export const CATEGORY_STRATEGIES: Readonly<Record<Category, CategoryStrategy>> = {
  team_stats: {
    label: 'team stats',
    defaultMode: 'static',
    fileName: 'team_stats.csv',
    path: (season) => `/stats/team/_/season/${season}/seasontype/2`,
    hints: STATS_HINTS,
  },
  opponent_stats: {
    label: 'opponent stats',
    defaultMode: 'static',
    fileName: 'opponent_stats.csv',
    path: (season) => `/stats/team/_/view/opponent/season/${season}/seasontype/2`,
    hints: STATS_HINTS,
  },
  rankings: {
    label: 'rankings',
    defaultMode: 'rendered',
    fileName: 'rankings.csv',
    path: (season) => `/rankings/_/week/1/year/${season}/seasontype/2`,
    hints: {
      readySelector: 'section.Rankings div.tabs__content table',
    },
  },
};

/** Fixed processing order within a season. */
export const CATEGORY_ORDER: readonly Category[] = ['team_stats', 'opponent_stats', 'rankings'];

/**
 * The mode a job will use: the category default, unless rendering is forced
 * for every category.
 */
export function resolveMode(category: Category, forceRendered: boolean): RenderingMode {
  return forceRendered ? 'rendered' : CATEGORY_STRATEGIES[category].defaultMode;
}

export function categoryUrl(baseUrl: string, category: Category, season: Season): string {
  return `${baseUrl}${CATEGORY_STRATEGIES[category].path(season)}`;
}

/** CLI spelling (`team-stats`) → category (`team_stats`). */
export function parseCategory(value: string): Category | undefined {
  const normalized = value.trim().toLowerCase().replace(/-/g, '_');
  return CATEGORY_ORDER.find((category) => category === normalized);
}
