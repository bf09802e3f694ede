/**
 * extractors/index.ts — One extractor instance per category.
 */

import type { Category, RowsByCategory } from '../core/types';
import type { BaseExtractor } from './baseExtractor';
import { RankingsExtractor } from './rankingsExtractor';
import { StatsTableExtractor } from './statsTableExtractor';

export type ExtractorRegistry = { [C in Category]: BaseExtractor<RowsByCategory[C]> };

export function createExtractors(): ExtractorRegistry {
  return {
    team_stats: new StatsTableExtractor('team_stats'),
    opponent_stats: new StatsTableExtractor('opponent_stats'),
    rankings: new RankingsExtractor(),
  };
}

export { BaseExtractor } from './baseExtractor';
export type { CellSnapshot, RowSnapshot, TableSnapshot } from './baseExtractor';
export { RankingsExtractor } from './rankingsExtractor';
export { StatsTableExtractor } from './statsTableExtractor';
