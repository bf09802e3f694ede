#!/usr/bin/env node
/**
 * scrapeAll.ts — Every category for a range of seasons.
 *
 *   scrape-all --start-year 2019 --end-year 2024 --output-dir data
 */

import { parseScrapeAllArgs } from './args';
import { main } from './runner';

if (require.main === module) {
  main(parseScrapeAllArgs);
}
