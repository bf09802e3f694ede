#!/usr/bin/env node
/**
 * scrapeCategory.ts — One category for a range of seasons.
 *
 *   scrape-category rankings --start-year 2021 --use-selenium
 */

import { parseScrapeCategoryArgs } from './args';
import { main } from './runner';

if (require.main === module) {
  main(parseScrapeCategoryArgs);
}
