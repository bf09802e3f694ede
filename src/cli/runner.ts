/**
 * runner.ts — Shared body of the two command-line entry points.
 *
 * Parses argv, wires the production pipeline (config → fetcher → SeasonJob →
 * BatchOrchestrator → CSV sink), prints the run report and returns the
 * process exit code:
 *
 *   0  every job succeeded (or was cancelled)
 *   1  at least one job failed
 *   2  usage or configuration error
 */

import { ZodError } from 'zod';
import { loadScraperConfig, retryPolicyFrom } from '../core/config';
import { Logger } from '../core/logger';
import { currentSeason } from '../core/season';
import type { RunSummary, Season } from '../core/types';
import { createExtractors } from '../extractors';
import { createPageFetcher } from '../middleware/pageFetcher';
import { BatchOrchestrator } from '../pipeline/batchOrchestrator';
import { SeasonJob } from '../pipeline/seasonJob';
import { CsvOutputSink } from '../storage/csvOutputSink';
import { UsageError, type ParsedCommand, type RunOptions } from './args';
import { formatRunReport } from './report';

const logger = new Logger('CLI');

export type ArgParser = (argv: readonly string[], current: Season) => ParsedCommand;

/** Runs the batch a parsed command describes. */
export type BatchExecutor = (options: RunOptions) => Promise<RunSummary>;

export async function runCli(
  parse: ArgParser,
  argv: readonly string[],
  execute: BatchExecutor = runBatch,
): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parse(argv, currentSeason());
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  if (command.kind === 'help') {
    console.log(command.text);
    return 0;
  }

  let summary: RunSummary;
  try {
    summary = await execute(command.options);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      console.error(`error: invalid configuration: ${issues.join('; ')}`);
      return 2;
    }
    throw err;
  }

  console.log(formatRunReport(summary));
  return summary.failed > 0 ? 1 : 0;
}

async function runBatch(options: RunOptions): Promise<RunSummary> {
  const config = loadScraperConfig();
  if (options.logFile) Logger.setLogFile(options.logFile);

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}; finishing the current job and skipping the rest`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  const fetcher = createPageFetcher(config);
  try {
    const job = new SeasonJob({
      fetcher,
      extractors: createExtractors(),
      baseUrl: config.sourceBaseUrl,
      retry: retryPolicyFrom(config),
      forceRendered: options.forceRendered,
      signal: controller.signal,
    });
    const orchestrator = new BatchOrchestrator(job, new CsvOutputSink(options.outputDir));

    return await orchestrator.run({
      seasons: options.seasons,
      categories: options.categories,
      pacingMs: options.pacingMs,
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', cancel);
    process.removeListener('SIGTERM', cancel);
    await fetcher.close();
    Logger.setLogFile(null);
  }
}

/** Run `parse`'s command for the current process and exit with its code. */
export function main(parse: ArgParser): void {
  runCli(parse, process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error('Scrape aborted by an unexpected error', err);
      process.exitCode = 1;
    });
}
