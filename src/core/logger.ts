/**
 * logger.ts — Natural-language progress logger for the scraping pipeline.
 *
 * Messages read like "Fetched rankings for 2021 (2 teams)" and carry a
 * timestamp, level and module label so a long multi-season run can be
 * followed on the terminal or piped into a file.
 */

import { appendFileSync } from 'fs';
import { describeError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

// Process-wide sink settings shared by every Logger instance.
const minLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : 'info';
let logFilePath: string | null = null;

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('SeasonJob');
 *   logger.info('Fetched team_stats for 2023 (362 teams)');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Mirror every emitted line into `path` (appended), or stop mirroring
   * when called with `null`.  If the file cannot be written, one notice goes
   * to stderr and mirroring stops; console output carries on.
   */
  static setLogFile(path: string | null): void {
    logFilePath = path;
  }

  // ── Public API ─────────────────────────────────────────

  /** Selector waits, per-row drops, backoff timings. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page fetched, rows extracted, file written. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: unparsable rank, duplicate team. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure for one job: layout drift, exhausted retries, write error. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    // The message is for operators; the raw error keeps the stack for debugging.
    if (err !== undefined) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  /**
   * `[2026-02-10T18:30:00.000Z] [INFO ] [SeasonJob] Fetched rankings…`
   */
  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }

    if (logFilePath) {
      try {
        appendFileSync(logFilePath, `${line}\n`);
      } catch (err) {
        console.error(`Could not write log file ${logFilePath}: ${describeError(err)}; continuing without it`);
        logFilePath = null;
      }
    }
  }
}
