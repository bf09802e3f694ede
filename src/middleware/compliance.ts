/**
 * compliance.ts — "Good citizen" layer in front of every page fetch.
 *
 * 1. **robots.txt** — consult the site's crawl rules before fetching.
 * 2. **Per-host spacing** — a Bottleneck limiter per hostname with
 *    `maxConcurrent: 1` and `minTime = RATE_LIMIT_MS`, so consecutive calls
 *    to one host are always spaced out, whichever backend makes them.
 * 3. **HTTP 402** — "Pay-to-Crawl" answers are never retried.
 *
 * State (robots cache, limiters) belongs to one gate instance, so a batch run
 * and a test each get their own.
 */

import Bottleneck from 'bottleneck';
import robotsParser from 'robots-parser';
import { describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { LightFetchFn } from './lightFetcher';

const logger = new Logger('Compliance');

type RobotsRules = ReturnType<typeof robotsParser>;

export interface ComplianceOptions {
  userAgent: string;
  rateLimitMs: number;
  respectRobots: boolean;
  /** Used to download robots.txt. */
  fetchText: LightFetchFn;
  robotsTimeoutMs?: number;
}

// ─── Status helpers ─────────────────────────────────────────

/** HTTP 402 "Payment Required": a pay-to-crawl firewall. */
export function isPaywallResponse(statusCode: number): boolean {
  return statusCode === 402;
}

/** 2xx. */
export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return 'unknown';
  }
}

// ─── Gate ───────────────────────────────────────────────────

export class ComplianceGate {
  private readonly robotsCache = new Map<string, RobotsRules | null>();
  private readonly limiters = new Map<string, Bottleneck>();

  constructor(private readonly options: ComplianceOptions) {}

  /**
   * `true` if robots.txt allows `url` for our UA, or if checks are disabled,
   * or if robots.txt is unavailable (RFC 9309: treat as unrestricted).
   */
  async isAllowed(url: string): Promise<boolean> {
    if (!this.options.respectRobots) return true;

    let origin: string;
    let hostname: string;
    try {
      const parsed = new URL(url);
      origin = parsed.origin;
      hostname = parsed.hostname;
    } catch {
      return true;
    }

    let rules = this.robotsCache.get(hostname);
    if (rules === undefined) {
      rules = await this.loadRobots(origin, hostname);
      this.robotsCache.set(hostname, rules);
    }
    if (!rules) return true;

    const allowed = rules.isAllowed(url, this.options.userAgent) ?? true;
    if (!allowed) {
      logger.warn(`robots.txt disallows ${url} for UA "${this.options.userAgent}"`);
    }
    return allowed;
  }

  /** Run `task` in the hostname's queue, respecting the minimum spacing. */
  schedule<T>(url: string, task: () => Promise<T>): Promise<T> {
    return this.limiterFor(hostnameOf(url)).schedule(task);
  }

  /** Drop cached robots rules and stop every limiter. */
  async dispose(): Promise<void> {
    this.robotsCache.clear();
    const limiters = [...this.limiters.values()];
    this.limiters.clear();
    await Promise.all(limiters.map((limiter) => limiter.stop({ dropWaitingJobs: true })));
  }

  // ── Internals ──────────────────────────────────────────

  private limiterFor(hostname: string): Bottleneck {
    let limiter = this.limiters.get(hostname);
    if (!limiter) {
      limiter = new Bottleneck({
        maxConcurrent: 1,
        minTime: this.options.rateLimitMs,
      });
      this.limiters.set(hostname, limiter);
    }
    return limiter;
  }

  private async loadRobots(origin: string, hostname: string): Promise<RobotsRules | null> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const result = await this.schedule(robotsUrl, () =>
        this.options.fetchText(robotsUrl, {
          timeoutMs: this.options.robotsTimeoutMs ?? 5_000,
          headers: { 'user-agent': this.options.userAgent },
        }),
      );
      if (isSuccessStatus(result.statusCode)) {
        return robotsParser(robotsUrl, result.body);
      }
      logger.info(`No robots.txt for ${hostname} (HTTP ${result.statusCode}) — assuming allowed`);
    } catch (err) {
      logger.warn(
        `Could not fetch robots.txt for ${hostname} — assuming allowed: ${describeError(err)}`,
      );
    }
    return null;
  }
}
