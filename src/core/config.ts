/**
 * config.ts — Environment-driven scraper configuration.
 *
 * Every knob that affects how hard we hit the source site (timeouts, spacing,
 * retry budget) lives here and is passed explicitly into the fetcher and the
 * season job.  Tests build a config with all delays set to zero.
 */

import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

export const ScraperConfigSchema = z.object({
  sourceBaseUrl: z
    .string()
    .url()
    .default('https://www.espn.com/mens-college-basketball')
    .transform((url) => url.replace(/\/+$/, '')),
  userAgent: z
    .string()
    .min(1)
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
        '(KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
    ),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  renderWaitMs: z.coerce.number().int().positive().default(10_000),
  rateLimitMs: z.coerce.number().int().nonnegative().default(1_000),
  maxAttempts: z.coerce.number().int().min(1).default(3),
  backoffBaseMs: z.coerce.number().int().nonnegative().default(1_000),
  respectRobots: booleanFromEnv.default('true'),
  chromeExecutablePath: z.string().min(1).optional(),
  loadMoreClicks: z.coerce.number().int().nonnegative().default(10),
});

export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;

/** Retry budget handed to SeasonJob. */
export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
}

/**
 * Build a ScraperConfig from environment variables.
 *
 * Throws a ZodError naming the offending variable when a value is malformed
 * (e.g. `MAX_ATTEMPTS=zero`).
 */
export function loadScraperConfig(
  env: NodeJS.ProcessEnv = process.env,
): ScraperConfig {
  return ScraperConfigSchema.parse({
    sourceBaseUrl: env.SOURCE_BASE_URL,
    userAgent: env.BOT_USER_AGENT,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    renderWaitMs: env.RENDER_WAIT_MS,
    rateLimitMs: env.RATE_LIMIT_MS,
    maxAttempts: env.MAX_ATTEMPTS,
    backoffBaseMs: env.BACKOFF_BASE_MS,
    respectRobots: env.RESPECT_ROBOTS?.toLowerCase(),
    chromeExecutablePath: env.CHROME_EXECUTABLE_PATH,
    loadMoreClicks: env.LOAD_MORE_CLICKS,
  });
}

export function retryPolicyFrom(config: ScraperConfig): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    backoffBaseMs: config.backoffBaseMs,
  };
}
