import { DateTime } from 'luxon';
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadScraperConfig, retryPolicyFrom } from '../core/config';
import { currentSeason, seasonLabel, seasonRange } from '../core/season';

describe('loadScraperConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadScraperConfig({});

    expect(config.sourceBaseUrl).toBe('https://www.espn.com/mens-college-basketball');
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.renderWaitMs).toBe(10_000);
    expect(config.rateLimitMs).toBe(1_000);
    expect(config.respectRobots).toBe(true);
    expect(config.chromeExecutablePath).toBeUndefined();
    expect(retryPolicyFrom(config)).toEqual({ maxAttempts: 3, backoffBaseMs: 1_000 });
  });

  it('coerces numeric strings and strips a trailing slash from the base URL', () => {
    const config = loadScraperConfig({
      SOURCE_BASE_URL: 'https://stats.test/mbb/',
      MAX_ATTEMPTS: '5',
      BACKOFF_BASE_MS: '0',
      RESPECT_ROBOTS: 'NO',
    });

    expect(config.sourceBaseUrl).toBe('https://stats.test/mbb');
    expect(config.maxAttempts).toBe(5);
    expect(config.backoffBaseMs).toBe(0);
    expect(config.respectRobots).toBe(false);
  });

  it('rejects malformed values', () => {
    expect(() => loadScraperConfig({ MAX_ATTEMPTS: '0' })).toThrow(ZodError);
    expect(() => loadScraperConfig({ RATE_LIMIT_MS: 'soon' })).toThrow(ZodError);
  });
});

describe('season utilities', () => {
  it('rolls over to the next season in November, Eastern time', () => {
    expect(currentSeason(DateTime.fromISO('2023-10-31T12:00:00', { zone: 'America/New_York' }))).toBe(2023);
    expect(currentSeason(DateTime.fromISO('2023-11-01T00:30:00', { zone: 'America/New_York' }))).toBe(2024);
    // 03:00 UTC on Nov 1 is still October 31 in New York.
    expect(currentSeason(DateTime.fromISO('2023-11-01T03:00:00Z', { zone: 'utc' }))).toBe(2023);
    expect(currentSeason(DateTime.fromISO('2024-03-15T12:00:00', { zone: 'America/New_York' }))).toBe(2024);
  });

  it('expands an inclusive range', () => {
    expect(seasonRange({ start: 2021, end: 2023 })).toEqual([2021, 2022, 2023]);
    expect(seasonRange({ start: 2024, end: 2024 })).toEqual([2024]);
  });

  it('rejects a reversed range', () => {
    expect(() => seasonRange({ start: 2024, end: 2023 })).toThrow(RangeError);
  });

  it('labels seasons by both calendar years', () => {
    expect(seasonLabel(2024)).toBe('2023-24');
    expect(seasonLabel(2000)).toBe('1999-00');
  });
});
