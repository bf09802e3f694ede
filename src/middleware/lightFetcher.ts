/**
 * lightFetcher.ts — Plain HTTP client for pages whose tables ship in the HTML.
 *
 * got-scraping sends a browser-grade header set (Accept, Accept-Language,
 * sec-ch-ua…) consistent with a desktop Chrome TLS fingerprint, which the
 * stats pages accept without a full browser.
 *
 * got-scraping v4 is ESM-only while this package compiles to CommonJS, so the
 * module is loaded with a dynamic `import()` on first use.
 */

import { Logger } from '../core/logger';

const logger = new Logger('LightFetcher');

type GotScrapingModule = typeof import('got-scraping');

let gotScrapingModule: Promise<GotScrapingModule> | null = null;

function getGotScraping(): Promise<GotScrapingModule> {
  if (!gotScrapingModule) {
    gotScrapingModule = import('got-scraping');
  }
  return gotScrapingModule;
}

export interface LightFetchOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface LightFetchResult {
  body: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
}

/** Signature shared by `lightFetch` and the stand-ins tests inject. */
export type LightFetchFn = (
  url: string,
  options?: LightFetchOptions,
) => Promise<LightFetchResult>;

/**
 * GET `url` and return the body whatever the status code; callers decide
 * which statuses count as failures.  Network errors and timeouts reject.
 */
export const lightFetch: LightFetchFn = async (url, options) => {
  logger.debug(`Light-fetching ${url}…`);

  const { gotScraping } = await getGotScraping();

  const response = await gotScraping({
    url,
    method: 'GET',
    headers: { ...options?.headers },
    timeout: { request: options?.timeoutMs ?? 30_000 },
    throwHttpErrors: false,
    followRedirect: true,
    headerGeneratorOptions: {
      browsers: [{ name: 'chrome', minVersion: 120 }],
      devices: ['desktop'],
      operatingSystems: ['macos', 'windows'],
    },
  });

  const statusCode = response.statusCode;
  logger.debug(`Light-fetch complete — HTTP ${statusCode} for ${url}`);

  return {
    body: typeof response.body === 'string' ? response.body : String(response.body),
    statusCode,
    headers: response.headers,
  };
};
