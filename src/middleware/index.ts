/**
 * middleware/index.ts — Barrel export for the fetch layer.
 */

export { createPageFetcher, SitePageFetcher } from './pageFetcher';
export type { PageFetcher, SitePageFetcherDeps } from './pageFetcher';
export { lightFetch } from './lightFetcher';
export type { LightFetchFn, LightFetchOptions, LightFetchResult } from './lightFetcher';
export { BrowserRenderedFetcher } from './renderedFetcher';
export type { RenderedBackend, RenderedFetchOptions, RenderedFetchResult } from './renderedFetcher';
export { ComplianceGate, isPaywallResponse, isSuccessStatus } from './compliance';
export type { ComplianceOptions } from './compliance';
