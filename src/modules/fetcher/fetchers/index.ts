/**
 * Fetcher exports and factory
 */

import { HttpFetcher } from './http.fetcher';
import { RenderingFetcher } from './rendering.fetcher';
import type { PageFetcher } from './types';

export * from './types';
export { HttpFetcher, parseSetCookie, serializeCookies } from './http.fetcher';
export { RenderingFetcher } from './rendering.fetcher';
export type { RenderingFetcherOptions } from './rendering.fetcher';

export interface FetcherSelection {
  useJsRendering: boolean;
  headless: boolean;
  renderSettleMs: number;
}

/**
 * Pick the page fetcher for a run: plain HTTP, or jsdom rendering on top of it
 */
export function createPageFetcher(selection: FetcherSelection, http: PageFetcher = new HttpFetcher()): PageFetcher {
  if (!selection.useJsRendering) {
    return http;
  }

  return new RenderingFetcher(http, {
    settleMs: selection.renderSettleMs,
    headless: selection.headless,
  });
}
