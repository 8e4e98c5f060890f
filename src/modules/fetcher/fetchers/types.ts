/**
 * Fetcher interface and shared types
 */

import type { ObservedRequest } from '../../../lib/extraction/extraction.types';

export interface FetchOptions {
  /**
   * Extra request headers (user agent, injected credentials)
   */
  headers: Record<string, string>;

  /**
   * Cookies sent with every request
   */
  cookies: Record<string, string>;
  timeoutMs: number;

  /**
   * Aborts the request; the fetch rejects with CancelledError
   */
  signal?: AbortSignal;

  /**
   * Follow redirects (default true). The crawl scheduler always passes false
   * and queues the Location itself.
   */
  followRedirects?: boolean;

  /**
   * Bodies are truncated beyond this size
   */
  maxBodyBytes?: number;
}

export interface FetchedContent {
  /**
   * Requested URL
   */
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  headers: Record<string, string>;
  cookies: Record<string, string>;
  body: string;

  /**
   * Requests the page issued while rendering (empty for plain HTTP)
   */
  observedRequests: ObservedRequest[];
  durationMs: number;
}

/**
 * Fetches one URL with GET. Rejects with NetworkError, TimeoutError or CancelledError.
 */
export interface PageFetcher {
  readonly name: string;
  fetch(url: string, options: FetchOptions): Promise<FetchedContent>;
  close?(): Promise<void>;
}
