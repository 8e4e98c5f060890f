/**
 * Crawling Types
 * Type definitions for the crawl frontier, scoping and scheduling
 */

/**
 * What a queued target is fetched for
 */
export type TargetKind = 'page' | 'script' | 'subdomain' | 'guessed-endpoint' | 'hidden-file';

/**
 * A URL waiting to be fetched. Created on discovery, consumed once.
 */
export interface CrawlTarget {
  /**
   * Normalized absolute URL
   */
  readonly url: string;

  /**
   * Link distance from the seed (0 for the seed and auxiliary targets)
   */
  readonly depth: number;

  /**
   * URL of the page this target was discovered on
   */
  readonly origin: string | null;

  readonly kind: TargetKind;
}

/**
 * Immutable per-run scope
 */
export interface ScopePolicy {
  /**
   * Lowercased host of the seed URL
   */
  readonly baseHost: string;

  /**
   * Registrable domain of the seed host (the host itself for IPs and single labels)
   */
  readonly baseDomain: string;

  /**
   * Accept any host under baseDomain instead of baseHost only
   */
  readonly includeSubdomains: boolean;

  /**
   * Schemes without the trailing colon, e.g. ['http', 'https']
   */
  readonly allowedSchemes: readonly string[];

  readonly maxDepth: number;

  /**
   * Maximum number of targets the frontier accepts over the run
   */
  readonly maxPages: number;

  /**
   * Lowercase extensions with the leading dot, e.g. '.png'
   */
  readonly ignoredExtensions: readonly string[];

  /**
   * Query keys matching this pattern are dropped during normalization
   */
  readonly sessionParamPattern: RegExp;
}

export type RejectionReason = 'malformed' | 'scheme' | 'ignored-extension' | 'out-of-scope';

export type NormalizeResult =
  | { accepted: true; url: string }
  | { accepted: false; reason: RejectionReason; raw: string };

/**
 * Why the frontier refused a target
 */
export type FrontierRejection = 'duplicate' | 'depth' | 'budget';

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  /**
   * Number of targets fetched successfully
   */
  pagesVisited: number;

  /**
   * Number of targets whose fetch failed
   */
  pagesFailed: number;

  /**
   * Number of targets not fetched (robots denial, cancellation)
   */
  pagesSkipped: number;

  /**
   * Offers refused because the URL was already visited or pending
   */
  duplicatesSkipped: number;

  /**
   * Candidate URLs produced by extraction and auxiliary discovery
   */
  linksDiscovered: number;

  /**
   * Candidates dropped by the normalizer, keyed by reason
   */
  scopeRejections: Record<RejectionReason, number>;

  /**
   * Deepest depth of a successfully fetched target
   */
  maxDepthReached: number;

  /**
   * Mean fetch-plus-extract time per visited target in milliseconds
   */
  averagePageTime: number;

  /**
   * Visited / (visited + failed), 0 when nothing was attempted
   */
  successRate: number;

  /**
   * Total crawl time in milliseconds
   */
  totalTime: number;
}
