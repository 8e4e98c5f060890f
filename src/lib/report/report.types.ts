/**
 * Report Types
 * Per-page records, per-URL failures and the final crawl report
 */

import { CircuitBreakerStats } from '../circuit-breaker/circuit-breaker.types';
import { CrawlingStatistics, FrontierRejection, TargetKind } from '../crawling/crawling.types';
import { HostThrottleStats } from '../crawling/host-throttle';
import { GuessedEndpointHit, HiddenFileHit, SubdomainCandidate } from '../discovery/discovery.types';
import { FetchFailureKind } from '../errors/crawl.errors';
import { EndpointSource, EndpointSpec, EndpointType, FormSpec } from '../extraction/extraction.types';
import { HostRobotsSummary } from '../robots/robots.types';

/**
 * One successfully fetched target. Frozen once recorded.
 */
export interface PageRecord {
  url: string;
  finalUrl: string;
  statusCode: number;
  contentType: string;
  title: string | null;
  forms: FormSpec[];
  links: string[];
  apiEndpoints: EndpointSpec[];
  jsFiles: string[];
  websocketUrls: string[];
  cookies: Record<string, string>;
  headers: Record<string, string>;
  depth: number;
  kind: TargetKind;

  /**
   * ISO timestamp
   */
  fetchedAt: string;
  durationMs: number;
  parseErrors: string[];
}

export interface FetchFailureRecord {
  url: string;
  depth: number;
  kind: FetchFailureKind;
  message: string;
  statusCode?: number;
  attempts: number;
}

/**
 * A target robots.txt disallows. With override on it is fetched anyway.
 */
export interface PolicyDenialRecord {
  url: string;
  host: string;

  /**
   * The matching rule, e.g. `Disallow: /admin`
   */
  rule: string | null;
  overridden: boolean;
}

export interface CrawlFeatureFlags {
  respectRobots: boolean;
  overrideRobots: boolean;
  includeSubdomains: boolean;
  jsRendering: boolean;
  jsAnalysis: boolean;
  subdomainEnumeration: boolean;
  endpointGuessing: boolean;
  hiddenFileScanning: boolean;
}

export interface CrawlSummary {
  baseUrl: string;
  totalPages: number;
  totalForms: number;
  totalEndpoints: number;
  totalJsFiles: number;
  totalWebsocketUrls: number;
  totalFailures: number;
  totalDenials: number;
  totalSubdomains: number;
  totalGuessedEndpoints: number;
  totalHiddenFiles: number;
  crawlDepthReached: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;

  /**
   * The run stopped early (interrupt or time budget); the report is partial
   */
  cancelled: boolean;
  features: CrawlFeatureFlags;
  robots: {
    loadedHosts: string[];
    overridden: boolean;
    hosts: HostRobotsSummary[];
  };
}

/**
 * Crawl counters plus the frontier, throttle and circuit breaker state at the end of the run
 */
export interface CrawlRunStatistics extends CrawlingStatistics {
  frontier: {
    rejections: Record<FrontierRejection, number>;
    budgetExhausted: boolean;
  };
  throttle: HostThrottleStats & {
    requestsPerHost: Record<string, number>;
  };
  circuitBreakers: Record<string, CircuitBreakerStats>;
}

export interface CrawlReport {
  summary: CrawlSummary;
  forms: {
    all: FormSpec[];
    byMethod: Record<string, FormSpec[]>;
  };
  apiEndpoints: {
    all: EndpointSpec[];
    byType: Record<EndpointType, EndpointSpec[]>;
    bySource: Record<EndpointSource, EndpointSpec[]>;
  };
  javascriptFiles: string[];
  websocketUrls: string[];

  /**
   * Cookies set across the crawl, last value wins
   */
  cookies: Record<string, string>;

  /**
   * Response headers per page URL
   */
  headers: Record<string, Record<string, string>>;
  pages: PageRecord[];
  failures: FetchFailureRecord[];
  denials: PolicyDenialRecord[];
  subdomains: SubdomainCandidate[];
  guessedEndpoints: GuessedEndpointHit[];
  hiddenFiles: HiddenFileHit[];
  statistics: CrawlRunStatistics;
}

/**
 * Writes a finished report somewhere
 */
export interface ReportSink {
  readonly format: 'json' | 'sqlite';
  write(report: CrawlReport, path: string): Promise<void>;
}
