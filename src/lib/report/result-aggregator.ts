/**
 * Result Aggregator
 * Accumulates page records and discovery artifacts into the crawl report
 */

import { GuessedEndpointHit, HiddenFileHit, SubdomainCandidate } from '../discovery/discovery.types';
import { classifyEndpoint } from '../extraction/endpoint-heuristics';
import { EndpointSource, EndpointSpec, EndpointType, FormSpec } from '../extraction/extraction.types';
import { HostRobotsSummary } from '../robots/robots.types';
import {
  CrawlFeatureFlags,
  CrawlReport,
  CrawlRunStatistics,
  FetchFailureRecord,
  PageRecord,
  PolicyDenialRecord,
} from './report.types';

export interface ReportContext {
  startedAt: number;
  finishedAt: number;
  cancelled: boolean;
  features: CrawlFeatureFlags;
  robots: HostRobotsSummary[];
  statistics: CrawlRunStatistics;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach((child: unknown) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

export class ResultAggregator {
  private pages: PageRecord[] = [];
  private forms: Map<string, FormSpec> = new Map();
  private endpoints: Map<string, EndpointSpec> = new Map();
  private jsFiles: Set<string> = new Set();
  private websocketUrls: Set<string> = new Set();
  private cookies: Record<string, string> = {};
  private headers: Record<string, Record<string, string>> = {};
  private failures: FetchFailureRecord[] = [];
  private denials: PolicyDenialRecord[] = [];
  private subdomains: SubdomainCandidate[] = [];
  private guessedEndpoints: Map<string, GuessedEndpointHit> = new Map();
  private hiddenFiles: Map<string, HiddenFileHit> = new Map();

  constructor(private readonly baseUrl: string) {}

  /**
   * Record a fetched page. A frozen copy is kept, nested arrays included, and
   * never changes afterwards.
   */
  recordPage(record: PageRecord): PageRecord {
    const frozen = deepFreeze(structuredClone(record));
    this.pages.push(frozen);

    for (const form of frozen.forms) {
      const key = `${form.method} ${form.action}`;
      if (!this.forms.has(key)) this.forms.set(key, form);
    }

    this.recordEndpoints(frozen.apiEndpoints);
    frozen.jsFiles.forEach((url) => this.jsFiles.add(url));
    frozen.websocketUrls.forEach((url) => this.websocketUrls.add(url));
    Object.assign(this.cookies, frozen.cookies);
    this.headers[frozen.url] = frozen.headers;

    return frozen;
  }

  recordEndpoints(endpoints: readonly EndpointSpec[]): void {
    for (const endpoint of endpoints) {
      const key = `${endpoint.source} ${endpoint.url}`;
      if (!this.endpoints.has(key)) this.endpoints.set(key, endpoint);
    }
  }

  recordFailure(failure: FetchFailureRecord): void {
    this.failures.push(failure);
  }

  recordDenial(denial: PolicyDenialRecord): void {
    this.denials.push(denial);
  }

  recordSubdomains(candidates: readonly SubdomainCandidate[]): void {
    this.subdomains.push(...candidates);
  }

  recordGuessedEndpoint(hit: GuessedEndpointHit): void {
    this.guessedEndpoints.set(hit.url, hit);
  }

  recordHiddenFile(hit: HiddenFileHit): void {
    this.hiddenFiles.set(hit.url, hit);
  }

  getPages(): readonly PageRecord[] {
    return this.pages;
  }

  getFailures(): readonly FetchFailureRecord[] {
    return this.failures;
  }

  getDenials(): readonly PolicyDenialRecord[] {
    return this.denials;
  }

  build(context: ReportContext): CrawlReport {
    const forms = Array.from(this.forms.values());
    const endpoints = Array.from(this.endpoints.values());
    const hiddenFiles = Array.from(this.hiddenFiles.values()).sort((a, b) => a.sensitivity - b.sensitivity);
    const guessedEndpoints = Array.from(this.guessedEndpoints.values());

    const byMethod: Record<string, FormSpec[]> = {};
    for (const form of forms) {
      (byMethod[form.method] = byMethod[form.method] || []).push(form);
    }

    const byType: Record<EndpointType, EndpointSpec[]> = { api: [], rest: [], graphql: [], versioned: [], other: [] };
    const bySource: Record<EndpointSource, EndpointSpec[]> = { html: [], 'js-static': [], 'js-dynamic': [], network: [] };
    for (const endpoint of endpoints) {
      byType[classifyEndpoint(endpoint.url)].push(endpoint);
      bySource[endpoint.source].push(endpoint);
    }

    const crawlDepthReached = this.pages.reduce((max, page) => Math.max(max, page.depth), 0);

    return {
      summary: {
        baseUrl: this.baseUrl,
        totalPages: this.pages.length,
        totalForms: forms.length,
        totalEndpoints: endpoints.length,
        totalJsFiles: this.jsFiles.size,
        totalWebsocketUrls: this.websocketUrls.size,
        totalFailures: this.failures.length,
        totalDenials: this.denials.length,
        totalSubdomains: this.subdomains.length,
        totalGuessedEndpoints: guessedEndpoints.length,
        totalHiddenFiles: hiddenFiles.length,
        crawlDepthReached,
        startedAt: new Date(context.startedAt).toISOString(),
        finishedAt: new Date(context.finishedAt).toISOString(),
        durationMs: context.finishedAt - context.startedAt,
        cancelled: context.cancelled,
        features: context.features,
        robots: {
          loadedHosts: context.robots.filter((entry) => entry.loaded).map((entry) => entry.host),
          overridden: context.features.overrideRobots,
          hosts: context.robots,
        },
      },
      forms: { all: forms, byMethod },
      apiEndpoints: { all: endpoints, byType, bySource },
      javascriptFiles: Array.from(this.jsFiles),
      websocketUrls: Array.from(this.websocketUrls),
      cookies: { ...this.cookies },
      headers: { ...this.headers },
      pages: [...this.pages],
      failures: [...this.failures],
      denials: [...this.denials],
      subdomains: [...this.subdomains],
      guessedEndpoints,
      hiddenFiles,
      statistics: context.statistics,
    };
  }
}
