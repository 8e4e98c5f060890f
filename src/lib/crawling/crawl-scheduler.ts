/**
 * Crawl Scheduler
 * Drains the frontier with a bounded pool of workers. Each worker takes a
 * target, checks robots.txt, waits for the host's slot, fetches through the
 * host's circuit breaker, extracts, and offers what it found back to the
 * frontier. The run ends when the frontier is empty and no worker is busy.
 */

import { CrawlerConfig, validateSeedUrl } from '../../config/crawl.config';
import { FetchedContent, FetchOptions, PageFetcher } from '../../modules/fetcher/fetchers/types';
import { HostCircuitBreakers } from '../circuit-breaker';
import {
  DnsResolver,
  EndpointGuesser,
  HiddenFileScanner,
  SubdomainEnumerator,
  WordlistName,
  loadWordlist,
  sensitivityOf,
} from '../discovery';
import {
  CancelledError,
  FatalConfigError,
  RetryExhaustedError,
  UnexpectedStatusError,
  classifyFetchError,
  isSuccessStatus,
  withRetry,
} from '../errors/crawl.errors';
import { DiscoveryExtractor, DEFAULT_CSRF_FIELD_PATTERN, compileApiPatterns } from '../extraction';
import { CrawlLogger } from '../logging/crawl.logger';
import { CrawlFeatureFlags, CrawlReport, ResultAggregator } from '../report';
import { RobotsRegistry, RobotsPolicy } from '../robots';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { CrawlTarget, ScopePolicy, TargetKind } from './crawling.types';
import { Frontier } from './frontier';
import { HostThrottle, SleepFn, sleep } from './host-throttle';
import { hostKey, normalizeUrl } from './url-normalizer';

export interface CrawlSchedulerOptions {
  config: CrawlerConfig;

  /**
   * Fetches pages (plain HTTP or rendering)
   */
  fetcher: PageFetcher;

  /**
   * Fetches robots.txt, scripts and probes; defaults to `fetcher`
   */
  probeFetcher?: PageFetcher;
  dns: DnsResolver;
  logger: CrawlLogger;

  /**
   * Preloaded wordlists; missing ones are read from disk when needed
   */
  wordlists?: Partial<Record<WordlistName, string[]>>;
  clock?: () => number;
  sleep?: SleepFn;
}

/**
 * Wakes idle workers when new targets arrive or a busy worker finishes
 */
class WorkNotifier {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  wakeAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve());
  }
}

interface RunState {
  seed: string;
  policy: ScopePolicy;
  frontier: Frontier;
  statistics: CrawlingStatisticsTracker;
  aggregator: ResultAggregator;
  robots: RobotsRegistry;
  breakers: HostCircuitBreakers<FetchedContent>;
  notifier: WorkNotifier;

  /**
   * Aborts in-flight requests once the cancel grace period ends
   */
  requests: AbortController;
  graceTimer?: NodeJS.Timeout;

  /**
   * Clock reading at which the time budget runs out, null without one
   */
  deadline: number | null;
  inFlight: number;
  cancelled: boolean;
  probedHosts: Set<string>;
  guesser: EndpointGuesser | null;
  scanner: HiddenFileScanner | null;
}

const PAGE_KINDS: ReadonlySet<TargetKind> = new Set(['page', 'subdomain']);

/**
 * Redirects to the same normalized URL (`/docs` to `/docs/`) fetched in place
 */
const MAX_IN_PLACE_REDIRECTS = 2;

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

export class CrawlScheduler {
  private readonly throttle: HostThrottle;
  private readonly clock: () => number;
  private readonly sleep: SleepFn;

  constructor(private readonly options: CrawlSchedulerOptions) {
    this.clock = options.clock || Date.now;
    this.sleep = options.sleep || sleep;
    this.throttle = new HostThrottle(this.clock, this.sleep);
  }

  /**
   * Crawl from `seed` within `policy`. Resolves with the report, partial when
   * `signal` aborts or the time budget runs out. Rejects only with
   * FatalConfigError, before anything is fetched.
   */
  async run(seed: string, policy: ScopePolicy, signal?: AbortSignal): Promise<CrawlReport> {
    const { config, logger } = this.options;
    const startedAt = this.clock();

    const seedUrl = await this.preflight(seed, policy);
    const extractor = new DiscoveryExtractor({
      policy,
      apiPatterns: compileApiPatterns(config.apiPatterns),
      csrfFieldPattern: DEFAULT_CSRF_FIELD_PATTERN,
      htmlEndpoints: true,
      jsStaticAnalysis: !config.disableJsAnalysis,
      jsDynamicAnalysis: !config.disableJsAnalysis,
    });

    const requests = new AbortController();
    const state: RunState = {
      seed: seedUrl,
      policy,
      frontier: new Frontier(policy),
      statistics: new CrawlingStatisticsTracker(this.clock),
      aggregator: new ResultAggregator(seedUrl),
      robots: new RobotsRegistry((robotsUrl) => this.fetchRobots(robotsUrl, state), {
        respectRobots: config.respectRobots,
        overrideRobots: config.overrideRobots,
        userAgent: config.userAgent,
        logger,
      }),
      breakers: new HostCircuitBreakers<FetchedContent>(
        { ...config.circuitBreaker, monitoringPeriod: 60000 },
        logger
      ),
      notifier: new WorkNotifier(),
      requests,
      deadline: config.maxDurationMs > 0 ? startedAt + config.maxDurationMs : null,
      inFlight: 0,
      cancelled: false,
      probedHosts: new Set(),
      guesser: config.enableEndpointGuessing ? new EndpointGuesser(await this.wordlist('endpoints')) : null,
      scanner: config.enableHiddenFileScanning
        ? new HiddenFileScanner(await this.wordlist('hidden-files'), config.extraHiddenFiles)
        : null,
    };

    const onAbort = () => this.cancel(state, 'interrupted');
    if (signal?.aborted) {
      this.cancel(state, 'interrupted');
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    // Workers also check the deadline between targets; the timer covers a worker stuck in a fetch
    const budgetTimer = config.maxDurationMs > 0
      ? setTimeout(() => this.cancel(state, this.budgetReason()), config.maxDurationMs)
      : undefined;

    logger.info(`🕷️  Starting crawl of ${seedUrl} (depth ${policy.maxDepth}, pages ${policy.maxPages}, concurrency ${config.concurrency})`);

    try {
      this.offer(state, { url: seedUrl, depth: 0, origin: null, kind: 'page' });

      if (config.enableSubdomainEnumeration && !state.cancelled) {
        await this.enumerateSubdomains(state);
      }

      const workers = Array.from({ length: config.concurrency }, () => this.worker(state, extractor));
      await Promise.all(workers);
    } finally {
      clearTimeout(budgetTimer);
      clearTimeout(state.graceTimer);
      signal?.removeEventListener('abort', onAbort);
      state.breakers.shutdown();
    }

    while (state.frontier.next()) {
      state.statistics.recordSkipped();
    }

    const report = state.aggregator.build({
      startedAt,
      finishedAt: this.clock(),
      cancelled: state.cancelled,
      features: this.features(),
      robots: state.robots.getSummaries(),
      statistics: {
        ...state.statistics.getStatistics(),
        frontier: {
          rejections: state.frontier.getRejections(),
          budgetExhausted: state.frontier.isBudgetExhausted(),
        },
        throttle: {
          ...this.throttle.getStats(),
          requestsPerHost: this.throttle.getHostCounts(),
        },
        circuitBreakers: state.breakers.getStats(),
      },
    });

    logger.info(
      `✅ Crawl ${state.cancelled ? 'stopped' : 'completed'}: ${report.summary.totalPages} pages, ` +
        `${report.summary.totalFailures} failures, ${report.summary.totalDenials} robots denials`
    );
    return report;
  }

  /**
   * Fatal checks before any fetch: seed URL, scheme, scope and DNS
   */
  private async preflight(seed: string, policy: ScopePolicy): Promise<string> {
    const url = validateSeedUrl(seed);

    const normalized = normalizeUrl(url.href, url.href, policy, { checkExtension: false });
    if (!normalized.accepted) {
      throw new FatalConfigError(`Seed URL ${seed} rejected (${normalized.reason})`);
    }

    const hostname = url.hostname.replace(/^\[|\]$/g, '');
    try {
      await this.options.dns.lookup(hostname);
    } catch (error) {
      throw new FatalConfigError(`Seed host ${hostname} does not resolve`, { cause: error });
    }

    return normalized.url;
  }

  /**
   * Stop dequeuing; in-flight requests are aborted once the grace period ends
   */
  private cancel(state: RunState, reason: string): void {
    if (state.cancelled) return;

    const { config, logger } = this.options;
    state.cancelled = true;
    logger.warn(`Crawl cancelled (${reason}), waiting up to ${config.cancelGraceMs}ms for in-flight requests`);
    state.notifier.wakeAll();
    state.graceTimer = setTimeout(() => state.requests.abort(new CancelledError(state.seed)), config.cancelGraceMs);
  }

  private budgetReason(): string {
    return `time budget of ${this.options.config.maxDurationMs}ms reached`;
  }

  private async worker(state: RunState, extractor: DiscoveryExtractor): Promise<void> {
    while (!state.cancelled) {
      if (state.deadline !== null && this.clock() >= state.deadline) {
        this.cancel(state, this.budgetReason());
        break;
      }

      const target = state.frontier.next();
      if (!target) {
        if (state.inFlight === 0) {
          state.notifier.wakeAll();
          return;
        }
        await state.notifier.wait();
        continue;
      }

      // Claimed synchronously with next(): no other worker can fetch it
      state.frontier.markVisited(target.url);
      state.inFlight++;
      try {
        await this.process(state, target, extractor);
      } finally {
        state.inFlight--;
        state.notifier.wakeAll();
      }
    }
  }

  private async process(state: RunState, target: CrawlTarget, extractor: DiscoveryExtractor): Promise<void> {
    const { config, logger } = this.options;
    const host = hostKey(target.url);

    const robots = await state.robots.forUrl(target.url);
    if (!this.checkRobots(state, target, robots)) {
      state.statistics.recordSkipped();
      return;
    }

    const crawlDelay = robots.crawlDelay(config.userAgent);
    const delayMs = Math.max(config.delayMs, crawlDelay !== null ? crawlDelay * 1000 : 0);
    const isProbe = target.kind === 'guessed-endpoint' || target.kind === 'hidden-file';
    const fetcher = isProbe || target.kind === 'script' ? this.probeFetcher() : this.options.fetcher;
    const fetchOptions = this.fetchOptions(state);

    let content: FetchedContent;
    let attempts = 1;
    let requestUrl = target.url;
    try {
      for (let hop = 0; ; hop++) {
        const url = requestUrl;
        const outcome = await withRetry(
          async () => {
            await this.throttle.acquire(host, delayMs, state.requests.signal);
            const response = await state.breakers.execute(host, () => fetcher.fetch(url, fetchOptions));
            if (!isProbe && !isSuccessStatus(response.status)) {
              throw new UnexpectedStatusError(url, response.status);
            }
            return response;
          },
          {
            maxAttempts: config.retry.enabled ? 2 : 1,
            backoffMs: config.retry.backoffMs,
            sleep: (ms) => this.sleep(ms, state.requests.signal),
            onRetry: (failure) => logger.warn(`Retrying ${url} after ${failure.kind} failure: ${failure.message}`),
          }
        );
        content = outcome.value;
        attempts = outcome.attempts;

        const inPlace = !isProbe && hop < MAX_IN_PLACE_REDIRECTS ? this.inPlaceLocation(state, target, content, robots) : null;
        if (!inPlace) break;
        requestUrl = inPlace;
      }
    } catch (error) {
      const lastError = error instanceof RetryExhaustedError ? error.lastError : error;
      const failure = classifyFetchError(lastError);
      state.aggregator.recordFailure({
        url: target.url,
        depth: target.depth,
        kind: failure.kind,
        message: failure.message,
        statusCode: failure.statusCode,
        attempts: error instanceof RetryExhaustedError ? error.attempts : attempts,
      });
      state.statistics.recordFailed();
      logger.warn(`Fetch failed (${failure.kind}) ${target.url}: ${failure.message}`);
      return;
    }

    logger.debug(`Fetched ${target.url} (${content.status}, ${content.durationMs}ms, depth ${target.depth})`);

    if (!isProbe && isRedirect(content.status)) {
      this.recordRedirect(state, target, content);
      return;
    }

    if (target.kind === 'hidden-file') {
      this.recordHiddenFile(state, target, content);
      state.statistics.recordPageVisit(target.depth, content.durationMs);
      return;
    }

    if (target.kind === 'guessed-endpoint') {
      this.recordGuessedEndpoint(state, target, content);
      if (content.status < 200 || content.status >= 300) {
        state.statistics.recordPageVisit(target.depth, content.durationMs);
        return;
      }
    }

    this.recordPage(state, target, content, extractor);

    if (PAGE_KINDS.has(target.kind)) {
      this.scheduleProbes(state, target);
    }
  }

  /**
   * Returns false when the target must not be fetched. Denials are always
   * recorded; under override the fetch goes ahead and both facts are logged.
   */
  private checkRobots(state: RunState, target: CrawlTarget, robots: RobotsPolicy): boolean {
    const { userAgent } = this.options.config;
    const { pathname, search, host } = new URL(target.url);
    const verdict = robots.evaluate(`${pathname}${search}`, userAgent);
    if (verdict.allowed) {
      return true;
    }

    const rule = verdict.rule ? `${verdict.rule.type === 'allow' ? 'Allow' : 'Disallow'}: ${verdict.rule.pattern}` : null;
    state.aggregator.recordDenial({ url: target.url, host, rule, overridden: robots.override });

    if (robots.override) {
      this.options.logger.warn(`robots.txt override: fetching ${target.url} despite "${rule}"`);
      return true;
    }

    this.options.logger.info(`🚫 Denied by robots.txt: ${target.url} ("${rule}")`);
    return false;
  }

  private recordPage(state: RunState, target: CrawlTarget, content: FetchedContent, extractor: DiscoveryExtractor): void {
    const { logger, config } = this.options;
    const startedAt = this.clock();

    const result = extractor.extract({
      url: content.finalUrl,
      body: content.body,
      contentType: content.contentType,
      observedRequests: content.observedRequests,
    });

    for (const parseError of result.parseErrors) {
      logger.warn(`Parse failure on ${target.url}: ${parseError}`);
    }
    for (const rejected of result.rejected) {
      state.statistics.recordScopeRejection(rejected.reason);
    }

    state.aggregator.recordPage({
      url: target.url,
      finalUrl: content.finalUrl,
      statusCode: content.status,
      contentType: content.contentType,
      title: result.title,
      forms: result.forms,
      links: result.links,
      apiEndpoints: result.apiEndpoints,
      jsFiles: result.jsFiles,
      websocketUrls: result.websocketUrls,
      cookies: content.cookies,
      headers: content.headers,
      depth: target.depth,
      kind: target.kind,
      fetchedAt: new Date(this.clock()).toISOString(),
      durationMs: content.durationMs,
      parseErrors: result.parseErrors,
    });
    state.statistics.recordPageVisit(target.depth, content.durationMs + (this.clock() - startedAt));

    const depth = target.depth + 1;
    const candidates: CrawlTarget[] = result.links.map((url) => ({ url, depth, origin: target.url, kind: 'page' }));

    if (!config.disableJsAnalysis) {
      for (const jsFile of result.jsFiles) {
        const normalized = normalizeUrl(jsFile, content.finalUrl, state.policy, { checkExtension: false });
        if (normalized.accepted) {
          candidates.push({ url: normalized.url, depth, origin: target.url, kind: 'script' });
        } else {
          state.statistics.recordScopeRejection(normalized.reason);
        }
      }
    }

    for (const endpoint of result.apiEndpoints) {
      // Heuristic reconstructions are reported, never requested
      if (endpoint.source === 'js-dynamic' || endpoint.url.includes('{param}')) continue;

      const normalized = normalizeUrl(endpoint.url, content.finalUrl, state.policy);
      if (normalized.accepted) {
        candidates.push({ url: normalized.url, depth, origin: target.url, kind: 'page' });
      } else {
        state.statistics.recordScopeRejection(normalized.reason);
      }
    }

    state.statistics.recordLinkDiscovery(candidates.length);
    candidates.forEach((candidate) => this.offer(state, candidate));
  }

  /**
   * Absolute Location of a redirect that normalizes back to the target itself,
   * when robots.txt allows its exact path; null otherwise
   */
  private inPlaceLocation(state: RunState, target: CrawlTarget, content: FetchedContent, robots: RobotsPolicy): string | null {
    const location = content.headers['location'];
    if (!isRedirect(content.status) || !location) return null;

    const normalized = normalizeUrl(location, content.url, state.policy, { checkExtension: false });
    if (!normalized.accepted || normalized.url !== target.url) return null;

    const absolute = new URL(location, content.url);
    if (absolute.href === content.url || !robots.isAllowed(`${absolute.pathname}${absolute.search}`, this.options.config.userAgent)) {
      return null;
    }
    return absolute.href;
  }

  /**
   * Redirects are not followed inside a fetch: the 3xx is recorded and its
   * Location is offered as a new target at the same depth, so scope, robots
   * and the host throttle apply to it
   */
  private recordRedirect(state: RunState, target: CrawlTarget, content: FetchedContent): void {
    const { logger } = this.options;
    const location = content.headers['location'];

    let next: string | null = null;
    if (location) {
      const normalized = normalizeUrl(location, content.url, state.policy, { checkExtension: target.kind !== 'script' });
      if (normalized.accepted) {
        next = normalized.url;
      } else {
        state.statistics.recordScopeRejection(normalized.reason);
        logger.info(`↪️  Not following redirect ${target.url} -> ${location} (${normalized.reason})`);
      }
    }

    state.aggregator.recordPage({
      url: target.url,
      finalUrl: content.url,
      statusCode: content.status,
      contentType: content.contentType,
      title: null,
      forms: [],
      links: next ? [next] : [],
      apiEndpoints: [],
      jsFiles: [],
      websocketUrls: [],
      cookies: content.cookies,
      headers: content.headers,
      depth: target.depth,
      kind: target.kind,
      fetchedAt: new Date(this.clock()).toISOString(),
      durationMs: content.durationMs,
      parseErrors: [],
    });
    state.statistics.recordPageVisit(target.depth, content.durationMs);

    if (next) {
      state.statistics.recordLinkDiscovery(1);
      this.offer(state, { url: next, depth: target.depth, origin: target.url, kind: target.kind === 'script' ? 'script' : 'page' });
    }
  }

  private recordHiddenFile(state: RunState, target: CrawlTarget, content: FetchedContent): void {
    if (!state.scanner || !state.scanner.isHit(content.status)) return;

    const path = new URL(target.url).pathname;
    const sensitivity = sensitivityOf(path);
    state.aggregator.recordHiddenFile({
      url: target.url,
      path,
      statusCode: content.status,
      contentType: content.contentType,
      sensitivity,
    });
    this.options.logger.info(`🔐 Hidden file ${target.url} (${content.status}, sensitivity ${sensitivity})`);
  }

  private recordGuessedEndpoint(state: RunState, target: CrawlTarget, content: FetchedContent): void {
    if (!state.guesser || !state.guesser.isHit(content.status)) return;

    state.aggregator.recordGuessedEndpoint({
      url: target.url,
      path: new URL(target.url).pathname,
      statusCode: content.status,
      contentType: content.contentType,
    });
    this.options.logger.info(`🎯 Guessed endpoint ${target.url} (${content.status})`);
  }

  /**
   * Endpoint guesses and hidden-file probes, once per host, on its first page
   */
  private scheduleProbes(state: RunState, target: CrawlTarget): void {
    const host = hostKey(target.url);
    if (state.probedHosts.has(host) || (!state.guesser && !state.scanner)) return;
    state.probedHosts.add(host);

    const probes: CrawlTarget[] = [];
    if (state.guesser) {
      for (const candidate of state.guesser.candidates(target.url, state.policy)) {
        probes.push({ url: candidate.url, depth: 0, origin: target.url, kind: 'guessed-endpoint' });
      }
    }
    if (state.scanner) {
      for (const candidate of state.scanner.candidates(target.url, state.policy)) {
        probes.push({ url: candidate.url, depth: 0, origin: target.url, kind: 'hidden-file' });
      }
    }

    const accepted = probes.filter((probe) => this.offer(state, probe)).length;
    state.statistics.recordLinkDiscovery(probes.length);
    this.options.logger.debug(`Queued ${accepted}/${probes.length} probes for ${host}`);
  }

  private async enumerateSubdomains(state: RunState): Promise<void> {
    const { config, dns, logger } = this.options;
    const enumerator = new SubdomainEnumerator({
      methods: config.subdomainMethods,
      wordlist: await this.wordlist('subdomains'),
      resolver: dns,
      concurrency: config.dnsConcurrency,
      logger,
    });

    const { protocol } = new URL(state.seed);
    const candidates = await enumerator.enumerate(state.policy.baseDomain);

    for (const candidate of candidates) {
      const normalized = normalizeUrl(`${protocol}//${candidate.host}/`, state.seed, state.policy);
      if (!normalized.accepted) {
        state.statistics.recordScopeRejection(normalized.reason);
        continue;
      }
      candidate.queued = this.offer(state, { url: normalized.url, depth: 0, origin: null, kind: 'subdomain' });
    }

    state.statistics.recordLinkDiscovery(candidates.length);
    state.aggregator.recordSubdomains(candidates);
  }

  private offer(state: RunState, target: CrawlTarget): boolean {
    if (state.frontier.offer(target)) {
      state.notifier.wakeAll();
      return true;
    }
    if (state.frontier.isVisited(target.url) || state.frontier.isPending(target.url)) {
      state.statistics.recordDuplicate();
    }
    return false;
  }

  private async fetchRobots(robotsUrl: string, state: RunState): Promise<{ status: number; body: string }> {
    const { config } = this.options;
    await this.throttle.acquire(hostKey(robotsUrl), config.delayMs, state.requests.signal);
    const response = await this.probeFetcher().fetch(robotsUrl, this.fetchOptions(state));
    return { status: response.status, body: response.body };
  }

  /**
   * Redirects are never followed by the fetcher; see recordRedirect
   */
  private fetchOptions(state: RunState): FetchOptions {
    const { config } = this.options;
    return {
      headers: { 'User-Agent': config.userAgent, ...config.headers },
      cookies: config.cookies,
      timeoutMs: config.timeoutMs,
      signal: state.requests.signal,
      followRedirects: false,
      maxBodyBytes: config.maxBodyBytes,
    };
  }

  private probeFetcher(): PageFetcher {
    return this.options.probeFetcher || this.options.fetcher;
  }

  private async wordlist(name: WordlistName): Promise<string[]> {
    const preloaded = this.options.wordlists?.[name];
    if (preloaded) return preloaded;

    const { config } = this.options;
    const overridePath = name === 'subdomains' ? config.subdomainWordlist :
                         name === 'endpoints' ? config.endpointWordlist :
                         config.hiddenFileWordlist;
    try {
      return await loadWordlist(name, overridePath);
    } catch (error) {
      throw new FatalConfigError(`Cannot read ${name} wordlist`, { cause: error });
    }
  }

  private features(): CrawlFeatureFlags {
    const { config } = this.options;
    return {
      respectRobots: config.respectRobots,
      overrideRobots: config.overrideRobots,
      includeSubdomains: config.includeSubdomains,
      jsRendering: config.useJsRendering,
      jsAnalysis: !config.disableJsAnalysis,
      subdomainEnumeration: config.enableSubdomainEnumeration,
      endpointGuessing: config.enableEndpointGuessing,
      hiddenFileScanning: config.enableHiddenFileScanning,
    };
  }
}
