/**
 * Result Aggregator Tests
 */

import { ResultAggregator } from '../result-aggregator';
import { features, pageRecord, populatedAggregator, reportContext, searchForm, sessionForm } from './report-fixtures';

describe('ResultAggregator', () => {
  it('should freeze recorded pages', () => {
    const aggregator = new ResultAggregator('https://example.com/');
    const recorded = aggregator.recordPage(pageRecord({ title: 'Home' }));

    expect(Object.isFrozen(recorded)).toBe(true);
    expect(aggregator.getPages()).toEqual([recorded]);
  });

  it('should freeze nested data and keep it apart from the caller', () => {
    const aggregator = new ResultAggregator('https://example.com/');
    const input = pageRecord({ forms: [searchForm], links: ['https://example.com/a'], headers: { server: 'nginx' } });
    const recorded = aggregator.recordPage(input);

    expect(Object.isFrozen(recorded.forms)).toBe(true);
    expect(Object.isFrozen(recorded.forms[0].fields[0])).toBe(true);
    expect(Object.isFrozen(recorded.links)).toBe(true);
    expect(Object.isFrozen(recorded.headers)).toBe(true);
    expect(() => recorded.links.push('https://example.com/b')).toThrow(TypeError);

    input.links.push('https://example.com/c');
    input.headers.server = 'apache';
    expect(recorded.links).toEqual(['https://example.com/a']);
    expect(recorded.headers).toEqual({ server: 'nginx' });
    expect(Object.isFrozen(searchForm)).toBe(false);
  });

  describe('build', () => {
    const report = populatedAggregator().build(reportContext());

    it('should carry the frontier, throttle and breaker statistics', () => {
      expect(report.statistics.frontier).toEqual({ rejections: { duplicate: 0, depth: 0, budget: 0 }, budgetExhausted: false });
      expect(report.statistics.throttle.requestsPerHost).toEqual({ 'example.com': 2 });
      expect(report.statistics.circuitBreakers).toEqual({});
    });

    it('should summarize the run', () => {
      expect(report.summary).toEqual({
        baseUrl: 'https://example.com/',
        totalPages: 2,
        totalForms: 2,
        totalEndpoints: 3,
        totalJsFiles: 1,
        totalWebsocketUrls: 1,
        totalFailures: 0,
        totalDenials: 0,
        totalSubdomains: 0,
        totalGuessedEndpoints: 0,
        totalHiddenFiles: 2,
        crawlDepthReached: 2,
        startedAt: '1970-01-01T00:00:00.000Z',
        finishedAt: '1970-01-01T00:00:01.500Z',
        durationMs: 1500,
        cancelled: false,
        features,
        robots: { loadedHosts: [], overridden: false, hosts: [] },
      });
    });

    it('should deduplicate forms and group them by method', () => {
      expect(report.forms).toEqual({
        all: [searchForm, sessionForm],
        byMethod: { GET: [searchForm], POST: [sessionForm] },
      });
    });

    it('should group endpoints by type and by source', () => {
      const urls = (endpoints: Array<{ url: string }>) => endpoints.map((endpoint) => endpoint.url);

      expect(urls(report.apiEndpoints.all)).toEqual([
        'https://example.com/api/status',
        'https://example.com/api/users',
        '{param}/orders',
      ]);
      expect(urls(report.apiEndpoints.byType.api)).toEqual(['https://example.com/api/status', 'https://example.com/api/users']);
      expect(urls(report.apiEndpoints.byType.other)).toEqual(['{param}/orders']);
      expect(urls(report.apiEndpoints.bySource['js-dynamic'])).toEqual(['{param}/orders']);
      expect(report.apiEndpoints.bySource.network).toEqual([]);
    });

    it('should merge cookies and keep headers per page', () => {
      expect(report.cookies).toEqual({ session: 'b', theme: 'dark' });
      expect(report.headers).toEqual({
        'https://example.com/': { server: 'nginx' },
        'https://example.com/about': { server: 'nginx', 'x-powered-by': 'php' },
      });
    });

    it('should order hidden files by sensitivity', () => {
      expect(report.hiddenFiles.map((hit) => hit.path)).toEqual(['/.env', '/debug.log']);
    });
  });

  it('should report failures, denials and loaded robots hosts', () => {
    const aggregator = new ResultAggregator('https://example.com/');
    aggregator.recordFailure({ url: 'https://example.com/x', depth: 1, kind: 'network', message: 'refused', attempts: 1 });
    aggregator.recordDenial({ url: 'https://example.com/admin', host: 'example.com', rule: 'Disallow: /admin', overridden: false });
    aggregator.recordSubdomains([
      { host: 'www.example.com', method: 'dns', resolved: true, addresses: ['192.0.2.1'], queued: true },
    ]);
    aggregator.recordGuessedEndpoint({
      url: 'https://example.com/api',
      path: '/api',
      statusCode: 401,
      contentType: 'application/json',
    });

    const report = aggregator.build(
      reportContext({
        cancelled: true,
        robots: [
          {
            host: 'example.com',
            robotsUrl: 'https://example.com/robots.txt',
            loaded: true,
            rules: { groups: [], sitemaps: [], warnings: [] },
          },
          {
            host: 'www.example.com',
            robotsUrl: 'https://www.example.com/robots.txt',
            loaded: false,
            rules: { groups: [], sitemaps: [], warnings: [] },
          },
        ],
      })
    );

    expect(report.summary).toMatchObject({
      totalFailures: 1,
      totalDenials: 1,
      totalSubdomains: 1,
      totalGuessedEndpoints: 1,
      cancelled: true,
      crawlDepthReached: 0,
    });
    expect(report.summary.robots.loadedHosts).toEqual(['example.com']);
    expect(report.denials[0].rule).toBe('Disallow: /admin');
  });
});
