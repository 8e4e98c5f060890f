/**
 * Test Fixtures
 * Reusable test data
 */

import { CrawlerConfig, defaultCrawlerConfig } from '../../config/crawl.config';
import { createScopePolicy } from '../../lib/crawling/url-normalizer';
import { ScopePolicy } from '../../lib/crawling/crawling.types';

export const BASE = 'https://example.com';

export const testUserAgent = 'ReconCrawlTest/1.0';

/**
 * Config with no delays, no retry and no breaker
 */
export function testConfig(overrides: Partial<CrawlerConfig> = {}): CrawlerConfig {
  return {
    ...defaultCrawlerConfig(),
    maxDepth: 5,
    maxPages: 100,
    delayMs: 0,
    concurrency: 2,
    timeoutMs: 1000,
    maxDurationMs: 0,
    cancelGraceMs: 10,
    userAgent: testUserAgent,
    respectRobots: true,
    overrideRobots: false,
    retry: { enabled: false, backoffMs: 0 },
    circuitBreaker: { enabled: false, errorThresholdPercentage: 50, resetTimeout: 30000, minimumRequests: 5 },
    headers: {},
    cookies: {},
    verbose: false,
    ...overrides,
  };
}

export function testPolicy(
  seed: string = `${BASE}/`,
  overrides: { includeSubdomains?: boolean; maxDepth?: number; maxPages?: number } = {}
): ScopePolicy {
  return createScopePolicy(seed, {
    includeSubdomains: overrides.includeSubdomains ?? false,
    maxDepth: overrides.maxDepth ?? 5,
    maxPages: overrides.maxPages ?? 100,
  });
}

/**
 * Minimal HTML page linking to `hrefs`
 */
export function page(title: string, hrefs: string[] = [], extra: string = ''): string {
  const links = hrefs.map((href) => `<a href="${href}">${href}</a>`).join('\n    ');
  return `<!DOCTYPE html>
<html>
<head><title>${title}</title></head>
<body>
  <nav>
    ${links}
  </nav>
  ${extra}
</body>
</html>`;
}

export const loginPageHtml = `<!DOCTYPE html>
<html>
<head>
  <title>Sign in</title>
  <meta name="csrf-token" content="meta-token-123">
</head>
<body>
  <form action="/session" method="post">
    <input type="hidden" name="authenticity_token" value="form-token-456">
    <input type="text" name="username">
    <input type="password" name="password">
    <select name="role"><option>user</option></select>
    <textarea name="note"></textarea>
    <input type="submit" value="Sign in">
  </form>
  <form action="/search">
    <input type="text" name="q">
  </form>
</body>
</html>`;
