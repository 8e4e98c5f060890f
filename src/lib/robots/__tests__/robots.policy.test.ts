/**
 * Robots Policy Tests
 */

import { RobotsPolicy, matchesPattern, parseRobotsTxt } from '../robots.policy';

const robotsTxt = [
  'User-agent: *',
  'Disallow: /admin',
  'Allow: /admin/public',
  'Disallow: /*.php$',
  'Crawl-delay: 2',
  '',
  'User-agent: ReconBot # our own agent',
  'Disallow: /private',
  'Crawl-delay: 5',
  '',
  'Sitemap: https://example.com/sitemap.xml',
  'Bogus line',
  'Foo: bar',
].join('\n');

const browserAgent = 'Mozilla/5.0 (compatible; OtherBot/2.0)';

describe('parseRobotsTxt', () => {
  it('should parse groups, sitemaps and warnings', () => {
    expect(parseRobotsTxt(robotsTxt)).toEqual({
      groups: [
        { userAgents: ['*'], allow: ['/admin/public'], disallow: ['/admin', '/*.php$'], crawlDelay: 2 },
        { userAgents: ['reconbot'], allow: [], disallow: ['/private'], crawlDelay: 5 },
      ],
      sitemaps: ['https://example.com/sitemap.xml'],
      warnings: ['Line 12: missing \':\' in "Bogus line"', 'Line 13: unknown directive "foo"'],
    });
  });

  it('should share one group between consecutive user-agent lines', () => {
    const rules = parseRobotsTxt('User-agent: a\nUser-agent: b\nDisallow: /x\nUser-agent: c\nDisallow: /y');
    expect(rules.groups.map((group) => group.userAgents)).toEqual([['a', 'b'], ['c']]);
  });

  it('should ignore an empty disallow', () => {
    const rules = parseRobotsTxt('User-agent: *\nDisallow:');
    expect(rules.groups[0].disallow).toEqual([]);
    expect(rules.warnings).toEqual([]);
  });

  it('should warn about rules outside any group and invalid delays', () => {
    const rules = parseRobotsTxt('Disallow: /x\nUser-agent: *\nCrawl-delay: soon');
    expect(rules.warnings).toEqual(['Line 1: disallow before any user-agent', 'Line 3: invalid crawl-delay "soon"']);
    expect(rules.groups[0].crawlDelay).toBeNull();
  });
});

describe('matchesPattern', () => {
  it('should treat * as a wildcard and $ as an end anchor', () => {
    expect(matchesPattern('/*.php$', '/dir/index.php')).toBe(true);
    expect(matchesPattern('/*.php$', '/index.php?x=1')).toBe(false);
    expect(matchesPattern('/a.b', '/a.b/c')).toBe(true);
    expect(matchesPattern('/a.b', '/axb')).toBe(false);
  });

  it('should match a prefix and treat a $ inside the pattern literally', () => {
    expect(matchesPattern('/private', '/private/keys')).toBe(true);
    expect(matchesPattern('/pri', '/pr')).toBe(false);
    expect(matchesPattern('/a$b', '/a$b/c')).toBe(true);
    expect(matchesPattern('/*', '/')).toBe(true);
  });

  it('should answer quickly for patterns with many wildcards', () => {
    const pattern = '/*a*a*a*a*a*a*a*a*a*a*a*a*b';
    const path = `/${'a'.repeat(40)}`;

    const started = Date.now();
    expect(matchesPattern(pattern, path)).toBe(false);
    expect(matchesPattern(pattern, `${path}b`)).toBe(true);
    expect(Date.now() - started).toBeLessThan(100);
  });
});

describe('RobotsPolicy', () => {
  const policy = RobotsPolicy.build(robotsTxt);

  it('should deny a path under a disallowed prefix', () => {
    expect(policy.evaluate('/admin/settings', browserAgent)).toEqual({
      allowed: false,
      rule: { type: 'disallow', pattern: '/admin' },
    });
  });

  it('should let the longest matching rule win', () => {
    expect(policy.evaluate('/admin/public/about', browserAgent)).toEqual({
      allowed: true,
      rule: { type: 'allow', pattern: '/admin/public' },
    });
  });

  it('should prefer disallow when allow and disallow are equally long', () => {
    const tie = RobotsPolicy.build('User-agent: *\nAllow: /page\nDisallow: /page');
    expect(tie.evaluate('/page', browserAgent).allowed).toBe(false);
  });

  it('should match wildcard patterns against path and query', () => {
    expect(policy.isAllowed('/index.php', browserAgent)).toBe(false);
    expect(policy.isAllowed('/index.php?x=1', browserAgent)).toBe(true);
  });

  it('should use the group naming the agent', () => {
    expect(policy.isAllowed('/admin', 'ReconBot/1.0')).toBe(true);
    expect(policy.isAllowed('/private/report', 'ReconBot/1.0')).toBe(false);
    expect(policy.crawlDelay('ReconBot/1.0')).toBe(5);
    expect(policy.crawlDelay(browserAgent)).toBe(2);
  });

  it('should always allow robots.txt itself', () => {
    const strict = RobotsPolicy.build('User-agent: *\nDisallow: /');
    expect(strict.isAllowed('/robots.txt', browserAgent)).toBe(true);
    expect(strict.isAllowed('/', browserAgent)).toBe(false);
  });

  it('should allow everything when no group applies', () => {
    const other = RobotsPolicy.build('User-agent: SomeoneElse\nDisallow: /');
    expect(other.evaluate('/', browserAgent)).toEqual({ allowed: true, rule: null });
    expect(RobotsPolicy.empty('missing').rules.warnings).toEqual(['missing']);
  });

  it('should report the verdict but allow everything under override', () => {
    const overridden = RobotsPolicy.build(robotsTxt, true);
    expect(overridden.evaluate('/admin', browserAgent).allowed).toBe(false);
    expect(overridden.isAllowed('/admin', browserAgent)).toBe(true);
  });

  it('should describe every rule', () => {
    expect(policy.describeRules()).toEqual([
      '[*] Disallow: /admin',
      '[*] Disallow: /*.php$',
      '[*] Allow: /admin/public',
      '[*] Crawl-delay: 2',
      '[reconbot] Disallow: /private',
      '[reconbot] Crawl-delay: 5',
    ]);
  });
});
