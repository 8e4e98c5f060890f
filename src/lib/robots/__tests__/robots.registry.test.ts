/**
 * Robots Registry Tests
 */

import { RobotsRegistry, RobotsRegistryOptions } from '../robots.registry';
import { createMemoryLogger, MemoryLogger } from '../../logging/crawl.logger';

const robotsUrl = 'https://example.com/robots.txt';

describe('RobotsRegistry', () => {
  let logger: MemoryLogger;

  const options = (overrides: Partial<RobotsRegistryOptions> = {}): RobotsRegistryOptions => ({
    respectRobots: true,
    overrideRobots: false,
    userAgent: 'ReconCrawlTest/1.0',
    logger,
    ...overrides,
  });

  beforeEach(() => {
    logger = createMemoryLogger();
  });

  it('should load robots.txt once per origin', async () => {
    const fetchRobots = jest.fn().mockResolvedValue({ status: 200, body: 'User-agent: *\nDisallow: /admin' });
    const registry = new RobotsRegistry(fetchRobots, options());

    const [first, second] = await Promise.all([
      registry.forUrl('https://example.com/a'),
      registry.forUrl('https://example.com/b?x=1'),
    ]);

    expect(first).toBe(second);
    expect(fetchRobots).toHaveBeenCalledTimes(1);
    expect(fetchRobots).toHaveBeenCalledWith(robotsUrl);
    expect(first.isAllowed('/admin', 'ReconCrawlTest/1.0')).toBe(false);
    expect(registry.getSummaries()).toEqual([
      {
        host: 'example.com',
        robotsUrl,
        loaded: true,
        rules: { groups: [{ userAgents: ['*'], allow: [], disallow: ['/admin'], crawlDelay: null }], sitemaps: [], warnings: [] },
      },
    ]);
    expect(logger.lines).toEqual([{ level: 'info', message: `🤖 Loaded ${robotsUrl} (1 group(s))` }]);
  });

  it('should keep origins with different ports apart', async () => {
    const fetchRobots = jest.fn().mockResolvedValue({ status: 404, body: '' });
    const registry = new RobotsRegistry(fetchRobots, options());

    await registry.forUrl('https://example.com/');
    await registry.forUrl('https://example.com:8443/');

    expect(fetchRobots.mock.calls).toEqual([[robotsUrl], ['https://example.com:8443/robots.txt']]);
  });

  it('should allow everything when robots.txt is missing', async () => {
    const registry = new RobotsRegistry(jest.fn().mockResolvedValue({ status: 404, body: 'Not Found' }), options());

    const policy = await registry.forUrl('https://example.com/');

    expect(policy.isAllowed('/anything', 'ReconCrawlTest/1.0')).toBe(true);
    expect(registry.getSummaries()[0].loaded).toBe(false);
    expect(logger.lines).toEqual([
      { level: 'warn', message: `robots.txt ${robotsUrl}: robots.txt returned 404, allowing everything` },
    ]);
  });

  it('should allow everything when robots.txt is unreachable', async () => {
    const registry = new RobotsRegistry(jest.fn().mockRejectedValue(new Error('connection refused')), options());

    const policy = await registry.forUrl('https://example.com/');

    expect(policy.isAllowed('/admin', 'ReconCrawlTest/1.0')).toBe(true);
    expect(logger.lines[0].message).toBe(
      `robots.txt ${robotsUrl}: robots.txt unreachable (connection refused), allowing everything`
    );
  });

  it('should never request robots.txt when robots are not respected', async () => {
    const fetchRobots = jest.fn();
    const registry = new RobotsRegistry(fetchRobots, options({ respectRobots: false }));

    const policy = await registry.forUrl('https://example.com/');

    expect(fetchRobots).not.toHaveBeenCalled();
    expect(policy.override).toBe(true);
  });

  it('should warn that override is inert when robots are not respected', async () => {
    const fetchRobots = jest.fn();
    const registry = new RobotsRegistry(fetchRobots, options({ respectRobots: false, overrideRobots: true }));

    await registry.forUrl('https://example.com/');

    expect(fetchRobots).not.toHaveBeenCalled();
    expect(logger.lines).toEqual([
      {
        level: 'warn',
        message: 'overrideRobots has no effect while respectRobots is off: robots.txt will not be loaded or logged',
      },
    ]);
  });

  it('should log every rule it will not enforce under override', async () => {
    const fetchRobots = jest.fn().mockResolvedValue({ status: 200, body: 'User-agent: *\nDisallow: /admin\nCrawl-delay: 1' });
    const registry = new RobotsRegistry(fetchRobots, options({ overrideRobots: true }));

    const policy = await registry.forUrl('https://example.com/');

    expect(policy.isAllowed('/admin', 'ReconCrawlTest/1.0')).toBe(true);
    expect(logger.lines.filter((line) => line.level === 'warn').map((line) => line.message)).toEqual([
      `robots.txt override, rule observed but not enforced: ${robotsUrl} [*] Disallow: /admin`,
      `robots.txt override, rule observed but not enforced: ${robotsUrl} [*] Crawl-delay: 1`,
    ]);
  });
});
