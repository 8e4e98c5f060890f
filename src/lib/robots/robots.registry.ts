/**
 * Robots Registry
 * Loads each host's robots.txt once, on first use, and caches the policy
 */

import { CrawlLogger } from '../logging/crawl.logger';
import { RobotsPolicy } from './robots.policy';
import { HostRobotsSummary } from './robots.types';

/**
 * Fetch robots.txt for a host. Resolves with the body and status; rejects on
 * network failure.
 */
export type RobotsFetcher = (robotsUrl: string) => Promise<{ status: number; body: string }>;

export interface RobotsRegistryOptions {
  /**
   * When false, robots.txt is never requested and everything is allowed
   */
  respectRobots: boolean;

  /**
   * Parse and log rules but do not enforce them
   */
  overrideRobots: boolean;
  userAgent: string;
  logger: CrawlLogger;
}

interface HostEntry {
  robotsUrl: string;
  loaded: boolean;
  policy: RobotsPolicy;
}

export class RobotsRegistry {
  private entries: Map<string, Promise<HostEntry>> = new Map();
  private settled: Map<string, HostEntry> = new Map();

  constructor(
    private readonly fetchRobots: RobotsFetcher,
    private readonly options: RobotsRegistryOptions
  ) {
    if (!options.respectRobots && options.overrideRobots) {
      options.logger.warn('overrideRobots has no effect while respectRobots is off: robots.txt will not be loaded or logged');
    }
  }

  /**
   * Policy for the origin of `url`. Concurrent callers share one load.
   */
  async forUrl(url: string): Promise<RobotsPolicy> {
    const { protocol, host } = new URL(url);
    const key = `${protocol}//${host}`;

    let entry = this.entries.get(key);
    if (!entry) {
      entry = this.load(key);
      this.entries.set(key, entry);
    }

    return (await entry).policy;
  }

  /**
   * Per-host robots state for the report
   */
  getSummaries(): HostRobotsSummary[] {
    return Array.from(this.settled.entries()).map(([origin, entry]) => ({
      host: new URL(origin).host,
      robotsUrl: entry.robotsUrl,
      loaded: entry.loaded,
      rules: entry.policy.rules,
    }));
  }

  private async load(origin: string): Promise<HostEntry> {
    const robotsUrl = `${origin}/robots.txt`;
    const { overrideRobots, logger } = this.options;

    if (!this.options.respectRobots) {
      const entry = { robotsUrl, loaded: false, policy: RobotsPolicy.empty(undefined, true) };
      this.settled.set(origin, entry);
      return entry;
    }

    let policy: RobotsPolicy;
    let loaded = false;
    try {
      const response = await this.fetchRobots(robotsUrl);
      if (response.status >= 200 && response.status < 300) {
        policy = RobotsPolicy.build(response.body, overrideRobots);
        loaded = true;
      } else {
        policy = RobotsPolicy.empty(
          `robots.txt returned ${response.status}, allowing everything`,
          overrideRobots
        );
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      policy = RobotsPolicy.empty(
        `robots.txt unreachable (${message}), allowing everything`,
        overrideRobots
      );
    }

    for (const warning of policy.rules.warnings) {
      logger.warn(`robots.txt ${robotsUrl}: ${warning}`);
    }

    if (loaded) {
      logger.info(`🤖 Loaded ${robotsUrl} (${policy.rules.groups.length} group(s))`);
      if (overrideRobots) {
        for (const line of policy.describeRules()) {
          logger.warn(`robots.txt override, rule observed but not enforced: ${robotsUrl} ${line}`);
        }
      }
    }

    const entry = { robotsUrl, loaded, policy };
    this.settled.set(origin, entry);
    return entry;
  }
}
