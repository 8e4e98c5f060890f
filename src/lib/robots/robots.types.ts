/**
 * Robots Types
 * Parsed robots.txt structures
 */

export interface RobotsGroup {
  /**
   * Lowercased user-agent tokens naming this group
   */
  userAgents: string[];
  allow: string[];
  disallow: string[];

  /**
   * Seconds between requests, null when not given
   */
  crawlDelay: number | null;
}

export interface RobotsRuleSet {
  groups: RobotsGroup[];
  sitemaps: string[];

  /**
   * Unknown directives, stray rules and unparseable values
   */
  warnings: string[];
}

export interface RobotsRule {
  type: 'allow' | 'disallow';
  pattern: string;
}

export interface RobotsVerdict {
  allowed: boolean;

  /**
   * The rule that decided the verdict, null when nothing matched
   */
  rule: RobotsRule | null;
}

/**
 * Robots state of one host as reported at the end of a run
 */
export interface HostRobotsSummary {
  host: string;
  robotsUrl: string;
  loaded: boolean;
  rules: RobotsRuleSet;
}
