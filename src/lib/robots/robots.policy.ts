/**
 * Robots Policy
 * robots.txt parsing and allow/deny/crawl-delay queries
 */

import { RobotsGroup, RobotsRule, RobotsRuleSet, RobotsVerdict } from './robots.types';

/**
 * Parse robots.txt content into groups of rules.
 * Consecutive User-agent lines share one group; a rule line closes the agent list.
 */
export function parseRobotsTxt(content: string): RobotsRuleSet {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  const warnings: string[] = [];

  let current: RobotsGroup | null = null;
  let acceptingAgents = false;

  const lines = content.split(/\r\n|\r|\n/);
  lines.forEach((rawLine, index) => {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) {
      return;
    }

    const lineNo = index + 1;
    const colon = line.indexOf(':');
    if (colon === -1) {
      warnings.push(`Line ${lineNo}: missing ':' in "${line}"`);
      return;
    }

    const directive = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();

    switch (directive) {
      case 'user-agent': {
        if (!current || !acceptingAgents) {
          current = { userAgents: [], allow: [], disallow: [], crawlDelay: null };
          groups.push(current);
          acceptingAgents = true;
        }
        current.userAgents.push(value.toLowerCase());
        break;
      }

      case 'allow':
      case 'disallow': {
        if (!current) {
          warnings.push(`Line ${lineNo}: ${directive} before any user-agent`);
          return;
        }
        acceptingAgents = false;
        // An empty value is no rule
        if (value) {
          current[directive].push(value);
        }
        break;
      }

      case 'crawl-delay': {
        if (!current) {
          warnings.push(`Line ${lineNo}: crawl-delay before any user-agent`);
          return;
        }
        acceptingAgents = false;
        const delay = Number(value);
        if (!value || !Number.isFinite(delay) || delay < 0) {
          warnings.push(`Line ${lineNo}: invalid crawl-delay "${value}"`);
          return;
        }
        current.crawlDelay = delay;
        break;
      }

      case 'sitemap':
        if (value) {
          sitemaps.push(value);
        }
        break;

      default:
        warnings.push(`Line ${lineNo}: unknown directive "${directive}"`);
    }
  });

  return { groups, sitemaps, warnings };
}

/**
 * Match a robots path pattern (`*` wildcard, trailing `$` anchor) against the
 * start of `path`. Greedy scan with a single backtrack point, linear in the
 * number of stars times the path length.
 */
export function matchesPattern(pattern: string, path: string): boolean {
  const anchored = pattern.endsWith('$');
  const glob = anchored ? pattern.slice(0, -1) : `${pattern}*`;

  let p = 0;
  let s = 0;
  let star = -1;
  let resume = 0;

  while (s < path.length) {
    if (p < glob.length && glob[p] === '*') {
      star = p++;
      resume = s;
    } else if (p < glob.length && glob[p] === path[s]) {
      p++;
      s++;
    } else if (star !== -1) {
      p = star + 1;
      s = ++resume;
    } else {
      return false;
    }
  }

  while (p < glob.length && glob[p] === '*') {
    p++;
  }
  return p === glob.length;
}

export class RobotsPolicy {
  constructor(
    readonly rules: RobotsRuleSet,
    readonly override: boolean = false
  ) {}

  /**
   * Parse robots.txt content into a policy
   */
  static build(robotsTxt: string, override: boolean = false): RobotsPolicy {
    return new RobotsPolicy(parseRobotsTxt(robotsTxt), override);
  }

  /**
   * Allow-everything policy, used when robots.txt is missing or unreadable
   */
  static empty(warning?: string, override: boolean = false): RobotsPolicy {
    return new RobotsPolicy(
      { groups: [], sitemaps: [], warnings: warning ? [warning] : [] },
      override
    );
  }

  /**
   * Rules that apply to `userAgent`: groups naming the longest token found in
   * the agent string, merged; otherwise the `*` groups
   */
  selectGroup(userAgent: string): RobotsGroup | null {
    const agent = userAgent.toLowerCase();

    let bestToken = '';
    for (const group of this.rules.groups) {
      for (const token of group.userAgents) {
        if (token !== '*' && token.length > bestToken.length && agent.includes(token)) {
          bestToken = token;
        }
      }
    }

    const token = bestToken || '*';
    const matching = this.rules.groups.filter((group) => group.userAgents.includes(token));
    if (matching.length === 0) {
      return null;
    }

    const delays = matching
      .map((group) => group.crawlDelay)
      .filter((delay): delay is number => delay !== null);

    return {
      userAgents: [token],
      allow: matching.flatMap((group) => group.allow),
      disallow: matching.flatMap((group) => group.disallow),
      crawlDelay: delays.length > 0 ? Math.max(...delays) : null,
    };
  }

  /**
   * Enforced verdict for a path (path plus query). Longest matching pattern
   * wins; an Allow and a Disallow of equal length resolve to Disallow.
   */
  evaluate(path: string, userAgent: string): RobotsVerdict {
    if (path === '/robots.txt') {
      return { allowed: true, rule: null };
    }

    const group = this.selectGroup(userAgent);
    if (!group) {
      return { allowed: true, rule: null };
    }

    const candidates: RobotsRule[] = [
      ...group.allow.map((pattern): RobotsRule => ({ type: 'allow', pattern })),
      ...group.disallow.map((pattern): RobotsRule => ({ type: 'disallow', pattern })),
    ];

    let best: RobotsRule | null = null;
    for (const candidate of candidates) {
      if (!matchesPattern(candidate.pattern, path)) {
        continue;
      }
      if (
        !best ||
        candidate.pattern.length > best.pattern.length ||
        (candidate.pattern.length === best.pattern.length && candidate.type === 'disallow')
      ) {
        best = candidate;
      }
    }

    return { allowed: !best || best.type === 'allow', rule: best };
  }

  /**
   * True when the path may be fetched; always true under override
   */
  isAllowed(path: string, userAgent: string): boolean {
    return this.override || this.evaluate(path, userAgent).allowed;
  }

  /**
   * Crawl delay in seconds for `userAgent`, null when not set
   */
  crawlDelay(userAgent: string): number | null {
    const group = this.selectGroup(userAgent);
    return group ? group.crawlDelay : null;
  }

  /**
   * One line per rule, for logging
   */
  describeRules(): string[] {
    const lines: string[] = [];
    for (const group of this.rules.groups) {
      const agents = group.userAgents.join(', ');
      group.disallow.forEach((pattern) => lines.push(`[${agents}] Disallow: ${pattern}`));
      group.allow.forEach((pattern) => lines.push(`[${agents}] Allow: ${pattern}`));
      if (group.crawlDelay !== null) {
        lines.push(`[${agents}] Crawl-delay: ${group.crawlDelay}`);
      }
    }
    return lines;
  }
}
