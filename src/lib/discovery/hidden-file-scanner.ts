/**
 * Hidden File Scanner
 * Sensitive paths probed at each host root. Presence is decided by status
 * code alone; bodies are never inspected.
 */

import { normalizeUrl } from '../crawling/url-normalizer';
import { ScopePolicy } from '../crawling/crawling.types';
import { ProbeCandidate } from './endpoint-guesser';
import { SensitivityLevel } from './discovery.types';

const WILDCARD_BASES = ['index.php', 'index.html'];

const SENSITIVITY_RULES: ReadonlyArray<[RegExp, SensitivityLevel]> = [
  [/\.env|\.git|\.ssh/i, 1],
  [/config\.php|wp-config/i, 2],
  [/backup/i, 3],
  [/\.log|\.bak|\.old/i, 4],
];

export function sensitivityOf(path: string): SensitivityLevel {
  for (const [pattern, level] of SENSITIVITY_RULES) {
    if (pattern.test(path)) {
      return level;
    }
  }
  return 5;
}

/**
 * Last path segment when it looks like a file name
 */
function pageFileName(pathname: string): string | null {
  const segment = pathname.slice(pathname.lastIndexOf('/') + 1);
  return segment.includes('.') ? segment : null;
}

export class HiddenFileScanner {
  private readonly entries: string[];

  constructor(wordlist: readonly string[], extraPaths: readonly string[] = []) {
    this.entries = Array.from(new Set([...wordlist, ...extraPaths].map((entry) => entry.trim()).filter(Boolean)));
  }

  /**
   * Expand `*` entries (`*.bak`, `*~`) against the first page's file name
   * and the usual index files
   */
  expand(firstPageUrl: string): string[] {
    const fileName = pageFileName(new URL(firstPageUrl).pathname);
    const bases = Array.from(new Set(fileName ? [fileName, ...WILDCARD_BASES] : WILDCARD_BASES));

    const paths: string[] = [];
    for (const entry of this.entries) {
      const path = entry.replace(/^\/+/, '');
      if (path.startsWith('*')) {
        const suffix = path.slice(1);
        paths.push(...bases.map((base) => `${base}${suffix}`));
      } else if (path) {
        paths.push(path);
      }
    }
    return Array.from(new Set(paths));
  }

  candidates(firstPageUrl: string, policy: ScopePolicy): ProbeCandidate[] {
    const root = `${new URL(firstPageUrl).origin}/`;
    const seen = new Set<string>();
    const result: ProbeCandidate[] = [];

    for (const path of this.expand(firstPageUrl)) {
      const normalized = normalizeUrl(path, root, policy, { checkExtension: false });
      if (!normalized.accepted || seen.has(normalized.url)) continue;

      seen.add(normalized.url);
      result.push({ url: normalized.url, path: `/${path}` });
    }
    return result;
  }

  /**
   * Anything but a 404 or a redirect counts as present
   */
  isHit(statusCode: number): boolean {
    return statusCode !== 404 && !(statusCode >= 300 && statusCode < 400);
  }
}
