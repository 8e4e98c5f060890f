/**
 * Endpoint Guesser
 * Wordlist paths under the first page's directory, probed once per host
 */

import { normalizeUrl } from '../crawling/url-normalizer';
import { ScopePolicy } from '../crawling/crawling.types';

export interface ProbeCandidate {
  url: string;
  path: string;
}

export const GUESS_HIT_STATUSES: ReadonlySet<number> = new Set([200, 201, 204, 301, 302, 307, 308, 401, 403, 405]);

/**
 * Directory part of a page path: `/app/index.php` -> `/app/`
 */
export function baseDirectory(pathname: string): string {
  const cut = pathname.lastIndexOf('/');
  return cut >= 0 ? pathname.slice(0, cut + 1) : '/';
}

export class EndpointGuesser {
  constructor(private readonly wordlist: readonly string[]) {}

  candidates(firstPageUrl: string, policy: ScopePolicy): ProbeCandidate[] {
    const page = new URL(firstPageUrl);
    const base = `${page.origin}${baseDirectory(page.pathname)}`;
    const seen = new Set<string>();
    const result: ProbeCandidate[] = [];

    for (const entry of this.wordlist) {
      const path = entry.replace(/^\/+/, '');
      if (!path) continue;

      const normalized = normalizeUrl(path, base, policy, { checkExtension: false });
      if (!normalized.accepted || seen.has(normalized.url)) continue;

      seen.add(normalized.url);
      result.push({ url: normalized.url, path: new URL(normalized.url).pathname });
    }

    return result;
  }

  isHit(statusCode: number): boolean {
    return GUESS_HIT_STATUSES.has(statusCode);
  }
}
