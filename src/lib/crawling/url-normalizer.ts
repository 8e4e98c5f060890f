/**
 * URL Normalization Utilities
 * Canonicalize candidate URLs and check them against the run's scope
 */

import { getDomain } from 'tldts';
import { NormalizeResult, ScopePolicy } from './crawling.types';

/**
 * Images, stylesheets, fonts, media and binaries
 */
export const DEFAULT_IGNORED_EXTENSIONS: readonly string[] = [
  '.jpg', '.jpeg', '.png', '.gif', '.ico', '.svg', '.webp', '.bmp', '.tiff',
  '.css', '.woff', '.woff2', '.ttf', '.otf', '.eot',
  '.mp4', '.mp3', '.avi', '.mov', '.webm', '.wav',
  '.pdf', '.exe', '.dmg',
];

export const DEFAULT_SESSION_PARAM_PATTERN =
  /^(sessionid|session_id|sid|phpsessid|jsessionid|token|auth_token|access_token)$/i;

export interface NormalizeOptions {
  /**
   * Apply the ignored-extension filter (default true). Probes for
   * hidden files turn it off so that `backup.zip`-style paths survive.
   */
  checkExtension?: boolean;
}

/**
 * Registrable domain of a host; IP literals and single-label hosts map to themselves
 */
export function registrableDomain(host: string): string {
  const lower = host.toLowerCase();
  return getDomain(lower) || lower;
}

export interface ScopePolicyOptions {
  includeSubdomains: boolean;
  maxDepth: number;
  maxPages: number;
  allowedSchemes?: readonly string[];
  ignoredExtensions?: readonly string[];
  sessionParamPattern?: RegExp;
}

/**
 * Build the run's scope from the seed URL
 */
export function createScopePolicy(seedUrl: string, options: ScopePolicyOptions): ScopePolicy {
  const seed = new URL(seedUrl);
  const baseHost = seed.hostname.toLowerCase();

  return Object.freeze({
    baseHost,
    baseDomain: registrableDomain(baseHost),
    includeSubdomains: options.includeSubdomains,
    allowedSchemes: options.allowedSchemes || ['http', 'https'],
    maxDepth: options.maxDepth,
    maxPages: options.maxPages,
    ignoredExtensions: (options.ignoredExtensions || DEFAULT_IGNORED_EXTENSIONS).map((ext) =>
      ext.toLowerCase()
    ),
    sessionParamPattern: options.sessionParamPattern || DEFAULT_SESSION_PARAM_PATTERN,
  });
}

/**
 * Exact host match, or any host under the registrable domain when subdomains are included
 */
export function isInScope(url: string | URL, policy: ScopePolicy): boolean {
  let hostname: string;
  try {
    hostname = (typeof url === 'string' ? new URL(url) : url).hostname.toLowerCase();
  } catch {
    return false;
  }

  if (!policy.includeSubdomains) {
    return hostname === policy.baseHost;
  }

  return hostname === policy.baseDomain || hostname.endsWith(`.${policy.baseDomain}`);
}

/**
 * Lowercase extension of the last path segment, including the dot
 */
export function pathExtension(pathname: string): string {
  const segment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  return dot > 0 ? segment.slice(dot).toLowerCase() : '';
}

/**
 * Normalize a URL against a base and the scope policy.
 * Idempotent: normalizing an accepted URL again yields the same string.
 */
export function normalizeUrl(
  raw: string,
  base: string | URL | undefined,
  policy: ScopePolicy,
  options: NormalizeOptions = {}
): NormalizeResult {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { accepted: false, reason: 'malformed', raw };
  }

  let urlObj: URL;
  try {
    urlObj = new URL(trimmed, base);
  } catch {
    return { accepted: false, reason: 'malformed', raw };
  }

  const scheme = urlObj.protocol.slice(0, -1).toLowerCase();
  if (!policy.allowedSchemes.includes(scheme)) {
    return { accepted: false, reason: 'scheme', raw };
  }

  // Remove fragment
  urlObj.hash = '';

  // Drop session-like keys, keep the first value of repeated keys, sort by key
  const seen = new Map<string, string>();
  for (const [key, value] of urlObj.searchParams) {
    if (policy.sessionParamPattern.test(key) || seen.has(key)) {
      continue;
    }
    seen.set(key, value);
  }
  const params = new URLSearchParams(
    Array.from(seen.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
  urlObj.search = params.toString();

  // Remove trailing slashes (except for root)
  if (urlObj.pathname.length > 1 && urlObj.pathname.endsWith('/')) {
    urlObj.pathname = urlObj.pathname.replace(/\/+$/, '') || '/';
  }

  // Normalize hostname (lowercase); default ports are dropped by URL itself
  urlObj.hostname = urlObj.hostname.toLowerCase();

  if (options.checkExtension !== false) {
    const extension = pathExtension(urlObj.pathname);
    if (extension && policy.ignoredExtensions.includes(extension)) {
      return { accepted: false, reason: 'ignored-extension', raw };
    }
  }

  if (!isInScope(urlObj, policy)) {
    return { accepted: false, reason: 'out-of-scope', raw };
  }

  return { accepted: true, url: urlObj.href };
}

/**
 * `host[:port]` of a URL, used as the per-host key
 */
export function hostKey(url: string): string {
  return new URL(url).host.toLowerCase();
}
