/**
 * Endpoint Heuristics
 * Path patterns that mark a URL as an API endpoint, and endpoint grouping
 */

import { EndpointType, HttpMethodGuess } from './extraction.types';

export const DEFAULT_API_PATTERN_SOURCES: readonly string[] = [
  '/api(/|$)',
  '/rest(/|$)',
  '/graphql(/|$)',
  '/v\\d+(/|$)',
  '\\.json$',
];

/**
 * Compile heuristic sources (case-insensitive, tested against the path)
 */
export function compileApiPatterns(sources: readonly string[] = DEFAULT_API_PATTERN_SOURCES): RegExp[] {
  return sources.map((source) => new RegExp(source, 'i'));
}

/**
 * Path of a URL or of a path-like string, without query or fragment.
 * Strings that do not parse (e.g. with `{param}` placeholders) are cut by hand.
 */
function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, '').split(/[?#]/)[0];
  }
}

export function isApiEndpoint(url: string, patterns: RegExp[]): boolean {
  const path = pathOf(url);
  return patterns.some((pattern) => pattern.test(path));
}

/**
 * Report grouping; the first matching group wins
 */
export function classifyEndpoint(url: string): EndpointType {
  const path = pathOf(url).toLowerCase();

  if (/\/api(\/|$)/.test(path)) return 'api';
  if (/\/rest(\/|$)/.test(path)) return 'rest';
  if (/\/graphql(\/|$)/.test(path)) return 'graphql';
  if (/\/v\d+(\/|$)/.test(path)) return 'versioned';
  return 'other';
}

const KNOWN_METHODS: readonly HttpMethodGuess[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export function toMethodGuess(method: string | undefined | null): HttpMethodGuess {
  const upper = (method || '').toUpperCase();
  const known = KNOWN_METHODS.find((candidate) => candidate === upper);
  return known || 'UNKNOWN';
}
