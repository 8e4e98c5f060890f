/**
 * Endpoint Heuristics Tests
 */

import { classifyEndpoint, compileApiPatterns, isApiEndpoint, toMethodGuess } from '../endpoint-heuristics';

describe('isApiEndpoint', () => {
  const patterns = compileApiPatterns();

  it.each([
    ['https://example.com/api/users', true],
    ['https://example.com/API', true],
    ['https://example.com/v3/items?x=1', true],
    ['https://example.com/data.json', true],
    ['https://example.com/apiary', false],
    ['https://example.com/about', false],
    ['{param}/graphql', true],
  ])('should classify %s as %p', (url, expected) => {
    expect(isApiEndpoint(url, patterns)).toBe(expected);
  });

  it('should use custom patterns', () => {
    expect(isApiEndpoint('https://example.com/internal/rpc', compileApiPatterns(['/rpc$']))).toBe(true);
  });
});

describe('classifyEndpoint', () => {
  it('should pick the first matching group', () => {
    expect(classifyEndpoint('https://example.com/v1/api/x')).toBe('api');
    expect(classifyEndpoint('https://example.com/rest/orders')).toBe('rest');
    expect(classifyEndpoint('{param}/graphql')).toBe('graphql');
    expect(classifyEndpoint('https://example.com/v2/users')).toBe('versioned');
    expect(classifyEndpoint('https://example.com/data.json')).toBe('other');
  });
});

describe('toMethodGuess', () => {
  it('should map known methods and fall back to UNKNOWN', () => {
    expect(toMethodGuess('patch')).toBe('PATCH');
    expect(toMethodGuess('HEAD')).toBe('UNKNOWN');
    expect(toMethodGuess(null)).toBe('UNKNOWN');
  });
});
