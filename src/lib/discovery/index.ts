/**
 * Auxiliary Discovery
 * Main export file for subdomain, endpoint and hidden-file discovery
 */

export * from './discovery.types';
export * from './dns.resolver';
export * from './wordlists';
export * from './subdomain-enumerator';
export * from './endpoint-guesser';
export * from './hidden-file-scanner';
