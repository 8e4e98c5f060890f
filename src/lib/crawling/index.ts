/**
 * Crawling System
 * Main export file for scoping, the frontier and the crawl scheduler
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './frontier';
export * from './host-throttle';
export * from './crawling-statistics';
export * from './crawl-scheduler';
