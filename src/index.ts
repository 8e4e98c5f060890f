/**
 * recon-crawl library entry point
 */

export * from './config/crawl.config';
export * from './lib/crawling';
export * from './lib/robots';
export * from './lib/extraction';
export * from './lib/discovery';
export * from './lib/circuit-breaker';
export * from './lib/report';
export * from './lib/errors/crawl.errors';
export * from './lib/logging/crawl.logger';
export * from './modules/fetcher/fetchers';
