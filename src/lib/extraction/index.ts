/**
 * Discovery Extraction
 * Main export file for page content extraction
 */

export * from './extraction.types';
export * from './endpoint-heuristics';
export * from './forms';
export * from './js-analyzer';
export * from './discovery-extractor';
