import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Limits
  CRAWLER_MAX_DEPTH: parseInt(process.env.CRAWLER_MAX_DEPTH || '5', 10),
  CRAWLER_MAX_PAGES: parseInt(process.env.CRAWLER_MAX_PAGES || '1000', 10),
  CRAWLER_MAX_DURATION_MS: parseInt(process.env.CRAWLER_MAX_DURATION_MS || '0', 10), // 0 = no time budget

  // Politeness
  CRAWLER_DELAY_MS: parseInt(process.env.CRAWLER_DELAY_MS || '1000', 10),
  CRAWLER_CONCURRENCY: parseInt(process.env.CRAWLER_CONCURRENCY || '5', 10),
  CRAWLER_RESPECT_ROBOTS: process.env.CRAWLER_RESPECT_ROBOTS !== 'false', // Default true
  CRAWLER_OVERRIDE_ROBOTS: process.env.CRAWLER_OVERRIDE_ROBOTS === 'true', // Default false

  // Requests
  CRAWLER_TIMEOUT_MS: parseInt(process.env.CRAWLER_TIMEOUT_MS || '30000', 10),
  CRAWLER_CANCEL_GRACE_MS: parseInt(process.env.CRAWLER_CANCEL_GRACE_MS || '5000', 10),
  CRAWLER_USER_AGENT: process.env.CRAWLER_USER_AGENT || 'Mozilla/5.0 (compatible; ReconCrawl/1.0; +authorized-testing)',
  CRAWLER_MAX_BODY_BYTES: parseInt(process.env.CRAWLER_MAX_BODY_BYTES || '5242880', 10), // 5 MB

  // Resilience
  CRAWLER_RETRY_ENABLED: process.env.CRAWLER_RETRY_ENABLED === 'true', // Default false
  CRAWLER_RETRY_BACKOFF_MS: parseInt(process.env.CRAWLER_RETRY_BACKOFF_MS || '2000', 10),
  CIRCUIT_BREAKER_ENABLED: process.env.CIRCUIT_BREAKER_ENABLED !== 'false', // Default true
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10), // 30 seconds
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),

  // Rendering (jsdom)
  RENDER_SETTLE_MS: parseInt(process.env.RENDER_SETTLE_MS || '250', 10),

  // Auxiliary discovery
  DNS_CONCURRENCY: parseInt(process.env.DNS_CONCURRENCY || '10', 10),

  // Output
  OUTPUT_FORMAT: process.env.OUTPUT_FORMAT || 'both',
  VERBOSE: process.env.VERBOSE === 'true',
} as const;

export default env;
