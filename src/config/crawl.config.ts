/**
 * Crawler Configuration
 * Defaults come from the environment; a JSON config file and CLI flags
 * override them in that order
 */

import { promises as fs } from 'fs';
import { env } from './env';
import { FatalConfigError } from '../lib/errors/crawl.errors';
import { SUBDOMAIN_METHODS, SubdomainMethod } from '../lib/discovery/discovery.types';
import { OUTPUT_FORMATS, OutputFormat } from '../lib/report';

export interface CrawlerConfig {
  maxDepth: number;
  maxPages: number;

  /**
   * Minimum milliseconds between requests to one host
   */
  delayMs: number;
  concurrency: number;
  timeoutMs: number;

  /**
   * Time budget for the whole run, 0 for none
   */
  maxDurationMs: number;

  /**
   * How long in-flight fetches may finish after cancellation
   */
  cancelGraceMs: number;
  userAgent: string;
  maxBodyBytes: number;

  respectRobots: boolean;
  overrideRobots: boolean;
  includeSubdomains: boolean;

  useJsRendering: boolean;
  headless: boolean;
  renderSettleMs: number;

  disableJsAnalysis: boolean;
  enableSubdomainEnumeration: boolean;
  enableEndpointGuessing: boolean;
  enableHiddenFileScanning: boolean;
  subdomainMethods: SubdomainMethod[];
  subdomainWordlist: string | null;
  endpointWordlist: string | null;
  hiddenFileWordlist: string | null;

  /**
   * Paths probed in addition to the hidden-file wordlist
   */
  extraHiddenFiles: string[];
  dnsConcurrency: number;

  /**
   * Path regexes marking API endpoints
   */
  apiPatterns: string[];

  retry: {
    enabled: boolean;
    backoffMs: number;
  };

  circuitBreaker: {
    enabled: boolean;
    errorThresholdPercentage: number;
    resetTimeout: number;
    minimumRequests: number;
  };

  /**
   * Pre-supplied request headers and cookies (e.g. an authorized session)
   */
  headers: Record<string, string>;
  cookies: Record<string, string>;

  outputFormat: OutputFormat;
  outputFile: string;
  verbose: boolean;
}

/**
 * Partial configuration as given by a config file or CLI flags
 */
export type CrawlerConfigOverrides = Partial<Omit<CrawlerConfig, 'retry' | 'circuitBreaker'>> & {
  retry?: Partial<CrawlerConfig['retry']>;
  circuitBreaker?: Partial<CrawlerConfig['circuitBreaker']>;
};

export const DEFAULT_API_PATTERNS: readonly string[] = ['/api(/|$)', '/rest(/|$)', '/graphql(/|$)', '/v\\d+(/|$)', '\\.json$'];

export function defaultCrawlerConfig(): CrawlerConfig {
  return {
    maxDepth: env.CRAWLER_MAX_DEPTH,
    maxPages: env.CRAWLER_MAX_PAGES,
    delayMs: env.CRAWLER_DELAY_MS,
    concurrency: env.CRAWLER_CONCURRENCY,
    timeoutMs: env.CRAWLER_TIMEOUT_MS,
    maxDurationMs: env.CRAWLER_MAX_DURATION_MS,
    cancelGraceMs: env.CRAWLER_CANCEL_GRACE_MS,
    userAgent: env.CRAWLER_USER_AGENT,
    maxBodyBytes: env.CRAWLER_MAX_BODY_BYTES,
    respectRobots: env.CRAWLER_RESPECT_ROBOTS,
    overrideRobots: env.CRAWLER_OVERRIDE_ROBOTS,
    includeSubdomains: false,
    useJsRendering: false,
    headless: true,
    renderSettleMs: env.RENDER_SETTLE_MS,
    disableJsAnalysis: false,
    enableSubdomainEnumeration: false,
    enableEndpointGuessing: false,
    enableHiddenFileScanning: false,
    subdomainMethods: ['dns', 'wordlist'],
    subdomainWordlist: null,
    endpointWordlist: null,
    hiddenFileWordlist: null,
    extraHiddenFiles: [],
    dnsConcurrency: env.DNS_CONCURRENCY,
    apiPatterns: [...DEFAULT_API_PATTERNS],
    retry: {
      enabled: env.CRAWLER_RETRY_ENABLED,
      backoffMs: env.CRAWLER_RETRY_BACKOFF_MS,
    },
    circuitBreaker: {
      enabled: env.CIRCUIT_BREAKER_ENABLED,
      errorThresholdPercentage: env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      resetTimeout: env.CIRCUIT_BREAKER_RESET_TIMEOUT,
      minimumRequests: env.CIRCUIT_BREAKER_MIN_REQUESTS,
    },
    headers: {},
    cookies: {},
    outputFormat: isOutputFormat(env.OUTPUT_FORMAT) ? env.OUTPUT_FORMAT : 'both',
    outputFile: 'crawl_report',
    verbose: env.VERBOSE,
  };
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

function isSubdomainMethod(value: unknown): value is SubdomainMethod {
  return typeof value === 'string' && SUBDOMAIN_METHODS.some((method) => method === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON config file. Keys are the CrawlerConfig field names.
 */
export async function loadConfigFile(filePath: string): Promise<CrawlerConfigOverrides> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FatalConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FatalConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new FatalConfigError(`Config file ${filePath} must contain a JSON object`);
  }

  return parseOverrides(parsed, filePath);
}

const NUMBER_KEYS = [
  'maxDepth', 'maxPages', 'delayMs', 'concurrency', 'timeoutMs', 'maxDurationMs',
  'cancelGraceMs', 'maxBodyBytes', 'renderSettleMs', 'dnsConcurrency',
] as const;

const BOOLEAN_KEYS = [
  'respectRobots', 'overrideRobots', 'includeSubdomains', 'useJsRendering', 'headless',
  'disableJsAnalysis', 'enableSubdomainEnumeration', 'enableEndpointGuessing',
  'enableHiddenFileScanning', 'verbose',
] as const;

const NULLABLE_STRING_KEYS = ['subdomainWordlist', 'endpointWordlist', 'hiddenFileWordlist'] as const;

function expectType(source: string, key: string, expected: string): FatalConfigError {
  return new FatalConfigError(`${source}: "${key}" must be ${expected}`);
}

function stringArray(value: unknown, source: string, key: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw expectType(source, key, 'an array of strings');
  }
  return value;
}

function stringRecord(value: unknown, source: string, key: string): Record<string, string> {
  if (!isRecord(value)) {
    throw expectType(source, key, 'an object of strings');
  }
  const result: Record<string, string> = {};
  for (const [name, item] of Object.entries(value)) {
    if (typeof item !== 'string') {
      throw expectType(source, `${key}.${name}`, 'a string');
    }
    result[name] = item;
  }
  return result;
}

/**
 * Validate the shape of an untyped overrides object
 */
export function parseOverrides(input: Record<string, unknown>, source: string = 'config'): CrawlerConfigOverrides {
  const overrides: CrawlerConfigOverrides = {};

  for (const key of NUMBER_KEYS) {
    const value = input[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) throw expectType(source, key, 'a number');
    overrides[key] = value;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = input[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') throw expectType(source, key, 'a boolean');
    overrides[key] = value;
  }

  for (const key of NULLABLE_STRING_KEYS) {
    const value = input[key];
    if (value === undefined) continue;
    if (value !== null && typeof value !== 'string') throw expectType(source, key, 'a path or null');
    overrides[key] = value;
  }

  if (input.userAgent !== undefined) {
    if (typeof input.userAgent !== 'string') throw expectType(source, 'userAgent', 'a string');
    overrides.userAgent = input.userAgent;
  }

  if (input.outputFile !== undefined) {
    if (typeof input.outputFile !== 'string') throw expectType(source, 'outputFile', 'a string');
    overrides.outputFile = input.outputFile;
  }

  if (input.outputFormat !== undefined) {
    if (!isOutputFormat(input.outputFormat)) throw expectType(source, 'outputFormat', 'json, sqlite or both');
    overrides.outputFormat = input.outputFormat;
  }

  if (input.subdomainMethods !== undefined) {
    const methods = stringArray(input.subdomainMethods, source, 'subdomainMethods');
    const unknown = methods.find((method) => !isSubdomainMethod(method));
    if (unknown !== undefined) {
      throw new FatalConfigError(`${source}: unknown subdomain method "${unknown}"`);
    }
    overrides.subdomainMethods = methods.filter(isSubdomainMethod);
  }

  if (input.extraHiddenFiles !== undefined) {
    overrides.extraHiddenFiles = stringArray(input.extraHiddenFiles, source, 'extraHiddenFiles');
  }

  if (input.apiPatterns !== undefined) {
    overrides.apiPatterns = stringArray(input.apiPatterns, source, 'apiPatterns');
  }

  if (input.headers !== undefined) {
    overrides.headers = stringRecord(input.headers, source, 'headers');
  }

  if (input.cookies !== undefined) {
    overrides.cookies = stringRecord(input.cookies, source, 'cookies');
  }

  if (input.retry !== undefined) {
    if (!isRecord(input.retry)) throw expectType(source, 'retry', 'an object');
    const retry: Partial<CrawlerConfig['retry']> = {};
    const { enabled, backoffMs } = input.retry;
    if (enabled !== undefined) {
      if (typeof enabled !== 'boolean') throw expectType(source, 'retry.enabled', 'a boolean');
      retry.enabled = enabled;
    }
    if (backoffMs !== undefined) {
      if (typeof backoffMs !== 'number') throw expectType(source, 'retry.backoffMs', 'a number');
      retry.backoffMs = backoffMs;
    }
    overrides.retry = retry;
  }

  if (input.circuitBreaker !== undefined) {
    if (!isRecord(input.circuitBreaker)) throw expectType(source, 'circuitBreaker', 'an object');
    const breaker: Partial<CrawlerConfig['circuitBreaker']> = {};
    const { enabled } = input.circuitBreaker;
    if (enabled !== undefined) {
      if (typeof enabled !== 'boolean') throw expectType(source, 'circuitBreaker.enabled', 'a boolean');
      breaker.enabled = enabled;
    }
    for (const key of ['errorThresholdPercentage', 'resetTimeout', 'minimumRequests'] as const) {
      const value = input.circuitBreaker[key];
      if (value === undefined) continue;
      if (typeof value !== 'number') throw expectType(source, `circuitBreaker.${key}`, 'a number');
      breaker[key] = value;
    }
    overrides.circuitBreaker = breaker;
  }

  return overrides;
}

/**
 * Merge defaults <- file <- CLI and validate the result. Layers never carry
 * undefined values: absent options are left out.
 */
export function resolveCrawlerConfig(
  defaults: CrawlerConfig,
  ...layers: Array<CrawlerConfigOverrides | undefined>
): CrawlerConfig {
  let config: CrawlerConfig = { ...defaults, retry: { ...defaults.retry }, circuitBreaker: { ...defaults.circuitBreaker } };

  for (const layer of layers) {
    if (!layer) continue;
    const { retry, circuitBreaker, headers, cookies, ...rest } = layer;
    config = {
      ...config,
      ...rest,
      headers: { ...config.headers, ...headers },
      cookies: { ...config.cookies, ...cookies },
      retry: { ...config.retry, ...retry },
      circuitBreaker: { ...config.circuitBreaker, ...circuitBreaker },
    };
  }

  validateCrawlerConfig(config);
  return config;
}

export function validateCrawlerConfig(config: CrawlerConfig): void {
  const positive: Array<[string, number]> = [
    ['maxPages', config.maxPages],
    ['concurrency', config.concurrency],
    ['timeoutMs', config.timeoutMs],
    ['dnsConcurrency', config.dnsConcurrency],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new FatalConfigError(`${name} must be a positive integer (got ${value})`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ['maxDepth', config.maxDepth],
    ['delayMs', config.delayMs],
    ['maxDurationMs', config.maxDurationMs],
    ['cancelGraceMs', config.cancelGraceMs],
    ['retry.backoffMs', config.retry.backoffMs],
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      throw new FatalConfigError(`${name} must not be negative (got ${value})`);
    }
  }

  if (!isOutputFormat(config.outputFormat)) {
    throw new FatalConfigError(`Unknown output format "${config.outputFormat}"`);
  }

  const unknownMethod = config.subdomainMethods.find((method) => !isSubdomainMethod(method));
  if (unknownMethod !== undefined) {
    throw new FatalConfigError(`Unknown subdomain method "${unknownMethod}"`);
  }
  if (config.enableSubdomainEnumeration && config.subdomainMethods.length === 0) {
    throw new FatalConfigError('Subdomain enumeration needs at least one method');
  }

  for (const source of config.apiPatterns) {
    try {
      new RegExp(source, 'i');
    } catch (error) {
      throw new FatalConfigError(`Invalid API pattern "${source}"`, { cause: error });
    }
  }
}

/**
 * The seed must be an absolute http(s) URL
 */
export function validateSeedUrl(seed: string): URL {
  let url: URL;
  try {
    url = new URL(seed);
  } catch (error) {
    throw new FatalConfigError(`Invalid seed URL "${seed}"`, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new FatalConfigError(`Seed URL scheme ${url.protocol} is not allowed`);
  }
  return url;
}
