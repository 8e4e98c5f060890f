/**
 * Crawl Error Handling
 * Error taxonomy, fetch failure classification and the optional retry policy
 */

/**
 * Per-URL issue taxonomy. Only FATAL_CONFIG surfaces to the caller;
 * everything else is recorded in the report and the crawl continues.
 */
export enum CrawlIssueType {
  SCOPE_REJECTION = 'SCOPE_REJECTION',
  POLICY_DENIAL = 'POLICY_DENIAL',
  FETCH_FAILURE = 'FETCH_FAILURE',
  PARSE_FAILURE = 'PARSE_FAILURE',
  FATAL_CONFIG = 'FATAL_CONFIG',
}

export type FetchFailureKind = 'network' | 'timeout' | 'status' | 'circuit-open' | 'cancelled';

export class CrawlError extends Error {
  readonly type: CrawlIssueType;

  constructor(type: CrawlIssueType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrawlError';
    this.type = type;
  }
}

/**
 * Thrown by a PageFetcher when no response could be obtained
 */
export class NetworkError extends CrawlError {
  readonly code?: string;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(CrawlIssueType.FETCH_FAILURE, message, options);
    this.name = 'NetworkError';
    this.code = code;
  }
}

/**
 * Thrown by a PageFetcher when the per-request timeout elapsed
 */
export class TimeoutError extends CrawlError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(CrawlIssueType.FETCH_FAILURE, `Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when a request was aborted because the run was cancelled
 */
export class CancelledError extends CrawlError {
  constructor(url: string) {
    super(CrawlIssueType.FETCH_FAILURE, `Request to ${url} was cancelled`);
    this.name = 'CancelledError';
  }
}

/**
 * A page answered with a status outside 2xx/3xx
 */
export class UnexpectedStatusError extends CrawlError {
  readonly statusCode: number;

  constructor(url: string, statusCode: number) {
    super(CrawlIssueType.FETCH_FAILURE, `${url} returned status ${statusCode}`);
    this.name = 'UnexpectedStatusError';
    this.statusCode = statusCode;
  }
}

/**
 * Invalid seed, unusable configuration or no route to the target.
 * Aborts the run before any page fetch.
 */
export class FatalConfigError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(CrawlIssueType.FATAL_CONFIG, message, options);
    this.name = 'FatalConfigError';
  }
}

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  statusCode?: number;
  retryable: boolean;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify a fetch error (or an unsuccessful status) and decide whether
 * the optional retry may apply to it
 */
export function classifyFetchError(error: unknown, statusCode?: number): FetchFailure {
  if (error instanceof CancelledError) {
    return { kind: 'cancelled', message: error.message, retryable: false };
  }

  if (error instanceof TimeoutError) {
    return { kind: 'timeout', message: error.message, retryable: true };
  }

  if (error instanceof NetworkError) {
    // Open per-host breaker
    if (error.code === 'EOPENBREAKER') {
      return { kind: 'circuit-open', message: error.message, retryable: false };
    }
    return { kind: 'network', message: error.message, retryable: true };
  }

  if (error instanceof UnexpectedStatusError) {
    return { ...classifyFetchError(null, error.statusCode), message: error.message };
  }

  if (error === null && statusCode !== undefined) {
    return {
      kind: 'status',
      message: `Unexpected status ${statusCode}`,
      statusCode,
      // 429 and 5xx may recover; 4xx will not
      retryable: statusCode === 429 || statusCode >= 500,
    };
  }

  const message = errorMessage(error);
  if (message.includes('timeout') || message.includes('ETIMEDOUT')) {
    return { kind: 'timeout', message, retryable: true };
  }

  return { kind: 'network', message, retryable: true };
}

/**
 * True when a response status counts as a successful page fetch
 */
export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

export interface RetryOptions {
  /**
   * Total attempts including the first one
   */
  maxAttempts: number;
  backoffMs: number;
  onRetry?: (failure: FetchFailure, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

/**
 * Run `fn`, retrying retryable failures with exponential backoff.
 * `maxAttempts: 1` disables retrying.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep || ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await fn(), attempts: attempt };
    } catch (error) {
      const failure = classifyFetchError(error);
      if (!failure.retryable || attempt >= options.maxAttempts) {
        throw new RetryExhaustedError(error, attempt);
      }

      if (options.onRetry) {
        options.onRetry(failure, attempt);
      }

      await sleep(options.backoffMs * Math.pow(2, attempt - 1));
    }
  }
}

/**
 * Wraps the last error of a retried operation together with the attempt count
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(lastError: unknown, attempts: number) {
    super(errorMessage(lastError), { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}
