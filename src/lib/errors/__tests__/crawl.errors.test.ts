/**
 * Crawl Error Tests
 */

import {
  CancelledError,
  NetworkError,
  RetryExhaustedError,
  TimeoutError,
  UnexpectedStatusError,
  classifyFetchError,
  isSuccessStatus,
  withRetry,
} from '../crawl.errors';

describe('classifyFetchError', () => {
  it('should classify fetcher errors by kind', () => {
    expect(classifyFetchError(new TimeoutError('https://example.com/', 500))).toEqual({
      kind: 'timeout',
      message: 'Request to https://example.com/ timed out after 500ms',
      retryable: true,
    });
    expect(classifyFetchError(new NetworkError('refused', 'ECONNREFUSED'))).toEqual({
      kind: 'network',
      message: 'refused',
      retryable: true,
    });
    expect(classifyFetchError(new NetworkError('Circuit open for example.com', 'EOPENBREAKER'))).toEqual({
      kind: 'circuit-open',
      message: 'Circuit open for example.com',
      retryable: false,
    });
    expect(classifyFetchError(new CancelledError('https://example.com/'))).toEqual({
      kind: 'cancelled',
      message: 'Request to https://example.com/ was cancelled',
      retryable: false,
    });
  });

  it('should treat 429 and 5xx statuses as retryable', () => {
    expect(classifyFetchError(null, 503).retryable).toBe(true);
    expect(classifyFetchError(null, 429).retryable).toBe(true);
    expect(classifyFetchError(null, 404)).toEqual({
      kind: 'status',
      message: 'Unexpected status 404',
      statusCode: 404,
      retryable: false,
    });
  });

  it('should keep the message of an unexpected status error', () => {
    expect(classifyFetchError(new UnexpectedStatusError('https://example.com/x', 500))).toEqual({
      kind: 'status',
      message: 'https://example.com/x returned status 500',
      statusCode: 500,
      retryable: true,
    });
  });

  it('should fall back on the message for unknown errors', () => {
    expect(classifyFetchError(new Error('connect ETIMEDOUT')).kind).toBe('timeout');
    expect(classifyFetchError('boom')).toEqual({ kind: 'network', message: 'boom', retryable: true });
  });
});

describe('isSuccessStatus', () => {
  it('should accept 2xx and 3xx only', () => {
    expect([199, 200, 301, 399, 400, 500].map(isSuccessStatus)).toEqual([false, true, true, true, false, false]);
  });
});

describe('withRetry', () => {
  it('should retry a retryable failure after the backoff', async () => {
    const sleep = jest.fn().mockResolvedValue(undefined);
    const onRetry = jest.fn();
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new NetworkError('reset', 'ECONNRESET'))
      .mockResolvedValueOnce('ok');

    const outcome = await withRetry(fn, { maxAttempts: 2, backoffMs: 50, sleep, onRetry });

    expect(outcome).toEqual({ value: 'ok', attempts: 2 });
    expect(sleep).toHaveBeenCalledWith(50);
    expect(onRetry).toHaveBeenCalledWith({ kind: 'network', message: 'reset', retryable: true }, 1);
  });

  it('should double the backoff on each attempt', async () => {
    const sleep = jest.fn().mockResolvedValue(undefined);
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new TimeoutError('https://example.com/', 10));

    await expect(withRetry(fn, { maxAttempts: 3, backoffMs: 100, sleep })).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry a cancelled request', async () => {
    const sleep = jest.fn().mockResolvedValue(undefined);
    const cancelled = new CancelledError('https://example.com/');
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(cancelled);

    const error = await withRetry(fn, { maxAttempts: 2, backoffMs: 10, sleep }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 1, lastError: cancelled });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should make a single attempt when maxAttempts is 1', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new NetworkError('down'));

    await expect(withRetry(fn, { maxAttempts: 1, backoffMs: 10 })).rejects.toMatchObject({ attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
