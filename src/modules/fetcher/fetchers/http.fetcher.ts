/**
 * HTTP Fetcher - plain GET over native fetch
 * Timeout and cancellation through one AbortController per request
 */

import { CancelledError, CrawlError, NetworkError, TimeoutError } from '../../../lib/errors/crawl.errors';
import type { FetchedContent, FetchOptions, PageFetcher } from './types';

const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024;

/**
 * Parse one Set-Cookie header into name and value
 */
export function parseSetCookie(header: string): { name: string; value: string } | null {
  const pair = header.split(';')[0];
  const eq = pair.indexOf('=');
  if (eq <= 0) {
    return null;
  }

  return {
    name: pair.slice(0, eq).trim(),
    value: pair.slice(eq + 1).trim(),
  };
}

/**
 * Serialize a cookie map into a Cookie request header
 */
export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && error.cause instanceof Error && 'code' in error.cause) {
    const code = error.cause.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  }
  return String(error);
}

/**
 * Read at most `maxBytes` of the body
 */
async function readBody(response: Response, maxBytes: number): Promise<string> {
  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let received = 0;
  let text = '';

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    const remaining = maxBytes - received;
    const chunk = value.byteLength > remaining ? value.subarray(0, remaining) : value;
    received += chunk.byteLength;
    text += decoder.decode(chunk, { stream: true });

    if (received >= maxBytes) {
      await reader.cancel();
      break;
    }
  }

  return text + decoder.decode();
}

export class HttpFetcher implements PageFetcher {
  readonly name = 'http';

  async fetch(url: string, options: FetchOptions): Promise<FetchedContent> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(new TimeoutError(url, options.timeoutMs)),
      options.timeoutMs
    );
    const onCancel = () => controller.abort(new CancelledError(url));

    if (options.signal?.aborted) {
      clearTimeout(timeoutId);
      throw new CancelledError(url);
    }
    options.signal?.addEventListener('abort', onCancel, { once: true });

    const headers: Record<string, string> = {
      Accept: 'text/html,application/xhtml+xml,application/json,application/javascript,*/*;q=0.8',
      ...options.headers,
    };
    if (Object.keys(options.cookies).length > 0) {
      headers.Cookie = serializeCookies(options.cookies);
    }

    const started = Date.now();
    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        redirect: options.followRedirects === false ? 'manual' : 'follow',
        signal: controller.signal,
      });

      const body = await readBody(response, options.maxBodyBytes || DEFAULT_MAX_BODY_BYTES);

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      const cookies: Record<string, string> = {};
      for (const header of response.headers.getSetCookie()) {
        const cookie = parseSetCookie(header);
        if (cookie) {
          cookies[cookie.name] = cookie.value;
        }
      }

      return {
        url,
        finalUrl: response.url || url,
        status: response.status,
        contentType: response.headers.get('content-type') || '',
        headers: responseHeaders,
        cookies,
        body,
        observedRequests: [],
        durationMs: Date.now() - started,
      };
    } catch (error) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
      if (reason instanceof CrawlError) {
        throw reason;
      }
      throw new NetworkError(`GET ${url} failed: ${errorMessage(error)}`, errorCode(error), { cause: error });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }
}
