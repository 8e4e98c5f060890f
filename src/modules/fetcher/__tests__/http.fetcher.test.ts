/**
 * HTTP Fetcher Tests
 */

import { HttpFetcher, parseSetCookie, serializeCookies } from '../fetchers/http.fetcher';
import { FetchOptions } from '../fetchers/types';
import { CancelledError, NetworkError, TimeoutError } from '../../../lib/errors/crawl.errors';

const options = (overrides: Partial<FetchOptions> = {}): FetchOptions => ({
  headers: { 'User-Agent': 'ReconCrawlTest/1.0' },
  cookies: {},
  timeoutMs: 1000,
  ...overrides,
});

/**
 * fetch stand-in that only settles when its signal aborts
 */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener('abort', () => reject(signal.reason));
  });
}

describe('HttpFetcher', () => {
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the response with headers and body', async () => {
    fetchSpy.mockResolvedValue(
      new Response('<html>hi</html>', { status: 200, headers: { 'content-type': 'text/html', server: 'nginx' } })
    );

    const content = await new HttpFetcher().fetch('https://example.com/', options());

    expect(content).toMatchObject({
      url: 'https://example.com/',
      finalUrl: 'https://example.com/',
      status: 200,
      contentType: 'text/html',
      body: '<html>hi</html>',
      observedRequests: [],
    });
    expect(content.headers).toEqual({ 'content-type': 'text/html', server: 'nginx' });
  });

  it('should send configured headers and cookies', async () => {
    fetchSpy.mockResolvedValue(new Response(''));

    await new HttpFetcher().fetch('https://example.com/', options({ cookies: { a: '1', b: '2' } }));

    const init = fetchSpy.mock.calls[0][1];
    expect(init?.method).toBe('GET');
    expect(init?.redirect).toBe('follow');
    expect(init?.headers).toEqual({
      Accept: 'text/html,application/xhtml+xml,application/json,application/javascript,*/*;q=0.8',
      'User-Agent': 'ReconCrawlTest/1.0',
      Cookie: 'a=1; b=2',
    });
  });

  it('should not follow redirects for probes', async () => {
    fetchSpy.mockResolvedValue(new Response(null, { status: 302, headers: { location: '/login' } }));

    const content = await new HttpFetcher().fetch('https://example.com/.env', options({ followRedirects: false }));

    expect(fetchSpy.mock.calls[0][1]?.redirect).toBe('manual');
    expect(content.status).toBe(302);
    expect(content.body).toBe('');
  });

  it('should truncate bodies beyond the size limit', async () => {
    fetchSpy.mockResolvedValue(new Response('abcdefghij'));

    const content = await new HttpFetcher().fetch('https://example.com/big', options({ maxBodyBytes: 5 }));

    expect(content.body).toBe('abcde');
  });

  it('should wrap connection failures in a NetworkError', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
    fetchSpy.mockRejectedValue(new TypeError('fetch failed', { cause }));

    const error = await new HttpFetcher().fetch('https://example.com/', options()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: 'GET https://example.com/ failed: fetch failed: connect ECONNREFUSED 127.0.0.1:443',
      code: 'ECONNREFUSED',
    });
  });

  it('should time out slow responses', async () => {
    fetchSpy.mockImplementation(hangingFetch);

    const error = await new HttpFetcher()
      .fetch('https://example.com/slow', options({ timeoutMs: 20 }))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'Request to https://example.com/slow timed out after 20ms' });
  });

  it('should reject with CancelledError when the run is cancelled', async () => {
    fetchSpy.mockImplementation(hangingFetch);
    const controller = new AbortController();

    const pending = new HttpFetcher().fetch('https://example.com/slow', options({ signal: controller.signal }));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should not start a request after cancellation', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      new HttpFetcher().fetch('https://example.com/', options({ signal: controller.signal }))
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});

describe('cookie helpers', () => {
  it('should parse the name and value of a Set-Cookie header', () => {
    expect(parseSetCookie('session=abc; Path=/; HttpOnly')).toEqual({ name: 'session', value: 'abc' });
    expect(parseSetCookie('=orphan')).toBeNull();
    expect(parseSetCookie('novalue')).toBeNull();
  });

  it('should serialize a cookie map', () => {
    expect(serializeCookies({ a: '1', b: '2' })).toBe('a=1; b=2');
  });
});
