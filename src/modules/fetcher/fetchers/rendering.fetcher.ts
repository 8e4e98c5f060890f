/**
 * Rendering Fetcher - runs page scripts in jsdom
 * The document is fetched over HTTP, then executed in a jsdom window on a
 * worker thread. The window's network APIs only record what the page tries
 * to request, so no request made by page scripts ever leaves the process.
 */

import { Worker } from 'node:worker_threads';
import { isHtmlContent } from '../../../lib/extraction/discovery-extractor';
import type { ObservedRequest } from '../../../lib/extraction/extraction.types';
import { CancelledError, NetworkError, TimeoutError } from '../../../lib/errors/crawl.errors';
import { RECORDER_SCRIPT, RENDER_WORKER_SOURCE, RenderJob } from './render.worker';
import type { FetchedContent, FetchOptions, PageFetcher } from './types';

export interface RenderingFetcherOptions {
  /**
   * Time given to timers and load handlers before the DOM is serialized
   */
  settleMs: number;

  /**
   * When false, the window pretends to be visual (requestAnimationFrame runs)
   */
  headless: boolean;
}

interface RenderResult {
  body: string;
  observedRequests: ObservedRequest[];
}

type RenderOutcome =
  | { kind: 'done'; message: unknown }
  | { kind: 'failed'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

function isObservedRequest(value: unknown): value is ObservedRequest {
  if (typeof value !== 'object' || value === null) return false;
  if (!('url' in value) || typeof value.url !== 'string') return false;
  if (!('method' in value) || typeof value.method !== 'string') return false;
  if (!('via' in value)) return false;
  return value.via === 'fetch' || value.via === 'xhr' || value.via === 'websocket' || value.via === 'beacon';
}

function toRenderResult(message: unknown): RenderResult | null {
  if (typeof message !== 'object' || message === null) return null;
  if (!('body' in message) || typeof message.body !== 'string') return null;
  if (!('observedRequests' in message) || !Array.isArray(message.observedRequests)) return null;

  const observedRequests: unknown[] = message.observedRequests;
  return { body: message.body, observedRequests: observedRequests.filter(isObservedRequest) };
}

export class RenderingFetcher implements PageFetcher {
  readonly name = 'rendering';

  constructor(
    private readonly documentFetcher: PageFetcher,
    private readonly options: RenderingFetcherOptions
  ) {}

  async fetch(url: string, options: FetchOptions): Promise<FetchedContent> {
    const started = Date.now();
    const content = await this.documentFetcher.fetch(url, options);

    if (!isHtmlContent(content.contentType, content.body) || content.status >= 300) {
      return content;
    }
    if (options.signal?.aborted) {
      throw new CancelledError(url);
    }

    const rendered = await this.render(url, content, options);
    return {
      ...content,
      body: rendered.body,
      observedRequests: rendered.observedRequests,
      durationMs: Date.now() - started,
    };
  }

  /**
   * Build the window on a worker thread. The worker is terminated once it
   * answers, fails, runs past `timeoutMs` or the run is cancelled.
   */
  private async render(url: string, content: FetchedContent, options: FetchOptions): Promise<RenderResult> {
    const job: RenderJob = {
      jsdomPath: require.resolve('jsdom'),
      html: content.body,
      url: content.finalUrl,
      visual: !this.options.headless,
      settleMs: this.options.settleMs,
      recorderScript: RECORDER_SCRIPT,
    };
    const worker = new Worker(RENDER_WORKER_SOURCE, { eval: true, workerData: job });

    let settle: (outcome: RenderOutcome) => void = () => undefined;
    const finished = new Promise<RenderOutcome>((resolve) => {
      settle = resolve;
    });

    const onAbort = () => settle({ kind: 'cancelled' });
    const timer = setTimeout(() => settle({ kind: 'timeout' }), options.timeoutMs);
    options.signal?.addEventListener('abort', onAbort, { once: true });
    worker.once('message', (message: unknown) => settle({ kind: 'done', message }));
    worker.once('error', (error: unknown) => settle({ kind: 'failed', error }));
    worker.once('exit', (code: number) =>
      settle({ kind: 'failed', error: new Error(`Render worker exited with code ${code}`) })
    );

    try {
      const outcome = await finished;
      switch (outcome.kind) {
        case 'done': {
          const result = toRenderResult(outcome.message);
          if (!result) {
            throw new NetworkError(`Rendering ${url} returned a malformed result`, 'ERENDER');
          }
          return result;
        }
        case 'timeout':
          throw new TimeoutError(url, options.timeoutMs);
        case 'cancelled':
          throw new CancelledError(url);
        case 'failed': {
          const reason = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
          throw new NetworkError(`Rendering ${url} failed: ${reason}`, 'ERENDER', { cause: outcome.error });
        }
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      await worker.terminate();
    }
  }
}
