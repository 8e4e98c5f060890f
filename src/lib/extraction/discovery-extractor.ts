/**
 * Discovery Extractor
 * Turns one fetched page into links, forms, endpoints, scripts and WebSocket URLs.
 * Works on already-fetched content only; never performs network I/O.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { normalizeUrl, pathExtension } from '../crawling/url-normalizer';
import { isApiEndpoint, toMethodGuess } from './endpoint-heuristics';
import {
  EndpointSpec,
  ExtractionInput,
  ExtractionOptions,
  ExtractionResult,
  FormSpec,
} from './extraction.types';
import { extractForms } from './forms';
import { JsAnalyzer, extractWebSocketUrls } from './js-analyzer';

// Attributes that may carry an API URL outside of href/src
const DATA_URL_ATTRIBUTES = ['data-url', 'data-endpoint', 'data-api', 'data-src', 'data-href'];

export function isHtmlContent(contentType: string, body: string): boolean {
  const type = contentType.toLowerCase();
  if (type.includes('html') || type.includes('xml+xhtml')) {
    return true;
  }
  return !type && /^\s*</.test(body);
}

export function isScriptContent(contentType: string, url: string): boolean {
  const type = contentType.toLowerCase();
  if (type.includes('javascript') || type.includes('ecmascript')) {
    return true;
  }
  try {
    const extension = pathExtension(new URL(url).pathname);
    return extension === '.js' || extension === '.mjs';
  } catch {
    return false;
  }
}

function resolve(raw: string, base: string): string | null {
  try {
    const url = new URL(raw.trim(), base);
    return /^https?:$/.test(url.protocol) ? url.href : null;
  } catch {
    return null;
  }
}

export class DiscoveryExtractor {
  private jsAnalyzer: JsAnalyzer;

  constructor(private readonly options: ExtractionOptions) {
    this.jsAnalyzer = new JsAnalyzer({
      apiPatterns: options.apiPatterns,
      staticAnalysis: options.jsStaticAnalysis,
      dynamicAnalysis: options.jsDynamicAnalysis,
    });
  }

  /**
   * Extract everything discoverable from one page or script
   */
  extract(page: ExtractionInput): ExtractionResult {
    const result: ExtractionResult = {
      title: null,
      links: [],
      jsFiles: [],
      forms: [],
      apiEndpoints: [],
      websocketUrls: [],
      rejected: [],
      parseErrors: [],
    };

    const links = new Set<string>();
    const jsFiles = new Set<string>();
    const endpoints = new Map<string, EndpointSpec>();
    const addEndpoint = (endpoint: EndpointSpec) => {
      const key = `${endpoint.source} ${endpoint.url}`;
      if (!endpoints.has(key)) endpoints.set(key, endpoint);
    };

    const guard = (step: string, fn: () => void) => {
      try {
        fn();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.parseErrors.push(`${step}: ${message}`);
      }
    };

    if (isHtmlContent(page.contentType, page.body)) {
      const doc = this.load(page.body, result);
      if (doc) {
        guard('title', () => {
          const title = doc('title').first().text().trim();
          result.title = title || null;
        });

        guard('links', () => this.collectLinks(doc, page.url, links, jsFiles, result));

        guard('forms', () => {
          result.forms = extractForms(doc, page.url, this.options.csrfFieldPattern);
        });

        if (this.options.htmlEndpoints) {
          guard('html-endpoints', () =>
            this.collectHtmlEndpoints(doc, page.url, result.forms).forEach(addEndpoint)
          );
        }

        guard('inline-scripts', () => {
          for (const code of this.inlineScripts(doc)) {
            const analysis = this.jsAnalyzer.analyze(code, page.url);
            analysis.endpoints.forEach(addEndpoint);
            analysis.jsFiles.forEach((file) => jsFiles.add(file));
          }
        });
      }
    } else if (isScriptContent(page.contentType, page.url)) {
      guard('script', () => {
        const analysis = this.jsAnalyzer.analyze(page.body, page.url);
        analysis.endpoints.forEach(addEndpoint);
        analysis.jsFiles.forEach((file) => jsFiles.add(file));
      });
    }

    guard('websockets', () => {
      result.websocketUrls = extractWebSocketUrls(page.body);
    });

    for (const request of page.observedRequests || []) {
      addEndpoint({
        url: request.url,
        source: 'network',
        httpMethodGuess: toMethodGuess(request.method),
        foundOn: page.url,
      });
      if (request.via === 'websocket' && !result.websocketUrls.includes(request.url)) {
        result.websocketUrls.push(request.url);
      }
    }

    result.jsFiles = Array.from(jsFiles);
    result.links = Array.from(links).filter((link) => !jsFiles.has(link));
    result.apiEndpoints = Array.from(endpoints.values());
    return result;
  }

  /**
   * Every href/src attribute plus GET form actions, through the normalizer.
   * `script[src]` targets go to jsFiles instead.
   */
  private collectLinks(
    $: CheerioAPI,
    pageUrl: string,
    links: Set<string>,
    jsFiles: Set<string>,
    result: ExtractionResult
  ): void {
    const candidates: string[] = [];

    $('script[src]').each((_, el) => {
      const src = $(el).attr('src');
      const absolute = src ? resolve(src, pageUrl) : null;
      if (!absolute) return;

      const normalized = normalizeUrl(absolute, undefined, this.options.policy);
      jsFiles.add(normalized.accepted ? normalized.url : absolute);
    });

    $('[href], [src]').each((_, el) => {
      const $el = $(el);
      if (($el.prop('tagName') || '').toLowerCase() === 'script') return;
      const href = $el.attr('href');
      const src = $el.attr('src');
      if (href) candidates.push(href);
      if (src) candidates.push(src);
    });

    $('form').each((_, el) => {
      const method = ($(el).attr('method') || 'GET').toUpperCase();
      const action = $(el).attr('action');
      if (method === 'GET' && action) candidates.push(action);
    });

    for (const raw of candidates) {
      const normalized = normalizeUrl(raw, pageUrl, this.options.policy);
      if (normalized.accepted) {
        links.add(normalized.url);
      } else {
        result.rejected.push({ raw: normalized.raw, reason: normalized.reason });
      }
    }
  }

  /**
   * Anchors, resources, data attributes and form actions whose path looks like an API
   */
  private collectHtmlEndpoints($: CheerioAPI, pageUrl: string, forms: FormSpec[]): EndpointSpec[] {
    const endpoints: EndpointSpec[] = [];
    const attributes = ['href', 'src', ...DATA_URL_ATTRIBUTES];

    $(attributes.map((attribute) => `[${attribute}]`).join(', ')).each((_, el) => {
      for (const attribute of attributes) {
        const value = $(el).attr(attribute);
        const url = value ? resolve(value, pageUrl) : null;
        if (url && isApiEndpoint(url, this.options.apiPatterns)) {
          endpoints.push({ url, source: 'html', httpMethodGuess: 'GET', foundOn: pageUrl });
        }
      }
    });

    for (const form of forms) {
      if (isApiEndpoint(form.action, this.options.apiPatterns)) {
        endpoints.push({
          url: form.action,
          source: 'html',
          httpMethodGuess: toMethodGuess(form.method),
          foundOn: pageUrl,
        });
      }
    }

    return endpoints;
  }

  /**
   * Inline `<script>` bodies and inline event handler attributes
   */
  private inlineScripts($: CheerioAPI): string[] {
    const scripts: string[] = [];

    $('script:not([src])').each((_, el) => {
      const type = ($(el).attr('type') || '').toLowerCase();
      if (type && !type.includes('javascript') && type !== 'module') return;
      const code = $(el).html();
      if (code && code.trim()) scripts.push(code);
    });

    $('*').each((_, el) => {
      const attributes = $(el).attr() || {};
      for (const [name, value] of Object.entries(attributes)) {
        if (name.toLowerCase().startsWith('on') && value.trim()) {
          scripts.push(value);
        }
      }
    });

    return scripts;
  }

  private load(body: string, result: ExtractionResult): CheerioAPI | null {
    try {
      return cheerio.load(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.parseErrors.push(`parse: ${message}`);
      return null;
    }
  }
}
