/**
 * Extraction Types
 * Discovery results produced from one fetched page
 */

import { RejectionReason, ScopePolicy } from '../crawling/crawling.types';

/**
 * Where an endpoint was found. Provenance is kept for confidence scoring
 * downstream: `js-dynamic` entries are heuristic and may not be reachable.
 */
export type EndpointSource = 'html' | 'js-static' | 'js-dynamic' | 'network';

export type HttpMethodGuess = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'UNKNOWN';

export type EndpointType = 'api' | 'rest' | 'graphql' | 'versioned' | 'other';

export interface EndpointSpec {
  /**
   * Absolute URL; js-dynamic entries may contain `{param}` placeholders
   */
  url: string;
  source: EndpointSource;
  httpMethodGuess: HttpMethodGuess;

  /**
   * Page or script the endpoint was found on
   */
  foundOn: string;
}

export interface FormField {
  name: string;
  type: string;
  hidden: boolean;

  /**
   * Name looks like an anti-forgery token
   */
  csrf: boolean;
}

export interface FormSpec {
  /**
   * Absolute action URL (the page URL when the form has no action)
   */
  action: string;
  method: string;
  fields: FormField[];
  csrfToken: string | null;
  pageUrl: string;
}

/**
 * A request a rendered page issued while loading
 */
export interface ObservedRequest {
  url: string;
  method: string;
  via: 'fetch' | 'xhr' | 'websocket' | 'beacon';
}

/**
 * Already-fetched content handed to the extractor
 */
export interface ExtractionInput {
  /**
   * Final URL of the response; relative references resolve against it
   */
  url: string;
  body: string;
  contentType: string;
  observedRequests?: ObservedRequest[];
}

export interface ExtractionOptions {
  policy: ScopePolicy;

  /**
   * Path heuristics marking a URL as an API endpoint
   */
  apiPatterns: RegExp[];

  /**
   * Field names matching this pattern are CSRF tokens
   */
  csrfFieldPattern: RegExp;
  htmlEndpoints: boolean;
  jsStaticAnalysis: boolean;
  jsDynamicAnalysis: boolean;
}

export interface ExtractionResult {
  title: string | null;

  /**
   * Normalized in-scope links (scripts excluded)
   */
  links: string[];

  /**
   * Absolute URLs of referenced scripts, in scope or not
   */
  jsFiles: string[];
  forms: FormSpec[];
  apiEndpoints: EndpointSpec[];
  websocketUrls: string[];

  /**
   * Candidates dropped by the normalizer
   */
  rejected: Array<{ raw: string; reason: RejectionReason }>;

  /**
   * Extraction steps that threw; the other steps' results are kept
   */
  parseErrors: string[];
}
