/**
 * JavaScript Analyzer
 * Static and dynamic-construction URL discovery over script source
 */

import { isApiEndpoint, toMethodGuess } from './endpoint-heuristics';
import { EndpointSpec, HttpMethodGuess } from './extraction.types';

export interface JsAnalysisResult {
  endpoints: EndpointSpec[];

  /**
   * Scripts referenced by import/require, resolved against the source URL
   */
  jsFiles: string[];
}

export interface JsAnalysisOptions {
  apiPatterns: RegExp[];
  staticAnalysis: boolean;
  dynamicAnalysis: boolean;
}

const PLACEHOLDER = '{param}';

/**
 * One operand of a URL argument: a quoted literal, a template literal or an identifier
 */
const TERM = String.raw`(?:\x60[^\x60]*\x60|'[^'\n]*'|"[^"\n]*"|[\w$.]+)`;

/**
 * A URL argument: one operand or a `+` concatenation of operands
 */
const ARG = String.raw`(${TERM}(?:\s*\+\s*${TERM})*)`;

interface CallSite {
  name: string;
  pattern: RegExp;

  /**
   * Index of the capture group holding the URL argument
   */
  argGroup: number;
  method: (match: RegExpExecArray, rest: string) => HttpMethodGuess;
}

/**
 * `method: 'POST'` / `type: 'POST'` inside the options that follow a call
 */
function methodFromOptions(rest: string, fallback: HttpMethodGuess): HttpMethodGuess {
  const options = rest.slice(0, 200).match(/^\s*,\s*\{[^}]*?\b(?:method|type)\s*:\s*['"](\w+)['"]/);
  return options ? toMethodGuess(options[1]) : fallback;
}

const CALL_SITES: CallSite[] = [
  {
    name: 'fetch',
    pattern: new RegExp(String.raw`\bfetch\(\s*${ARG}`, 'g'),
    argGroup: 1,
    method: (_, rest) => methodFromOptions(rest, 'GET'),
  },
  {
    name: 'xhr',
    pattern: new RegExp(String.raw`\.open\(\s*['"](\w+)['"]\s*,\s*${ARG}`, 'g'),
    argGroup: 2,
    method: (match) => toMethodGuess(match[1]),
  },
  {
    name: 'jquery',
    pattern: new RegExp(String.raw`\$\.(get|post|getJSON)\(\s*${ARG}`, 'g'),
    argGroup: 2,
    method: (match) => (match[1] === 'post' ? 'POST' : 'GET'),
  },
  {
    name: 'jquery-ajax',
    pattern: new RegExp(String.raw`\$\.ajax\(\s*\{[^}]*?\burl\s*:\s*${ARG}`, 'g'),
    argGroup: 1,
    method: (match) => {
      const type = match[0].match(/\b(?:type|method)\s*:\s*['"](\w+)['"]/);
      return type ? toMethodGuess(type[1]) : 'UNKNOWN';
    },
  },
  {
    name: 'axios-verb',
    pattern: new RegExp(String.raw`\baxios\.(get|post|put|patch|delete)\(\s*${ARG}`, 'g'),
    argGroup: 2,
    method: (match) => toMethodGuess(match[1]),
  },
  {
    name: 'axios-config',
    pattern: new RegExp(String.raw`\baxios\(\s*\{[^}]*?\burl\s*:\s*${ARG}`, 'g'),
    argGroup: 1,
    method: (match) => {
      const method = match[0].match(/\bmethod\s*:\s*['"](\w+)['"]/);
      return method ? toMethodGuess(method[1]) : 'GET';
    },
  },
  {
    name: 'axios-call',
    pattern: new RegExp(String.raw`\baxios\(\s*${ARG}`, 'g'),
    argGroup: 1,
    method: (_, rest) => methodFromOptions(rest, 'GET'),
  },
];

/**
 * Base-URL variables concatenated with a path literal, e.g. `apiUrl + '/users'`
 */
const BASE_CONCAT = /\b(?:base_?url|api_?url|api_?base|base_?api|endpoint)\s*\+\s*(['"`])([^'"`\n]+)\1/gi;

const STRING_LITERAL = /(['"`])((?:(?!\1)[^\\\n]|\\.)*)\1/g;

const SCRIPT_REFERENCE = /(?:\bimport\s+(?:[\w*{}\s,]+\s+from\s+)?|\brequire\(\s*|\bimport\(\s*)['"]([^'"]+\.m?js)['"]/g;

export interface ReconstructedUrl {
  value: string;

  /**
   * True when part of the value was interpolated at run time
   */
  dynamic: boolean;
}

/**
 * Rebuild a URL argument from its operands; interpolated parts become
 * `{param}`. Returns null when no literal text is left (a bare variable).
 */
export function reconstructUrlArgument(arg: string): ReconstructedUrl | null {
  const single = arg.match(/^(['"])([^'"]*)\1$/) || arg.match(/^`([^`$]*)`$/);
  if (single) {
    const value = single[single.length - 1];
    return value ? { value, dynamic: false } : null;
  }

  let dynamic = false;
  const interpolate = (template: string) =>
    template.replace(/\$\{[^}]*\}/g, () => {
      dynamic = true;
      return PLACEHOLDER;
    });

  const parts = arg.split('+').map((part) => part.trim());
  let literalText = '';
  const value = parts
    .map((part) => {
      const quoted = part.match(/^(['"])(.*)\1$/);
      if (quoted) {
        literalText += quoted[2];
        return quoted[2];
      }
      const template = part.match(/^`(.*)`$/s);
      if (template) {
        const rebuilt = interpolate(template[1]);
        literalText += rebuilt.split(PLACEHOLDER).join('');
        return rebuilt;
      }
      dynamic = true;
      return PLACEHOLDER;
    })
    .join('');

  if (!literalText) {
    return null;
  }

  return { value, dynamic };
}

/**
 * Resolve a possibly templated URL against the script's URL.
 * Placeholders are kept verbatim rather than percent-encoded.
 */
function resolveTemplate(template: string, sourceUrl: string): string | null {
  if (/^(https?|wss?):\/\//i.test(template) || template.startsWith(PLACEHOLDER)) {
    return template;
  }

  try {
    const source = new URL(sourceUrl);
    if (template.startsWith('//')) {
      return `${source.protocol}${template}`;
    }
    if (template.startsWith('/')) {
      return `${source.origin}${template}`;
    }
    const directory = source.href.replace(/[?#].*$/, '').replace(/[^/]*$/, '');
    return `${directory}${template}`;
  } catch {
    return null;
  }
}

function resolveLiteral(literal: string, sourceUrl: string): string | null {
  try {
    return new URL(literal, sourceUrl).href;
  } catch {
    return null;
  }
}

function looksLikeUrl(value: string): boolean {
  return /^(https?:\/\/|\/(?!\/)|\.{1,2}\/)/i.test(value) && !/\s/.test(value);
}

export class JsAnalyzer {
  constructor(private readonly options: JsAnalysisOptions) {}

  /**
   * Analyze one script body. `sourceUrl` is the script's URL, or the page URL for inline code.
   */
  analyze(source: string, sourceUrl: string): JsAnalysisResult {
    const endpoints = new Map<string, EndpointSpec>();
    const add = (endpoint: EndpointSpec) => {
      const key = `${endpoint.source} ${endpoint.url}`;
      if (!endpoints.has(key)) {
        endpoints.set(key, endpoint);
      }
    };

    if (this.options.staticAnalysis || this.options.dynamicAnalysis) {
      this.scanCallSites(source, sourceUrl, add);
    }

    if (this.options.staticAnalysis) {
      this.scanLiterals(source, sourceUrl, add);
    }

    if (this.options.dynamicAnalysis) {
      this.scanBaseConcatenation(source, sourceUrl, add);
    }

    return {
      endpoints: Array.from(endpoints.values()),
      jsFiles: this.options.staticAnalysis ? this.scanScriptReferences(source, sourceUrl) : [],
    };
  }

  /**
   * Recognized HTTP call sites: a literal argument is a js-static endpoint,
   * a template or concatenation a js-dynamic one
   */
  private scanCallSites(source: string, sourceUrl: string, add: (endpoint: EndpointSpec) => void): void {
    for (const site of CALL_SITES) {
      site.pattern.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = site.pattern.exec(source)) !== null) {
        const arg = match[site.argGroup];
        if (!arg) continue;

        const rest = source.slice(match.index + match[0].length);
        const method = site.method(match, rest);

        const rebuilt = reconstructUrlArgument(arg);
        if (!rebuilt) continue;

        if (!rebuilt.dynamic) {
          if (!this.options.staticAnalysis || !looksLikeUrl(rebuilt.value)) continue;
          const url = resolveLiteral(rebuilt.value, sourceUrl);
          if (url) {
            add({ url, source: 'js-static', httpMethodGuess: method, foundOn: sourceUrl });
          }
          continue;
        }

        if (!this.options.dynamicAnalysis) continue;
        const url = resolveTemplate(rebuilt.value, sourceUrl);
        if (url) {
          add({ url, source: 'js-dynamic', httpMethodGuess: method, foundOn: sourceUrl });
        }
      }
    }
  }

  /**
   * Any string literal that resolves to an API-looking path
   */
  private scanLiterals(source: string, sourceUrl: string, add: (endpoint: EndpointSpec) => void): void {
    STRING_LITERAL.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = STRING_LITERAL.exec(source)) !== null) {
      const literal = match[2];
      if (literal.includes('${') || !looksLikeUrl(literal)) continue;

      const url = resolveLiteral(literal, sourceUrl);
      if (url && /^https?:/i.test(url) && isApiEndpoint(url, this.options.apiPatterns)) {
        add({ url, source: 'js-static', httpMethodGuess: 'UNKNOWN', foundOn: sourceUrl });
      }
    }
  }

  private scanBaseConcatenation(source: string, sourceUrl: string, add: (endpoint: EndpointSpec) => void): void {
    BASE_CONCAT.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = BASE_CONCAT.exec(source)) !== null) {
      const path = match[2];
      const template = `${PLACEHOLDER}${path.startsWith('/') ? '' : '/'}${path}`;
      add({ url: template, source: 'js-dynamic', httpMethodGuess: 'UNKNOWN', foundOn: sourceUrl });
    }
  }

  private scanScriptReferences(source: string, sourceUrl: string): string[] {
    const files = new Set<string>();
    SCRIPT_REFERENCE.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = SCRIPT_REFERENCE.exec(source)) !== null) {
      const url = resolveLiteral(match[1], sourceUrl);
      if (url) files.add(url);
    }
    return Array.from(files);
  }
}

/**
 * Literal `ws://` / `wss://` URLs anywhere in the text
 */
export function extractWebSocketUrls(text: string): string[] {
  const urls = new Set<string>();
  for (const match of text.matchAll(/\bwss?:\/\/[^\s'"`<>)\\]+/gi)) {
    urls.add(match[0]);
  }
  return Array.from(urls);
}
