/**
 * Form Extraction
 * Forms, hidden fields and CSRF tokens
 */

import type { CheerioAPI } from 'cheerio';
import { FormField, FormSpec } from './extraction.types';

/**
 * Common anti-forgery field names:
 * csrf_token, csrftoken, _csrf, _token, authenticity_token (Rails),
 * __RequestVerificationToken (ASP.NET), csrfmiddlewaretoken (Django),
 * _xsrf (Tornado), XSRF-TOKEN, _wpnonce (WordPress), form_token (Drupal)
 */
export const DEFAULT_CSRF_FIELD_PATTERN =
  /csrf|xsrf|^_token$|authenticity_token|requestverificationtoken|nonce|form_token/i;

// Common CSRF meta tag names
const CSRF_META_NAMES = ['csrf-token', 'csrf_token', 'csrftoken', '_csrf', 'x-csrf-token', 'xsrf-token'];

/**
 * Token from a `<meta name="csrf-token">`-style tag
 */
export function extractMetaCsrfToken($: CheerioAPI): string | null {
  let token: string | null = null;

  $('meta[name]').each((_, el) => {
    const name = ($(el).attr('name') || '').toLowerCase();
    const content = $(el).attr('content');
    if (!token && content && CSRF_META_NAMES.includes(name)) {
      token = content;
    }
  });

  return token;
}

function resolveAction(action: string, pageUrl: string): string {
  try {
    return new URL(action || pageUrl, pageUrl).href;
  } catch {
    return action;
  }
}

function fieldType(tagName: string, typeAttr: string | undefined): string {
  if (tagName === 'select' || tagName === 'textarea') {
    return tagName;
  }
  return (typeAttr || 'text').toLowerCase();
}

/**
 * Every form on the page, with named fields. The CSRF token is the first
 * token-like field's value, else the page's CSRF meta tag.
 */
export function extractForms($: CheerioAPI, pageUrl: string, csrfFieldPattern: RegExp): FormSpec[] {
  const metaToken = extractMetaCsrfToken($);
  const forms: FormSpec[] = [];

  $('form').each((_, formEl) => {
    const form = $(formEl);
    const fields: FormField[] = [];
    let csrfToken: string | null = null;

    form.find('input, select, textarea').each((_, el) => {
      const $el = $(el);
      const name = $el.attr('name');
      if (!name) return;

      const tagName = ($el.prop('tagName') || '').toLowerCase();
      const type = fieldType(tagName, $el.attr('type'));
      const csrf = csrfFieldPattern.test(name);
      const value = $el.attr('value');

      if (csrf && csrfToken === null && value) {
        csrfToken = value;
      }

      fields.push({ name, type, hidden: type === 'hidden', csrf });
    });

    forms.push({
      action: resolveAction(form.attr('action') || '', pageUrl),
      method: (form.attr('method') || 'GET').toUpperCase(),
      fields,
      csrfToken: csrfToken || metaToken,
      pageUrl,
    });
  });

  return forms;
}
