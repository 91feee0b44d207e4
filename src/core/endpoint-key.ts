/**
 * Endpoint keys and path templates.
 *
 * A key's display form is 'METHOD /path/{param}'. Its identity ignores
 * placeholder names: '/users/{id}' and '/users/{userId}' are the same
 * endpoint, while the names still matter for dependency inference.
 */

import { EndpointKey } from './types';

const PLACEHOLDER = /^\{([^{}]+)\}$/;

/**
 * Normalize a path into a template: strips scheme/host, query and fragment,
 * collapses slashes, rewrites ':id' and '{{id}}' segments to '{id}'.
 */
export function normalizePath(rawPath: string): string {
  let p = rawPath.trim();

  p = p.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/]*/i, '');
  p = p.replace(/^\{\{[^}]+\}\}/, '');
  p = p.split('#')[0].split('?')[0];

  const segments = p
    .split('/')
    .filter((s) => s.length > 0)
    .map((segment) => {
      const postman = segment.match(/^\{\{([^{}]+)\}\}$/);
      if (postman) return `{${postman[1]}}`;
      if (segment.startsWith(':') && segment.length > 1) return `{${segment.slice(1)}}`;
      return segment;
    });

  return '/' + segments.join('/');
}

export function createKey(method: string, path: string): EndpointKey {
  return { method: method.trim().toUpperCase(), path: normalizePath(path) };
}

/**
 * Display form: 'GET /users/{id}'.
 */
export function formatKey(key: EndpointKey): string {
  return `${key.method} ${key.path}`;
}

/**
 * Parse a display key ('GET /users/{id}').
 */
export function parseKey(display: string): EndpointKey | null {
  const match = display.trim().match(/^([A-Za-z]+)\s+(\S+)$/);
  if (!match) return null;
  return createKey(match[1], match[2]);
}

/**
 * Identity used for lookup and comparison: placeholder names are erased.
 */
export function endpointIdentity(key: EndpointKey): string {
  const shape = key.path
    .split('/')
    .map((segment) => (PLACEHOLDER.test(segment) ? '{}' : segment))
    .join('/');
  return `${key.method.toUpperCase()} ${shape}`;
}

export function keysEqual(a: EndpointKey, b: EndpointKey): boolean {
  return endpointIdentity(a) === endpointIdentity(b);
}

/**
 * Placeholder names of a template, in order.
 */
export function pathPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const segment of template.split('/')) {
    const match = segment.match(PLACEHOLDER);
    if (match) names.push(match[1]);
  }
  return names;
}

/**
 * Check whether a concrete path ('/users/42') fits a template ('/users/{id}').
 */
export function matchesTemplate(template: string, concretePath: string): boolean {
  const t = normalizePath(template).split('/');
  const c = normalizePath(concretePath).split('/');
  if (t.length !== c.length) return false;
  return t.every((segment, i) => PLACEHOLDER.test(segment) || segment === c[i]);
}

/**
 * Pick the best template for a concrete path: literal segments win over
 * placeholders, compared left to right ('/users/me' beats '/users/{id}').
 */
export function findMatchingTemplate(templates: string[], concretePath: string): string | null {
  let best: string | null = null;
  let bestScore = '';

  for (const template of templates) {
    if (!matchesTemplate(template, concretePath)) continue;
    const score = normalizePath(template)
      .split('/')
      .map((segment) => (PLACEHOLDER.test(segment) ? '0' : '1'))
      .join('');
    if (best === null || score > bestScore || (score === bestScore && template < best)) {
      best = template;
      bestScore = score;
    }
  }

  return best;
}

/**
 * Remove a base path prefix ('/v1') from a request path.
 */
export function stripBasePath(path: string, basePath?: string): string {
  const normalized = normalizePath(path);
  if (!basePath) return normalized;
  const base = normalizePath(basePath);
  if (base === '/') return normalized;
  if (normalized === base) return '/';
  return normalized.startsWith(base + '/') ? normalized.slice(base.length) : normalized;
}

/**
 * Lexical comparison independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
