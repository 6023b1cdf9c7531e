import { RewriteError } from './errors.js';
import type { PathParams } from './router.js';

const NAME = /^[A-Za-z0-9_]+$/;

function encodeRemainder(value: string): string {
  return value.split('/').map(encodeURIComponent).join('/');
}

/**
 * Substitutes captured parameters into a rewrite target such as
 * `/api/items/:id` or `/assets/*rest`. The target is parsed on every call,
 * so a bad target surfaces per request rather than at registration.
 */
export function applyRewrite(target: string, params: PathParams): string {
  if (!target.startsWith('/')) {
    throw new RewriteError(`Rewrite target "${target}" must start with "/"`, target);
  }
  const segments = target.slice(1).split('/');

  const out = segments.map((segment, i) => {
    const sigil = segment[0];
    if (sigil !== ':' && sigil !== '*') return segment;

    const name = segment.slice(1);
    if (!NAME.test(name)) {
      throw new RewriteError(`Invalid parameter "${segment}" in rewrite target "${target}"`, target);
    }
    if (sigil === '*' && i !== segments.length - 1) {
      throw new RewriteError(`Wildcard "${segment}" must be the last segment of "${target}"`, target);
    }
    const value = params[name];
    if (value === undefined) {
      throw new RewriteError(`Rewrite target "${target}" references "${name}", which the route does not capture`, target);
    }
    return sigil === '*' ? encodeRemainder(value) : encodeURIComponent(value);
  });

  return '/' + out.join('/');
}

/** Joins an origin base path and a request path with exactly one slash between them. */
export function joinPaths(base: string, path: string): string {
  const baseSlash = base.endsWith('/');
  const pathSlash = path.startsWith('/');
  if (baseSlash && pathSlash) return base + path.slice(1);
  if (!baseSlash && !pathSlash) return `${base}/${path}`;
  return base + path;
}

/** Origin query first, then the request's; either may be empty. */
export function joinQueries(originQuery: string, requestQuery: string): string {
  const a = originQuery.replace(/^\?/, '');
  const b = requestQuery.replace(/^\?/, '');
  if (!a && !b) return '';
  if (!a || !b) return `?${a || b}`;
  return `?${a}&${b}`;
}
