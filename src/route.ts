import { HeaderMap, type HeaderInit } from './headers.js';
import type { UpstreamResponse } from './transport.js';

export const ALL_METHODS = ['GET', 'HEAD', 'OPTIONS', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

/** Mutates the upstream response before it is relayed. Throw (or reject) to fail. */
export type ResponseModifier = (response: UpstreamResponse) => void | Promise<void>;

export interface Route {
  readonly methods: readonly string[];
  readonly path: string;
  /** Empty means the request path is forwarded unchanged. */
  readonly rewriteTarget: string;
  readonly requestHeaders?: HeaderMap;
  readonly responseModifier?: ResponseModifier;
}

/**
 * `"*"` is every common verb, otherwise verbs are separated by `|`:
 * `"GET|POST"` gives `["GET", "POST"]`.
 */
export function parseMethods(methods: string): string[] {
  if (methods === '*') return [...ALL_METHODS];
  return methods.split('|').map((m) => m.trim());
}

export function newRoute(methods: string, path: string): Route {
  return {
    methods: parseMethods(methods),
    path,
    rewriteTarget: '',
  };
}

export function withRewrite(route: Route, target: string): Route {
  return { ...route, rewriteTarget: target };
}

export function withRequestHeaders(route: Route, headers: HeaderInit): Route {
  return { ...route, requestHeaders: new HeaderMap(headers) };
}

export function withResponseModifier(route: Route, modifier: ResponseModifier | undefined): Route {
  return { ...route, responseModifier: modifier };
}
