import { METHODS } from 'node:http';
import Router from 'find-my-way';
import { ConfigurationError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type { ResponseModifier, Route } from './route.js';

export type PathParams = Readonly<Record<string, string>>;

export type MatchResult =
  | { kind: 'matched'; route: Route; params: PathParams }
  | { kind: 'not-found' }
  | { kind: 'method-not-allowed'; allowed: string[] };

export interface CompiledPattern {
  readonly source: string;
  /** The pattern in find-my-way syntax: named wildcards become a bare `*`. */
  readonly routerPath: string;
  /** Pattern with parameter names erased; two patterns with the same shape collide. */
  readonly shape: string;
  readonly params: readonly string[];
  readonly wildcard?: string;
}

const NAME = /^[A-Za-z0-9_]+$/;

export function compilePattern(pattern: string): CompiledPattern {
  if (!pattern.startsWith('/')) {
    throw new ConfigurationError(`Path pattern "${pattern}" must start with "/"`);
  }
  const segments = pattern.slice(1).split('/');
  const params: string[] = [];
  let wildcard: string | undefined;
  const routerSegments: string[] = [];
  const shapeSegments: string[] = [];

  segments.forEach((segment, i) => {
    if (segment.startsWith(':') || segment.startsWith('*')) {
      const name = segment.slice(1);
      if (!NAME.test(name)) {
        throw new ConfigurationError(`Invalid parameter "${segment}" in path pattern "${pattern}"`);
      }
      if (params.includes(name) || wildcard === name) {
        throw new ConfigurationError(`Parameter "${name}" appears twice in path pattern "${pattern}"`);
      }
      if (segment.startsWith('*')) {
        if (i !== segments.length - 1) {
          throw new ConfigurationError(`Wildcard "${segment}" must be the last segment of "${pattern}"`);
        }
        wildcard = name;
        routerSegments.push('*');
        shapeSegments.push('*');
      } else {
        params.push(name);
        routerSegments.push(segment);
        shapeSegments.push(':');
      }
      return;
    }
    if (segment.includes(':') || segment.includes('*')) {
      throw new ConfigurationError(`Segment "${segment}" of "${pattern}" mixes literal text with a parameter`);
    }
    routerSegments.push(segment);
    shapeSegments.push(segment);
  });

  return {
    source: pattern,
    routerPath: '/' + routerSegments.join('/'),
    shape: '/' + shapeSegments.join('/'),
    params,
    wildcard,
  };
}

type HttpMethod = Router.HTTPMethod;

function isHttpMethod(method: string): method is HttpMethod {
  return METHODS.includes(method);
}

/** Composite (method, registered path) key shared by the route table and modifier index. */
export function routeKey(method: string, path: string): string {
  return `${method} ${path}`;
}

interface Entry {
  route: Route;
  pattern: CompiledPattern;
}

/**
 * Method+path matcher for the proxied routes. Populated during setup and
 * sealed before the first request; lookups never mutate it.
 */
export class RouteTable {
  // segment length is bounded by the server's URL limit, not by the matcher
  private readonly matcher = Router({ maxParamLength: Number.MAX_SAFE_INTEGER });
  // keyed by method and pattern shape, since find-my-way treats `/a/:x` and `/a/:y` as one route
  private readonly entries = new Map<string, Entry>();
  private readonly methods = new Set<HttpMethod>();
  private sealed = false;

  constructor(private readonly logger: Logger = createLogger('router')) {}

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.entries.size;
  }

  seal(): void {
    this.sealed = true;
  }

  register(route: Route): void {
    if (this.sealed) {
      throw new ConfigurationError(`Cannot register "${route.path}" after serving has started`);
    }
    if (route.methods.length === 0) {
      throw new ConfigurationError(`Route "${route.path}" has no methods`);
    }
    const pattern = compilePattern(route.path);
    const methods: HttpMethod[] = [];
    for (const method of new Set(route.methods)) {
      if (!isHttpMethod(method)) {
        throw new ConfigurationError(`Unknown HTTP method "${method}" for route "${route.path}"`);
      }
      methods.push(method);
    }

    for (const method of methods) {
      const key = routeKey(method, pattern.shape);
      const previous = this.entries.get(key);
      try {
        if (previous) {
          this.matcher.off(method, previous.pattern.routerPath);
          this.logger.warn('Route registered twice, replacing the earlier one', {
            method,
            path: route.path,
            previous: previous.route.path,
          });
        }
        this.matcher.on(method, pattern.routerPath, () => undefined, key);
      } catch (err) {
        throw new ConfigurationError(`Cannot register ${method} ${route.path}: ${String(err)}`, { cause: err });
      }
      this.entries.set(key, { route, pattern });
      this.methods.add(method);
    }
  }

  match(method: string, path: string): MatchResult {
    const found = isHttpMethod(method) ? this.lookup(method, path) : undefined;
    if (found) return { kind: 'matched', ...found };

    const allowed = [...this.methods].filter((m) => m !== method && this.lookup(m, path) !== undefined);
    if (allowed.length > 0) return { kind: 'method-not-allowed', allowed };
    return { kind: 'not-found' };
  }

  private lookup(method: HttpMethod, path: string): { route: Route; params: PathParams } | undefined {
    if (!this.methods.has(method)) return undefined;
    const found = this.matcher.find(method, path) ?? this.findUndecodable(method, path);
    if (!found) return undefined;
    const key: unknown = found.store;
    const entry = typeof key === 'string' ? this.entries.get(key) : undefined;
    if (!entry) return undefined;

    const params: Record<string, string> = {};
    for (const name of entry.pattern.params) {
      const value = found.params[name];
      // a named parameter never binds an empty segment
      if (!value) return undefined;
      params[name] = value;
    }
    if (entry.pattern.wildcard) {
      params[entry.pattern.wildcard] = found.params['*'] ?? '';
    }
    return { route: entry.route, params };
  }

  /**
   * find-my-way gives up on a segment whose percent-encoding does not decode
   * (`/items/%E0%A4%A`). Retry with every `%` escaped so such a segment binds
   * as the raw text the client sent.
   */
  private findUndecodable(method: HttpMethod, path: string) {
    if (!path.includes('%')) return null;
    return this.matcher.find(method, path.replaceAll('%', '%25'));
  }
}

/** Route-scoped response modifiers by (method, registered path). */
export class ResponseModifierIndex {
  private readonly modifiers = new Map<string, ResponseModifier>();

  set(method: string, path: string, modifier: ResponseModifier | undefined): void {
    const key = routeKey(method, path);
    if (modifier) {
      this.modifiers.set(key, modifier);
    } else {
      this.modifiers.delete(key);
    }
  }

  get(method: string, path: string): ResponseModifier | undefined {
    return this.modifiers.get(routeKey(method, path));
  }

  get size(): number {
    return this.modifiers.size;
  }
}
