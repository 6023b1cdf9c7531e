import {
  ConfigurationError,
  toModifierError,
  toProxyError,
  toTransportError,
  type ProxyError,
} from './errors.js';
import {
  HeaderMap,
  mergeRequestHeaders,
  mergeSinkHeaders,
  removeHopHeaders,
  type HeaderInit,
  type ResponseSink,
} from './headers.js';
import { HealthMonitor, type HealthCheck, type HealthState } from './healthMonitor.js';
import { LoadCounter } from './loadCounter.js';
import { createLogger, type Logger } from './logger.js';
import { requestDuration, requestsTotal, trackOrigin, type OriginStatusSource } from './metrics.js';
import { applyRewrite, joinPaths, joinQueries } from './rewrite.js';
import { newRoute, withRewrite, type ResponseModifier, type Route } from './route.js';
import { ResponseModifierIndex, RouteTable } from './router.js';
import { FetchTransport, type OutgoingRequest, type Transport, type UpstreamResponse } from './transport.js';

/** An incoming request, already detached from the HTTP framework that received it. */
export interface ProxyRequest {
  method: string;
  /** `http` or `https`, as the client spoke to the proxy. */
  scheme: string;
  /** The client's Host header. */
  host: string;
  path: string;
  /** Raw query string including the leading `?`, or empty. */
  query: string;
  headers: HeaderMap;
  body?: Buffer;
  remoteAddress?: string;
}

export type ErrorHandler = (sink: ResponseSink, request: ProxyRequest, error: ProxyError) => void | Promise<void>;
export type NotFoundHandler = (sink: ResponseSink, request: ProxyRequest) => void | Promise<void>;
export type MethodNotAllowedHandler = (
  sink: ResponseSink,
  request: ProxyRequest,
  allowed: readonly string[]
) => void | Promise<void>;

export interface DispatcherOptions {
  transport?: Transport;
  /** Sent on every forwarded request; route headers override these key by key. */
  requestHeaders?: HeaderInit;
  /** Runs on every upstream response, before the route's own modifier. */
  modifyResponse?: ResponseModifier;
  errorHandler?: ErrorHandler;
  notFoundHandler?: NotFoundHandler;
  methodNotAllowedHandler?: MethodNotAllowedHandler;
  healthCheck?: HealthCheck;
  healthCheckPeriodMs?: number;
  logger?: Logger;
}

interface Settings {
  readonly transport: Transport;
  readonly requestHeaders?: HeaderMap;
  readonly modifyResponse?: ResponseModifier;
  readonly errorHandler: ErrorHandler;
  readonly notFoundHandler: NotFoundHandler;
  readonly methodNotAllowedHandler: MethodNotAllowedHandler;
}

type Outcome = 'forwarded' | 'not-found' | 'method-not-allowed' | 'errored';

export async function sendJson(
  sink: ResponseSink,
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<void> {
  sink.status(status);
  sink.setHeader('content-type', 'application/json; charset=utf-8');
  for (const [key, value] of Object.entries(headers)) sink.setHeader(key, value);
  await sink.send(JSON.stringify(body));
}

export const defaultErrorHandler: ErrorHandler = async (sink, _request, error) => {
  if (sink.sent) return;
  if (error.kind === 'transport') {
    await sendJson(sink, 502, { error: 'Bad gateway' });
    return;
  }
  await sendJson(sink, 500, { error: 'Internal proxy error' });
};

export const defaultNotFoundHandler: NotFoundHandler = (sink) => sendJson(sink, 404, { error: 'Not found' });

export const defaultMethodNotAllowedHandler: MethodNotAllowedHandler = (sink, _request, allowed) =>
  sendJson(sink, 405, { error: 'Method not allowed' }, { allow: allowed.join(', ') });

export function parseOrigin(origin: string): URL {
  let url: URL;
  try {
    url = new URL(origin);
  } catch (err) {
    throw new ConfigurationError(`Invalid origin URL "${origin}"`, { cause: err });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`Origin "${origin}" must use http or https`);
  }
  if (!url.host) {
    throw new ConfigurationError(`Origin "${origin}" has no host`);
  }
  return url;
}

/**
 * Reverse proxy for a single origin. Requests are matched against the
 * registered routes, rewritten and forwarded through the transport, and the
 * upstream response passes through the modifier chain on its way back.
 *
 * ```ts
 * const proxy = await ProxyDispatcher.create('http://backend:8000');
 * proxy.rewritePath('GET|POST', '/items', '/api/items').passAnyPathUnder('GET', '/static');
 * ```
 *
 * Routes must be registered before the first request is handled.
 */
export class ProxyDispatcher implements OriginStatusSource {
  private readonly table: RouteTable;
  private readonly modifiers = new ResponseModifierIndex();
  private readonly load = new LoadCounter();
  private readonly settings: Settings;
  private readonly untrack: () => void;
  private closed = false;

  private constructor(
    readonly origin: URL,
    private readonly health: HealthMonitor,
    options: DispatcherOptions,
    private readonly logger: Logger
  ) {
    this.table = new RouteTable(logger);
    this.settings = Object.freeze({
      transport: options.transport ?? new FetchTransport(),
      requestHeaders: options.requestHeaders ? new HeaderMap(options.requestHeaders) : undefined,
      modifyResponse: options.modifyResponse,
      errorHandler: options.errorHandler ?? defaultErrorHandler,
      notFoundHandler: options.notFoundHandler ?? defaultNotFoundHandler,
      methodNotAllowedHandler: options.methodNotAllowedHandler ?? defaultMethodNotAllowedHandler,
    });
    this.untrack = trackOrigin(origin.host, this);
  }

  /** Rejects with ConfigurationError when the origin is not an http(s) URL. */
  static async create(origin: string, options: DispatcherOptions = {}): Promise<ProxyDispatcher> {
    const url = parseOrigin(origin);
    const logger = options.logger ?? createLogger('proxy');
    const health = await HealthMonitor.start(url, {
      check: options.healthCheck,
      periodMs: options.healthCheckPeriodMs,
      logger,
    });
    return new ProxyDispatcher(url, health, options, logger);
  }

  // --- Registration ---

  handlePath(route: Route): this {
    this.table.register(route);
    for (const method of new Set(route.methods)) {
      this.modifiers.set(method, route.path, route.responseModifier);
    }
    return this;
  }

  passPath(methods: string, path: string): this {
    return this.handlePath(newRoute(methods, path));
  }

  passPaths(methods: string, ...paths: string[]): this {
    for (const path of paths) this.passPath(methods, path);
    return this;
  }

  passAnyPath(methods: string): this {
    return this.passPath(methods, '/*path');
  }

  passAnyPathUnder(methods: string, ...paths: string[]): this {
    for (const path of paths) this.passPath(methods, joinPaths(path, '/*path'));
    return this;
  }

  rewritePath(methods: string, sourcePath: string, targetPath: string): this {
    return this.handlePath(withRewrite(newRoute(methods, sourcePath), targetPath));
  }

  // --- Health and load ---

  isAvailable(): boolean {
    return this.health.isAvailable();
  }

  get healthState(): HealthState {
    return this.health.state;
  }

  setHealthCheckFunc(check: HealthCheck, periodMs: number): Promise<void> {
    return this.health.setCheckFunc(check, periodMs);
  }

  getLoad(): number {
    return this.load.get();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.untrack();
    await this.health.stop();
  }

  // --- Serving ---

  /**
   * Serves one request. Never rejects: every failure is handed to the
   * error handler, and the load counter is released on every path.
   */
  async handle(request: ProxyRequest, sink: ResponseSink): Promise<void> {
    this.table.seal();
    this.load.increment();
    const started = performance.now();
    let outcome: Outcome = 'errored';
    try {
      outcome = await this.dispatch(request, sink);
    } catch (err) {
      await this.fail(sink, request, toProxyError(err));
    } finally {
      this.load.decrement();
      requestsTotal.inc({ method: request.method, outcome });
      requestDuration.observe({ outcome }, (performance.now() - started) / 1000);
    }
  }

  private async dispatch(request: ProxyRequest, sink: ResponseSink): Promise<Outcome> {
    const match = this.table.match(request.method, request.path);
    if (match.kind === 'not-found') {
      await this.settings.notFoundHandler(sink, request);
      return 'not-found';
    }
    if (match.kind === 'method-not-allowed') {
      await this.settings.methodNotAllowedHandler(sink, request, match.allowed);
      return 'method-not-allowed';
    }

    const { route, params } = match;
    const outgoing = this.prepare(request);
    if (route.rewriteTarget) {
      outgoing.path = applyRewrite(route.rewriteTarget, params);
    }
    mergeRequestHeaders(outgoing, this.settings.requestHeaders, route.requestHeaders);
    outgoing.path = joinPaths(this.origin.pathname, outgoing.path);
    outgoing.query = joinQueries(this.origin.search, request.query);

    this.logger.debug('Forwarding request', {
      method: request.method,
      path: request.path,
      route: route.path,
      target: outgoing.path,
    });

    let response: UpstreamResponse;
    try {
      response = await this.settings.transport.roundTrip(outgoing);
    } catch (err) {
      throw toTransportError(err);
    }

    await this.applyModifiers(request.method, route.path, response);
    await this.relay(sink, response);
    return 'forwarded';
  }

  private prepare(request: ProxyRequest): OutgoingRequest {
    const headers = request.headers.clone();
    removeHopHeaders(headers);
    // the server in front of us already answered 100-continue; fetch rejects the header
    headers.delete('expect');
    headers.set('x-forwarded-proto', request.scheme);
    headers.set('x-forwarded-host', request.host);
    if (request.remoteAddress) {
      const prior = headers.values('x-forwarded-for').join(', ');
      headers.set('x-forwarded-for', prior ? `${prior}, ${request.remoteAddress}` : request.remoteAddress);
    }
    headers.set('host', this.origin.host);

    return {
      method: request.method,
      origin: this.origin,
      host: this.origin.host,
      path: request.path,
      query: request.query,
      headers,
      body: request.body,
    };
  }

  private async applyModifiers(method: string, routePath: string, response: UpstreamResponse): Promise<void> {
    if (this.settings.modifyResponse) {
      try {
        await this.settings.modifyResponse(response);
      } catch (err) {
        throw toModifierError(err, 'global');
      }
    }
    const modifier = this.modifiers.get(method, routePath);
    if (modifier) {
      try {
        await modifier(response);
      } catch (err) {
        throw toModifierError(err, 'route');
      }
    }
  }

  private async relay(sink: ResponseSink, response: UpstreamResponse): Promise<void> {
    const headers = response.headers.clone();
    removeHopHeaders(headers);
    sink.status(response.status);
    mergeSinkHeaders(sink, headers);
    await sink.send(response.body);
  }

  private async fail(sink: ResponseSink, request: ProxyRequest, error: ProxyError): Promise<void> {
    this.logger.error('Proxy error', {
      method: request.method,
      path: request.path,
      kind: error.kind,
      error: error.message,
    });
    try {
      await this.settings.errorHandler(sink, request, error);
    } catch (hookErr) {
      this.logger.error('Error handler failed', { error: String(hookErr) });
      if (sink.sent) return;
      try {
        await sendJson(sink, 500, { error: 'Internal proxy error' });
      } catch (sendErr) {
        this.logger.error('Could not send fallback error response', { error: String(sendErr) });
      }
    }
  }
}
