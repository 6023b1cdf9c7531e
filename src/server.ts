import Fastify from 'fastify';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ProxyDispatcher, ProxyRequest } from './dispatcher.js';
import { HeaderMap, type ResponseSink } from './headers.js';
import { registry } from './metrics.js';

/** Writes the dispatcher's output through a fastify reply. */
export class ReplySink implements ResponseSink {
  constructor(private readonly reply: FastifyReply) {}

  get sent(): boolean {
    return this.reply.sent;
  }

  status(code: number): void {
    this.reply.status(code);
  }

  setHeader(key: string, value: string): void {
    // fastify appends set-cookie on header(), so clear it first to get replace semantics
    this.reply.removeHeader(key);
    this.reply.header(key, value);
  }

  addHeader(key: string, value: string): void {
    const existing = this.reply.getHeader(key);
    if (existing === undefined || key.toLowerCase() === 'set-cookie') {
      this.reply.header(key, value);
      return;
    }
    const lines = Array.isArray(existing) ? existing : [String(existing)];
    this.reply.header(key, [...lines, value]);
  }

  send(body?: Buffer | string): void {
    this.reply.send(body);
  }
}

function splitUrl(url: string): { path: string; query: string } {
  const i = url.indexOf('?');
  if (i < 0) return { path: url, query: '' };
  return { path: url.slice(0, i), query: url.slice(i) };
}

export function toProxyRequest(req: FastifyRequest): ProxyRequest {
  const { path, query } = splitUrl(req.url);
  return {
    method: req.method,
    scheme: req.protocol,
    host: req.headers.host ?? req.hostname,
    path,
    query,
    headers: HeaderMap.fromIncoming(req.headers),
    body: Buffer.isBuffer(req.body) ? req.body : undefined,
    remoteAddress: req.ip,
  };
}

export interface ServerOptions {
  /** Serves availability and load as JSON; omitted means no health route. */
  healthPath?: string;
  /** Serves the prom-client registry; omitted means no metrics route. */
  metricsPath?: string;
  bodyLimit?: number;
}

/**
 * Mounts the dispatcher behind a catch-all route. Admin routes, when enabled,
 * take precedence over proxying for GET on their exact paths. Closing the
 * server closes the dispatcher.
 */
export function buildServer(dispatcher: ProxyDispatcher, options: ServerOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: false,
    exposeHeadRoutes: false,
    ...(options.bodyLimit ? { bodyLimit: options.bodyLimit } : {}),
  });

  // bodies are forwarded as received
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, async (_req: FastifyRequest, body: Buffer) => body);

  if (options.healthPath) {
    app.get(options.healthPath, async (_req, reply) => {
      const available = dispatcher.isAvailable();
      reply.status(available ? 200 : 503);
      return {
        status: available ? 'ok' : 'degraded',
        origin: dispatcher.origin.host,
        available,
        load: dispatcher.getLoad(),
      };
    });
  }

  if (options.metricsPath) {
    app.get(options.metricsPath, async (_req, reply) => {
      reply.header('Content-Type', registry.contentType);
      return registry.metrics();
    });
  }

  app.all('*', async (req, reply) => {
    await dispatcher.handle(toProxyRequest(req), new ReplySink(reply));
    // a hook that only logs leaves the reply open; finish it with whatever status was set
    if (!reply.sent) reply.send();
    return reply;
  });

  app.addHook('onClose', async () => {
    await dispatcher.close();
  });

  return app;
}
