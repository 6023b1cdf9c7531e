import http from 'node:http';
import type { FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProxyDispatcher, type DispatcherOptions } from '../src/dispatcher.js';
import { HeaderMap } from '../src/headers.js';
import { silentLogger } from '../src/logger.js';
import { buildServer } from '../src/server.js';
import { FetchTransport, type Transport } from '../src/transport.js';
import { FakeTransport } from './helpers/fakes.js';

const servers: FastifyInstance[] = [];

async function serve(transport: Transport, origin = 'http://backend:8000', options: DispatcherOptions = {}) {
  const proxy = await ProxyDispatcher.create(origin, {
    transport,
    healthCheck: () => true,
    logger: silentLogger,
    ...options,
  });
  proxy.rewritePath('GET|POST', '/items', '/api/items').passAnyPathUnder('GET', '/static');
  const app = buildServer(proxy, { healthPath: '/__proxy/health', metricsPath: '/__proxy/metrics' });
  servers.push(app);
  return { app, proxy };
}

afterEach(async () => {
  await Promise.all(servers.splice(0).map((app) => app.close()));
});

describe('buildServer', () => {
  it('proxies a rewritten GET with its query string', async () => {
    const transport = new FakeTransport(() => ({
      headers: new HeaderMap({ 'content-type': 'text/plain' }),
      body: Buffer.from('ok'),
    }));
    const { app } = await serve(transport);

    const res = await app.inject({ method: 'GET', url: '/items?q=1' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain');
    expect(res.body).toBe('ok');
    expect(transport.requests[0].path).toBe('/api/items');
    expect(transport.requests[0].query).toBe('?q=1');
    expect(transport.requests[0].headers.get('x-forwarded-proto')).toBe('http');
    expect(transport.requests[0].body).toBeUndefined();
  });

  it('forwards a POST body as raw bytes', async () => {
    const transport = new FakeTransport();
    const { app } = await serve(transport);

    await app.inject({
      method: 'POST',
      url: '/items',
      headers: { 'content-type': 'application/json' },
      payload: '{"name":"lamp"}',
    });

    expect(transport.requests[0].method).toBe('POST');
    expect(transport.requests[0].body?.toString()).toBe('{"name":"lamp"}');
    expect(transport.requests[0].headers.get('content-type')).toBe('application/json');
  });

  it('relays every Set-Cookie line from the origin', async () => {
    const transport = new FakeTransport(() => ({
      headers: new HeaderMap({ 'set-cookie': ['a=1', 'b=2'] }),
    }));
    const { app } = await serve(transport);

    const res = await app.inject({ method: 'GET', url: '/static/app.js' });

    expect(res.headers['set-cookie']).toEqual(['a=1', 'b=2']);
  });

  it('serves origin health as JSON', async () => {
    const { app } = await serve(new FakeTransport());

    const res = await app.inject({ method: 'GET', url: '/__proxy/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', origin: 'backend:8000', available: true, load: 0 });
  });

  it('reports a degraded origin with 503', async () => {
    const { app, proxy } = await serve(new FakeTransport());
    await proxy.setHealthCheckFunc(() => false, 60_000);

    const res = await app.inject({ method: 'GET', url: '/__proxy/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ status: 'degraded', origin: 'backend:8000', available: false, load: 0 });
  });

  it('exposes the origin gauges on the metrics route', async () => {
    const { app } = await serve(new FakeTransport(), 'http://metrics-origin:9000');

    const res = await app.inject({ method: 'GET', url: '/__proxy/metrics' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('proxy_origin_available{origin="metrics-origin:9000"} 1');
  });

  it('answers 404 for unrouted paths', async () => {
    const { app } = await serve(new FakeTransport());

    const res = await app.inject({ method: 'GET', url: '/missing' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Not found' });
  });

  it('answers 502 when the origin is down', async () => {
    const transport = new FakeTransport(() => {
      throw new Error('ECONNREFUSED');
    });
    const { app } = await serve(transport);

    const res = await app.inject({ method: 'GET', url: '/items' });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({ error: 'Bad gateway' });
  });

  it('finishes the reply when the error hook only logs', async () => {
    const seen = vi.fn();
    const transport = new FakeTransport(() => {
      throw new Error('ECONNREFUSED');
    });
    const { app } = await serve(transport, 'http://backend:8000', {
      errorHandler: (_sink, _req, error) => seen(error.kind),
    });

    const res = await app.inject({ method: 'GET', url: '/items' });

    expect(seen).toHaveBeenCalledWith('transport');
    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('');
  });

  it('keeps the status a hook set when it sends no body', async () => {
    const { app } = await serve(new FakeTransport(), 'http://backend:8000', {
      notFoundHandler: (sink) => sink.status(410),
    });

    const res = await app.inject({ method: 'GET', url: '/missing' });

    expect(res.statusCode).toBe(410);
    expect(res.body).toBe('');
  });

  it('stops the health monitor when the server closes', async () => {
    const { app, proxy } = await serve(new FakeTransport());
    servers.splice(servers.indexOf(app), 1);
    await app.close();
    expect(proxy.healthState).toBe('stopped');
  });
});

describe('buildServer with a live origin', () => {
  let origin: http.Server | undefined;

  afterEach(async () => {
    const s = origin;
    origin = undefined;
    if (!s) return;
    s.closeAllConnections();
    await new Promise<void>((resolve) => s.close(() => resolve()));
  });

  function listen(handler: http.RequestListener): Promise<string> {
    const s = http.createServer(handler);
    origin = s;
    return new Promise((resolve) => {
      s.listen(0, '127.0.0.1', () => {
        const address = s.address();
        if (address && typeof address !== 'string') resolve(`http://127.0.0.1:${address.port}`);
      });
    });
  }

  it('forwards an upload sent with Expect: 100-continue', async () => {
    const url = await listen((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (c: Buffer) => chunks.push(c));
      req.on('end', () => {
        res.setHeader('content-type', 'text/plain');
        res.end(`received ${Buffer.concat(chunks).length} bytes, expect=${req.headers.expect ?? 'none'}`);
      });
    });
    const { app } = await serve(new FetchTransport({ timeoutMs: 5000 }), url);

    const res = await app.inject({
      method: 'POST',
      url: '/items',
      headers: { 'content-type': 'application/octet-stream', expect: '100-continue' },
      payload: Buffer.alloc(2048, 1),
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('received 2048 bytes, expect=none');
  });
});
