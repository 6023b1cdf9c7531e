import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export const registry = new Registry();

/** What the gauges read from a live proxy. */
export interface OriginStatusSource {
  isAvailable(): boolean;
  getLoad(): number;
}

const origins = new Map<string, OriginStatusSource>();

export function trackOrigin(origin: string, source: OriginStatusSource): () => void {
  origins.set(origin, source);
  return () => {
    if (origins.get(origin) === source) origins.delete(origin);
  };
}

export const requestsTotal = new Counter({
  name: 'proxy_requests_total',
  help: 'Total requests seen by the proxy, by outcome',
  labelNames: ['method', 'outcome'],
  registers: [registry],
});

export const requestDuration = new Histogram({
  name: 'proxy_request_duration_seconds',
  help: 'Request duration in seconds, including the origin round trip',
  labelNames: ['outcome'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const inflightRequests = new Gauge({
  name: 'proxy_inflight_requests',
  help: 'Requests currently being forwarded to the origin',
  labelNames: ['origin'],
  registers: [registry],
  collect() {
    this.reset();
    for (const [origin, source] of origins) this.set({ origin }, source.getLoad());
  },
});

export const originAvailable = new Gauge({
  name: 'proxy_origin_available',
  help: 'Origin reachability at the last health check (1=up, 0=down)',
  labelNames: ['origin'],
  registers: [registry],
  collect() {
    this.reset();
    for (const [origin, source] of origins) this.set({ origin }, source.isAvailable() ? 1 : 0);
  },
});
