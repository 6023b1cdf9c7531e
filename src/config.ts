import fs from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { ProxyDispatcher } from './dispatcher.js';
import { isLevel, type Level } from './logger.js';
import { joinPaths } from './rewrite.js';
import { newRoute, withRequestHeaders, withRewrite } from './route.js';

export interface Settings {
  origin: string;            // e.g. "http://backend:8000"
  port: number;
  host: string;
  healthCheckPeriodMs: number;
  healthCheckTimeoutMs: number;
  upstreamTimeoutMs: number;
  logLevel: Level;
  routesFile?: string;       // JSON file of RouteConfig entries
  healthPath: string;
  metricsPath: string;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Readonly<Settings> {
  const origin = env.ORIGIN_URL;
  if (!origin) {
    throw new ConfigurationError('ORIGIN_URL is required');
  }
  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error; got "${logLevel}"`);
  }

  return Object.freeze({
    origin,
    port: positiveInt(env, 'PORT', 3016),
    host: env.HOST || '0.0.0.0',
    healthCheckPeriodMs: positiveInt(env, 'HEALTH_CHECK_PERIOD_MS', 10_000),
    healthCheckTimeoutMs: positiveInt(env, 'HEALTH_CHECK_TIMEOUT_MS', 10_000),
    upstreamTimeoutMs: positiveInt(env, 'UPSTREAM_TIMEOUT_MS', 30_000),
    logLevel,
    routesFile: env.ROUTES_FILE || undefined,
    healthPath: env.HEALTH_PATH || '/__proxy/health',
    metricsPath: env.METRICS_PATH || '/__proxy/metrics',
  });
}

const headerValue = z.union([z.string(), z.array(z.string())]);

export const zRouteConfig = z.object({
  methods: z.string().min(1),                       // "*", "GET" or "GET|POST"
  path: z.string().startsWith('/').optional(),
  rewrite: z.string().startsWith('/').optional(),
  headers: z.record(headerValue).optional(),
  under: z.array(z.string().startsWith('/')).min(1).optional(), // wildcard under each prefix
}).refine((r) => Boolean(r.path) !== Boolean(r.under), {
  message: 'exactly one of "path" or "under" is required',
}).refine((r) => !(r.rewrite && r.under), {
  message: '"rewrite" cannot be combined with "under"',
});

export type RouteConfig = z.infer<typeof zRouteConfig>;

export const zRoutesFile = z.array(zRouteConfig);

export function parseRoutes(input: unknown): RouteConfig[] {
  const result = zRoutesFile.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid routes: ${detail}`, { cause: result.error });
  }
  return result.data;
}

export function loadRoutes(file: string): RouteConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read routes file ${file}`, { cause: err });
  }
  return parseRoutes(raw);
}

export function applyRoutes(proxy: ProxyDispatcher, routes: readonly RouteConfig[]): ProxyDispatcher {
  for (const config of routes) {
    const paths = config.under?.map((prefix) => joinPaths(prefix, '/*path')) ?? (config.path ? [config.path] : []);
    for (const path of paths) {
      let route = newRoute(config.methods, path);
      if (config.rewrite) route = withRewrite(route, config.rewrite);
      if (config.headers) route = withRequestHeaders(route, config.headers);
      proxy.handlePath(route);
    }
  }
  return proxy;
}
