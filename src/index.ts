#!/usr/bin/env node
import { applyRoutes, loadRoutes, loadSettings } from './config.js';
import { ProxyDispatcher } from './dispatcher.js';
import { tcpCheck } from './healthMonitor.js';
import { createLogger } from './logger.js';
import { buildServer } from './server.js';
import { FetchTransport } from './transport.js';

const settings = loadSettings();
const logger = createLogger('proxy', settings.logLevel);

const proxy = await ProxyDispatcher.create(settings.origin, {
  transport: new FetchTransport({ timeoutMs: settings.upstreamTimeoutMs }),
  healthCheck: tcpCheck(settings.healthCheckTimeoutMs),
  healthCheckPeriodMs: settings.healthCheckPeriodMs,
  logger,
});

if (settings.routesFile) {
  const routes = loadRoutes(settings.routesFile);
  applyRoutes(proxy, routes);
  logger.info('Routes loaded', { file: settings.routesFile, count: routes.length });
} else {
  proxy.passAnyPath('*');
  logger.info('No ROUTES_FILE set, passing every path to the origin');
}

const server = buildServer(proxy, {
  healthPath: settings.healthPath,
  metricsPath: settings.metricsPath,
});

let shuttingDown = false;
const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Shutting down', { signal });
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error('Shutdown failed', { error: String(err) });
      process.exit(1);
    }
  );
};
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

await server.listen({ port: settings.port, host: settings.host });
logger.info(`Proxy running on port ${settings.port}`, {
  origin: settings.origin,
  available: proxy.isAvailable(),
});
