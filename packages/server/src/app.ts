import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { getConnInfo } from '@hono/node-server/conninfo';
import { AppError } from './errors.js';
import { errorContext, logger as rootLogger, type Logger } from './logger.js';
import { createIngressRoutes, INGRESS_PATH, type RemoteAddrResolver } from './routes/ingress.js';
import { IngressLogService } from './services/ingress-log.js';
import type { StorageEngine } from './storage/index.js';

export const SERVICE_NAME = 'Hydra';
export const SERVICE_VERSION = '0.1.0';

export interface AppOptions {
  storage: StorageEngine;
  logger?: Logger;
  resolveRemoteAddr?: RemoteAddrResolver;
  now?: () => Date;
}

export interface HydraApp {
  app: Hono;
  ingress: IngressLogService;
}

const nodeRemoteAddr: RemoteAddrResolver = (c) => getConnInfo(c).remote.address ?? null;

export function createApp(options: AppOptions): HydraApp {
  const log = (options.logger ?? rootLogger).child('http');
  const ingress = new IngressLogService(options.storage, log.child('ingress'), { now: options.now });

  const app = new Hono();

  // Middleware
  app.use('/*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use('/*', async (c, next) => {
    const started = Date.now();
    await next();
    log.info('Request handled', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Date.now() - started,
    });
  });

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Root endpoint
  app.get('/', (c) => {
    return c.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        health: '/health',
        ingress: INGRESS_PATH,
        websocket: '/ws',
      },
    });
  });

  app.route(INGRESS_PATH, createIngressRoutes(ingress, options.resolveRemoteAddr ?? nodeRemoteAddr));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    if (err instanceof AppError) {
      if (err.status >= 500) log.error(err.message, errorContext(err.cause ?? err));
      return c.json({ error: err.message }, err.status);
    }
    log.error('Unhandled error', { ...errorContext(err), path: c.req.path });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return { app, ingress };
}
