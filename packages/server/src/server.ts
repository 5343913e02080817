import { Server } from 'http';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import type { ServerConfig } from './config.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { StorageEngine } from './storage/index.js';
import { WebSocketManager } from './websocket.js';

export interface RunningServer {
  server: Server;
  storage: StorageEngine;
  wsManager: WebSocketManager;
  close(): Promise<void>;
}

export interface StartOptions {
  storage?: StorageEngine;
  logger?: Logger;
}

/**
 * Start the HTTP + WebSocket server. Resolves once the port is bound.
 */
export function startServer(config: ServerConfig, options: StartOptions = {}): Promise<RunningServer> {
  const log = options.logger ?? rootLogger;
  const storage = options.storage ?? StorageEngine.open(config.dataDir);
  const { app, ingress } = createApp({ storage, logger: log });

  return new Promise((resolve, reject) => {
    // serve() returns the underlying Node.js server
    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
      log.info('Hydra server listening', { host: config.host, port: info.port, pid: process.pid, node: process.version });
      log.info(`WebSocket endpoint: ws://${config.host}:${info.port}/ws`);
    });

    if (!(server instanceof Server)) {
      reject(new Error('Expected an HTTP/1.1 server'));
      return;
    }

    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const wsManager = new WebSocketManager(server, { ingress }, log.child('ws'));

      const close = () => new Promise<void>((done, fail) => {
        log.info('Shutting down gracefully...');
        wsManager.close();
        server.close((error) => {
          storage.close();
          if (error) fail(error);
          else done();
        });
      });

      resolve({ server, storage, wsManager, close });
    });
  });
}
