import type { ClientLogger, SocketFactory } from '@hydra/client';
import { createLogger, rawDataToString, stderrOutput, type Logger, type LoggerOptions } from '@hydra/server';
import { WebSocket } from 'ws';

/** Client transport over the `ws` package, for Node.js hosts. */
export const nodeSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);

  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(rawDataToString(data)));
  ws.on('error', () => handlers.onError());
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString('utf-8')));

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (text) => ws.send(text),
    close: () => {
      if (ws.readyState === WebSocket.CONNECTING || ws.readyState === WebSocket.OPEN) {
        ws.close();
      }
    },
  };
};

/**
 * Route client diagnostics into the structured logger. Connection chatter
 * goes to debug so command output stays clean.
 */
export function clientLogger(log: Logger): ClientLogger {
  const context = (details: unknown[]) => (details.length > 0 ? { details } : undefined);
  return {
    debug: (message, ...details) => log.debug(message, context(details)),
    info: (message, ...details) => log.debug(message, context(details)),
    warn: (message, ...details) => log.warn(message, context(details)),
    error: (message, ...details) => log.error(message, context(details)),
  };
}

/** Client diagnostics for commands whose stdout carries their result. */
export function diagnosticsLogger(options: Omit<LoggerOptions, 'output'> = {}): ClientLogger {
  return clientLogger(createLogger('client', { ...options, output: stderrOutput }));
}
