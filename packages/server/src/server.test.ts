import type { AddressInfo } from 'net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import type { Logger } from './logger.js';
import { startServer, type RunningServer } from './server.js';
import { StorageEngine } from './storage/index.js';

function silentLogger(): Logger {
  const log: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => log,
  };
  return log;
}

function isAddressInfo(value: ReturnType<RunningServer['server']['address']>): value is AddressInfo {
  return typeof value === 'object' && value !== null;
}

/** Resolves with the first lifecycle event of a client socket. */
function firstEvent(ws: WebSocket): Promise<{ event: 'ping'; data: Buffer } | { event: 'error'; error: Error }> {
  return new Promise((resolve) => {
    ws.once('ping', (data: Buffer) => resolve({ event: 'ping', data }));
    ws.once('error', (error: Error) => resolve({ event: 'error', error }));
  });
}

describe('startServer', () => {
  let running: RunningServer;
  let log: Logger;
  let baseUrl: string;
  const sockets: WebSocket[] = [];

  beforeEach(async () => {
    log = silentLogger();
    running = await startServer(
      { port: 0, host: '127.0.0.1', dataDir: 'unused' },
      { storage: StorageEngine.temporary(), logger: log },
    );
    const address = running.server.address();
    if (!isAddressInfo(address)) throw new Error('server is not bound to a port');
    baseUrl = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    sockets.splice(0).forEach((ws) => ws.terminate());
    await running.close();
  });

  function connect(path: string): WebSocket {
    const ws = new WebSocket(`${baseUrl}${path}`);
    sockets.push(ws);
    return ws;
  }

  it('pings a client as soon as it connects on /ws', async () => {
    const result = await firstEvent(connect('/ws'));

    expect(result.event).toBe('ping');
    expect(result.event === 'ping' && [...result.data]).toEqual([1, 2, 3]);
    expect(running.wsManager.getConnectedClientsCount()).toBe(1);
  });

  it('refuses upgrades on other paths', async () => {
    const result = await firstEvent(connect('/other'));

    expect(result.event).toBe('error');
    expect(log.warn).toHaveBeenCalledWith('Rejected upgrade', { path: '/other' });
    expect(running.wsManager.getConnectedClientsCount()).toBe(0);
  });
});
