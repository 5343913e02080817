import type { AddressInfo } from 'net';
import { Client, silentLogger } from '@hydra/client';
import { startServer, StorageEngine, type Logger, type RunningServer } from '@hydra/server';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { clientLogger, diagnosticsLogger, nodeSocketFactory } from './socket.js';

function quietLogger(): Logger {
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

describe('nodeSocketFactory', () => {
  let running: RunningServer;
  let port: number;
  let stopped: boolean;

  beforeEach(async () => {
    running = await startServer(
      { port: 0, host: '127.0.0.1', dataDir: 'unused' },
      { storage: StorageEngine.temporary(), logger: quietLogger() },
    );
    const address = running.server.address();
    if (!isAddressInfo(address)) throw new Error('server is not bound to a port');
    port = address.port;
    stopped = false;
  });

  afterEach(async () => {
    if (!stopped) await running.close();
  });

  it('fetches captured requests over a real socket', async () => {
    const captured = await fetch(`http://127.0.0.1:${port}/ingress/hooks/build?attempt=1`, {
      method: 'POST',
      body: 'payload',
    });
    expect(captured.status).toBe(200);

    const client = Client.new({ url: `ws://127.0.0.1:${port}/ws`, socketFactory: nodeSocketFactory, logger: silentLogger });
    try {
      await client.ready({ timeoutMs: 5000 });
      const page = await client.fetchIngressLogs({ direction: 'descending', limit: 10, cursor: { kind: 'none' } });

      expect(page.items).toHaveLength(1);
      expect(page.items[0]?.item).toMatchObject({
        method: 'POST',
        host: `127.0.0.1:${port}`,
        path: 'hooks/build',
        query: { attempt: '1' },
        body: Buffer.from('payload').toString('base64'),
        remote_addr: '127.0.0.1',
      });
      expect(page.has_more_after).toBe(false);
    } finally {
      client.close();
    }
  });

  it('reports a refused connection as a down socket', async () => {
    await running.close();
    stopped = true;

    const client = Client.new({
      url: `ws://127.0.0.1:${port}/ws`,
      socketFactory: nodeSocketFactory,
      logger: silentLogger,
    });
    const states: string[] = [];
    client.onStateChange((state) => states.push(state));

    await vi.waitFor(() => expect(states).toContain('error'));
    client.close();
    expect(client.state).toBe('closed');
  });
});

describe('clientLogger', () => {
  it('demotes info to debug and keeps details as context', () => {
    const log = quietLogger();
    const logger = clientLogger(log);

    logger.info('Connecting to', 'ws://127.0.0.1:9797/ws');
    logger.warn('Response for unknown request', 7);
    logger.error('Connection error');

    expect(log.debug).toHaveBeenCalledWith('Connecting to', { details: ['ws://127.0.0.1:9797/ws'] });
    expect(log.warn).toHaveBeenCalledWith('Response for unknown request', { details: [7] });
    expect(log.error).toHaveBeenCalledWith('Connection error', undefined);
  });
});

describe('diagnosticsLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps every level off stdout', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    const logger = diagnosticsLogger({ level: 'debug', format: 'json' });

    logger.warn('Dropped undecodable message:', 'Malformed message');
    logger.info('Reconnecting in 1000ms...');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(2);
    const lines = stderr.mock.calls.map(([chunk]) => JSON.parse(String(chunk)));
    expect(lines.map(({ level, scope, msg }) => ({ level, scope, msg }))).toEqual([
      { level: 'warn', scope: 'client', msg: 'Dropped undecodable message:' },
      { level: 'debug', scope: 'client', msg: 'Reconnecting in 1000ms...' },
    ]);
    expect(lines[0].details).toEqual(['Malformed message']);
  });
});
