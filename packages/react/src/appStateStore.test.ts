import { ClientClosedError, ReadyTimeoutError } from '@hydra/client';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createAppStateStore } from './appStateStore.js';
import { fakeClients } from './test/fakeClient.js';

describe('createAppStateStore', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes the client only after it is ready', async () => {
    const fakes = fakeClients();
    const init = vi.fn(async () => {});
    const store = createAppStateStore({ init, createClient: fakes.createClient });

    store.getState().initialize();
    expect(store.getState().lifecycle).toEqual({ status: 'initializing' });

    await vi.waitFor(() => expect(fakes.sockets).toHaveLength(1));
    expect(store.getState().lifecycle.status).toBe('initializing');

    fakes.socket().open();
    const settled = await store.getState().whenSettled();

    expect(init).toHaveBeenCalledTimes(1);
    expect(settled).toEqual({ status: 'ready', client: fakes.clients[0] });
    expect(store.getState().lifecycle).toBe(settled);
  });

  it('creates the client at most once however often it is initialized', () => {
    const fakes = fakeClients();
    const createClient = vi.fn(fakes.createClient);
    const store = createAppStateStore({ createClient });

    store.getState().initialize();
    store.getState().initialize();
    store.getState().initialize();

    expect(createClient).toHaveBeenCalledTimes(1);
  });

  it('fails and closes the client when it is not ready in time', async () => {
    vi.useFakeTimers();
    const fakes = fakeClients();
    const store = createAppStateStore({ createClient: fakes.createClient, readyTimeoutMs: 50 });

    store.getState().initialize();
    await vi.advanceTimersByTimeAsync(50);
    const settled = await store.getState().whenSettled();

    expect(settled.status).toBe('failed');
    expect(settled.status === 'failed' && settled.error).toBeInstanceOf(ReadyTimeoutError);
    expect(fakes.clients[0]?.state).toBe('closed');
    expect(fakes.socket().closed).toBe(true);
  });

  it('fails without creating a client when init rejects', async () => {
    const createClient = vi.fn(fakeClients().createClient);
    const store = createAppStateStore({
      init: () => Promise.reject(new Error('binding failed to load')),
      createClient,
    });

    store.getState().initialize();
    const settled = await store.getState().whenSettled();

    expect(settled).toEqual({ status: 'failed', error: new Error('binding failed to load') });
    expect(createClient).not.toHaveBeenCalled();
  });

  it('retries only from the failed state', async () => {
    let attempts = 0;
    const fakes = fakeClients();
    const store = createAppStateStore({
      init: async () => {
        attempts += 1;
        if (attempts === 1) throw new Error('first attempt');
      },
      createClient: fakes.createClient,
    });

    store.getState().retry();
    expect(store.getState().lifecycle).toEqual({ status: 'uninitialized' });

    store.getState().initialize();
    expect((await store.getState().whenSettled()).status).toBe('failed');

    store.getState().retry();
    expect(store.getState().lifecycle).toEqual({ status: 'initializing' });
    await vi.waitFor(() => expect(fakes.sockets).toHaveLength(1));
    fakes.socket().open();

    expect((await store.getState().whenSettled()).status).toBe('ready');
    store.getState().retry();
    expect(attempts).toBe(2);
  });

  it('closes the client and resets on dispose', async () => {
    const fakes = fakeClients();
    const store = createAppStateStore({ createClient: fakes.createClient });

    store.getState().initialize();
    fakes.socket().open();
    await store.getState().whenSettled();

    store.getState().dispose();

    expect(store.getState().lifecycle).toEqual({ status: 'uninitialized' });
    expect(fakes.clients[0]?.state).toBe('closed');
  });

  it('discards a client that is disposed while connecting', async () => {
    const fakes = fakeClients();
    const store = createAppStateStore({ createClient: fakes.createClient });

    store.getState().initialize();
    store.getState().dispose();

    expect(fakes.clients[0]?.state).toBe('closed');
    await expect(fakes.clients[0]?.ready()).rejects.toBeInstanceOf(ClientClosedError);
    expect(store.getState().lifecycle).toEqual({ status: 'uninitialized' });
  });
});
