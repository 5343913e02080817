import type { Client } from '@hydra/client';
import { createStore, type StoreApi } from 'zustand/vanilla';

export type ClientLifecycle =
  | { status: 'uninitialized' }
  | { status: 'initializing' }
  | { status: 'ready'; client: Client }
  | { status: 'failed'; error: Error };

export type SettledLifecycle = Extract<ClientLifecycle, { status: 'ready' | 'failed' }>;

export interface AppStateStoreOptions {
  /** Runs before the client is created, e.g. to load a binding module. */
  init?: () => Promise<void>;
  createClient: () => Client;
  readyTimeoutMs?: number;
}

export interface AppStateStore {
  lifecycle: ClientLifecycle;

  // Actions
  initialize: () => void;
  retry: () => void;
  whenSettled: () => Promise<SettledLifecycle>;
  dispose: () => void;
}

export type AppStateStoreApi = StoreApi<AppStateStore>;

export const DEFAULT_READY_TIMEOUT_MS = 30_000;

function isSettled(lifecycle: ClientLifecycle): lifecycle is SettledLifecycle {
  return lifecycle.status === 'ready' || lifecycle.status === 'failed';
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Holds the client lifecycle. `initialize()` is an initialize-once gate:
 * the client is only published after `ready()` resolves.
 */
export function createAppStateStore(options: AppStateStoreOptions): AppStateStoreApi {
  const { init, createClient, readyTimeoutMs = DEFAULT_READY_TIMEOUT_MS } = options;
  // bumped by dispose() so an in-flight run cannot publish afterwards
  let generation = 0;
  let pendingClient: Client | null = null;

  return createStore<AppStateStore>()((set, get, api) => {
    const run = async (current: number): Promise<void> => {
      let client: Client | null = null;
      try {
        if (init) await init();
        if (current !== generation) return;

        client = createClient();
        pendingClient = client;
        await client.ready({ timeoutMs: readyTimeoutMs });
        if (current !== generation) return;

        set({ lifecycle: { status: 'ready', client } });
      } catch (err) {
        client?.close();
        if (current !== generation) return;
        set({ lifecycle: { status: 'failed', error: toError(err) } });
      } finally {
        if (pendingClient === client) pendingClient = null;
      }
    };

    const start = () => {
      set({ lifecycle: { status: 'initializing' } });
      void run(generation);
    };

    return {
      lifecycle: { status: 'uninitialized' },

      initialize: () => {
        if (get().lifecycle.status !== 'uninitialized') return;
        start();
      },

      retry: () => {
        if (get().lifecycle.status !== 'failed') return;
        start();
      },

      whenSettled: () => {
        const { lifecycle } = get();
        if (isSettled(lifecycle)) return Promise.resolve(lifecycle);

        return new Promise<SettledLifecycle>((resolve) => {
          const unsubscribe = api.subscribe((state) => {
            if (!isSettled(state.lifecycle)) return;
            unsubscribe();
            resolve(state.lifecycle);
          });
        });
      },

      dispose: () => {
        generation += 1;
        pendingClient?.close();
        pendingClient = null;
        const { lifecycle } = get();
        if (lifecycle.status === 'ready') lifecycle.client.close();
        set({ lifecycle: { status: 'uninitialized' } });
      },
    };
  });
}
