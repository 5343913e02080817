import { Client } from '@hydra/client';
import { createContext, useContext, useEffect, useMemo, useRef, useState, type ReactNode } from 'react';
import { useStore } from 'zustand';
import {
  createAppStateStore,
  type AppStateStoreApi,
  type AppStateStoreOptions,
  type ClientLifecycle,
} from './appStateStore.js';

export interface AppState {
  client: Client;
}

const AppStateContext = createContext<AppStateStoreApi | null>(null);

export interface AppStateProviderProps extends Partial<AppStateStoreOptions> {
  children: ReactNode;
  /** An externally owned store; the provider then never disposes it. */
  store?: AppStateStoreApi;
}

const defaultCreateClient = () => Client.new();

export function AppStateProvider({ children, store: external, init, createClient, readyTimeoutMs }: AppStateProviderProps) {
  // created once per provider; later prop changes are ignored
  const [store] = useState(
    () =>
      external ??
      createAppStateStore({ init, createClient: createClient ?? defaultCreateClient, readyTimeoutMs }),
  );
  const ownsStore = external === undefined;
  const pendingDispose = useRef<ReturnType<typeof setTimeout> | null>(null);

  useEffect(() => {
    if (pendingDispose.current) {
      clearTimeout(pendingDispose.current);
      pendingDispose.current = null;
    }
    store.getState().initialize();

    return () => {
      if (!ownsStore) return;
      // deferred so a StrictMode re-run of this effect keeps the same client
      pendingDispose.current = setTimeout(() => {
        pendingDispose.current = null;
        store.getState().dispose();
      }, 0);
    };
  }, [store, ownsStore]);

  return <AppStateContext.Provider value={store}>{children}</AppStateContext.Provider>;
}

export function useAppStateStore(): AppStateStoreApi {
  const store = useContext(AppStateContext);
  if (!store) {
    throw new Error('useAppStateStore must be used within an AppStateProvider');
  }
  return store;
}

export function useClientLifecycle(): ClientLifecycle {
  return useStore(useAppStateStore(), (state) => state.lifecycle);
}

export function useClient(): Client | null {
  const lifecycle = useClientLifecycle();
  return lifecycle.status === 'ready' ? lifecycle.client : null;
}

/** `{ client }` once the client is ready, otherwise null. */
export function useAppState(): AppState | null {
  const client = useClient();
  return useMemo(() => (client ? { client } : null), [client]);
}
