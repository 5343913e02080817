import type { Client } from '@hydra/client';
import { useEffect, useMemo } from 'react';
import { useStore } from 'zustand';
import { createIngressLogStore, type IngressLogStore, type IngressLogStoreOptions } from './ingressLogStore.js';

/**
 * Paginated ingress logs for a ready client. The first page loads on mount
 * and again whenever the client or options change.
 */
export function useIngressLogs(client: Client, options: IngressLogStoreOptions = {}): IngressLogStore {
  const { direction, limit } = options;
  const store = useMemo(() => createIngressLogStore(client, { direction, limit }), [client, direction, limit]);

  useEffect(() => {
    void store.getState().fetchFirstPage();
  }, [store]);

  return useStore(store);
}
