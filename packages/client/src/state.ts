import { createStore, type StoreApi } from 'zustand/vanilla';

export type ConnectionState = 'none' | 'connecting' | 'open' | 'closed' | 'error';

export interface ClientSnapshot {
  state: ConnectionState;
  /** Set once by close(); the client never reconnects afterwards. */
  closed: boolean;
}

export type ClientStateStore = StoreApi<ClientSnapshot>;

export function createClientStateStore(): ClientStateStore {
  return createStore<ClientSnapshot>()(() => ({ state: 'none', closed: false }));
}
