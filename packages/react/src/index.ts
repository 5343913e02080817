export {
  AppStateProvider,
  useAppState,
  useAppStateStore,
  useClient,
  useClientLifecycle,
} from './AppStateProvider.js';
export type { AppState, AppStateProviderProps } from './AppStateProvider.js';
export { createAppStateStore, DEFAULT_READY_TIMEOUT_MS } from './appStateStore.js';
export type {
  AppStateStore,
  AppStateStoreApi,
  AppStateStoreOptions,
  ClientLifecycle,
  SettledLifecycle,
} from './appStateStore.js';
export { createIngressLogStore } from './ingressLogStore.js';
export type { IngressLogStore, IngressLogStoreApi, IngressLogStoreOptions } from './ingressLogStore.js';
export { useIngressLogs } from './useIngressLogs.js';
