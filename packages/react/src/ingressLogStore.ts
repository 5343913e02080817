import type { Client } from '@hydra/client';
import {
  after,
  before,
  DEFAULT_PAGE_LIMIT,
  noCursor,
  type Direction,
  type IngressLog,
  type KeyedItem,
  type PaginatedCursor,
} from '@hydra/proto';
import { createStore, type StoreApi } from 'zustand/vanilla';

export interface IngressLogStore {
  items: KeyedItem<IngressLog>[];
  direction: Direction;
  limit: number;
  hasMoreBefore: boolean;
  hasMoreAfter: boolean;
  isLoading: boolean;
  error: string | null;

  // Actions
  fetchFirstPage: () => Promise<void>;
  nextPage: () => Promise<void>;
  previousPage: () => Promise<void>;
  setDirection: (direction: Direction) => Promise<void>;
}

export type IngressLogStoreApi = StoreApi<IngressLogStore>;

export interface IngressLogStoreOptions {
  direction?: Direction;
  limit?: number;
}

export function createIngressLogStore(client: Client, options: IngressLogStoreOptions = {}): IngressLogStoreApi {
  // only the latest page request may write to the store
  let latest = 0;

  return createStore<IngressLogStore>()((set, get) => {
    const load = async (cursor: PaginatedCursor): Promise<void> => {
      const ticket = ++latest;
      const { direction, limit } = get();
      set({ isLoading: true, error: null });
      try {
        const page = await client.fetchIngressLogs({ direction, limit, cursor });
        if (ticket !== latest) return;
        set({
          items: page.items,
          hasMoreBefore: page.has_more_before,
          hasMoreAfter: page.has_more_after,
          isLoading: false,
        });
      } catch (err) {
        if (ticket !== latest) return;
        set({ error: err instanceof Error ? err.message : String(err), isLoading: false });
      }
    };

    return {
      items: [],
      direction: options.direction ?? 'descending',
      limit: options.limit ?? DEFAULT_PAGE_LIMIT,
      hasMoreBefore: false,
      hasMoreAfter: false,
      isLoading: false,
      error: null,

      fetchFirstPage: () => load(noCursor),

      nextPage: async () => {
        const { items, hasMoreAfter } = get();
        const last = items[items.length - 1];
        if (!hasMoreAfter || !last) return;
        await load(after(last.key));
      },

      previousPage: async () => {
        const { items, hasMoreBefore } = get();
        const first = items[0];
        if (!hasMoreBefore || !first) return;
        await load(before(first.key));
      },

      setDirection: async (direction) => {
        set({ direction });
        await load(noCursor);
      },
    };
  });
}
