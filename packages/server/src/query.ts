/**
 * Cursor-based record fetching over storage trees.
 */

import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  MIN_PAGE_LIMIT,
  inverseDirection,
  type Direction,
  type KeyedItem,
  type PaginatedCursor,
} from '@hydra/proto';
import { BadRequestError, StorageError } from './errors.js';
import type { StorageEngine, Tree } from './storage/index.js';

export type FetchCursor = { kind: 'none' } | { kind: 'excluding'; key: string };

export type Decoder<T> = (value: unknown) => T;

/** Immutable query builder: each setter returns a new query. */
export class FetchRecordQuery {
  readonly cursor: FetchCursor;
  readonly limit: number;
  readonly order: Direction;

  constructor(cursor: FetchCursor = { kind: 'none' }, limit = DEFAULT_PAGE_LIMIT, order: Direction = 'ascending') {
    this.cursor = cursor;
    this.limit = limit;
    this.order = order;
  }

  withCursor(cursor: FetchCursor): FetchRecordQuery {
    return new FetchRecordQuery(cursor, this.limit, this.order);
  }

  withLimit(limit: number): FetchRecordQuery {
    return new FetchRecordQuery(this.cursor, limit, this.order);
  }

  withOrder(order: Direction): FetchRecordQuery {
    return new FetchRecordQuery(this.cursor, this.limit, order);
  }
}

export interface FetchRecordResult<T> {
  items: KeyedItem<T>[];
  order: Direction;
  /** More records exist past the last returned item, in query order. */
  moreRecords: boolean;
}

export function fetchRecords<T>(tree: Tree, query: FetchRecordQuery, decode: Decoder<T>): FetchRecordResult<T> {
  const limit = query.limit;
  const fetchLimit = limit + 1; // one extra tells us whether there are more

  const bound = query.cursor.kind === 'excluding' ? { key: query.cursor.key, inclusive: false } : undefined;
  const range = query.order === 'ascending'
    ? tree.range({ lower: bound })
    : tree.range({ upper: bound, reverse: true });

  const items: KeyedItem<T>[] = [];
  for (const { key, value } of range) {
    if (items.length >= fetchLimit) break;
    let item: T;
    try {
      item = decode(value);
    } catch (error) {
      throw new StorageError(`Failed to decode record "${key}" in tree "${tree.name}"`, { cause: error });
    }
    items.push({ key, item });
  }

  const moreRecords = items.length > limit;
  items.length = Math.min(items.length, limit);

  return { items, order: query.order, moreRecords };
}

export interface PaginatedFetchRequest {
  tree: string;
  cursor: PaginatedCursor;
  limit: number;
  direction: Direction;
}

export interface PaginatedFetchResponse<T> {
  items: KeyedItem<T>[];
  limit: number;
  has_more_before: boolean;
  has_more_after: boolean;
}

/**
 * Fetch one page in display order relative to a cursor.
 *
 * display ascending  5,6: before 5 -> query descending 4,3 -> shown 3,4
 * display descending 6,5: before 6 -> query ascending  7,8 -> shown 8,7
 */
export function fetchPaginated<T>(
  storage: StorageEngine,
  request: PaginatedFetchRequest,
  decode: Decoder<T>,
): PaginatedFetchResponse<T> {
  if (!Number.isInteger(request.limit) || request.limit < MIN_PAGE_LIMIT || request.limit > MAX_PAGE_LIMIT) {
    throw new BadRequestError(`limit must be an integer between ${MIN_PAGE_LIMIT} and ${MAX_PAGE_LIMIT}`);
  }

  const tree = storage.subtree(request.tree);
  const displayOrder = request.direction;

  let hasMoreBefore = false;
  let hasMoreAfter = false;
  let cursor: FetchCursor = { kind: 'none' };
  let queryOrder = displayOrder;

  switch (request.cursor.kind) {
    case 'before':
      hasMoreAfter = true;
      cursor = { kind: 'excluding', key: request.cursor.key };
      queryOrder = inverseDirection(displayOrder);
      break;
    case 'after':
      hasMoreBefore = true;
      cursor = { kind: 'excluding', key: request.cursor.key };
      break;
    case 'none':
      break;
  }

  const query = new FetchRecordQuery(cursor, request.limit, queryOrder);
  const result = fetchRecords(tree, query, decode);

  const items = result.items;
  if (queryOrder === displayOrder) {
    hasMoreAfter = result.moreRecords;
  } else {
    hasMoreBefore = result.moreRecords;
    items.reverse();
  }

  return {
    items,
    limit: request.limit,
    has_more_before: hasMoreBefore,
    has_more_after: hasMoreAfter,
  };
}
