import type { Direction, PaginatedCursor } from './types.js';

export function inverseDirection(direction: Direction): Direction {
  return direction === 'ascending' ? 'descending' : 'ascending';
}

export const noCursor: PaginatedCursor = { kind: 'none' };

export function before(key: string): PaginatedCursor {
  return { kind: 'before', key };
}

export function after(key: string): PaginatedCursor {
  return { kind: 'after', key };
}
