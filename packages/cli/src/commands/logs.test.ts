import { IngressLogService, StorageEngine, type Logger } from '@hydra/server';
import { describe, expect, it, vi } from 'vitest';
import { pagingHints } from '../format.js';
import { buildFetchRequest } from './logs.js';

function quietLogger(): Logger {
  const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: () => log };
  return log;
}

describe('buildFetchRequest', () => {
  it('defaults to the newest page', () => {
    expect(buildFetchRequest({})).toEqual({ direction: 'descending', limit: 10, cursor: { kind: 'none' } });
  });

  it('reads the limit, direction and cursor flags', () => {
    expect(buildFetchRequest({ limit: '25', direction: 'ascending', after: '01HZ0000000000000000000001' })).toEqual({
      direction: 'ascending',
      limit: 25,
      cursor: { kind: 'after', key: '01HZ0000000000000000000001' },
    });
    expect(buildFetchRequest({ before: '01HZ0000000000000000000009' }).cursor).toEqual({
      kind: 'before',
      key: '01HZ0000000000000000000009',
    });
  });

  it('rejects both cursors at once', () => {
    expect(() => buildFetchRequest({ before: 'a', after: 'b' })).toThrow('Cannot specify both --before and --after');
  });

  it('rejects limits outside the page range', () => {
    expect(() => buildFetchRequest({ limit: '0' })).toThrow(
      'Invalid options (--limit: Number must be greater than or equal to 1)',
    );
    expect(() => buildFetchRequest({ limit: '1001' })).toThrow(
      'Invalid options (--limit: Number must be less than or equal to 1000)',
    );
  });

  it('rejects an unknown direction', () => {
    expect(() => buildFetchRequest({ direction: 'sideways' })).toThrow(/^Invalid options \(--direction: /);
  });
});

describe('following paging hints', () => {
  function capturedService(count: number) {
    const service = new IngressLogService(StorageEngine.temporary(), quietLogger(), {
      now: () => new Date('2024-06-01T12:00:00.000Z'),
    });
    for (let i = 0; i < count; i++) {
      service.capture({
        method: 'POST',
        host: 'localhost',
        path: String(i),
        query: {},
        headers: {},
        body: new Uint8Array(),
        remoteAddr: null,
      });
    }
    return service;
  }

  const paths = (page: ReturnType<IngressLogService['fetch']>) => page.items.map(({ item }) => item.path);

  it('moves to the next and back to the previous ascending page', () => {
    const service = capturedService(12);
    const request = buildFetchRequest({ direction: 'ascending', limit: '5' });
    const first = service.fetch(request);
    expect(paths(first)).toEqual(['0', '1', '2', '3', '4']);

    const [next] = pagingHints(first, request);
    if (!next) throw new Error('expected a next page hint');
    expect(next.label).toBe('next');
    const nextRequest = buildFetchRequest(next.flags);
    const second = service.fetch(nextRequest);
    expect(paths(second)).toEqual(['5', '6', '7', '8', '9']);

    const previous = pagingHints(second, nextRequest).find((hint) => hint.label === 'previous');
    if (!previous) throw new Error('expected a previous page hint');
    expect(paths(service.fetch(buildFetchRequest(previous.flags)))).toEqual(['0', '1', '2', '3', '4']);
  });

  it('keeps a descending walk descending', () => {
    const service = capturedService(12);
    const request = buildFetchRequest({ limit: '5' });
    const first = service.fetch(request);
    expect(paths(first)).toEqual(['11', '10', '9', '8', '7']);

    const next = pagingHints(first, request).find((hint) => hint.label === 'next');
    if (!next) throw new Error('expected a next page hint');
    expect(paths(service.fetch(buildFetchRequest(next.flags)))).toEqual(['6', '5', '4', '3', '2']);
  });
});
