import ulid from 'ulid';
import {
  decodeIngressLog,
  type FetchIngressLogsRequest,
  type FetchIngressLogsResponse,
  type IngressLog,
} from '@hydra/proto';
import type { Logger } from '../logger.js';
import { fetchPaginated } from '../query.js';
import type { StorageEngine } from '../storage/index.js';

export const INGRESS_TREE = 'ingress';

export interface CaptureInput {
  method: string;
  host: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body: Uint8Array;
  remoteAddr: string | null;
}

/**
 * IngressLogService stores captured requests keyed by their ULID event id,
 * so key order is arrival order.
 */
export class IngressLogService {
  private storage: StorageEngine;
  private log: Logger;
  private nextId: (seedTime?: number) => string;
  private now: () => Date;

  constructor(storage: StorageEngine, log: Logger, options: { now?: () => Date } = {}) {
    this.storage = storage;
    this.log = log;
    this.nextId = ulid.monotonicFactory();
    this.now = options.now ?? (() => new Date());
  }

  capture(input: CaptureInput): IngressLog {
    const date = this.now();
    const eventId = this.nextId(date.getTime());

    const entry: IngressLog = {
      event_id: eventId,
      date: date.toISOString(),
      remote_addr: input.remoteAddr,
      method: input.method,
      host: input.host,
      path: input.path,
      query: input.query,
      headers: input.headers,
      body: Buffer.from(input.body).toString('base64'),
    };

    this.storage.subtree(INGRESS_TREE).insert(eventId, entry);
    this.log.info('Ingress request captured', { eventId, method: input.method, path: input.path, bytes: input.body.byteLength });
    return entry;
  }

  fetch(request: FetchIngressLogsRequest): FetchIngressLogsResponse {
    return fetchPaginated(
      this.storage,
      { tree: INGRESS_TREE, cursor: request.cursor, limit: request.limit, direction: request.direction },
      decodeIngressLog,
    );
  }

  count(): number {
    return this.storage.subtree(INGRESS_TREE).size;
  }
}
