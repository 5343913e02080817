/**
 * Hydra wire types shared by the server, the client and host applications.
 */

export type Direction = 'ascending' | 'descending';

/**
 * Position of a page relative to a known key. `before` and `after` are in
 * display order, not key order.
 */
export type PaginatedCursor =
  | { kind: 'none' }
  | { kind: 'before'; key: string }
  | { kind: 'after'; key: string };

/** One captured HTTP request. `body` is base64, `date` is ISO-8601 UTC. */
export interface IngressLog {
  event_id: string;
  date: string;
  remote_addr: string | null;
  method: string;
  host: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body: string;
}

export interface KeyedItem<T> {
  key: string;
  item: T;
}

export interface FetchIngressLogsRequest {
  direction: Direction;
  limit: number;
  cursor: PaginatedCursor;
}

export interface FetchIngressLogsResponse {
  items: KeyedItem<IngressLog>[];
  limit: number;
  has_more_before: boolean;
  has_more_after: boolean;
}

export type RequestPayload =
  { type: 'fetch_ingress_logs'; request: FetchIngressLogsRequest };

export type ResponsePayload =
  | { type: 'fetch_ingress_logs'; response: FetchIngressLogsResponse }
  | { type: 'error'; message: string };

export interface RequestEnvelope {
  id: number;
  payload: RequestPayload;
}

export interface ResponseEnvelope {
  request_id: number;
  payload: ResponsePayload;
}

export type Message =
  | { type: 'request'; request: RequestEnvelope }
  | { type: 'response'; response: ResponseEnvelope };
