/**
 * Hydra protocol - main exports
 */

export { encodeMessage, decodeMessage, decodeIngressLog, ProtocolError } from './codec.js';
export { inverseDirection, noCursor, before, after } from './record.js';
export {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  MIN_PAGE_LIMIT,
  directionSchema,
  fetchIngressLogsRequestSchema,
  ingressLogSchema,
  messageSchema,
  pageLimitSchema,
  paginatedCursorSchema,
} from './schemas.js';
export type {
  Direction,
  FetchIngressLogsRequest,
  FetchIngressLogsResponse,
  IngressLog,
  KeyedItem,
  Message,
  PaginatedCursor,
  RequestEnvelope,
  RequestPayload,
  ResponseEnvelope,
  ResponsePayload,
} from './types.js';
