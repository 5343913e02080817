import { z } from 'zod';

export const MIN_PAGE_LIMIT = 1;
export const MAX_PAGE_LIMIT = 1000;
export const DEFAULT_PAGE_LIMIT = 10;

export const directionSchema = z.enum(['ascending', 'descending']);

export const paginatedCursorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('before'), key: z.string().min(1) }),
  z.object({ kind: z.literal('after'), key: z.string().min(1) }),
]);

export const ingressLogSchema = z.object({
  event_id: z.string().min(1),
  date: z.string().datetime(),
  remote_addr: z.string().nullable(),
  method: z.string(),
  host: z.string(),
  path: z.string(),
  query: z.record(z.string()),
  headers: z.record(z.string()),
  body: z.string(),
});

export const pageLimitSchema = z.number().int().min(MIN_PAGE_LIMIT).max(MAX_PAGE_LIMIT);

export const fetchIngressLogsRequestSchema = z.object({
  direction: directionSchema,
  limit: pageLimitSchema,
  cursor: paginatedCursorSchema,
});

export const fetchIngressLogsResponseSchema = z.object({
  items: z.array(z.object({ key: z.string(), item: ingressLogSchema })),
  limit: z.number().int(),
  has_more_before: z.boolean(),
  has_more_after: z.boolean(),
});

export const requestPayloadSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('fetch_ingress_logs'), request: fetchIngressLogsRequestSchema }),
]);

export const responsePayloadSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('fetch_ingress_logs'), response: fetchIngressLogsResponseSchema }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

const messageIdSchema = z.number().int().nonnegative();

export const messageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('request'),
    request: z.object({ id: messageIdSchema, payload: requestPayloadSchema }),
  }),
  z.object({
    type: z.literal('response'),
    response: z.object({ request_id: messageIdSchema, payload: responsePayloadSchema }),
  }),
]);
