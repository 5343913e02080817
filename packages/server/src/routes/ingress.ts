import { Hono, type Context } from 'hono';
import { z } from 'zod';
import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  MIN_PAGE_LIMIT,
  directionSchema,
  type PaginatedCursor,
} from '@hydra/proto';
import { BadRequestError } from '../errors.js';
import type { IngressLogService } from '../services/ingress-log.js';

export const INGRESS_PATH = '/ingress';

export type RemoteAddrResolver = (c: Context) => string | null;

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(MIN_PAGE_LIMIT).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
  direction: directionSchema.default('descending'),
  before: z.string().min(1).optional(),
  after: z.string().min(1).optional(),
});

/** Path below the ingress mount point, without a leading slash. */
export function capturedPath(requestPath: string): string {
  if (requestPath === INGRESS_PATH) return '';
  if (requestPath.startsWith(`${INGRESS_PATH}/`)) {
    return requestPath.slice(INGRESS_PATH.length + 1);
  }
  return requestPath.replace(/^\//, '');
}

export function createIngressRoutes(service: IngressLogService, resolveRemoteAddr: RemoteAddrResolver) {
  const app = new Hono();

  const capture = async (c: Context) => {
    const body = new Uint8Array(await c.req.arrayBuffer());
    const entry = service.capture({
      method: c.req.method,
      host: c.req.header('host') ?? new URL(c.req.url).host,
      path: capturedPath(c.req.path),
      query: c.req.query(),
      headers: c.req.header(),
      body,
      remoteAddr: resolveRemoteAddr(c),
    });
    return c.json({ event_id: entry.event_id });
  };

  /** POST /ingress[/*] — capture any request sent to the ingress endpoint */
  app.post('/', capture);
  app.post('/*', capture);

  /** GET /ingress — page through captured requests */
  app.get('/', (c) => {
    const parsed = listQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new BadRequestError(`Invalid query (${problems.join('; ')})`);
    }

    const { limit, direction, before, after } = parsed.data;
    if (before && after) {
      throw new BadRequestError('Cannot specify both before and after');
    }

    let cursor: PaginatedCursor = { kind: 'none' };
    if (before) cursor = { kind: 'before', key: before };
    else if (after) cursor = { kind: 'after', key: after };

    return c.json(service.fetch({ limit, direction, cursor }));
  });

  return app;
}
