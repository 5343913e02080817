import type { RequestEnvelope, ResponseEnvelope, ResponsePayload } from '@hydra/proto';
import { errorContext, type Logger } from './logger.js';
import type { IngressLogService } from './services/ingress-log.js';

export interface RequestServices {
  ingress: IngressLogService;
}

/**
 * Answer one protocol request. Failures become an error payload carrying the
 * same request id, so the caller can settle its pending request.
 */
export function handleRequest(request: RequestEnvelope, services: RequestServices, log: Logger): ResponseEnvelope {
  let payload: ResponsePayload;
  try {
    switch (request.payload.type) {
      case 'fetch_ingress_logs':
        payload = {
          type: 'fetch_ingress_logs',
          response: services.ingress.fetch(request.payload.request),
        };
        break;
    }
  } catch (error) {
    log.warn('Request failed', { requestId: request.id, type: request.payload.type, ...errorContext(error) });
    payload = { type: 'error', message: error instanceof Error ? error.message : String(error) };
  }

  return { request_id: request.id, payload };
}
