import type { ZodError } from 'zod';
import { ingressLogSchema, messageSchema } from './schemas.js';
import type { IngressLog, Message } from './types.js';

/**
 * Raised when a frame or stored record does not match the wire format.
 * `issues` lists the offending paths, e.g. `request.payload.request.limit`.
 */
export class ProtocolError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ProtocolError';
    this.issues = issues;
  }
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function encodeMessage(message: Message): string {
  return JSON.stringify(message);
}

export function decodeMessage(text: string): Message {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`Malformed message: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = messageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError('Invalid message', describeIssues(parsed.error));
  }
  return parsed.data;
}

export function decodeIngressLog(value: unknown): IngressLog {
  const parsed = ingressLogSchema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError('Invalid ingress log', describeIssues(parsed.error));
  }
  return parsed.data;
}
