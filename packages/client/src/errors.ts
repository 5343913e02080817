/**
 * Errors raised by the client. Each carries a stable `code` so host
 * applications can branch without matching on messages.
 */

export type ClientErrorCode =
  | 'CONFIGURATION'
  | 'NOT_READY'
  | 'CLOSED'
  | 'READY_TIMEOUT'
  | 'READY_ABORTED'
  | 'REQUEST_TIMEOUT'
  | 'CONNECTION_LOST'
  | 'REMOTE';

export class ClientError extends Error {
  readonly code: ClientErrorCode;

  constructor(code: ClientErrorCode, message: string) {
    super(message);
    this.name = 'ClientError';
    this.code = code;
  }
}

export class ClientConfigurationError extends ClientError {
  constructor(message: string) {
    super('CONFIGURATION', message);
    this.name = 'ClientConfigurationError';
  }
}

export class ClientNotReadyError extends ClientError {
  constructor(state: string) {
    super('NOT_READY', `Client is not ready (connection is ${state})`);
    this.name = 'ClientNotReadyError';
  }
}

export class ClientClosedError extends ClientError {
  constructor() {
    super('CLOSED', 'Client has been closed');
    this.name = 'ClientClosedError';
  }
}

export class ReadyTimeoutError extends ClientError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('READY_TIMEOUT', `Client was not ready within ${timeoutMs}ms`);
    this.name = 'ReadyTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ReadyAbortedError extends ClientError {
  constructor() {
    super('READY_ABORTED', 'Waiting for the client was aborted');
    this.name = 'ReadyAbortedError';
  }
}

export class RequestTimeoutError extends ClientError {
  readonly requestId: number;

  constructor(requestId: number, timeoutMs: number) {
    super('REQUEST_TIMEOUT', `Request ${requestId} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.requestId = requestId;
  }
}

export class ConnectionLostError extends ClientError {
  constructor() {
    super('CONNECTION_LOST', 'Connection lost before the response arrived');
    this.name = 'ConnectionLostError';
  }
}

export class RemoteError extends ClientError {
  constructor(message: string) {
    super('REMOTE', message);
    this.name = 'RemoteError';
  }
}

export function isClientError(value: unknown): value is ClientError {
  return value instanceof ClientError;
}
