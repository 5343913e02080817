/**
 * Error types surfaced by HTTP routes and WebSocket handlers.
 * Anything that is not an AppError is reported as a 500.
 */

export class AppError extends Error {
  readonly status: 400 | 404 | 500;

  constructor(message: string, status: 400 | 404 | 500 = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.status = status;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
    this.name = 'StorageError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
