/**
 * Hydra server - main exports
 */

export { createApp, SERVICE_NAME, SERVICE_VERSION } from './app.js';
export type { AppOptions, HydraApp } from './app.js';
export { loadServerConfig, defaultDataDir, DEFAULT_HOST, DEFAULT_PORT } from './config.js';
export type { ServerConfig } from './config.js';
export { AppError, BadRequestError, ConfigError, NotFoundError, StorageError } from './errors.js';
export { handleRequest } from './handler.js';
export type { RequestServices } from './handler.js';
export { createLogger, errorContext, logger, logSettingsFromEnv, standardOutput, stderrOutput } from './logger.js';
export type { LogContext, LogFormat, LogLevel, LogOutput, Logger, LoggerOptions } from './logger.js';
export { FetchRecordQuery, fetchPaginated, fetchRecords } from './query.js';
export type { Decoder, FetchCursor, FetchRecordResult, PaginatedFetchRequest, PaginatedFetchResponse } from './query.js';
export { INGRESS_PATH, capturedPath } from './routes/ingress.js';
export type { RemoteAddrResolver } from './routes/ingress.js';
export { startServer } from './server.js';
export type { RunningServer, StartOptions } from './server.js';
export { INGRESS_TREE, IngressLogService } from './services/ingress-log.js';
export type { CaptureInput } from './services/ingress-log.js';
export { StorageEngine, Tree } from './storage/index.js';
export { WebSocketManager, WS_PATH, rawDataToString } from './websocket.js';
