/**
 * Hydra CLI - library exports
 */

export {
  ConfigManager,
  CONFIG_FILENAME,
  DEFAULT_READY_TIMEOUT_MS,
  configFileSchema,
  resolveClientConfig,
  resolveServeConfig,
} from './config.js';
export type { ClientConfig, ClientFlags, HydraConfig, ServeFlags } from './config.js';
export { buildFetchRequest } from './commands/logs.js';
export type { LogsOptions } from './commands/logs.js';
export { formatIngressLogTable, formatPageFlags, formatTarget, pagingHints } from './format.js';
export type { PageFlags, PagingHint } from './format.js';
export { clientLogger, diagnosticsLogger, nodeSocketFactory } from './socket.js';
