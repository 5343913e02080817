export { Client, DEFAULT_URL } from './client.js';
export type { ClientOptions, ReadyOptions, StateListener } from './client.js';
export * from './errors.js';
export { createConsoleLogger, silentLogger } from './logger.js';
export type { ClientLogger } from './logger.js';
export { browserSocketFactory } from './socket.js';
export type { SocketFactory, SocketHandlers, SocketLike } from './socket.js';
export type { ConnectionState } from './state.js';
