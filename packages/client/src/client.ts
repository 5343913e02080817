// WebSocket client for the Hydra server
import {
  decodeMessage,
  encodeMessage,
  ProtocolError,
  type FetchIngressLogsRequest,
  type FetchIngressLogsResponse,
  type Message,
  type RequestPayload,
  type ResponsePayload,
} from '@hydra/proto';
import { Connection } from './connection.js';
import {
  ClientClosedError,
  ClientNotReadyError,
  ConnectionLostError,
  ReadyAbortedError,
  ReadyTimeoutError,
  RemoteError,
  RequestTimeoutError,
} from './errors.js';
import { createConsoleLogger, type ClientLogger } from './logger.js';
import { browserSocketFactory, type SocketFactory } from './socket.js';
import { createClientStateStore, type ClientStateStore, type ConnectionState } from './state.js';

export const DEFAULT_URL = 'ws://127.0.0.1:9797/ws';

export interface ClientOptions {
  url?: string;
  socketFactory?: SocketFactory;
  logger?: ClientLogger;
  /** How long a socket may stay unopened before it is replaced. */
  connectTimeoutMs?: number;
  requestTimeoutMs?: number;
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

export interface ReadyOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;

interface PendingRequest {
  resolve(payload: ResponsePayload): void;
  reject(error: Error): void;
  timer: ReturnType<typeof setTimeout>;
}

type ResolvedOptions = Required<ClientOptions>;

export class Client {
  private readonly options: ResolvedOptions;
  private readonly log: ClientLogger;
  private readonly store: ClientStateStore = createClientStateStore();
  private connection: Connection | null = null;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectDelay: number;
  private readonly pending = new Map<number, PendingRequest>();
  private nextRequestId = 0;

  private constructor(options: ResolvedOptions) {
    this.options = options;
    this.log = options.logger;
    this.reconnectDelay = options.reconnectDelayMs;
  }

  /**
   * Create a client and start connecting. The handle is usable once
   * `ready()` resolves.
   *
   * @throws ClientConfigurationError when no socket factory can be used
   */
  static new(options: ClientOptions = {}): Client {
    const client = new Client({
      url: options.url ?? DEFAULT_URL,
      socketFactory: options.socketFactory ?? browserSocketFactory,
      logger: options.logger ?? createConsoleLogger(),
      connectTimeoutMs: options.connectTimeoutMs ?? 30_000,
      requestTimeoutMs: options.requestTimeoutMs ?? 30_000,
      reconnectDelayMs: options.reconnectDelayMs ?? 1_000,
      maxReconnectDelayMs: options.maxReconnectDelayMs ?? 30_000,
    });
    client.connect();
    return client;
  }

  get url(): string {
    return this.options.url;
  }

  get state(): ConnectionState {
    return this.store.getState().state;
  }

  get isClosed(): boolean {
    return this.store.getState().closed;
  }

  onStateChange(listener: StateListener): () => void {
    return this.store.subscribe((snapshot, previous) => {
      if (snapshot.state !== previous.state) listener(snapshot.state, previous.state);
    });
  }

  ready(options: ReadyOptions = {}): Promise<void> {
    const { timeoutMs, signal } = options;
    const snapshot = this.store.getState();
    if (snapshot.closed) return Promise.reject(new ClientClosedError());
    if (signal?.aborted) return Promise.reject(new ReadyAbortedError());
    if (snapshot.state === 'open') return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        cleanup();
        reject(new ReadyAbortedError());
      };

      const unsubscribe = this.store.subscribe((next) => {
        if (next.closed) {
          cleanup();
          reject(new ClientClosedError());
        } else if (next.state === 'open') {
          cleanup();
          resolve();
        }
      });

      function cleanup() {
        unsubscribe();
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new ReadyTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  sendMessage(text: string): void {
    this.requireOpen().send(text);
  }

  async request(payload: RequestPayload): Promise<ResponsePayload> {
    const connection = this.requireOpen();
    const id = this.nextRequestId++;
    const timeoutMs = this.options.requestTimeoutMs;

    return new Promise<ResponsePayload>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new RequestTimeoutError(id, timeoutMs));
      }, timeoutMs);
      this.pending.set(id, { resolve, reject, timer });

      try {
        connection.send(encodeMessage({ type: 'request', request: { id, payload } }));
      } catch (error) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  async fetchIngressLogs(request: FetchIngressLogsRequest): Promise<FetchIngressLogsResponse> {
    const payload = await this.request({ type: 'fetch_ingress_logs', request });
    switch (payload.type) {
      case 'fetch_ingress_logs':
        return payload.response;
      case 'error':
        throw new RemoteError(payload.message);
    }
  }

  close(): void {
    if (this.isClosed) return;

    this.clearTimers();
    this.connection?.dispose();
    this.connection = null;
    this.rejectPending(() => new ClientClosedError());
    this.store.setState({ state: 'closed', closed: true });
    this.log.info('Client closed');
  }

  private requireOpen(): Connection {
    const { connection } = this;
    if (this.state !== 'open' || !connection?.isOpen) {
      throw new ClientNotReadyError(this.state);
    }
    return connection;
  }

  private setState(state: ConnectionState): void {
    if (this.isClosed) return;
    this.log.debug('Connection state changed to', state);
    this.store.setState({ state });
  }

  private connect(): void {
    this.connection?.dispose();
    this.setState('connecting');
    this.log.info('Connecting to', this.url);

    const connection = new Connection(this.url, this.options.socketFactory, {
      onOpen: () => this.handleOpen(connection),
      onMessage: (text) => this.handleMessage(text),
      onDown: (state, detail) => this.handleDown(connection, state, detail),
    });
    this.connection = connection;
    connection.open();
    // the factory may already have reported open or down
    if (this.connection !== connection || this.state === 'open') return;

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      if (this.connection !== connection || this.state === 'open') return;
      this.log.warn('Connection timed out');
      connection.dispose();
      this.connection = null;
      this.setState('error');
      this.scheduleReconnect();
    }, this.options.connectTimeoutMs);
  }

  private reconnect(): void {
    try {
      this.connect();
    } catch (error) {
      this.log.error('Connection failed:', error);
      this.connection = null;
      this.setState('error');
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.isClosed) {
      return;
    }

    this.log.info(`Reconnecting in ${this.reconnectDelay}ms...`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnect();
      // Exponential backoff with max delay
      this.reconnectDelay = Math.min(this.reconnectDelay * 2, this.options.maxReconnectDelayMs);
    }, this.reconnectDelay);
  }

  private handleOpen(connection: Connection): void {
    if (this.connection !== connection) return;
    this.clearConnectTimer();
    this.reconnectDelay = this.options.reconnectDelayMs;
    this.log.info('Connected');
    this.setState('open');
  }

  private handleDown(
    connection: Connection,
    state: 'closed' | 'error',
    detail: { code?: number; reason?: string },
  ): void {
    if (this.connection !== connection) return;
    this.clearConnectTimer();
    if (state === 'closed') this.log.info('Disconnected', detail);
    else this.log.error('Connection error');

    connection.dispose();
    this.connection = null;
    this.setState(state);
    this.rejectPending(() => new ConnectionLostError());
    this.scheduleReconnect();
  }

  private handleMessage(text: string): void {
    let message: Message;
    try {
      message = decodeMessage(text);
    } catch (error) {
      if (!(error instanceof ProtocolError)) throw error;
      this.log.warn('Dropped undecodable message:', error.message);
      return;
    }

    if (message.type === 'request') {
      this.log.warn('Unexpected request from server', message.request.id);
      return;
    }

    const { request_id: requestId, payload } = message.response;
    const pending = this.pending.get(requestId);
    if (!pending) {
      this.log.warn('Response for unknown request', requestId);
      return;
    }
    clearTimeout(pending.timer);
    this.pending.delete(requestId);
    pending.resolve(payload);
  }

  private rejectPending(makeError: () => Error): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      this.pending.delete(id);
      pending.reject(makeError());
    }
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearConnectTimer();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
