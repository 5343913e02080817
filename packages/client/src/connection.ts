import type { SocketFactory, SocketLike } from './socket.js';

export interface ConnectionEvents {
  onOpen(): void;
  onMessage(text: string): void;
  /** Fired once, with the state the socket ended in. */
  onDown(state: 'closed' | 'error', detail: { code?: number; reason?: string }): void;
}

/**
 * One socket attempt. Events stop flowing after the first close/error or
 * after dispose(), so a stale attempt can never move the client's state.
 * The socket is created by open(), not the constructor, so a factory that
 * reports synchronously already sees a fully built connection.
 */
export class Connection {
  private socket: SocketLike | null = null;
  private down = false;
  private disposed = false;
  private readonly url: string;
  private readonly factory: SocketFactory;
  private readonly events: ConnectionEvents;

  constructor(url: string, factory: SocketFactory, events: ConnectionEvents) {
    this.url = url;
    this.factory = factory;
    this.events = events;
  }

  open(): void {
    const socket = this.factory(this.url, {
      onOpen: () => {
        if (this.live) this.events.onOpen();
      },
      onMessage: (text) => {
        if (this.live) this.events.onMessage(text);
      },
      onError: () => {
        if (!this.live) return;
        this.down = true;
        this.events.onDown('error', {});
      },
      onClose: (code, reason) => {
        if (!this.live) return;
        this.down = true;
        this.events.onDown('closed', { code, reason });
      },
    });
    this.socket = socket;
    // disposed while the factory was still running
    if (this.disposed) socket.close();
  }

  private get live(): boolean {
    return !this.down && !this.disposed;
  }

  get isOpen(): boolean {
    return this.live && this.socket !== null && this.socket.isOpen;
  }

  send(text: string): void {
    if (!this.socket) throw new Error('Socket has not been created');
    this.socket.send(text);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.socket?.close();
  }
}
