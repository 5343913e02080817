import { ClientConfigurationError } from './errors.js';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onError(): void;
  onClose(code: number, reason: string): void;
}

/** The slice of a WebSocket the client relies on. */
export interface SocketLike {
  readonly isOpen: boolean;
  send(text: string): void;
  /** Close and stop delivering events. */
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

const decoder = new TextDecoder();

/**
 * Factory over the host's global WebSocket (browsers, Deno, Node 22+).
 */
export const browserSocketFactory: SocketFactory = (url, handlers) => {
  if (typeof WebSocket === 'undefined') {
    throw new ClientConfigurationError('No global WebSocket available; pass a socketFactory');
  }

  const ws = new WebSocket(url);
  ws.binaryType = 'arraybuffer';

  ws.onopen = () => handlers.onOpen();
  ws.onmessage = (event: MessageEvent) => {
    const data: unknown = event.data;
    if (typeof data === 'string') handlers.onMessage(data);
    else if (data instanceof ArrayBuffer) handlers.onMessage(decoder.decode(data));
  };
  ws.onerror = () => handlers.onError();
  ws.onclose = (event: CloseEvent) => handlers.onClose(event.code, event.reason);

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (text) => ws.send(text),
    close: () => {
      // unbind the listeners and close the connection
      ws.onopen = null;
      ws.onmessage = null;
      ws.onerror = null;
      ws.onclose = null;
      if (ws.readyState === WebSocket.CONNECTING || ws.readyState === WebSocket.OPEN) {
        ws.close();
      }
    },
  };
};
