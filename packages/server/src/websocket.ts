import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage, Server } from 'http';
import { decodeMessage, encodeMessage, ProtocolError, type Message } from '@hydra/proto';
import { handleRequest, type RequestServices } from './handler.js';
import type { Logger } from './logger.js';

export const WS_PATH = '/ws';

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

/**
 * WebSocketManager answers protocol requests on /ws.
 * Every frame carries one JSON-encoded Message; responses go back on the
 * socket the request came from.
 */
export class WebSocketManager {
  private wss: WebSocketServer;
  private clients: Set<WebSocket> = new Set();
  private services: RequestServices;
  private log: Logger;

  constructor(server: Server, services: RequestServices, log: Logger) {
    this.wss = new WebSocketServer({ noServer: true });
    this.services = services;
    this.log = log;

    // Handle upgrade requests
    server.on('upgrade', (request: IncomingMessage, socket, head) => {
      const pathname = new URL(request.url || '', `http://${request.headers.host || 'localhost'}`).pathname;

      if (pathname === WS_PATH) {
        this.wss.handleUpgrade(request, socket, head, (ws) => {
          this.wss.emit('connection', ws, request);
        });
      } else {
        this.log.warn('Rejected upgrade', { path: pathname });
        socket.destroy();
      }
    });

    this.wss.on('connection', (ws: WebSocket, request: IncomingMessage) => this.onConnection(ws, request));
  }

  private onConnection(ws: WebSocket, request: IncomingMessage): void {
    const who = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
    const userAgent = request.headers['user-agent'] ?? 'Unknown browser';
    this.log.info('WebSocket client connected', { who, userAgent });
    this.clients.add(ws);

    // Kick things off; some browsers never surface the pong
    ws.ping(Buffer.from([1, 2, 3]));

    ws.on('message', (data: RawData, isBinary: boolean) => {
      this.log.debug('Frame received', { who, binary: isBinary });
      this.handleFrame(rawDataToString(data), who, (text) => {
        if (ws.readyState === WebSocket.OPEN) ws.send(text);
      });
    });

    ws.on('pong', () => {
      this.log.debug('Pong received', { who });
    });

    ws.on('close', (code: number, reason: Buffer) => {
      this.log.info('WebSocket client disconnected', { who, code, reason: reason.toString('utf-8') });
      this.clients.delete(ws);
    });

    ws.on('error', (error: Error) => {
      this.log.error('WebSocket error', { who, error: error.message });
      this.clients.delete(ws);
    });
  }

  /** Decode one frame and send the answer, if any, through `reply`. */
  handleFrame(text: string, who: string, reply: (text: string) => void): void {
    let message: Message;
    try {
      message = decodeMessage(text);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.log.warn('Dropped undecodable frame', { who, error: error.message });
        return;
      }
      throw error;
    }

    switch (message.type) {
      case 'request': {
        const response = handleRequest(message.request, this.services, this.log);
        reply(encodeMessage({ type: 'response', response }));
        break;
      }
      case 'response':
        this.log.warn('Unexpected response message from client', { who, requestId: message.response.request_id });
        break;
    }
  }

  getConnectedClientsCount(): number {
    return this.clients.size;
  }

  close(): void {
    for (const client of this.clients) {
      client.close(1001, 'Server shutting down');
    }
    this.clients.clear();
    this.wss.close();
  }
}
