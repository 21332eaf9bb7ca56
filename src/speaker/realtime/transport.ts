/**
 * Realtime Transport
 *
 * Message channel to the realtime speech API. Production uses a WebSocket
 * (ws); tests substitute an in-process fake.
 *
 * Events: 'open', 'message' (text), 'close' (code, reason), 'error' (Error)
 */

import { EventEmitter } from 'node:events';
import WebSocket from 'ws';

export interface RealtimeTransport extends EventEmitter {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type RealtimeTransportFactory = (url: string, headers: Record<string, string>) => RealtimeTransport;

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class WebSocketTransport extends EventEmitter implements RealtimeTransport {
  private readonly socket: WebSocket;

  constructor(url: string, headers: Record<string, string>) {
    super();
    this.socket = new WebSocket(url, { headers });
    this.socket.on('open', () => this.emit('open'));
    this.socket.on('message', data => this.emit('message', rawDataToString(data)));
    this.socket.on('close', (code, reason) => this.emit('close', code, reason.toString('utf8')));
    this.socket.on('error', error => this.emit('error', error));
  }

  send(data: string): void {
    this.socket.send(data);
  }

  close(code = 1000, reason = ''): void {
    if (this.socket.readyState === WebSocket.CLOSED) {
      this.emit('close', code, reason);
      return;
    }
    this.socket.close(code, reason);
  }
}

export const createWebSocketTransport: RealtimeTransportFactory = (url, headers) => new WebSocketTransport(url, headers);
