/**
 * Client transport using the `ws` package.
 *
 * Deals only with raw text frames; decoding and routing happen in the socket.
 */

import { WebSocket } from 'ws';
import type { ClientOptions, RawData } from 'ws';
import createDebug from 'debug';
import type { ClientTransport } from './ClientTransport.ts';

const debug = createDebug('phx-channels:ws-transport');

type ConnectionState = 'disconnected' | 'connecting' | 'connected';

function toText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class WsClientTransport implements ClientTransport {
  private _ws: WebSocket | null = null;
  private _state: ConnectionState = 'disconnected';
  private _connectPromise: Promise<void> | null = null;
  private _wsOptions: ClientOptions;

  private _onOpen: (() => void)[] = [];
  private _onClose: ((error?: Error) => void)[] = [];
  private _onMessage: ((text: string) => void)[] = [];

  /**
   * @param wsOptions - Passed to the `ws` constructor (headers, TLS settings, ...)
   */
  constructor(wsOptions: ClientOptions = {}) {
    this._wsOptions = wsOptions;
  }

  get connected(): boolean {
    return this._state === 'connected';
  }

  onOpen(cb: () => void): void {
    this._onOpen.push(cb);
  }
  onClose(cb: (error?: Error) => void): void {
    this._onClose.push(cb);
  }
  onMessage(cb: (text: string) => void): void {
    this._onMessage.push(cb);
  }

  connect(url: string): Promise<void> {
    if (this._state === 'connected') return Promise.resolve();
    if (this._state === 'connecting' && this._connectPromise) return this._connectPromise;

    this._connectPromise = new Promise((resolve, reject) => {
      let settled = false;
      let lastError: Error | undefined;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        this._connectPromise = null;
        if (err) reject(err);
        else resolve();
      };

      this._state = 'connecting';
      debug('Connecting to %s', url);

      const ws = new WebSocket(url, this._wsOptions);
      this._ws = ws;

      ws.on('open', () => {
        this._state = 'connected';
        debug('Connected to %s', url);
        for (const cb of this._onOpen) cb();
        finish();
      });

      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          debug('Dropping binary frame');
          return;
        }
        const text = toText(data);
        for (const cb of this._onMessage) cb(text);
      });

      ws.on('error', (err: Error) => {
        debug('WebSocket error on %s: %o', url, err);
        lastError = err;
      });

      ws.on('close', (code: number) => {
        if (this._ws === ws) {
          this._ws = null;
          this._state = 'disconnected';
        }
        debug('Disconnected from %s (code: %d)', url, code);

        // If we never connected, treat as failure for the connect() Promise.
        finish(lastError ?? new Error(`WebSocket closed before open (code: ${code})`));

        for (const cb of this._onClose) cb(lastError);
      });
    });

    return this._connectPromise;
  }

  send(text: string): void {
    if (!this._ws || this._state !== 'connected') {
      debug('Cannot send, not connected');
      return;
    }
    this._ws.send(text);
  }

  close(): void {
    if (this._ws) {
      debug('Closing');
      this._ws.close();
    }
  }
}
