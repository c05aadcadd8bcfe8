/**
 * Test utilities: an in-memory transport and polling helpers.
 */

import type { ClientTransport } from '../src/transports/ClientTransport.ts';
import type { Payload } from '../src/types.ts';

/**
 * In-memory ClientTransport. `connect()` opens synchronously unless
 * `failConnects` is positive, in which case the attempt closes with an error.
 */
export class FakeTransport implements ClientTransport {
  connected = false;
  /** Text frames written by the socket. */
  sent: string[] = [];
  /** URLs passed to connect(). */
  urls: string[] = [];
  failConnects = 0;
  /** When set, close() waits for completeClose(), like a close handshake. */
  deferClose = false;
  private _pendingClose = false;

  private _onOpen: (() => void)[] = [];
  private _onClose: ((error?: Error) => void)[] = [];
  private _onMessage: ((text: string) => void)[] = [];

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
    this.urls.push(url);
    if (this.connected) return Promise.resolve();

    if (this.failConnects > 0) {
      this.failConnects--;
      const err = new Error('connection refused');
      for (const cb of this._onClose) cb(err);
      return Promise.reject(err);
    }

    this.connected = true;
    for (const cb of this._onOpen) cb();
    return Promise.resolve();
  }

  close(): void {
    if (!this.connected) return;
    if (this.deferClose) {
      this._pendingClose = true;
      return;
    }
    this.connected = false;
    for (const cb of this._onClose) cb();
  }

  /**
   * Finish a close deferred by `deferClose`.
   */
  completeClose(): void {
    if (!this._pendingClose) return;
    this._pendingClose = false;
    this.connected = false;
    for (const cb of this._onClose) cb();
  }

  send(text: string): void {
    this.sent.push(text);
  }

  /**
   * Simulate the server dropping the connection.
   */
  drop(error?: Error): void {
    this.connected = false;
    for (const cb of this._onClose) cb(error);
  }

  /**
   * Deliver a server frame.
   */
  receive(frame: unknown): void {
    const text = typeof frame === 'string' ? frame : JSON.stringify(frame);
    for (const cb of this._onMessage) cb(text);
  }

  /**
   * Sent frames, parsed.
   */
  frames(): [string, string, string, string, Payload][] {
    return this.sent.map((text) => JSON.parse(text));
  }

  lastFrame(): [string, string, string, string, Payload] {
    const frames = this.frames();
    const last = frames[frames.length - 1];
    if (!last) throw new Error('No frames sent');
    return last;
  }

  /**
   * Reply to the last frame sent, the way the server acknowledges a push.
   */
  replyToLast(status: string, response: Payload = {}): void {
    const [joinRef, ref, topic] = this.lastFrame();
    this.receive([joinRef, ref, topic, 'phx_reply', { status, response }]);
  }
}

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 5000)
 * @param pollInterval - How often to check condition in milliseconds (default: 10)
 * @returns Promise that resolves when condition is true, rejects on timeout
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 10
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}
