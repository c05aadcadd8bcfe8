/**
 * A single outbound request awaiting at most one reply.
 */

import createDebug from 'debug';
import { TimeoutError } from './errors.ts';
import type { PushError } from './errors.ts';
import { createRef } from './helpers.ts';
import type { Response } from './Response.ts';
import { toFrame } from './wire.ts';
import type { OutboundFrame, OutboundMessage } from './wire.ts';
import type { Payload, Ref } from './types.ts';

const debug = createDebug('phx-channels:push');

export type PushHandler = (payload: Payload, push: Push) => void;
export type AlwaysHandler = (push: Push) => void;

export interface PushRefs {
  ref?: Ref;
  joinRef?: Ref;
}

/**
 * Outbound request with a single-shot callback registry.
 *
 * The push resolves exactly once, from a server reply (`resolve`) or a local
 * failure (`fail`). Callbacks fire in registration order: all `always`
 * callbacks first, then those registered for the received status. Both
 * registries are emptied afterwards.
 *
 * @example
 * ```ts
 * channel.send('new_msg', { body: 'hi' })
 *   .receive('ok', (reply) => console.log('sent', reply))
 *   .receive('error', ({ reason }) => console.error(reason));
 * ```
 */
export class Push implements OutboundMessage {
  readonly topic: string;
  readonly event: string;
  readonly payload: Payload;
  readonly ref: Ref;
  readonly joinRef: Ref;

  private _receivedStatus: string | undefined;
  private _receivedResponse: Payload | undefined;
  private _lastError: PushError | undefined;
  private _resolved = false;

  private _callbacks = new Map<string, PushHandler[]>();
  private _alwaysCallbacks: AlwaysHandler[] = [];

  constructor(event: string, topic: string, payload: Payload = {}, refs: PushRefs = {}) {
    this.event = event;
    this.topic = topic;
    this.payload = payload;
    this.ref = refs.ref ?? createRef();
    this.joinRef = refs.joinRef ?? createRef();
  }

  get receivedStatus(): string | undefined {
    return this._receivedStatus;
  }

  get receivedResponse(): Payload | undefined {
    return this._receivedResponse;
  }

  /**
   * Local failure that resolved this push, if any. Cleared by a server reply.
   */
  get lastError(): PushError | undefined {
    return this._lastError;
  }

  get resolved(): boolean {
    return this._resolved;
  }

  get frame(): OutboundFrame {
    return toFrame(this);
  }

  /**
   * Register a callback for a reply status.
   *
   * Fires synchronously when the push already resolved with that status.
   */
  receive(status: string, callback: PushHandler): this {
    if (this._resolved) {
      if (this._receivedStatus === status && this._receivedResponse) {
        callback(this._receivedResponse, this);
      }
      return this;
    }

    const list = this._callbacks.get(status);
    if (list) list.push(callback);
    else this._callbacks.set(status, [callback]);
    return this;
  }

  /**
   * Register a callback fired once on resolution, whatever the status.
   */
  always(callback: AlwaysHandler): this {
    if (this._resolved) {
      callback(this);
      return this;
    }
    this._alwaysCallbacks.push(callback);
    return this;
  }

  /**
   * Resolve with the server reply correlated to this push.
   */
  resolve(response: Response): void {
    if (this._resolved) {
      debug('ignoring second resolution of %s', this.ref);
      return;
    }
    this._receivedStatus = response.status;
    this._receivedResponse = { ...response.payload };
    this._lastError = undefined;
    this._fireCallbacksAndCleanup();
  }

  /**
   * Resolve locally without a server reply.
   */
  fail(error: PushError): void {
    if (this._resolved) {
      debug('ignoring failure of resolved push %s: %s', this.ref, error.message);
      return;
    }
    this._receivedStatus = error instanceof TimeoutError ? 'timeout' : 'error';
    this._receivedResponse = { reason: error.message };
    this._lastError = error;
    this._fireCallbacksAndCleanup();
  }

  private _fireCallbacksAndCleanup(): void {
    this._resolved = true;
    const always = this._alwaysCallbacks;
    const matching = this._receivedStatus !== undefined ? this._callbacks.get(this._receivedStatus) : undefined;
    this._alwaysCallbacks = [];
    this._callbacks.clear();

    debug('resolved %s %s with status %s', this.event, this.ref, this._receivedStatus);

    for (const cb of always) cb(this);

    const response = this._receivedResponse;
    if (matching && response) {
      for (const cb of matching) cb(response, this);
    }
  }
}
