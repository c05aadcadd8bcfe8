/**
 * Decoded inbound frame.
 */

import type { Payload, Ref } from './types.ts';

export interface ResponseInit {
  joinRef?: Ref;
  ref: Ref;
  topic: string;
  event: string;
  payload: Payload;
}

/**
 * Immutable view of one server message. Built by `decodeFrame`.
 */
export class Response {
  /** Join session the message belongs to; absent on server broadcasts. */
  readonly joinRef: Ref | undefined;
  /** Ref of the push this replies to, or `""` for unsolicited messages. */
  readonly ref: Ref;
  readonly topic: string;
  readonly event: string;
  readonly payload: Readonly<Payload>;

  constructor(init: ResponseInit) {
    this.joinRef = init.joinRef;
    this.ref = init.ref;
    this.topic = init.topic;
    this.event = init.event;
    this.payload = Object.freeze({ ...init.payload });
    Object.freeze(this);
  }

  /**
   * The reply `status` field (`"ok"`, `"error"`, ...), if the payload has one.
   */
  get status(): string | undefined {
    const status = this.payload['status'];
    return typeof status === 'string' ? status : undefined;
  }
}
