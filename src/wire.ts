/**
 * Wire protocol frames (Phoenix serializer v2).
 *
 * Every message in either direction is a JSON array of exactly five elements:
 * `[joinRef, ref, topic, event, payload]`. The order is fixed by the server
 * and must not change.
 */

import { Type } from 'typebox';
import { DecodeError, InvalidPayloadError } from './errors.ts';
import { isRecord } from './helpers.ts';
import { Response } from './Response.ts';
import { compileSchema } from './validation.ts';
import type { Payload, Ref } from './types.ts';

/**
 * Reserved event names.
 */
export const Event = {
  Heartbeat: 'heartbeat',
  Join: 'phx_join',
  Leave: 'phx_leave',
  Reply: 'phx_reply',
  Error: 'phx_error',
  Close: 'phx_close',
} as const;

/**
 * Topic used for socket-level messages (heartbeats).
 */
export const SOCKET_TOPIC = 'phoenix';

/**
 * Outbound message fields, in wire order.
 */
export interface OutboundMessage {
  joinRef: Ref;
  ref: Ref;
  topic: string;
  event: string;
  payload: Payload;
}

export type OutboundFrame = [joinRef: Ref, ref: Ref, topic: string, event: string, payload: Payload];

// Refs are checked separately: the server sends `null` for both on broadcasts.
const InboundFrameSchema = Type.Tuple([
  Type.Unknown(),
  Type.Unknown(),
  Type.String(),
  Type.String(),
  Type.Record(Type.String(), Type.Unknown()),
]);

const inboundFrame = compileSchema(InboundFrameSchema);

export function toFrame(message: OutboundMessage): OutboundFrame {
  return [message.joinRef, message.ref, message.topic, message.event, message.payload];
}

/**
 * Serialize a message to a text frame.
 *
 * @throws InvalidPayloadError if the payload cannot be represented as JSON
 */
export function encodeFrame(message: OutboundMessage): string {
  try {
    return JSON.stringify(toFrame(message));
  } catch {
    throw new InvalidPayloadError();
  }
}

/**
 * Parse a text frame into a Response.
 *
 * @throws DecodeError if the text is not a five-element frame
 */
export function decodeFrame(text: string): Response {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new DecodeError('malformed JSON');
  }

  if (!Array.isArray(value) || value.length !== 5) {
    throw new DecodeError('expected an array of 5 elements');
  }
  if (!inboundFrame.check(value)) {
    throw new DecodeError(inboundFrame.explain(value));
  }

  const [joinRef, ref, topic, event, payload] = value;
  if (!isRecord(payload)) {
    throw new DecodeError('payload must be an object');
  }

  return new Response({
    joinRef: typeof joinRef === 'string' ? joinRef : undefined,
    ref: typeof ref === 'string' ? ref : '',
    topic,
    event,
    payload,
  });
}
