/**
 * phx-channels: Phoenix Channels client for Node.js.
 *
 * One WebSocket carries any number of topic channels. Pushes are correlated
 * with their replies by ref, channels track join/leave state, and each
 * channel keeps a presence view fed by `presence_state`/`presence_diff`.
 *
 * ## Example
 * ```ts
 * import { Socket } from 'phx-channels';
 *
 * const socket = new Socket('ws://localhost:4000/socket/websocket', {
 *   params: { token: 'user-token' },
 * });
 * socket.connect();
 *
 * const room = socket.channel('room:lobby', { nickname: 'ada' });
 * room.on('new_msg', (response) => console.log(response.payload));
 * room.onPresenceUpdate((_channel, presence) => console.log(presence.firstMetas()));
 *
 * socket.once('open', () => {
 *   room.join()
 *     .receive('ok', () => room.send('new_msg', { body: 'hello' }))
 *     .receive('error', ({ reason }) => console.error('join failed', reason));
 * });
 * ```
 *
 * Logging goes through `debug`; enable it with `DEBUG=phx-channels:*`.
 *
 * @packageDocumentation
 */

// Runtime exports
export { Socket } from './Socket.ts';
export { Channel } from './Channel.ts';
export { Push } from './Push.ts';
export { Presence, PresenceEvent } from './Presence.ts';
export { Response } from './Response.ts';
export { Event, SOCKET_TOPIC, encodeFrame, decodeFrame } from './wire.ts';
export { createRef, isHeartbeatRef, HEARTBEAT_REF_PREFIX, buildSocketUrl, formatEndpoint } from './helpers.ts';
export { WsClientTransport } from './transports/WsClientTransport.ts';
export {
  ErrorCode,
  hasErrorCode,
  getErrorCode,
  InvalidPayloadError,
  NotConnectedError,
  TimeoutError,
  DecodeError,
  ValidationError,
} from './errors.ts';

// Type-only exports
export type {
  Ref,
  Payload,
  Meta,
  PresenceState,
  ConnectionState,
  ChannelState,
  EndpointParts,
  SocketOptions,
} from './types.ts';

export type { ChannelHost, ChannelEventHandler, ChannelPresenceHandler, JoinCallback } from './Channel.ts';
export type { PushHandler, AlwaysHandler, PushRefs } from './Push.ts';
export type { PresenceJoinHandler, PresenceLeaveHandler, PresenceStateHandler } from './Presence.ts';
export type { ResponseInit } from './Response.ts';
export type { OutboundMessage, OutboundFrame } from './wire.ts';
export type { PushError, ErrorCodeType } from './errors.ts';
export type { ClientTransport } from './transports/ClientTransport.ts';
