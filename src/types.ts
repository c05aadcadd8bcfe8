/**
 * Core type definitions for the channels client.
 */

import type { ClientTransport } from './transports/ClientTransport.ts';

/**
 * Opaque correlation token. Equality is string equality.
 */
export type Ref = string;

/**
 * JSON object carried in the fifth position of every frame.
 */
export type Payload = Record<string, unknown>;

/**
 * One presence entry (e.g. one connected device) for an identity.
 */
export type Meta = Record<string, unknown>;

/**
 * Replicated presence: identity -> ordered meta records.
 */
export type PresenceState = Record<string, Meta[]>;

/**
 * Socket connection lifecycle.
 */
export type ConnectionState =
  | 'initial'
  | 'connecting'
  | 'connected'
  | 'disconnecting'
  | 'disconnected';

/**
 * Channel lifecycle.
 */
export type ChannelState = 'closed' | 'errored' | 'joined' | 'joining' | 'leaving';

/**
 * Endpoint pieces used by `Socket.fromParts`.
 * Defaults produce `ws://localhost:4000/socket/websocket`.
 */
export interface EndpointParts {
  protocol?: string;
  host?: string;
  port?: number;
  path?: string;
  transport?: string;
}

/**
 * Socket configuration options.
 */
export interface SocketOptions {
  /** Query parameters appended to the endpoint URL. */
  params?: Record<string, string>;
  /** Serializer version sent as the `vsn` query parameter. Default: "2.0.0" */
  vsn?: string;
  /** Heartbeat interval in milliseconds; 0 disables heartbeats. Default: 30000 */
  heartbeatIntervalMs?: number;
  /** Reconnect after an unexpected disconnect. Default: true */
  reconnect?: boolean;
  /** Delay between reconnect attempts in milliseconds. Default: 5000 */
  reconnectIntervalMs?: number;
  /** Fail pushes with no reply after this many milliseconds. Default: no deadline */
  pushTimeoutMs?: number;
  /**
   * Override the client transport implementation.
   * Default: `ws` transport.
   */
  transport?: ClientTransport;
}
