/**
 * Socket class - top-level orchestrator.
 *
 * Owns the transport, the table of pushes awaiting a reply, the channel
 * registry, the heartbeat loop and the reconnect policy.
 */

import { EventEmitter } from 'events';
import createDebug from 'debug';
import { Type } from 'typebox';
import { Channel } from './Channel.ts';
import type { ChannelHost } from './Channel.ts';
import { DecodeError, InvalidPayloadError, NotConnectedError, TimeoutError } from './errors.ts';
import { HEARTBEAT_REF_PREFIX, buildSocketUrl, createRef, formatEndpoint } from './helpers.ts';
import { Push } from './Push.ts';
import type { Response } from './Response.ts';
import { compileSchema } from './validation.ts';
import { Event, SOCKET_TOPIC, decodeFrame, encodeFrame } from './wire.ts';
import { WsClientTransport } from './transports/WsClientTransport.ts';
import type { ClientTransport } from './transports/ClientTransport.ts';
import type { ConnectionState, EndpointParts, Payload, Ref, SocketOptions } from './types.ts';

const debug = createDebug('phx-channels:socket');

const SocketOptionsSchema = Type.Object({
  params: Type.Optional(Type.Record(Type.String(), Type.String())),
  vsn: Type.Optional(Type.String()),
  heartbeatIntervalMs: Type.Optional(Type.Number({ minimum: 0 })),
  reconnect: Type.Optional(Type.Boolean()),
  reconnectIntervalMs: Type.Optional(Type.Number({ minimum: 0 })),
  pushTimeoutMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
});

const socketOptions = compileSchema(SocketOptionsSchema);

interface PendingPush {
  push: Push;
  timeoutId?: ReturnType<typeof setTimeout>;
}

/**
 * Events:
 * - `open` once the transport is connected
 * - `disconnect (error?)` after the transport closed
 * - `stateChange (previous, next)` on every connection state change
 * - `response (response)` for every decoded inbound message
 */
export class Socket extends EventEmitter implements ChannelHost {
  private _url: string;
  private _transport: ClientTransport;
  private _options: {
    heartbeatIntervalMs: number;
    reconnect: boolean;
    reconnectIntervalMs: number;
    pushTimeoutMs?: number;
  };

  private _state: ConnectionState = 'initial';
  private _channels = new Map<string, Channel>();
  private _pending = new Map<Ref, PendingPush>();

  // Heartbeat
  private _heartbeatTimer: ReturnType<typeof setTimeout> | null = null;

  // Reconnect
  private _reconnectTimer: ReturnType<typeof setInterval> | null = null;
  private _closeWasClean = false;
  private _connectAfterClose = false;

  /**
   * @param endpoint - Socket URL, e.g. `ws://localhost:4000/socket/websocket`
   * @throws ValidationError if options are invalid
   */
  constructor(endpoint: string, options: SocketOptions = {}) {
    super();
    const { transport, ...config } = options;
    socketOptions.validate(config);

    this._options = {
      heartbeatIntervalMs: config.heartbeatIntervalMs ?? 30000,
      reconnect: config.reconnect ?? true,
      reconnectIntervalMs: config.reconnectIntervalMs ?? 5000,
      ...(config.pushTimeoutMs !== undefined ? { pushTimeoutMs: config.pushTimeoutMs } : {}),
    };
    this._url = buildSocketUrl(endpoint, config.params, config.vsn);

    this._transport = transport ?? new WsClientTransport();
    this._transport.onOpen(() => this._handleOpen());
    this._transport.onClose((error) => this._handleClose(error));
    this._transport.onMessage((text) => {
      this.handleMessage(text);
    });
  }

  /**
   * Create a socket from endpoint pieces instead of a URL.
   *
   * @example
   * ```typescript
   * const socket = Socket.fromParts({ host: 'example.com', port: 4000 }, { params: { token: 'abc' } });
   * ```
   */
  static fromParts(parts: EndpointParts = {}, options: SocketOptions = {}): Socket {
    return new Socket(formatEndpoint(parts), options);
  }

  get url(): string {
    return this._url;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connected(): boolean {
    return this._transport.connected;
  }

  get channels(): ReadonlyMap<string, Channel> {
    return this._channels;
  }

  // Connection

  /**
   * Open the connection. While a disconnect is still closing the transport,
   * the connection is opened again once the close completes.
   */
  connect(): void {
    if (this._state === 'disconnecting') {
      debug('Connect requested while disconnecting, reopening after close');
      this._connectAfterClose = true;
      return;
    }
    if (this._state === 'connecting' || this._transport.connected) return;

    debug('Connecting to %s', this._url);
    this._setState('connecting');
    this._openTransport();
  }

  /**
   * Close the connection. Suppresses reconnection until the next successful connect.
   */
  disconnect(): void {
    this._closeWasClean = true;
    this._connectAfterClose = false;
    this._stopReconnect();

    if (this._state === 'initial' || this._state === 'disconnected' || this._state === 'disconnecting') {
      return;
    }

    debug('Disconnecting from %s', this._url);
    this._setState('disconnecting');
    this._transport.close();
  }

  // Channels

  /**
   * Create a channel for a topic, replacing any channel registered for it.
   */
  channel(topic: string, params: Payload = {}): Channel {
    const channel = new Channel(this, topic, params);
    this._channels.set(topic, channel);
    return channel;
  }

  /**
   * Leave a channel; it is unregistered once the server confirms.
   */
  remove(channel: Channel): Push {
    return channel.leave();
  }

  /**
   * Register a channel again after a disconnect or a leave dropped it.
   * A different channel registered for the topic in the meantime is kept.
   */
  attach(channel: Channel): void {
    if (!this._channels.has(channel.topic)) {
      this._channels.set(channel.topic, channel);
    }
  }

  detach(channel: Channel): void {
    if (this._channels.get(channel.topic) === channel) {
      this._channels.delete(channel.topic);
    }
  }

  // Sending

  send(event: string, topic: string, payload: Payload = {}): Push {
    return this.push(new Push(event, topic, payload));
  }

  /**
   * Write a push and track it until its reply arrives.
   *
   * Never throws: a missing connection or an unserializable payload resolves
   * the push with status `"error"` before this returns.
   */
  push(push: Push): Push {
    if (!this._transport.connected) {
      debug('Cannot send %s on %s, not connected', push.event, push.topic);
      push.fail(new NotConnectedError());
      return push;
    }

    let text: string;
    try {
      text = encodeFrame(push);
    } catch (err) {
      if (!(err instanceof InvalidPayloadError)) throw err;
      debug('Failed to encode %s on %s', push.event, push.topic);
      push.fail(err);
      return push;
    }

    const pending: PendingPush = { push };
    const timeoutMs = this._options.pushTimeoutMs;
    if (timeoutMs !== undefined) {
      pending.timeoutId = setTimeout(() => {
        if (this._pending.get(push.ref) !== pending) return;
        this._pending.delete(push.ref);
        debug('Push %s timed out after %dms', push.ref, timeoutMs);
        push.fail(new TimeoutError());
      }, timeoutMs);
    }
    this._pending.set(push.ref, pending);

    debug('Sending %s', text);
    this._transport.send(text);
    return push;
  }

  // Receiving

  /**
   * Decode and dispatch one inbound text frame. Malformed frames are dropped.
   */
  handleMessage(text: string): Response | undefined {
    let response: Response;
    try {
      response = decodeFrame(text);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      debug('Dropping frame: %s', err.message);
      return undefined;
    }

    debug('Received %s on %s (ref %s)', response.event, response.topic, response.ref);

    const pending = this._pending.get(response.ref);
    this._pending.delete(response.ref);
    if (pending) {
      if (pending.timeoutId) clearTimeout(pending.timeoutId);
      pending.push.resolve(response);
    }

    this._channels.get(response.topic)?.received(response);
    this.emit('response', response);

    return response;
  }

  // Transport lifecycle

  private _openTransport(): void {
    this._transport.connect(this._url).catch((err: unknown) => {
      // The close callback drives state and reconnection.
      debug('Connect failed: %s', err instanceof Error ? err.message : String(err));
    });
  }

  private _handleOpen(): void {
    debug('Connected to %s', this._url);
    this._closeWasClean = false;
    this._stopReconnect();
    this._setState('connected');
    this.emit('open');
    this._scheduleHeartbeat();
  }

  private _handleClose(error?: Error): void {
    debug('Disconnected from %s%s', this._url, error ? ` (${error.message})` : '');
    this._stopHeartbeat();
    this._setState('disconnected');

    const channels = [...this._channels.values()];
    const stranded = [...this._pending.values()];
    this._channels.clear();
    this._pending.clear();

    for (const channel of channels) {
      channel.connectionLost();
    }
    for (const { push, timeoutId } of stranded) {
      if (timeoutId) clearTimeout(timeoutId);
      push.fail(new NotConnectedError());
    }

    this.emit('disconnect', error);

    if (this._connectAfterClose) {
      this._connectAfterClose = false;
      this._setState('connecting');
      this._openTransport();
      return;
    }

    if (!this._closeWasClean && this._options.reconnect && this._options.reconnectIntervalMs > 0) {
      this._scheduleReconnect();
    }
  }

  // Heartbeat

  private _scheduleHeartbeat(): void {
    if (this._options.heartbeatIntervalMs <= 0) return;
    this._stopHeartbeat();
    this._heartbeatTimer = setTimeout(() => this._sendHeartbeat(), this._options.heartbeatIntervalMs);
  }

  private _sendHeartbeat(): void {
    this._heartbeatTimer = null;
    if (!this._transport.connected) return;

    this.push(new Push(Event.Heartbeat, SOCKET_TOPIC, {}, { ref: createRef(HEARTBEAT_REF_PREFIX) }));
    this._scheduleHeartbeat();
  }

  private _stopHeartbeat(): void {
    if (this._heartbeatTimer) {
      clearTimeout(this._heartbeatTimer);
      this._heartbeatTimer = null;
    }
  }

  // Reconnect

  private _scheduleReconnect(): void {
    if (this._reconnectTimer) return;

    const interval = this._options.reconnectIntervalMs;
    debug('Reconnecting every %dms', interval);
    this._reconnectTimer = setInterval(() => {
      if (this._transport.connected) {
        this._stopReconnect();
        return;
      }
      debug('Attempting reconnect to %s', this._url);
      this._setState('connecting');
      this._openTransport();
    }, interval);
  }

  private _stopReconnect(): void {
    if (this._reconnectTimer) {
      clearInterval(this._reconnectTimer);
      this._reconnectTimer = null;
    }
  }

  private _setState(next: ConnectionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.emit('stateChange', previous, next);
  }
}
