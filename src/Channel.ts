/**
 * Per-topic session over the shared socket.
 */

import createDebug from 'debug';
import { Presence, PresenceEvent } from './Presence.ts';
import { Push } from './Push.ts';
import type { PushError } from './errors.ts';
import { createRef } from './helpers.ts';
import type { Response } from './Response.ts';
import { Event } from './wire.ts';
import type { ChannelState, Payload, Ref } from './types.ts';

const debug = createDebug('phx-channels:channel');

export type ChannelEventHandler = (response: Response, channel: Channel) => void;
export type ChannelPresenceHandler = (channel: Channel, presence: Presence) => void;
export type JoinCallback = (error: PushError | undefined, channel: Channel) => void;

/**
 * What a channel needs from the socket that owns it. The socket owns the
 * channel registry; a channel never holds the socket itself.
 */
export interface ChannelHost {
  push(push: Push): Push;
  attach(channel: Channel): void;
  detach(channel: Channel): void;
}

export class Channel {
  readonly topic: string;
  readonly params: Payload;
  readonly presence = new Presence();

  private _host: ChannelHost;
  private _state: ChannelState = 'closed';
  private _joinRef: Ref | undefined;
  private _handlers = new Map<string, ChannelEventHandler>();
  private _presenceUpdate: ChannelPresenceHandler | null = null;

  constructor(host: ChannelHost, topic: string, params: Payload = {}) {
    this._host = host;
    this.topic = topic;
    this.params = params;
    this._installPresenceHandlers();
  }

  get state(): ChannelState {
    return this._state;
  }

  /**
   * Ref of the current join push; replies from older joins carry another one.
   */
  get joinRef(): Ref | undefined {
    return this._joinRef;
  }

  /**
   * Join the topic with this channel's params.
   *
   * The state is `joining` on return and becomes `joined` on an `"ok"` reply.
   * A channel dropped by a disconnect or a leave registers with the socket again.
   */
  join(): Push {
    this._host.attach(this);
    this._installPresenceHandlers();
    this._setState('joining');

    const ref = createRef();
    const joinPush = new Push(Event.Join, this.topic, this.params, { ref, joinRef: ref });
    this._joinRef = joinPush.ref;

    return this._host
      .push(joinPush)
      .receive('ok', () => {
        if (this._joinRef === joinPush.ref) this._setState('joined');
      })
      .receive('error', () => this._joinFailed(joinPush))
      .receive('timeout', () => this._joinFailed(joinPush));
  }

  /**
   * Leave the topic. On an `"ok"` reply all handlers are dropped, the state
   * becomes `closed` and the socket forgets this channel.
   */
  leave(): Push {
    this._setState('leaving');

    return this.send(Event.Leave, {}).receive('ok', () => {
      this._handlers.clear();
      this._presenceUpdate = null;
      this.presence.onJoin = null;
      this.presence.onLeave = null;
      this.presence.onStateChange = null;
      this._setState('closed');
      this._host.detach(this);
    });
  }

  /**
   * Join unless already joined, then call back with the join's local error, if any.
   */
  joinIfNeeded(callback: JoinCallback): void {
    if (this._state === 'joined') {
      callback(undefined, this);
      return;
    }
    this.join().always((push) => callback(push.lastError, this));
  }

  /**
   * Push an event on this topic.
   */
  send(event: string, payload: Payload = {}): Push {
    const push = this._joinRef
      ? new Push(event, this.topic, payload, { joinRef: this._joinRef })
      : new Push(event, this.topic, payload);
    return this._host.push(push);
  }

  /**
   * Handle an event pushed by the server. Replaces an earlier handler for the same event.
   */
  on(event: string, handler: ChannelEventHandler): this {
    this._handlers.set(event, handler);
    return this;
  }

  off(event: string): this {
    this._handlers.delete(event);
    return this;
  }

  /**
   * Called after each full presence sync.
   */
  onPresenceUpdate(handler: ChannelPresenceHandler): this {
    this._presenceUpdate = handler;
    return this;
  }

  /**
   * Route an inbound message for this topic. Called by the socket.
   */
  received(response: Response): void {
    if (response.joinRef !== undefined && this._joinRef !== undefined && response.joinRef !== this._joinRef) {
      debug('dropping %s on %s from stale join %s', response.event, this.topic, response.joinRef);
      return;
    }

    if (response.event === Event.Error) {
      this._setState('errored');
    } else if (response.event === Event.Close) {
      this._setState('closed');
    }

    const handler = this._handlers.get(response.event);
    if (!handler) {
      debug('no handler for %s on %s', response.event, this.topic);
      return;
    }
    handler(response, this);
  }

  /**
   * Mark the channel errored after the connection dropped. Called by the socket.
   */
  connectionLost(): void {
    if (this._state !== 'closed') this._setState('errored');
  }

  private _installPresenceHandlers(): void {
    if (!this._handlers.has(PresenceEvent.State)) {
      this.on(PresenceEvent.State, (response) => {
        this.presence.sync(response);
        this._presenceUpdate?.(this, this.presence);
      });
    }
    if (!this._handlers.has(PresenceEvent.Diff)) {
      this.on(PresenceEvent.Diff, (response) => {
        this.presence.sync(response);
      });
    }
  }

  private _joinFailed(push: Push): void {
    if (this._joinRef === push.ref && this._state === 'joining') {
      this._setState('errored');
    }
  }

  private _setState(state: ChannelState): void {
    if (this._state === state) return;
    debug('%s: %s -> %s', this.topic, this._state, state);
    this._state = state;
  }
}
