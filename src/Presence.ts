/**
 * Replicated presence state for one topic.
 *
 * The server sends a full `presence_state` snapshot after join, then
 * `presence_diff` messages with `joins` and `leaves`. Each identity maps to
 * an ordered list of metas; fields the server places next to `metas` are
 * copied into every meta so each record stands on its own.
 */

import createDebug from 'debug';
import copy from 'fast-copy';
import { Type } from 'typebox';
import { isRecord } from './helpers.ts';
import type { Response } from './Response.ts';
import { compileSchema } from './validation.ts';
import type { Meta, PresenceState } from './types.ts';

const debug = createDebug('phx-channels:presence');

export const PresenceEvent = {
  State: 'presence_state',
  Diff: 'presence_diff',
} as const;

export type PresenceJoinHandler = (id: string, meta: Meta) => void;
export type PresenceLeaveHandler = (id: string, meta: Meta) => void;
export type PresenceStateHandler = (state: PresenceState) => void;

const metaList = compileSchema(Type.Array(Type.Record(Type.String(), Type.Unknown())));

/**
 * Flatten one wire entry `{ metas: [...], ...shared }` into self-describing metas.
 * Fields already on a meta take precedence over shared ones.
 */
function mergeMetas(id: string, entry: unknown): Meta[] | undefined {
  if (!isRecord(entry)) {
    debug('skipping %s: entry is not an object', id);
    return undefined;
  }
  const { metas, ...shared } = entry;
  if (!metaList.check(metas)) {
    debug('skipping %s: %s', id, metaList.explain(metas));
    return undefined;
  }
  return metas.map((meta) => ({ ...copy(shared), ...copy(meta) }));
}

export class Presence {
  private _state: PresenceState = {};

  onJoin: PresenceJoinHandler | null = null;
  onLeave: PresenceLeaveHandler | null = null;
  onStateChange: PresenceStateHandler | null = null;

  constructor(state: PresenceState = {}) {
    this._state = copy(state);
  }

  /**
   * Snapshot of the replicated state. Changes to it do not reach this presence.
   */
  get state(): PresenceState {
    return copy(this._state);
  }

  /**
   * Apply a `presence_state` or `presence_diff` message. Other events are ignored.
   */
  sync(response: Response): void {
    switch (response.event) {
      case PresenceEvent.State:
        this._syncState(response.payload);
        break;
      case PresenceEvent.Diff:
        this._syncDiff(response.payload);
        break;
      default:
        debug('ignoring %s on %s', response.event, response.topic);
        return;
    }
    this.onStateChange?.(copy(this._state));
  }

  private _syncState(payload: Readonly<Record<string, unknown>>): void {
    for (const [id, entry] of Object.entries(payload)) {
      const metas = mergeMetas(id, entry);
      if (metas) this._state[id] = metas;
    }
  }

  private _syncDiff(payload: Readonly<Record<string, unknown>>): void {
    const { joins: rawJoins, leaves: rawLeaves } = payload;
    const joins = isRecord(rawJoins) ? rawJoins : {};
    const leaves = isRecord(rawLeaves) ? rawLeaves : {};

    // Leaves first: an id present in both ends up joined.
    for (const [id, entry] of Object.entries(leaves)) {
      delete this._state[id];
      const metas = mergeMetas(id, entry) ?? [];
      for (const meta of metas) this.onLeave?.(id, meta);
    }

    for (const [id, entry] of Object.entries(joins)) {
      const metas = mergeMetas(id, entry);
      if (!metas) continue;
      this._state[id] = metas;
      for (const meta of metas) this.onJoin?.(id, copy(meta));
    }
  }

  // Accessors

  metas(id: string): Meta[] | undefined {
    const metas = this._state[id];
    return metas && copy(metas);
  }

  /**
   * The first meta of an identity, commonly its primary record.
   */
  firstMeta(id: string): Meta | undefined {
    const first = this._state[id]?.[0];
    return first && copy(first);
  }

  firstMetas(): Record<string, Meta> {
    const result: Record<string, Meta> = {};
    for (const [id, metas] of Object.entries(this._state)) {
      const first = metas[0];
      if (first) result[id] = copy(first);
    }
    return result;
  }

  /**
   * Read `key` from the first meta of `id`, if the value passes `guard`.
   *
   * @example
   * ```ts
   * const name = presence.firstMetaValue('u1', 'name', (v): v is string => typeof v === 'string');
   * ```
   */
  firstMetaValue<T>(id: string, key: string, guard: (value: unknown) => value is T): T | undefined {
    const value = this.firstMeta(id)?.[key];
    return guard(value) ? value : undefined;
  }

  /**
   * Read `key` from the first meta of every identity, keeping values that pass `guard`.
   */
  firstMetaValues<T>(key: string, guard: (value: unknown) => value is T): T[] {
    const result: T[] = [];
    for (const meta of Object.values(this.firstMetas())) {
      const value = meta[key];
      if (guard(value)) result.push(value);
    }
    return result;
  }
}
