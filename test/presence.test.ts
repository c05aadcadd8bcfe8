/**
 * Presence sync tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Presence } from '../src/Presence.ts';
import { Response } from '../src/Response.ts';
import type { Meta, Payload, PresenceState } from '../src/types.ts';

function message(event: string, payload: Payload): Response {
  return new Response({ ref: '', topic: 'room:lobby', event, payload });
}

const isString = (value: unknown): value is string => typeof value === 'string';

describe('Presence', () => {
  describe('presence_state', () => {
    it('should merge fields next to metas into each meta', () => {
      const presence = new Presence();
      presence.sync(message('presence_state', { u1: { metas: [{ ref: 'a' }], name: 'Alice' } }));

      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'a', name: 'Alice' }] });
    });

    it('should copy shared fields into every meta of an id', () => {
      const presence = new Presence();
      presence.sync(
        message('presence_state', {
          u1: { metas: [{ ref: 'a' }, { ref: 'b' }], profile: { name: 'Alice' } },
        })
      );

      const metas = presence.metas('u1');
      assert.deepStrictEqual(metas, [
        { ref: 'a', profile: { name: 'Alice' } },
        { ref: 'b', profile: { name: 'Alice' } },
      ]);
      assert.notStrictEqual(metas?.[0]?.['profile'], metas?.[1]?.['profile']);
    });

    it('should keep fields already on a meta', () => {
      const presence = new Presence();
      presence.sync(message('presence_state', { u1: { metas: [{ ref: 'a', name: 'Al' }], name: 'Alice' } }));

      assert.deepStrictEqual(presence.metas('u1'), [{ ref: 'a', name: 'Al' }]);
    });

    it('should overwrite listed ids and leave others alone', () => {
      const presence = new Presence({ u1: [{ ref: 'old' }], u2: [{ ref: 'x' }] });
      presence.sync(message('presence_state', { u1: { metas: [{ ref: 'new' }] } }));

      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'new' }], u2: [{ ref: 'x' }] });
    });

    it('should skip malformed entries', () => {
      const presence = new Presence();
      presence.sync(
        message('presence_state', {
          u1: 'nope',
          u2: { metas: 'nope' },
          u3: { metas: [1, 2] },
          u4: { metas: [{ ref: 'ok' }] },
        })
      );

      assert.deepStrictEqual(presence.state, { u4: [{ ref: 'ok' }] });
    });

    it('should fire the state change callback once', () => {
      const presence = new Presence();
      const states: PresenceState[] = [];
      presence.onStateChange = (state) => states.push({ ...state });

      presence.sync(message('presence_state', { u1: { metas: [{ ref: 'a' }] }, u2: { metas: [{ ref: 'b' }] } }));

      assert.strictEqual(states.length, 1);
      assert.deepStrictEqual(Object.keys(states[0] ?? {}).sort(), ['u1', 'u2']);
    });
  });

  describe('presence_diff', () => {
    it('should remove leaving ids and report each merged meta', () => {
      const presence = new Presence({ u1: [{ ref: 'a' }], u2: [{ ref: 'b' }] });
      const leaves: [string, Meta][] = [];
      let stateChanges = 0;
      presence.onLeave = (id, meta) => leaves.push([id, meta]);
      presence.onStateChange = () => stateChanges++;

      presence.sync(message('presence_diff', { joins: {}, leaves: { u1: { metas: [{ ref: 'a' }] } } }));

      assert.deepStrictEqual(presence.state, { u2: [{ ref: 'b' }] });
      assert.deepStrictEqual(leaves, [['u1', { ref: 'a' }]]);
      assert.strictEqual(stateChanges, 1);
    });

    it('should set joining ids and report each meta', () => {
      const presence = new Presence();
      const joins: [string, Meta][] = [];
      presence.onJoin = (id, meta) => joins.push([id, meta]);

      presence.sync(
        message('presence_diff', {
          joins: { u1: { metas: [{ ref: 'a' }, { ref: 'b' }], name: 'Alice' } },
          leaves: {},
        })
      );

      assert.deepStrictEqual(presence.metas('u1'), [
        { ref: 'a', name: 'Alice' },
        { ref: 'b', name: 'Alice' },
      ]);
      assert.deepStrictEqual(joins, [
        ['u1', { ref: 'a', name: 'Alice' }],
        ['u1', { ref: 'b', name: 'Alice' }],
      ]);
    });

    it('should let a join win over a leave for the same id', () => {
      const presence = new Presence({ u1: [{ ref: 'a' }] });
      const order: string[] = [];
      presence.onLeave = (id) => order.push(`leave:${id}`);
      presence.onJoin = (id) => order.push(`join:${id}`);
      presence.onStateChange = () => order.push('state');

      presence.sync(
        message('presence_diff', {
          joins: { u1: { metas: [{ ref: 'b' }] } },
          leaves: { u1: { metas: [{ ref: 'a' }] } },
        })
      );

      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'b' }] });
      assert.deepStrictEqual(order, ['leave:u1', 'join:u1', 'state']);
    });

    it('should fire the state change callback for an empty diff', () => {
      const presence = new Presence({ u1: [{ ref: 'a' }] });
      let stateChanges = 0;
      presence.onStateChange = () => stateChanges++;

      presence.sync(message('presence_diff', { joins: {}, leaves: {} }));

      assert.strictEqual(stateChanges, 1);
      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'a' }] });
    });

    it('should treat missing joins or leaves as empty', () => {
      const presence = new Presence();
      presence.sync(message('presence_diff', { joins: { u1: { metas: [{ ref: 'a' }] } } }));

      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'a' }] });
    });
  });

  it('should ignore other events', () => {
    const presence = new Presence();
    let stateChanges = 0;
    presence.onStateChange = () => stateChanges++;

    presence.sync(message('new_msg', { u1: { metas: [{ ref: 'a' }] } }));

    assert.strictEqual(stateChanges, 0);
    assert.deepStrictEqual(presence.state, {});
  });

  describe('Accessors', () => {
    const presence = new Presence();
    presence.sync(
      message('presence_state', {
        u1: { metas: [{ ref: 'a', device: 'phone' }, { ref: 'b', device: 'laptop' }], name: 'Alice' },
        u2: { metas: [{ ref: 'c', device: 'tablet' }], name: 'Bob' },
        u3: { metas: [{ ref: 'd', device: 7 }] },
      })
    );

    it('should return all metas for an id', () => {
      assert.strictEqual(presence.metas('u1')?.length, 2);
      assert.strictEqual(presence.metas('nobody'), undefined);
    });

    it('should return the first meta for an id', () => {
      assert.deepStrictEqual(presence.firstMeta('u1'), { ref: 'a', device: 'phone', name: 'Alice' });
      assert.strictEqual(presence.firstMeta('nobody'), undefined);
    });

    it('should return the first meta of every id', () => {
      assert.deepStrictEqual(presence.firstMetas(), {
        u1: { ref: 'a', device: 'phone', name: 'Alice' },
        u2: { ref: 'c', device: 'tablet', name: 'Bob' },
        u3: { ref: 'd', device: 7 },
      });
    });

    it('should read a typed value from the first meta', () => {
      assert.strictEqual(presence.firstMetaValue('u2', 'name', isString), 'Bob');
      assert.strictEqual(presence.firstMetaValue('u3', 'device', isString), undefined);
      assert.strictEqual(presence.firstMetaValue('nobody', 'name', isString), undefined);
    });

    it('should read typed values across all ids', () => {
      assert.deepStrictEqual(presence.firstMetaValues('device', isString), ['phone', 'tablet']);
      assert.deepStrictEqual(presence.firstMetaValues('name', isString), ['Alice', 'Bob']);
    });
  });

  describe('Isolation', () => {
    it('should not let accessor results change the replicated state', () => {
      const presence = new Presence();
      presence.sync(message('presence_state', { u1: { metas: [{ ref: 'a' }] } }));

      presence.metas('u1')?.push({ ref: 'x' });
      const first = presence.firstMeta('u1');
      if (first) first['ref'] = 'changed';
      const firsts = presence.firstMetas();
      if (firsts['u1']) firsts['u1']['ref'] = 'changed';
      const state = presence.state;
      state['u2'] = [{ ref: 'y' }];
      state['u1']?.push({ ref: 'z' });

      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'a' }] });
    });

    it('should hand callbacks copies of the state', () => {
      const presence = new Presence();
      presence.onJoin = (_id, meta) => {
        meta['ref'] = 'changed';
      };
      presence.onStateChange = (state) => {
        delete state['u1'];
      };

      presence.sync(message('presence_diff', { joins: { u1: { metas: [{ ref: 'a' }] } }, leaves: {} }));

      assert.deepStrictEqual(presence.state, { u1: [{ ref: 'a' }] });
    });
  });
});
