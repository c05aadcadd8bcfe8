/**
 * Chat Room Example
 *
 * Joins `room:lobby` on a Phoenix server, prints messages and presence
 * changes, and sends a message once the join is acknowledged.
 *
 * Expects a Phoenix app with a `room:*` channel at localhost:4000.
 *
 * Run with: DEBUG=phx-channels:* node --import tsx examples/chat-room.ts
 */

import { Socket } from '../src/index.ts';
import type { ConnectionState, Response } from '../src/index.ts';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  // 1. Create the socket; params are sent as query parameters on connect
  const socket = Socket.fromParts(
    { host: 'localhost', port: 4000, path: '/socket/websocket' },
    { params: { nickname: 'ada' }, pushTimeoutMs: 10000 }
  );

  socket.on('stateChange', (previous: ConnectionState, next: ConnectionState) => console.log(`[Socket] ${previous} -> ${next}`));
  socket.on('disconnect', (err: Error | undefined) => console.log(`[Socket] Disconnected${err ? `: ${err.message}` : ''}`));

  // 2. Register the channel and its handlers before joining
  const room = socket.channel('room:lobby', { nickname: 'ada' });

  room.on('new_msg', (response: Response) => {
    console.log(`[Room] ${String(response.payload['user'])}: ${String(response.payload['body'])}`);
  });

  room.presence.onJoin = (id, meta) => console.log(`[Presence] ${id} joined (${JSON.stringify(meta)})`);
  room.presence.onLeave = (id) => console.log(`[Presence] ${id} left`);
  room.onPresenceUpdate((_channel, presence) => {
    console.log(`[Presence] Online: ${Object.keys(presence.state).join(', ') || '(nobody)'}`);
  });

  // 3. Join once the socket is open, then send a message
  socket.once('open', () => {
    room
      .join()
      .receive('ok', () => {
        console.log('[Room] Joined');
        room.send('new_msg', { body: 'Hello from Node!' }).receive('error', (payload) => {
          console.error('[Room] Send failed:', payload['reason']);
        });
      })
      .receive('error', (payload) => console.error('[Room] Join rejected:', payload['response']))
      .receive('timeout', () => console.error('[Room] Join timed out'));
  });

  socket.connect();

  // 4. Stay around for a while, then leave and disconnect
  await delay(30000);

  room.leave().always(() => {
    console.log('[Room] Left');
    socket.disconnect();
  });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
