/**
 * Utility functions.
 */

import { randomUUID } from 'crypto';
import type { EndpointParts, Ref } from './types.ts';

/**
 * Prefix marking refs of internally generated heartbeat pushes.
 */
export const HEARTBEAT_REF_PREFIX = 'hb-';

/**
 * Create a fresh correlation ref.
 *
 * @param prefix - Optional classification prefix (e.g. `HEARTBEAT_REF_PREFIX`)
 */
export function createRef(prefix = ''): Ref {
  return prefix + randomUUID().toLowerCase();
}

export function isHeartbeatRef(ref: Ref): boolean {
  return ref.startsWith(HEARTBEAT_REF_PREFIX);
}

/**
 * Narrow an unknown JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Join endpoint pieces into a URL string.
 * `{ host: 'example.com', port: 4000 }` -> `ws://example.com:4000/socket/websocket`
 */
export function formatEndpoint(parts: EndpointParts = {}): string {
  const {
    protocol = 'ws',
    host = 'localhost',
    port = 4000,
    path = 'socket',
    transport = 'websocket',
  } = parts;
  return `${protocol}://${host}:${port}/${path}/${transport}`;
}

/**
 * Build the connection URL: maps http(s) to ws(s) and appends query
 * parameters plus the serializer version.
 *
 * @throws Error if the endpoint is not a valid absolute URL
 */
export function buildSocketUrl(
  endpoint: string,
  params: Record<string, string> = {},
  vsn = '2.0.0'
): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new Error(`Invalid socket endpoint: ${endpoint}`);
  }

  if (url.protocol === 'http:') url.protocol = 'ws:';
  else if (url.protocol === 'https:') url.protocol = 'wss:';

  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  url.searchParams.set('vsn', vsn);

  return url.toString();
}
