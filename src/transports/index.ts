/**
 * Transport layer exports.
 */

export type { ClientTransport } from './ClientTransport.ts';

export { WsClientTransport } from './WsClientTransport.ts';
