export const RELAY_NODE_VERSION = '0.1.0';

export { createRelayServer } from './server.js';
export type { RelayServer, RelayServerOptions } from './server.js';
export { parsePeerList } from './peers.js';
export type { RelayPeer } from './peers.js';
