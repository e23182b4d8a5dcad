export { PacketRelay } from './packet-relay.js';
export type { PacketRelayEvents, PacketRelayOptions, RelayDropReason } from './packet-relay.js';
