export type { TransportAdapter } from './transport-adapter.js';
export { MemoryNetwork } from './memory-network.js';
export type { DeliveryDecision, HeldPacket, PacketInterceptor } from './memory-network.js';
export { decodeRelayFrame, encodeRelayFrame, parseControlMessage } from './relay-frame.js';
export type { RelayControlMessage, RelayFrame } from './relay-frame.js';
