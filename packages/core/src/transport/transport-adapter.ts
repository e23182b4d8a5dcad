import type { RelayAddress } from '../identity/keypair.js';

/**
 * Raw byte I/O below the session layer. `sendRaw` resolves once the bytes are handed off, not
 * once they arrive; `onRawReceived` is set by whoever consumes inbound packets.
 */
export interface TransportAdapter {
  sendRaw(relayAddress: RelayAddress, bytes: Uint8Array): Promise<void>;
  onRawReceived: ((bytes: Uint8Array) => void) | null;
}
