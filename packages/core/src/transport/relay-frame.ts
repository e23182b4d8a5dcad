/**
 * Framing between an edge node and the relay it is connected to over a WebSocket: binary frames
 * carry `target address (32) | packet`, text frames carry JSON control messages.
 */

import { bytesToHex, concatBytes, hexToBytes } from '../crypto/hex.js';
import { ADDRESS_BYTES, type RelayAddress, isRelayAddress } from '../identity/keypair.js';

export interface RelayFrame {
  target: RelayAddress;
  packet: Uint8Array;
}

export type RelayControlMessage =
  | { type: 'register'; address: RelayAddress }
  | { type: 'registered'; address: RelayAddress }
  | { type: 'error'; error: string };

export function encodeRelayFrame(target: RelayAddress, packet: Uint8Array): Uint8Array {
  return concatBytes(hexToBytes(target), packet);
}

export function decodeRelayFrame(frame: Uint8Array): RelayFrame | null {
  if (frame.length <= ADDRESS_BYTES) return null;
  return {
    target: bytesToHex(frame.subarray(0, ADDRESS_BYTES)),
    packet: frame.slice(ADDRESS_BYTES),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function parseControlMessage(text: string): RelayControlMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { type, address, error } = parsed;
  if ((type === 'register' || type === 'registered') && typeof address === 'string' && isRelayAddress(address)) {
    return { type, address };
  }
  if (type === 'error' && typeof error === 'string') {
    return { type, error };
  }
  return null;
}
