import { bytesToHex, hexToBytes } from '../crypto/hex.js';
import { ADDRESS_BYTES, type RelayAddress, isRelayAddress } from '../identity/keypair.js';
import { type SessionId, isSessionId } from '../session/types.js';
import {
  ACK_HEADER_BYTES,
  DELIVER_HEADER_BYTES,
  KNOWN_FLAGS,
  MAX_ACK_SEQUENCES,
  MAX_ROUTE_ADDRESSES,
  MAX_SEQUENCE,
  SESSION_ID_BYTES,
} from './constants.js';

export interface DeliverFrame {
  sessionId: SessionId;
  sequence: number;
  flags: number;
  returnRoute: RelayAddress[];
  fragment: Uint8Array;
}

export interface AckFrame {
  sessionId: SessionId;
  sequences: number[];
}

export function isSequence(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_SEQUENCE;
}

/** Throws on fields that cannot be represented; the caller maps the error. */
export function encodeDeliverFrame(frame: DeliverFrame): Uint8Array {
  if (!isSessionId(frame.sessionId)) throw new Error('Invalid session id');
  if (!isSequence(frame.sequence)) throw new Error('Invalid sequence number');
  if ((frame.flags & ~KNOWN_FLAGS) !== 0) throw new Error('Unknown frame flags');
  if (frame.returnRoute.length === 0 || frame.returnRoute.length > MAX_ROUTE_ADDRESSES) {
    throw new Error('Invalid return route length');
  }

  const routeBytes = frame.returnRoute.length * ADDRESS_BYTES;
  const out = new Uint8Array(DELIVER_HEADER_BYTES + routeBytes + frame.fragment.length);
  const view = new DataView(out.buffer);
  out.set(hexToBytes(frame.sessionId), 0);
  view.setUint32(SESSION_ID_BYTES, frame.sequence);
  out[SESSION_ID_BYTES + 4] = frame.flags;
  out[SESSION_ID_BYTES + 5] = frame.returnRoute.length;
  frame.returnRoute.forEach((address, i) => {
    if (!isRelayAddress(address)) throw new Error('Invalid return route address');
    out.set(hexToBytes(address), DELIVER_HEADER_BYTES + i * ADDRESS_BYTES);
  });
  out.set(frame.fragment, DELIVER_HEADER_BYTES + routeBytes);
  return out;
}

export function decodeDeliverFrame(body: Uint8Array): DeliverFrame | null {
  if (body.length < DELIVER_HEADER_BYTES) return null;
  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const flags = body[SESSION_ID_BYTES + 4] ?? 0;
  const routeCount = body[SESSION_ID_BYTES + 5] ?? 0;
  if ((flags & ~KNOWN_FLAGS) !== 0) return null;
  if (routeCount === 0) return null;

  const fragmentStart = DELIVER_HEADER_BYTES + routeCount * ADDRESS_BYTES;
  if (body.length < fragmentStart) return null;

  const returnRoute: RelayAddress[] = [];
  for (let i = 0; i < routeCount; i++) {
    const offset = DELIVER_HEADER_BYTES + i * ADDRESS_BYTES;
    returnRoute.push(bytesToHex(body.subarray(offset, offset + ADDRESS_BYTES)));
  }

  return {
    sessionId: bytesToHex(body.subarray(0, SESSION_ID_BYTES)),
    sequence: view.getUint32(SESSION_ID_BYTES),
    flags,
    returnRoute,
    fragment: body.slice(fragmentStart),
  };
}

export function ackFrameLength(count: number): number {
  return ACK_HEADER_BYTES + 4 * count;
}

export function encodeAckFrame(frame: AckFrame): Uint8Array {
  if (!isSessionId(frame.sessionId)) throw new Error('Invalid session id');
  if (frame.sequences.length === 0 || frame.sequences.length > MAX_ACK_SEQUENCES) {
    throw new Error('Invalid acknowledgement count');
  }

  const out = new Uint8Array(ackFrameLength(frame.sequences.length));
  const view = new DataView(out.buffer);
  out.set(hexToBytes(frame.sessionId), 0);
  out[SESSION_ID_BYTES] = frame.sequences.length;
  frame.sequences.forEach((sequence, i) => {
    if (!isSequence(sequence)) throw new Error('Invalid sequence number');
    view.setUint32(ACK_HEADER_BYTES + i * 4, sequence);
  });
  return out;
}

export function decodeAckFrame(body: Uint8Array): AckFrame | null {
  if (body.length < ACK_HEADER_BYTES) return null;
  const count = body[SESSION_ID_BYTES] ?? 0;
  if (count === 0 || body.length !== ackFrameLength(count)) return null;

  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const sequences: number[] = [];
  for (let i = 0; i < count; i++) {
    sequences.push(view.getUint32(ACK_HEADER_BYTES + i * 4));
  }
  return { sessionId: bytesToHex(body.subarray(0, SESSION_ID_BYTES)), sequences };
}
