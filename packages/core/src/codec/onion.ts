/**
 * Layered packet construction over NaCl boxes.
 *
 * Each layer is `ephemeralPublicKey | nonce | box(plaintext)` where the plaintext starts with a
 * routing slot. A forwarding hop drops its routing slot from the front and appends a filler
 * derived from its shared key, keeping the packet at PACKET_SIZE. The sender knows every filler
 * in advance and writes into the innermost plaintext exactly the bytes that those fillers will
 * have turned into by the time they reach each hop, so every layer's MAC verifies.
 */

import nacl from 'tweetnacl';
import { concatBytes, xorBytes } from '../crypto/hex.js';
import { ADDRESS_BYTES, type RelayIdentity } from '../identity/keypair.js';
import {
  EPHEMERAL_KEY_BYTES,
  HEADER_BYTES,
  HOP_OVERHEAD,
  LAYER_PLAINTEXT_BYTES,
  MAC_BYTES,
  NONCE_BYTES,
  PACKET_SIZE,
  PacketKind,
  ROUTING_BYTES,
} from './constants.js';

interface LayerKeys {
  ephemeralPublicKey: Uint8Array;
  nonce: Uint8Array;
  sharedKey: Uint8Array;
  keystream: Uint8Array;
}

export type PeeledLayer =
  | { type: 'forward'; nextHop: Uint8Array; packet: Uint8Array }
  | { type: 'final'; kind: number; body: Uint8Array };

const EMPTY_ADDRESS = new Uint8Array(ADDRESS_BYTES);

/** Largest body a packet built over `layers` relays (destination included) can carry. */
export function bodyCapacity(layers: number): number {
  return PACKET_SIZE - HOP_OVERHEAD * layers;
}

function keystream(sharedKey: Uint8Array, nonce: Uint8Array): Uint8Array {
  return nacl.box.after(new Uint8Array(LAYER_PLAINTEXT_BYTES), nonce, sharedKey).subarray(MAC_BYTES);
}

function filler(sharedKey: Uint8Array): Uint8Array {
  const first = nacl.hash(concatBytes(sharedKey, Uint8Array.of(1)));
  const second = nacl.hash(concatBytes(sharedKey, Uint8Array.of(2)));
  return concatBytes(first, second).subarray(0, HOP_OVERHEAD);
}

function routingSlot(kind: number, nextHop: Uint8Array, bodyLength: number): Uint8Array {
  const slot = new Uint8Array(ROUTING_BYTES);
  slot[0] = kind;
  slot.set(nextHop, 1);
  slot[ROUTING_BYTES - 2] = (bodyLength >>> 8) & 0xff;
  slot[ROUTING_BYTES - 1] = bodyLength & 0xff;
  return slot;
}

function deriveLayer(hop: RelayIdentity): LayerKeys {
  const ephemeral = nacl.box.keyPair();
  const nonce = nacl.randomBytes(NONCE_BYTES);
  const sharedKey = nacl.box.before(hop.publicKey, ephemeral.secretKey);
  return { ephemeralPublicKey: ephemeral.publicKey, nonce, sharedKey, keystream: keystream(sharedKey, nonce) };
}

function sealLayer(layer: LayerKeys, plaintext: Uint8Array): Uint8Array {
  return concatBytes(layer.ephemeralPublicKey, layer.nonce, nacl.box.after(plaintext, layer.nonce, layer.sharedKey));
}

/**
 * Wraps `body` for `route` (relays in order, destination last). Callers check the body against
 * {@link bodyCapacity} first.
 */
export function wrapOnion(route: readonly RelayIdentity[], kind: number, body: Uint8Array): Uint8Array {
  if (route.length === 0) {
    throw new Error('wrapOnion needs at least one layer');
  }
  if (body.length > bodyCapacity(route.length)) {
    throw new Error('Body exceeds onion capacity');
  }

  const layers = route.map(deriveLayer);

  // tail[k] is what the hop-appended fillers look like when layer k is decrypted
  let tail: Uint8Array = new Uint8Array(0);
  for (const layer of layers.slice(0, -1)) {
    const carried = xorBytes(tail, layer.keystream.subarray(LAYER_PLAINTEXT_BYTES - tail.length));
    tail = concatBytes(carried, filler(layer.sharedKey));
  }

  const last = layers[layers.length - 1];
  if (!last) throw new Error('wrapOnion needs at least one layer');

  const plaintext = new Uint8Array(LAYER_PLAINTEXT_BYTES);
  plaintext.set(routingSlot(kind, EMPTY_ADDRESS, body.length), 0);
  plaintext.set(body, ROUTING_BYTES);
  const tailStart = LAYER_PLAINTEXT_BYTES - tail.length;
  plaintext.set(nacl.randomBytes(tailStart - ROUTING_BYTES - body.length), ROUTING_BYTES + body.length);
  plaintext.set(xorBytes(tail, last.keystream.subarray(tailStart)), tailStart);

  let packet = sealLayer(last, plaintext);
  for (let k = layers.length - 2; k >= 0; k--) {
    const layer = layers[k];
    const next = route[k + 1];
    if (!layer || !next) throw new Error('Onion route is inconsistent');
    const layerPlaintext = concatBytes(
      routingSlot(PacketKind.FORWARD, next.publicKey, 0),
      packet.subarray(0, PACKET_SIZE - HOP_OVERHEAD),
    );
    packet = sealLayer(layer, layerPlaintext);
  }
  return packet;
}

/** Removes one layer with `secretKey`. Returns null whenever the packet cannot be opened. */
export function peelOnion(packet: Uint8Array, secretKey: Uint8Array): PeeledLayer | null {
  if (packet.length !== PACKET_SIZE) return null;

  const ephemeralPublicKey = packet.subarray(0, EPHEMERAL_KEY_BYTES);
  const nonce = packet.subarray(EPHEMERAL_KEY_BYTES, HEADER_BYTES);
  const sharedKey = nacl.box.before(ephemeralPublicKey, secretKey);
  const plaintext = nacl.box.open.after(packet.subarray(HEADER_BYTES), nonce, sharedKey);
  if (!plaintext) return null;

  const kind = plaintext[0] ?? 0;
  if (kind === PacketKind.FORWARD) {
    return {
      type: 'forward',
      nextHop: plaintext.slice(1, 1 + ADDRESS_BYTES),
      packet: concatBytes(plaintext.subarray(ROUTING_BYTES), filler(sharedKey)),
    };
  }

  const bodyLength = ((plaintext[ROUTING_BYTES - 2] ?? 0) << 8) | (plaintext[ROUTING_BYTES - 1] ?? 0);
  if (bodyLength > LAYER_PLAINTEXT_BYTES - ROUTING_BYTES) return null;
  return { type: 'final', kind, body: plaintext.slice(ROUTING_BYTES, ROUTING_BYTES + bodyLength) };
}
