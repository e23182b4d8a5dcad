import { bytesToHex } from '../crypto/hex.js';
import { EdgeError } from '../errors/edge-error.js';
import { ADDRESS_BYTES, type RelayAddress, type RelayIdentity, type RelayKeypair } from '../identity/keypair.js';
import type { PathDescriptor } from '../path/path-descriptor.js';
import type { SessionId } from '../session/types.js';
import { DELIVER_HEADER_BYTES, MAX_ACK_SEQUENCES, PACKET_SIZE, PacketKind } from './constants.js';
import {
  type AckFrame,
  type DeliverFrame,
  ackFrameLength,
  decodeAckFrame,
  decodeDeliverFrame,
  encodeAckFrame,
  encodeDeliverFrame,
} from './frames.js';
import { bodyCapacity, peelOnion, wrapOnion } from './onion.js';

export interface DeliveryMeta {
  sessionId: SessionId;
  sequence: number;
  flags: number;
  returnRoute: readonly RelayAddress[];
}

export interface ForwardInstruction {
  kind: 'forward';
  nextHop: RelayAddress;
  /** Packet for the next hop, still PACKET_SIZE bytes */
  packet: Uint8Array;
}

export interface DeliverPayload extends DeliverFrame {
  kind: 'deliver';
}

export interface AcknowledgementUnit extends AckFrame {
  kind: 'ack';
}

export type DecodedUnit = ForwardInstruction | DeliverPayload | AcknowledgementUnit;

function layerRoute(path: PathDescriptor): RelayIdentity[] {
  return [...path.hops, path.destination];
}

/**
 * Stateless transform between fragments and fixed-size onion packets. Safe to share between
 * sessions.
 */
export class PacketCodec {
  readonly packetSize = PACKET_SIZE;

  /** Largest fragment a DELIVER packet on `path` carries, with a return route as long as the path. */
  capacity(path: PathDescriptor): number {
    const layers = path.hops.length + 1;
    return this.fragmentCapacity(layers, layers);
  }

  /** Acknowledged sequences that fit in one ACK packet on `path`. */
  ackCapacity(path: PathDescriptor): number {
    const room = bodyCapacity(path.hops.length + 1) - ackFrameLength(0);
    return Math.min(MAX_ACK_SEQUENCES, Math.floor(room / 4));
  }

  encode(fragment: Uint8Array, path: PathDescriptor, meta: DeliveryMeta): Uint8Array {
    const capacity = this.fragmentCapacity(path.hops.length + 1, meta.returnRoute.length);
    if (fragment.length > capacity) {
      throw new EdgeError('FRAGMENT_TOO_LARGE', 'Fragment exceeds packet capacity', {
        size: fragment.length,
        capacity,
      });
    }

    const body = encodeDeliverFrame({
      sessionId: meta.sessionId,
      sequence: meta.sequence,
      flags: meta.flags,
      returnRoute: [...meta.returnRoute],
      fragment,
    });
    return wrapOnion(layerRoute(path), PacketKind.DELIVER, body);
  }

  encodeAck(ack: AckFrame, path: PathDescriptor): Uint8Array {
    const capacity = this.ackCapacity(path);
    if (ack.sequences.length > capacity) {
      throw new EdgeError('FRAGMENT_TOO_LARGE', 'Too many acknowledged sequences for one packet', {
        count: ack.sequences.length,
        capacity,
      });
    }
    return wrapOnion(layerRoute(path), PacketKind.ACK, encodeAckFrame(ack));
  }

  /**
   * Removes this node's layer. Every failure surfaces as the same MALFORMED_PACKET error without
   * context.
   */
  decode(packet: Uint8Array, keypair: RelayKeypair): DecodedUnit {
    let unit: DecodedUnit | null;
    try {
      unit = this.tryDecode(packet, keypair);
    } catch {
      unit = null;
    }
    if (unit === null) {
      throw new EdgeError('MALFORMED_PACKET', 'Malformed packet');
    }
    return unit;
  }

  private tryDecode(packet: Uint8Array, keypair: RelayKeypair): DecodedUnit | null {
    const layer = peelOnion(packet, keypair.secretKey);
    if (!layer) return null;

    if (layer.type === 'forward') {
      return { kind: 'forward', nextHop: bytesToHex(layer.nextHop), packet: layer.packet };
    }
    if (layer.kind === PacketKind.DELIVER) {
      const frame = decodeDeliverFrame(layer.body);
      return frame ? { kind: 'deliver', ...frame } : null;
    }
    if (layer.kind === PacketKind.ACK) {
      const frame = decodeAckFrame(layer.body);
      return frame ? { kind: 'ack', ...frame } : null;
    }
    return null;
  }

  private fragmentCapacity(layers: number, routeLength: number): number {
    return bodyCapacity(layers) - DELIVER_HEADER_BYTES - ADDRESS_BYTES * routeLength;
  }
}
