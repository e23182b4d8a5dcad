import { type DecodedUnit, PacketCodec } from '../codec/packet-codec.js';
import { isEdgeError } from '../errors/edge-error.js';
import { type RelayAddress, type RelayKeypair, publicKeyToAddress } from '../identity/keypair.js';
import { createLogger } from '../logging/logger.js';
import { TrafficStats, type TrafficStatsData } from '../stats/traffic-stats.js';
import type { TransportAdapter } from '../transport/transport-adapter.js';

export type RelayDropReason = 'malformed' | 'not-forwardable' | 'send-failed';

export interface PacketRelayEvents {
  onForwarded: (nextHop: RelayAddress, size: number) => void;
  onDropped: (reason: RelayDropReason) => void;
}

export interface PacketRelayOptions {
  keypair: RelayKeypair;
  transport: TransportAdapter;
  codec?: PacketCodec;
  stats?: TrafficStats;
  events?: Partial<PacketRelayEvents>;
}

const log = createLogger('PacketRelay');

/**
 * Forwarding loop of a relay: removes this relay's layer and passes the packet on. A relay is
 * never an endpoint, so deliver and ack units addressed to it are dropped.
 */
export class PacketRelay {
  private keypair: RelayKeypair;
  private address: RelayAddress;
  private transport: TransportAdapter;
  private codec: PacketCodec;
  private stats: TrafficStats;
  private events: Partial<PacketRelayEvents>;

  constructor(options: PacketRelayOptions) {
    this.keypair = options.keypair;
    this.address = publicKeyToAddress(options.keypair.publicKey);
    this.transport = options.transport;
    this.codec = options.codec ?? new PacketCodec();
    this.stats = options.stats ?? new TrafficStats();
    this.events = options.events ?? {};
  }

  getAddress(): RelayAddress {
    return this.address;
  }

  start(): void {
    this.transport.onRawReceived = (bytes) => this.handle(bytes);
  }

  stop(): void {
    this.transport.onRawReceived = null;
  }

  getStats(): TrafficStatsData {
    return this.stats.getStats();
  }

  handle(bytes: Uint8Array): void {
    this.stats.recordPacketReceived(bytes.length);

    let unit: DecodedUnit;
    try {
      unit = this.codec.decode(bytes, this.keypair);
    } catch (error) {
      if (!isEdgeError(error, 'MALFORMED_PACKET')) throw error;
      this.stats.recordMalformed();
      this.drop('malformed');
      return;
    }

    if (unit.kind !== 'forward') {
      this.drop('not-forwardable');
      return;
    }

    const { nextHop, packet } = unit;
    void this.transport.sendRaw(nextHop, packet).then(
      () => {
        this.stats.recordForwarded(packet.length);
        this.events.onForwarded?.(nextHop, packet.length);
      },
      (error: unknown) => {
        log.warn('forwarding failed', { nextHop, error });
        this.drop('send-failed');
      },
    );
  }

  private drop(reason: RelayDropReason): void {
    this.stats.recordDropped();
    log.debug('packet dropped', { reason });
    this.events.onDropped?.(reason);
  }
}
