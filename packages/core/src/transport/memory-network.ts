import { EdgeError } from '../errors/edge-error.js';
import type { RelayAddress } from '../identity/keypair.js';
import type { TransportAdapter } from './transport-adapter.js';

export type DeliveryDecision = 'deliver' | 'drop' | 'hold';

export type PacketInterceptor = (from: RelayAddress, to: RelayAddress, bytes: Uint8Array) => DeliveryDecision;

export interface HeldPacket {
  from: RelayAddress;
  to: RelayAddress;
  bytes: Uint8Array;
}

class MemoryTransport implements TransportAdapter {
  onRawReceived: ((bytes: Uint8Array) => void) | null = null;
  readonly address: RelayAddress;
  private network: MemoryNetwork;

  constructor(network: MemoryNetwork, address: RelayAddress) {
    this.network = network;
    this.address = address;
  }

  sendRaw(relayAddress: RelayAddress, bytes: Uint8Array): Promise<void> {
    return this.network.send(this.address, relayAddress, bytes);
  }
}

/**
 * In-process hub connecting one transport per address. Deliveries are asynchronous (a microtask
 * after `sendRaw`), so fake timers do not hold them back. An interceptor can drop packets or hold
 * them for later release in any order.
 */
export class MemoryNetwork {
  private nodes = new Map<RelayAddress, MemoryTransport>();
  private held: HeldPacket[] = [];
  private interceptor: PacketInterceptor | null = null;
  private delivered = 0;

  createTransport(address: RelayAddress): TransportAdapter {
    if (this.nodes.has(address)) {
      throw new Error(`Address already attached: ${address}`);
    }
    const transport = new MemoryTransport(this, address);
    this.nodes.set(address, transport);
    return transport;
  }

  remove(address: RelayAddress): boolean {
    return this.nodes.delete(address);
  }

  setInterceptor(interceptor: PacketInterceptor | null): void {
    this.interceptor = interceptor;
  }

  getHeld(): readonly HeldPacket[] {
    return this.held;
  }

  getDeliveredCount(): number {
    return this.delivered;
  }

  /** Delivers held packets matching `filter` (all by default) in the given order. */
  releaseHeld(filter: (packet: HeldPacket) => boolean = () => true): number {
    const release = this.held.filter(filter);
    this.held = this.held.filter((packet) => !filter(packet));
    for (const packet of release) {
      this.dispatch(packet);
    }
    return release.length;
  }

  async send(from: RelayAddress, to: RelayAddress, bytes: Uint8Array): Promise<void> {
    if (!this.nodes.has(to)) {
      throw new EdgeError('TRANSPORT_FAILED', 'No transport attached for address', { address: to });
    }

    const packet = { from, to, bytes: bytes.slice() };
    const decision = this.interceptor?.(from, to, packet.bytes) ?? 'deliver';
    if (decision === 'drop') return;
    if (decision === 'hold') {
      this.held.push(packet);
      return;
    }
    this.dispatch(packet);
  }

  private dispatch(packet: HeldPacket): void {
    queueMicrotask(() => {
      const target = this.nodes.get(packet.to);
      if (!target) return;
      this.delivered++;
      target.onRawReceived?.(packet.bytes);
    });
  }
}
