import { describe, expect, it, vi } from 'vitest';
import { PacketKind } from '../codec/constants.js';
import { encodeAckFrame } from '../codec/frames.js';
import { wrapOnion } from '../codec/onion.js';
import { PacketCodec } from '../codec/packet-codec.js';
import { generateKeypair, identityFromKeypair, publicKeyToAddress } from '../identity/keypair.js';
import { createPathDescriptor } from '../path/path-descriptor.js';
import { MemoryNetwork } from '../transport/memory-network.js';
import { PacketRelay, type PacketRelayEvents } from './packet-relay.js';

async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

describe('PacketRelay', () => {
  function setup() {
    const network = new MemoryNetwork();
    const codec = new PacketCodec();
    const relayKeypair = generateKeypair();
    const targetKeypair = generateKeypair();
    const onForwarded = vi.fn<PacketRelayEvents['onForwarded']>();
    const onDropped = vi.fn<PacketRelayEvents['onDropped']>();

    const relayTransport = network.createTransport(publicKeyToAddress(relayKeypair.publicKey));
    const relay = new PacketRelay({
      keypair: relayKeypair,
      transport: relayTransport,
      events: { onForwarded, onDropped },
    });
    relay.start();

    const targetAddress = publicKeyToAddress(targetKeypair.publicKey);
    const target = network.createTransport(targetAddress);
    const received = vi.fn<(bytes: Uint8Array) => void>();
    target.onRawReceived = received;

    const path = createPathDescriptor([identityFromKeypair(relayKeypair)], identityFromKeypair(targetKeypair));
    return {
      network,
      codec,
      relay,
      relayTransport,
      relayKeypair,
      targetKeypair,
      targetAddress,
      path,
      received,
      onForwarded,
      onDropped,
    };
  }

  it('should peel its layer and forward to the next hop', async () => {
    const { codec, relay, targetKeypair, targetAddress, path, received, onForwarded } = setup();
    const packet = codec.encodeAck({ sessionId: '11'.repeat(16), sequences: [7, 9] }, path);

    relay.handle(packet);
    await flush();

    expect(onForwarded).toHaveBeenCalledWith(targetAddress, 1400);
    expect(received).toHaveBeenCalledOnce();
    const forwarded = received.mock.calls[0]?.[0] ?? new Uint8Array();
    expect(forwarded).toHaveLength(1400);
    expect(codec.decode(forwarded, targetKeypair)).toEqual({
      kind: 'ack',
      sessionId: '11'.repeat(16),
      sequences: [7, 9],
    });
    expect(relay.getStats()).toMatchObject({ packetsReceived: 1, packetsForwarded: 1, packetsDropped: 0 });
  });

  it('should drop malformed packets', () => {
    const { relay, received, onDropped } = setup();

    relay.handle(new Uint8Array(1400));
    relay.handle(new Uint8Array(3));

    expect(onDropped).toHaveBeenCalledTimes(2);
    expect(onDropped).toHaveBeenCalledWith('malformed');
    expect(received).not.toHaveBeenCalled();
    expect(relay.getStats()).toMatchObject({ malformedPackets: 2, packetsDropped: 2 });
  });

  it('should drop packets that end at the relay', () => {
    const { relay, relayKeypair, onDropped } = setup();
    const body = encodeAckFrame({ sessionId: '33'.repeat(16), sequences: [1] });
    const packet = wrapOnion([identityFromKeypair(relayKeypair)], PacketKind.ACK, body);

    relay.handle(packet);

    expect(onDropped).toHaveBeenCalledWith('not-forwardable');
    expect(relay.getStats().packetsForwarded).toBe(0);
  });

  it('should report packets whose next hop cannot be reached', async () => {
    const { network, codec, relay, targetAddress, path, onDropped, onForwarded } = setup();
    network.remove(targetAddress);

    relay.handle(codec.encodeAck({ sessionId: '22'.repeat(16), sequences: [1] }, path));
    await flush();

    expect(onDropped).toHaveBeenCalledWith('send-failed');
    expect(onForwarded).not.toHaveBeenCalled();
  });

  it('should detach from the transport when stopped', () => {
    const { relay, relayTransport } = setup();
    expect(relayTransport.onRawReceived).toBeTypeOf('function');
    relay.stop();
    expect(relayTransport.onRawReceived).toBeNull();
  });
});
