import {
  PacketCodec,
  type RelayControlMessage,
  type RelayKeypair,
  createPathDescriptor,
  decodeRelayFrame,
  encodeRelayFrame,
  generateKeypair,
  identityFromAddress,
  identityFromKeypair,
  parseControlMessage,
  publicKeyToAddress,
} from 'edgli-protocol';
import { afterEach, describe, expect, it } from 'vitest';
import WebSocket from 'ws';
import { type RelayServer, createRelayServer } from './server.js';

const codec = new PacketCodec();
const SESSION = '5a'.repeat(16);

function connectClient(port: number): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    ws.on('open', () => resolve(ws));
    ws.on('error', reject);
  });
}

function waitForControl(ws: WebSocket): Promise<RelayControlMessage | null> {
  return new Promise((resolve) => {
    const handler = (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      ws.off('message', handler);
      resolve(parseControlMessage(data.toString()));
    };
    ws.on('message', handler);
  });
}

function waitForBinary(ws: WebSocket): Promise<Uint8Array> {
  return new Promise((resolve) => {
    const handler = (data: WebSocket.RawData, isBinary: boolean) => {
      if (!isBinary) return;
      ws.off('message', handler);
      resolve(new Uint8Array(Array.isArray(data) ? Buffer.concat(data) : data));
    };
    ws.on('message', handler);
  });
}

async function waitFor(check: () => boolean): Promise<void> {
  for (let i = 0; i < 200; i++) {
    if (check()) return;
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error('condition not met in time');
}

describe('relay server', () => {
  const servers: RelayServer[] = [];
  const clients: WebSocket[] = [];

  afterEach(async () => {
    for (const client of clients.splice(0)) client.terminate();
    for (const server of servers.splice(0)) await server.close();
  });

  async function startServer(peers?: Array<{ address: string; url: string }>) {
    const keypair = generateKeypair();
    const server = createRelayServer({ port: 0, host: '127.0.0.1', keypair, peers });
    servers.push(server);
    const port = await server.listening;
    return { server, port, keypair, url: `ws://127.0.0.1:${port}` };
  }

  async function register(port: number, keypair: RelayKeypair = generateKeypair()) {
    const ws = await connectClient(port);
    clients.push(ws);
    const address = publicKeyToAddress(keypair.publicKey);
    const reply = waitForControl(ws);
    ws.send(JSON.stringify({ type: 'register', address }));
    return { ws, address, keypair, reply: await reply };
  }

  it('registers a node and answers with the relay address', async () => {
    const { server, port } = await startServer();
    const node = await register(port);

    expect(node.reply).toEqual({ type: 'registered', address: server.address });
    expect(server.connectedAddresses()).toEqual([node.address]);
  });

  it('forgets a node when its socket closes', async () => {
    const { server, port } = await startServer();
    const node = await register(port);
    node.ws.close();

    await waitFor(() => server.connectedAddresses().length === 0);
  });

  it('refuses packets before registration', async () => {
    const { port } = await startServer();
    const ws = await connectClient(port);
    clients.push(ws);

    const reply = waitForControl(ws);
    ws.send(new Uint8Array(40));
    expect(await reply).toEqual({ type: 'error', error: 'register first' });
  });

  it('refuses an address that is already registered', async () => {
    const { port } = await startServer();
    const first = await register(port);
    const second = await register(port, first.keypair);

    expect(second.reply).toEqual({ type: 'error', error: 'address in use' });
  });

  it('peels one layer and forwards to the next hop', async () => {
    const { server, port, keypair } = await startServer();
    const alice = await register(port);
    const bob = await register(port);

    const path = createPathDescriptor([identityFromKeypair(keypair)], identityFromKeypair(bob.keypair));
    const inbound = waitForBinary(bob.ws);
    alice.ws.send(encodeRelayFrame(server.address, codec.encodeAck({ sessionId: SESSION, sequences: [5] }, path)));

    const frame = decodeRelayFrame(await inbound);
    expect(frame?.target).toBe(bob.address);
    expect(frame?.packet).toHaveLength(1400);
    expect(codec.decode(frame?.packet ?? new Uint8Array(), bob.keypair)).toEqual({
      kind: 'ack',
      sessionId: SESSION,
      sequences: [5],
    });
    await waitFor(() => server.getStats().packetsForwarded === 1);
  });

  it('drops frames addressed to someone else', async () => {
    const { server, port } = await startServer();
    const alice = await register(port);

    alice.ws.send(encodeRelayFrame('cd'.repeat(32), new Uint8Array(1400)));
    await waitFor(() => server.getStats().packetsDropped === 1);
    expect(server.getStats().packetsForwarded).toBe(0);
  });

  it('links with configured peers and forwards across the link', async () => {
    const first = await startServer();
    const second = await startServer([{ address: first.server.address, url: first.url }]);
    await waitFor(() => first.server.connectedAddresses().includes(second.server.address));
    await waitFor(() => second.server.connectedAddresses().includes(first.server.address));

    const alice = await register(first.port);
    const bob = await register(second.port);
    const path = createPathDescriptor(
      [identityFromAddress(first.server.address), identityFromAddress(second.server.address)],
      identityFromKeypair(bob.keypair),
    );

    const inbound = waitForBinary(bob.ws);
    alice.ws.send(
      encodeRelayFrame(first.server.address, codec.encodeAck({ sessionId: SESSION, sequences: [1, 2] }, path)),
    );

    const frame = decodeRelayFrame(await inbound);
    expect(codec.decode(frame?.packet ?? new Uint8Array(), bob.keypair)).toEqual({
      kind: 'ack',
      sessionId: SESSION,
      sequences: [1, 2],
    });
  });

  it('rejects a peer that answers with another address', async () => {
    const first = await startServer();
    const second = await startServer();

    await expect(second.server.connectPeer({ address: 'ef'.repeat(32), url: first.url })).rejects.toMatchObject({
      code: 'TRANSPORT_FAILED',
      message: 'Peer answered with an unexpected address',
    });
  });
});
