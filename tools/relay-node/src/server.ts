import {
  EdgeError,
  PacketRelay,
  type PacketRelayEvents,
  type RelayAddress,
  type RelayControlMessage,
  type RelayKeypair,
  TrafficStats,
  type TrafficStatsData,
  type TransportAdapter,
  createLogger,
  decodeRelayFrame,
  encodeRelayFrame,
  parseControlMessage,
  publicKeyToAddress,
} from 'edgli-protocol';
import WebSocket, { WebSocketServer } from 'ws';
import type { RelayPeer } from './peers.js';

export interface RelayServerOptions {
  port: number;
  host?: string;
  keypair: RelayKeypair;
  /** Relays to link with on startup */
  peers?: RelayPeer[];
  events?: Partial<PacketRelayEvents>;
}

export interface RelayServer {
  readonly address: RelayAddress;
  /** Resolves with the bound port */
  listening: Promise<number>;
  connectPeer: (peer: RelayPeer) => Promise<void>;
  connectedAddresses: () => RelayAddress[];
  getStats: () => TrafficStatsData;
  close: () => Promise<void>;
}

const log = createLogger('RelayServer');

function rawDataToBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

function sendControl(ws: WebSocket, message: RelayControlMessage): void {
  ws.send(JSON.stringify(message));
}

/** Registered sockets by address; the relay's transport. */
class LinkTable implements TransportAdapter {
  onRawReceived: ((bytes: Uint8Array) => void) | null = null;
  private links = new Map<RelayAddress, WebSocket>();

  get(address: RelayAddress): WebSocket | undefined {
    return this.links.get(address);
  }

  set(address: RelayAddress, ws: WebSocket): void {
    this.links.set(address, ws);
  }

  /** Removes the link only if it still belongs to `ws`. */
  release(address: RelayAddress, ws: WebSocket): void {
    if (this.links.get(address) === ws) this.links.delete(address);
  }

  addresses(): RelayAddress[] {
    return Array.from(this.links.keys());
  }

  sendRaw(relayAddress: RelayAddress, bytes: Uint8Array): Promise<void> {
    const ws = this.links.get(relayAddress);
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new EdgeError('TRANSPORT_FAILED', 'No link to address', { relayAddress }));
    }
    return new Promise((resolve, reject) => {
      ws.send(encodeRelayFrame(relayAddress, bytes), (error) => {
        if (error) {
          reject(new EdgeError('TRANSPORT_FAILED', 'WebSocket send failed', { relayAddress, error: error.message }));
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * WebSocket relay: edge nodes and peer relays register their address, binary frames addressed to
 * this relay have one onion layer removed and go out on the link of the next hop.
 */
export function createRelayServer(options: RelayServerOptions): RelayServer {
  const address = publicKeyToAddress(options.keypair.publicKey);
  const links = new LinkTable();
  const stats = new TrafficStats();
  const relay = new PacketRelay({ keypair: options.keypair, transport: links, stats, events: options.events });
  const sockets = new Set<WebSocket>();
  const wss = new WebSocketServer({ port: options.port, host: options.host });

  relay.start();

  function handleFrame(data: WebSocket.RawData): void {
    const frame = decodeRelayFrame(rawDataToBytes(data));
    if (!frame || frame.target !== address) {
      stats.recordDropped();
      log.debug('dropping frame not addressed to this relay', { target: frame?.target });
      return;
    }
    links.onRawReceived?.(frame.packet);
  }

  function track(ws: WebSocket): void {
    sockets.add(ws);
    ws.on('error', (error) => log.warn('socket error', { error: error.message }));
    ws.on('close', () => sockets.delete(ws));
  }

  wss.on('connection', (ws: WebSocket) => {
    track(ws);
    let registered: RelayAddress | null = null;

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        if (!registered) {
          sendControl(ws, { type: 'error', error: 'register first' });
          return;
        }
        handleFrame(data);
        return;
      }

      const message = parseControlMessage(data.toString());
      if (message?.type !== 'register') {
        sendControl(ws, { type: 'error', error: 'invalid control message' });
        return;
      }
      const existing = links.get(message.address);
      if (existing && existing !== ws && existing.readyState === WebSocket.OPEN) {
        sendControl(ws, { type: 'error', error: 'address in use' });
        return;
      }

      if (registered && registered !== message.address) links.release(registered, ws);
      registered = message.address;
      links.set(registered, ws);
      sendControl(ws, { type: 'registered', address });
      log.info('node registered', { address: registered });
    });

    ws.on('close', () => {
      if (!registered) return;
      links.release(registered, ws);
      log.info('node disconnected', { address: registered });
    });
  });

  const listening = new Promise<number>((resolve, reject) => {
    wss.once('listening', () => {
      const bound = wss.address();
      resolve(typeof bound === 'string' ? options.port : bound.port);
    });
    wss.once('error', reject);
  });

  function connectPeer(peer: RelayPeer): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(peer.url);
      track(ws);
      let linked = false;

      const fail = (reason: string) => {
        ws.terminate();
        reject(new EdgeError('TRANSPORT_FAILED', reason, { peer: peer.address, url: peer.url }));
      };

      ws.on('open', () => sendControl(ws, { type: 'register', address }));
      ws.on('message', (data, isBinary) => {
        if (isBinary) {
          if (linked) handleFrame(data);
          return;
        }
        const message = parseControlMessage(data.toString());
        if (linked || !message) return;
        if (message.type === 'error') {
          fail(`Peer refused the link: ${message.error}`);
          return;
        }
        if (message.type !== 'registered') return;
        if (message.address !== peer.address) {
          fail('Peer answered with an unexpected address');
          return;
        }
        linked = true;
        links.set(peer.address, ws);
        log.info('linked with peer relay', { address: peer.address });
        resolve();
      });
      ws.on('close', () => {
        if (!linked) {
          reject(new EdgeError('TRANSPORT_FAILED', 'Peer closed before linking', { peer: peer.address }));
          return;
        }
        links.release(peer.address, ws);
        log.info('peer link closed', { address: peer.address });
      });
    });
  }

  void listening.then(
    () => {
      for (const peer of options.peers ?? []) {
        void connectPeer(peer).catch((error: unknown) => {
          log.warn('peer link failed', { peer: peer.address, error });
        });
      }
    },
    (error: unknown) => log.error('relay server failed to listen', { error }),
  );

  return {
    address,
    listening,
    connectPeer,
    connectedAddresses: () => links.addresses(),
    getStats: () => relay.getStats(),
    close: () =>
      new Promise((resolve) => {
        relay.stop();
        for (const ws of sockets) ws.terminate();
        sockets.clear();
        wss.close(() => resolve());
      }),
  };
}
