import {
  EdgeError,
  FileStorageAdapter,
  IdentityManager,
  type IdentityStorage,
  MemoryRelayDirectory,
  MemoryStorage,
  type OpenOptions,
  PathSelector,
  type RandomSource,
  type RelayAddress,
  type RelayIdentity,
  type SessionFailureReason,
  type SessionId,
  type SessionInfo,
  SessionManager,
  type SessionRole,
  type SessionState,
  type TrafficStatsData,
  type TransportAdapter,
  createLogger,
  identityFromAddress,
  setLogFormat,
  setLogLevel,
} from 'edgli-protocol';
import { type EdgeClientConfig, type EdgeClientConfigInput, parseConfig } from './config.js';
import { WebSocketTransport } from './ws-transport.js';

export interface EdgeClientOptions {
  config: EdgeClientConfigInput;
  /** Identity storage; defaults to the configured identity file, else memory */
  storage?: IdentityStorage;
  /** Replaces the WebSocket connection to the entry relay */
  transport?: TransportAdapter;
  random?: RandomSource;
}

export type SessionOpenedHandler = (sessionId: SessionId, role: SessionRole) => void;
export type SessionFailedHandler = (sessionId: SessionId, reason: SessionFailureReason) => void;
export type SessionStateHandler = (sessionId: SessionId, previous: SessionState, next: SessionState) => void;
export type StatusHandler = (status: string, detail?: string) => void;

const log = createLogger('EdgeClient');

interface Running {
  manager: SessionManager;
  socket: WebSocketTransport | null;
}

export class EdgeClient {
  private config: EdgeClientConfig;
  private identity: IdentityManager;
  private directory = new MemoryRelayDirectory();
  /** Edge node address → the relay it is connected to */
  private peerRelays = new Map<RelayAddress, RelayAddress>();
  private transportOverride: TransportAdapter | null;
  private random?: RandomSource;
  private running: Running | null = null;

  private openedHandlers: SessionOpenedHandler[] = [];
  private failedHandlers: SessionFailedHandler[] = [];
  private stateHandlers: SessionStateHandler[] = [];
  private statusHandlers: StatusHandler[] = [];

  constructor(options: EdgeClientOptions) {
    this.config = parseConfig(options.config);
    if (this.config.logLevel) setLogLevel(this.config.logLevel);
    if (this.config.logFormat) setLogFormat(this.config.logFormat);

    this.identity = new IdentityManager(options.storage ?? this.defaultStorage());
    this.transportOverride = options.transport ?? null;
    this.random = options.random;

    this.directory.addRelay(identityFromAddress(this.config.entryRelay.address));
    for (const relay of this.config.relays) {
      this.addRelay(relay.address);
    }
    for (const peer of this.config.peers) {
      this.setPeerRelay(peer.address, peer.relay);
    }
  }

  get started(): boolean {
    return this.running !== null;
  }

  /** Loads the identity, connects to the entry relay and starts accepting sessions. */
  async start(): Promise<void> {
    if (this.running) return;

    const keypair = await this.identity.init();
    const address = this.identity.getAddress();
    const host = this.config.host;
    log.info('node public identifiers', {
      address,
      host: host ? `${host.address}:${host.port}` : undefined,
    });
    this.emitStatus('identity:ready', address);

    let socket: WebSocketTransport | null = null;
    let transport: TransportAdapter;
    if (this.transportOverride) {
      transport = this.transportOverride;
    } else {
      socket = new WebSocketTransport({
        url: this.config.entryRelay.url,
        address,
        relayAddress: this.config.entryRelay.address,
        events: { onDisconnected: (code) => this.emitStatus('relay:disconnected', String(code)) },
      });
      await socket.connect();
      transport = socket;
    }

    const pathSelector = new PathSelector({
      selfAddress: address,
      directory: this.directory,
      entryRelay: identityFromAddress(this.config.entryRelay.address),
      random: this.random,
    });

    const manager = new SessionManager({
      keypair,
      transport,
      pathSelector,
      session: this.config.session,
      maxSessions: this.config.maxSessions,
      defaultHopCount: this.config.defaultHopCount,
      events: {
        onSessionOpened: (id, role) => {
          for (const handler of this.openedHandlers) handler(id, role);
        },
        onSessionFailed: (id, reason) => {
          for (const handler of this.failedHandlers) handler(id, reason);
        },
        onSessionStateChanged: (id, previous, next) => {
          for (const handler of this.stateHandlers) handler(id, previous, next);
        },
      },
    });
    manager.start();

    this.running = { manager, socket };
    this.emitStatus('connected', this.config.entryRelay.address);
  }

  /**
   * Relays only forward to nodes connected to them, so a destination with a known relay gets
   * that relay as last hop unless `options.exitRelay` says otherwise.
   */
  open(destination: RelayIdentity | RelayAddress, options: OpenOptions = {}): SessionId {
    const { manager } = this.require();
    const address = typeof destination === 'string' ? destination : destination.address;
    return manager.open(destination, { ...options, exitRelay: options.exitRelay ?? this.peerRelays.get(address) });
  }

  send(sessionId: SessionId, bytes: Uint8Array): void {
    this.require().manager.send(sessionId, bytes);
  }

  receive(sessionId: SessionId): AsyncIterable<Uint8Array> {
    return this.require().manager.receive(sessionId);
  }

  close(sessionId: SessionId): Promise<void> {
    return this.require().manager.close(sessionId);
  }

  getState(sessionId: SessionId): SessionState | undefined {
    return this.running?.manager.getState(sessionId);
  }

  getSessionInfo(sessionId: SessionId): SessionInfo | undefined {
    return this.running?.manager.getSessionInfo(sessionId);
  }

  listSessions(): SessionInfo[] {
    return this.running?.manager.listSessions() ?? [];
  }

  getStats(): TrafficStatsData | null {
    return this.running?.manager.getStats() ?? null;
  }

  getAddress(): RelayAddress {
    return this.identity.getAddress();
  }

  /** Makes a relay available for path selection. */
  addRelay(address: RelayAddress): void {
    if (this.directory.getRelay(address)) return;
    this.directory.addRelay(identityFromAddress(address));
  }

  /** Records the relay an edge node is connected to. */
  setPeerRelay(address: RelayAddress, relay: RelayAddress): void {
    this.peerRelays.set(address, relay);
  }

  getRelays(): RelayIdentity[] {
    return this.directory.getRelays().map((entry) => entry.identity);
  }

  onSessionOpened(handler: SessionOpenedHandler): void {
    this.openedHandlers.push(handler);
  }

  onSessionFailed(handler: SessionFailedHandler): void {
    this.failedHandlers.push(handler);
  }

  onSessionStateChanged(handler: SessionStateHandler): void {
    this.stateHandlers.push(handler);
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  /** Terminates every session and disconnects from the entry relay. */
  async shutdown(): Promise<void> {
    const running = this.running;
    if (!running) return;
    this.running = null;

    running.manager.shutdown();
    await running.socket?.close();
    this.emitStatus('disconnected');
  }

  private defaultStorage(): IdentityStorage {
    if (!this.config.identityFile) return new MemoryStorage();
    return new FileStorageAdapter({ filePath: this.config.identityFile, password: this.config.identityPassword });
  }

  private require(): Running {
    if (!this.running) {
      throw new EdgeError('TRANSPORT_FAILED', 'Client is not started');
    }
    return this.running;
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }
}
