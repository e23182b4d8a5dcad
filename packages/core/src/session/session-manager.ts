import { FrameFlags } from '../codec/constants.js';
import { type DecodedUnit, type DeliverPayload, PacketCodec } from '../codec/packet-codec.js';
import { EdgeError, isEdgeError } from '../errors/edge-error.js';
import {
  type RelayAddress,
  type RelayIdentity,
  type RelayKeypair,
  publicKeyToAddress,
} from '../identity/keypair.js';
import { createLogger } from '../logging/logger.js';
import { type PathDescriptor, pathFromRoute } from '../path/path-descriptor.js';
import type { PathSelector } from '../path/path-selector.js';
import { TrafficStats, type TrafficStatsData } from '../stats/traffic-stats.js';
import type { TransportAdapter } from '../transport/transport-adapter.js';
import { Session } from './session.js';
import {
  type SessionConfig,
  type SessionFailureReason,
  type SessionId,
  type SessionInfo,
  type SessionRole,
  type SessionState,
  generateSessionId,
  isTerminalState,
} from './types.js';

export interface SessionManagerEvents {
  onSessionOpened: (sessionId: SessionId, role: SessionRole) => void;
  onSessionStateChanged: (sessionId: SessionId, previous: SessionState, next: SessionState) => void;
  onSessionFailed: (sessionId: SessionId, reason: SessionFailureReason) => void;
}

export interface SessionManagerOptions {
  keypair: RelayKeypair;
  transport: TransportAdapter;
  pathSelector: PathSelector;
  codec?: PacketCodec;
  session?: Partial<SessionConfig>;
  /** Live (non-terminal) sessions allowed at once (default: 32) */
  maxSessions?: number;
  defaultHopCount?: number;
  /** Create responder sessions for inbound OPEN frames (default: true) */
  acceptInbound?: boolean;
  /** Forward packets for which this node is an intermediate hop (default: false) */
  relayPackets?: boolean;
  events?: Partial<SessionManagerEvents>;
  stats?: TrafficStats;
}

export interface OpenOptions {
  hopCount?: number;
  /** Relays that must not appear on the path, e.g. those of a failed session */
  excludeSet?: Iterable<RelayAddress>;
  /** Relay the destination is connected to; becomes the last hop */
  exitRelay?: RelayAddress;
}

/** Terminal sessions kept so late calls report SESSION_CLOSED / stream end instead of "unknown" */
export const MAX_RETAINED_TERMINAL_SESSIONS = 256;

const log = createLogger('SessionManager');

/**
 * Owns every session of this node and multiplexes them over one transport. Inbound packets are
 * decoded with this node's keys and dispatched by session id.
 */
export class SessionManager {
  private keypair: RelayKeypair;
  private localAddress: RelayAddress;
  private transport: TransportAdapter;
  private pathSelector: PathSelector;
  private codec: PacketCodec;
  private sessionConfig: Partial<SessionConfig>;
  private maxSessions: number;
  private defaultHopCount: number;
  private acceptInbound: boolean;
  private relayPackets: boolean;
  private events: Partial<SessionManagerEvents>;
  private stats: TrafficStats;
  private sessions = new Map<SessionId, Session>();
  /** Terminal session ids, oldest first */
  private terminated: SessionId[] = [];
  private started = false;

  constructor(options: SessionManagerOptions) {
    this.keypair = options.keypair;
    this.localAddress = publicKeyToAddress(options.keypair.publicKey);
    this.transport = options.transport;
    this.pathSelector = options.pathSelector;
    this.codec = options.codec ?? new PacketCodec();
    this.sessionConfig = options.session ?? {};
    this.maxSessions = options.maxSessions ?? 32;
    this.defaultHopCount = options.defaultHopCount ?? 2;
    this.acceptInbound = options.acceptInbound ?? true;
    this.relayPackets = options.relayPackets ?? false;
    this.events = options.events ?? {};
    this.stats = options.stats ?? new TrafficStats();
  }

  get address(): RelayAddress {
    return this.localAddress;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.transport.onRawReceived = (bytes) => this.handleRaw(bytes);
    log.info('started', { address: this.localAddress });
  }

  /** Unbinds the transport and closes every session without draining. */
  shutdown(): void {
    if (this.started && this.transport.onRawReceived) {
      this.transport.onRawReceived = null;
    }
    this.started = false;
    for (const session of this.sessions.values()) {
      session.terminate();
    }
    log.info('shut down', { address: this.localAddress });
  }

  /**
   * Selects a path and starts session setup. Returns without waiting for the peer; the session
   * becomes active on the first acknowledgement.
   */
  open(destination: RelayIdentity | RelayAddress, options: OpenOptions = {}): SessionId {
    const live = this.liveSessionCount();
    if (live >= this.maxSessions) {
      throw new EdgeError('TOO_MANY_SESSIONS', 'Session limit reached', { limit: this.maxSessions, live });
    }

    const path = this.pathSelector.selectPath(
      destination,
      options.hopCount ?? this.defaultHopCount,
      options.excludeSet,
      options.exitRelay,
    );

    let id = generateSessionId();
    while (this.sessions.has(id)) {
      id = generateSessionId();
    }

    const session = this.createSession(id, 'initiator', path);
    session.start();
    return id;
  }

  send(sessionId: SessionId, bytes: Uint8Array): void {
    this.requireSession(sessionId).send(bytes);
  }

  receive(sessionId: SessionId): AsyncIterable<Uint8Array> {
    return this.requireSession(sessionId).messages();
  }

  /** Resolves once the session is terminal; unknown ids resolve immediately. */
  close(sessionId: SessionId): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return Promise.resolve();
    return session.close();
  }

  getState(sessionId: SessionId): SessionState | undefined {
    return this.sessions.get(sessionId)?.getState();
  }

  getSessionInfo(sessionId: SessionId): SessionInfo | undefined {
    const session = this.sessions.get(sessionId);
    return session ? toSessionInfo(session) : undefined;
  }

  listSessions(): SessionInfo[] {
    return Array.from(this.sessions.values(), toSessionInfo);
  }

  getStats(): TrafficStatsData {
    return this.stats.getStats();
  }

  /** Entry point for every packet the transport receives. Never throws for bad input. */
  handleRaw(bytes: Uint8Array): void {
    let unit: DecodedUnit;
    try {
      unit = this.codec.decode(bytes, this.keypair);
    } catch (error) {
      if (!isEdgeError(error, 'MALFORMED_PACKET')) throw error;
      this.stats.recordMalformed();
      log.debug('dropping malformed packet', { size: bytes.length });
      return;
    }

    switch (unit.kind) {
      case 'forward':
        this.forward(unit.nextHop, unit.packet);
        break;
      case 'deliver':
        this.stats.recordPacketReceived(bytes.length);
        this.handleDeliver(unit);
        break;
      case 'ack': {
        this.stats.recordPacketReceived(bytes.length);
        this.stats.recordAckReceived();
        const session = this.sessions.get(unit.sessionId);
        if (!session) {
          this.stats.recordDropped();
          log.debug('ack for unknown session', { sessionId: unit.sessionId });
          break;
        }
        session.handleAck(unit.sequences);
        break;
      }
    }
  }

  private handleDeliver(unit: DeliverPayload): void {
    const existing = this.sessions.get(unit.sessionId);
    if (existing) {
      existing.handleDeliver(unit.sequence, unit.flags, unit.fragment);
      return;
    }
    if (!(unit.flags & FrameFlags.OPEN)) {
      this.stats.recordDropped();
      log.debug('frame for unknown session', { sessionId: unit.sessionId, sequence: unit.sequence });
      return;
    }
    this.acceptSession(unit);
  }

  private acceptSession(unit: DeliverPayload): void {
    if (!this.acceptInbound) {
      this.stats.recordDropped();
      log.debug('inbound session refused', { sessionId: unit.sessionId });
      return;
    }
    if (this.liveSessionCount() >= this.maxSessions) {
      this.stats.recordDropped();
      log.warn('inbound session refused: session limit reached', {
        sessionId: unit.sessionId,
        limit: this.maxSessions,
      });
      return;
    }

    let path: PathDescriptor;
    try {
      path = pathFromRoute(unit.returnRoute);
    } catch (error) {
      if (!isEdgeError(error, 'INVALID_PATH')) throw error;
      this.stats.recordDropped();
      log.debug('inbound session with unusable return route', { sessionId: unit.sessionId, error });
      return;
    }

    const session = this.createSession(unit.sessionId, 'responder', path);
    session.handleDeliver(unit.sequence, unit.flags, unit.fragment);
  }

  private createSession(id: SessionId, role: SessionRole, path: PathDescriptor): Session {
    const session = new Session({
      id,
      role,
      path,
      localAddress: this.localAddress,
      codec: this.codec,
      config: this.sessionConfig,
      transmit: (firstHop, packet) => this.dispatch(firstHop, packet),
      events: { onStateChanged: (changed, previous, next) => this.handleStateChanged(changed, previous, next) },
      stats: this.stats,
    });
    this.sessions.set(id, session);
    this.stats.recordSessionOpened();
    log.info('session opened', { sessionId: id, role, destination: session.destination, hops: path.hops.length });
    this.events.onSessionOpened?.(id, role);
    return session;
  }

  private handleStateChanged(session: Session, previous: SessionState, next: SessionState): void {
    const path = session.getPath();
    if (path && session.role === 'initiator') {
      if (previous === 'establishing' && next === 'active') this.pathSelector.recordSuccess(path);
      if (next === 'failed') this.pathSelector.recordFailure(path);
    }

    this.events.onSessionStateChanged?.(session.id, previous, next);

    const reason = session.getFailureReason();
    if (next === 'failed' && reason) {
      this.stats.recordSessionFailed();
      this.events.onSessionFailed?.(session.id, reason);
    }
    if (isTerminalState(next)) {
      this.retainTerminal(session.id);
    }
  }

  private retainTerminal(sessionId: SessionId): void {
    this.terminated.push(sessionId);
    while (this.terminated.length > MAX_RETAINED_TERMINAL_SESSIONS) {
      const oldest = this.terminated.shift();
      if (oldest) this.sessions.delete(oldest);
    }
  }

  private forward(nextHop: RelayAddress, packet: Uint8Array): void {
    if (!this.relayPackets) {
      this.stats.recordDropped();
      log.debug('not relaying packet', { nextHop });
      return;
    }
    this.stats.recordForwarded(packet.length);
    this.dispatch(nextHop, packet);
  }

  private dispatch(address: RelayAddress, packet: Uint8Array): void {
    void this.transport.sendRaw(address, packet).catch((error: unknown) => {
      log.warn('transport send failed', { address, error });
    });
  }

  private requireSession(sessionId: SessionId): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new EdgeError('SESSION_CLOSED', 'Unknown session', { sessionId });
    }
    return session;
  }

  private liveSessionCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!isTerminalState(session.getState())) count++;
    }
    return count;
  }
}

function toSessionInfo(session: Session): SessionInfo {
  return {
    id: session.id,
    role: session.role,
    state: session.getState(),
    destination: session.destination,
    route: session.getRoute(),
    outstanding: session.outstandingSequences().length,
    pending: session.pendingCount(),
    failureReason: session.getFailureReason(),
    createdAt: session.createdAt,
  };
}
