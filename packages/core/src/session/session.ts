import type { PacketCodec } from '../codec/packet-codec.js';
import { FrameFlags } from '../codec/constants.js';
import { EdgeError } from '../errors/edge-error.js';
import type { RelayAddress } from '../identity/keypair.js';
import { createLogger } from '../logging/logger.js';
import { type PathDescriptor, pathRelayAddresses, returnRouteFor } from '../path/path-descriptor.js';
import type { TrafficStats } from '../stats/traffic-stats.js';
import { MessageStream } from './message-stream.js';
import { type AcceptStatus, ReassemblyBuffer, type ReassemblyEvent } from './reassembly-buffer.js';
import {
  type SessionConfig,
  type SessionFailureReason,
  type SessionId,
  type SessionRole,
  type SessionState,
  isTerminalState,
  resolveSessionConfig,
} from './types.js';

/** Hands a packet to the transport. Never throws; delivery problems surface as missing acks. */
export type PacketTransmitter = (firstHop: RelayAddress, packet: Uint8Array) => void;

export interface SessionEvents {
  onStateChanged: (session: Session, previous: SessionState, next: SessionState) => void;
}

export interface SessionOptions {
  id: SessionId;
  role: SessionRole;
  path: PathDescriptor;
  /** This node's address, the last entry of the embedded return route */
  localAddress: RelayAddress;
  codec: PacketCodec;
  config?: Partial<SessionConfig>;
  transmit: PacketTransmitter;
  events?: Partial<SessionEvents>;
  stats?: TrafficStats;
}

interface OutstandingPacket {
  sequence: number;
  flags: number;
  fragment: Uint8Array;
  attempts: number;
  timer: ReturnType<typeof setTimeout> | null;
}

interface QueuedFragment {
  flags: number;
  fragment: Uint8Array;
}

/** The OPEN frame; data frames are numbered from 1. */
export const OPEN_SEQUENCE = 0;

const log = createLogger('Session');

/**
 * One logical stream to a destination over a fixed path.
 *
 * State flow: establishing → active → draining → closed; establishing and active can fail.
 * Responders start in active.
 *
 * Every outstanding packet owns exactly one retransmission timer. Terminal states cancel all
 * timers and none is armed afterwards.
 */
export class Session {
  readonly id: SessionId;
  readonly role: SessionRole;
  readonly destination: RelayAddress;
  readonly createdAt = Date.now();

  private state: SessionState;
  private config: SessionConfig;
  private path: PathDescriptor | null;
  private codec: PacketCodec | null;
  private readonly route: readonly RelayAddress[];
  private readonly returnRoute: readonly RelayAddress[];
  private readonly firstHop: RelayAddress;
  private transmitter: PacketTransmitter;
  private events: Partial<SessionEvents>;
  private stats: TrafficStats | null;

  private nextSendSequence = OPEN_SEQUENCE + 1;
  private outstanding = new Map<number, OutstandingPacket>();
  private pending: QueuedFragment[] = [];
  private reassembly: ReassemblyBuffer;
  private stream = new MessageStream();
  private drainTimer: ReturnType<typeof setTimeout> | null = null;
  /** Gives up sequences still missing in front of the peer's CLOSE frame. */
  private gapTimer: ReturnType<typeof setTimeout> | null = null;
  private failureReason: SessionFailureReason | null = null;
  private closeWaiters: Array<() => void> = [];

  constructor(options: SessionOptions) {
    const firstHop = options.path.hops[0];
    if (!firstHop) {
      throw new EdgeError('INVALID_PATH', 'Session path has no relays');
    }

    this.id = options.id;
    this.role = options.role;
    this.path = options.path;
    this.codec = options.codec;
    this.destination = options.path.destination.address;
    this.route = pathRelayAddresses(options.path);
    this.returnRoute = returnRouteFor(options.path, options.localAddress);
    this.firstHop = firstHop.address;
    this.config = resolveSessionConfig(options.config);
    this.transmitter = options.transmit;
    this.events = options.events ?? {};
    this.stats = options.stats ?? null;
    this.reassembly = new ReassemblyBuffer(this.config.reorderWindow, OPEN_SEQUENCE + 1);
    this.state = options.role === 'initiator' ? 'establishing' : 'active';
  }

  /** Sends the OPEN frame. Only meaningful for initiators; later calls are ignored. */
  start(): void {
    if (this.state !== 'establishing' || this.outstanding.has(OPEN_SEQUENCE)) return;
    this.track(OPEN_SEQUENCE, FrameFlags.OPEN, new Uint8Array(0));
  }

  getState(): SessionState {
    return this.state;
  }

  getPath(): PathDescriptor | null {
    return this.path;
  }

  getRoute(): readonly RelayAddress[] {
    return this.route;
  }

  getFailureReason(): SessionFailureReason | null {
    return this.failureReason;
  }

  outstandingSequences(): number[] {
    return Array.from(this.outstanding.keys());
  }

  pendingCount(): number {
    return this.pending.length;
  }

  activeTimerCount(): number {
    let count = (this.drainTimer ? 1 : 0) + (this.gapTimer ? 1 : 0);
    for (const entry of this.outstanding.values()) {
      if (entry.timer) count++;
    }
    return count;
  }

  messages(): AsyncIterable<Uint8Array> {
    return this.stream;
  }

  /**
   * Segments `message` and queues its fragments. Returns immediately; fragments beyond the send
   * window, or sent while establishing, wait in the pending queue.
   */
  send(message: Uint8Array): void {
    if (this.state !== 'establishing' && this.state !== 'active') {
      throw new EdgeError('SESSION_CLOSED', 'Session is closed', { sessionId: this.id, state: this.state });
    }
    if (message.length > this.config.maxMessageSize) {
      throw new EdgeError('FRAGMENT_TOO_LARGE', 'Message exceeds the maximum message size', {
        size: message.length,
        maxMessageSize: this.config.maxMessageSize,
      });
    }
    const { path, codec } = this;
    if (!path || !codec) {
      throw new EdgeError('SESSION_CLOSED', 'Session is closed', { sessionId: this.id, state: this.state });
    }

    const capacity = codec.capacity(path);
    const data = message.slice();
    if (data.length === 0) {
      this.pending.push({ flags: FrameFlags.START_OF_MESSAGE | FrameFlags.END_OF_MESSAGE, fragment: data });
    }
    for (let offset = 0; offset < data.length; offset += capacity) {
      const end = Math.min(offset + capacity, data.length);
      this.pending.push({
        flags:
          (offset === 0 ? FrameFlags.START_OF_MESSAGE : 0) | (end === data.length ? FrameFlags.END_OF_MESSAGE : 0),
        fragment: data.subarray(offset, end),
      });
    }
    this.pump();
  }

  /** Applies acknowledged sequences; unknown or repeated ones are ignored. Returns how many applied. */
  handleAck(sequences: readonly number[]): number {
    if (isTerminalState(this.state)) return 0;

    let acknowledged = 0;
    for (const sequence of sequences) {
      const entry = this.outstanding.get(sequence);
      if (!entry) continue;
      this.retire(entry);
      acknowledged++;
      if (sequence === OPEN_SEQUENCE && this.state === 'establishing') {
        this.activate();
      }
    }

    if (acknowledged > 0) {
      this.pump();
      this.checkDrained();
    }
    return acknowledged;
  }

  /**
   * Handles an inbound frame for this session. Accepted and duplicate frames are acknowledged;
   * frames beyond the reorder window are dropped so the peer retransmits them later.
   *
   * A peer stops retransmitting once it closes, so sequences still missing in front of its CLOSE
   * frame one retransmission timeout later are marked lost.
   */
  handleDeliver(sequence: number, flags: number, fragment: Uint8Array): AcceptStatus | null {
    if (isTerminalState(this.state)) return null;
    if (this.state === 'establishing') {
      this.activate();
    }

    if (sequence === OPEN_SEQUENCE) {
      this.sendAck([OPEN_SEQUENCE]);
      return 'accepted';
    }

    const result = this.reassembly.accept(sequence, flags, fragment);
    if (result.status === 'out-of-window') {
      log.debug('frame beyond reorder window', { sessionId: this.id, sequence });
      return result.status;
    }

    this.sendAck([sequence]);
    this.applyEvents(result.events);
    if (this.reassembly.pendingClose !== null && !this.gapTimer && !isTerminalState(this.state)) {
      this.gapTimer = setTimeout(() => {
        this.gapTimer = null;
        this.applyEvents(this.reassembly.skipMissing());
      }, this.config.retransmitTimeoutMs);
    }
    return result.status;
  }

  /**
   * Resolves once the session is terminal. From active this drains: retransmissions stop, a CLOSE
   * frame is sent and the session closes once it is acknowledged or `drainTimeoutMs` passes.
   */
  close(): Promise<void> {
    if (isTerminalState(this.state)) return Promise.resolve();

    const done = new Promise<void>((resolve) => {
      this.closeWaiters.push(resolve);
    });
    if (this.state === 'establishing') {
      this.finish();
    } else if (this.state === 'active') {
      this.beginDrain();
    }
    return done;
  }

  /** Closes immediately without draining. */
  terminate(): void {
    this.finish();
  }

  private activate(): void {
    const open = this.outstanding.get(OPEN_SEQUENCE);
    if (open) this.retire(open);
    this.transition('active');
    this.pump();
  }

  /**
   * Retransmission of unacknowledged data stops here; only the CLOSE frame is sent reliably.
   */
  private beginDrain(): void {
    this.transition('draining');
    if (this.state !== 'draining') return;

    this.cancelTimers();
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      log.debug('drain timeout', { sessionId: this.id });
      this.finish();
    }, this.config.drainTimeoutMs);
    this.track(this.nextSendSequence++, FrameFlags.CLOSE, new Uint8Array(0));
  }

  private applyEvents(events: readonly ReassemblyEvent[]): void {
    for (const event of events) {
      switch (event.type) {
        case 'message':
          this.stream.push(event.data);
          break;
        case 'lost':
          log.debug('sequence lost', { sessionId: this.id, sequence: event.sequence });
          break;
        case 'close':
          this.handleRemoteClose();
          break;
      }
    }
  }

  private handleRemoteClose(): void {
    log.debug('peer closed session', { sessionId: this.id });
    this.stream.end();
    if (this.state === 'active') {
      this.beginDrain();
    } else {
      this.checkDrained();
    }
  }

  private pump(): void {
    if (this.state !== 'active' && this.state !== 'draining') return;
    while (this.outstanding.size < this.config.sendWindow) {
      const next = this.pending.shift();
      if (!next) break;
      this.track(this.nextSendSequence++, next.flags, next.fragment);
    }
  }

  private track(sequence: number, flags: number, fragment: Uint8Array): void {
    const entry: OutstandingPacket = { sequence, flags, fragment, attempts: 0, timer: null };
    this.outstanding.set(sequence, entry);
    this.transmit(entry);
  }

  /** Encodes with fresh onion layers on every attempt. */
  private transmit(entry: OutstandingPacket): void {
    const { path, codec } = this;
    if (!path || !codec || isTerminalState(this.state)) return;

    const packet = codec.encode(entry.fragment, path, {
      sessionId: this.id,
      sequence: entry.sequence,
      flags: entry.flags,
      returnRoute: this.returnRoute,
    });
    entry.attempts++;
    this.stats?.recordPacketSent(packet.length, entry.attempts > 1);
    this.armTimer(entry);
    this.transmitter(this.firstHop, packet);
  }

  private armTimer(entry: OutstandingPacket): void {
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = setTimeout(() => this.handleTimeout(entry.sequence), this.config.retransmitTimeoutMs);
  }

  private handleTimeout(sequence: number): void {
    if (isTerminalState(this.state)) return;
    const entry = this.outstanding.get(sequence);
    if (!entry) return;
    entry.timer = null;

    const budget = sequence === OPEN_SEQUENCE ? this.config.setupAttempts : this.config.maxRetries + 1;
    if (entry.attempts >= budget) {
      if (this.state === 'draining') {
        // peer unreachable while closing
        this.finish();
      } else {
        this.fail(sequence === OPEN_SEQUENCE ? 'setup-timeout' : 'retry-exhausted');
      }
      return;
    }

    log.debug('retransmitting', { sessionId: this.id, sequence, attempt: entry.attempts + 1 });
    this.transmit(entry);
  }

  private sendAck(sequences: number[]): void {
    const { path, codec } = this;
    if (!path || !codec) return;
    const packet = codec.encodeAck({ sessionId: this.id, sequences }, path);
    this.stats?.recordAckSent();
    this.transmitter(this.firstHop, packet);
  }

  private retire(entry: OutstandingPacket): void {
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = null;
    this.outstanding.delete(entry.sequence);
  }

  private checkDrained(): void {
    if (this.state === 'draining' && this.outstanding.size === 0) {
      this.finish();
    }
  }

  private finish(): void {
    if (isTerminalState(this.state)) return;
    this.cancelTimers();
    this.stream.end();
    this.transition('closed');
    this.release();
  }

  private fail(reason: SessionFailureReason): void {
    if (isTerminalState(this.state)) return;
    this.failureReason = reason;
    this.cancelTimers();
    log.warn('session failed', { sessionId: this.id, reason });
    this.stream.fail(new EdgeError('SESSION_FAILED', `Session failed: ${reason}`, { sessionId: this.id, reason }));
    this.transition('failed');
    this.release();
  }

  private cancelTimers(): void {
    for (const entry of this.outstanding.values()) {
      if (entry.timer) clearTimeout(entry.timer);
    }
    this.outstanding.clear();
    this.pending = [];
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    if (this.gapTimer) {
      clearTimeout(this.gapTimer);
      this.gapTimer = null;
    }
  }

  /** Runs after the terminal transition so listeners still see the path. */
  private release(): void {
    this.path = null;
    this.codec = null;
    const waiters = this.closeWaiters;
    this.closeWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    log.debug('state changed', { sessionId: this.id, from: previous, to: next });
    this.events.onStateChanged?.(this, previous, next);
  }
}
