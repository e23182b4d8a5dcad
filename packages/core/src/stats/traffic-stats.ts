export interface TrafficStatsData {
  /** Packets sent for own sessions, retransmissions included */
  packetsSent: number;
  retransmissions: number;
  /** Packets addressed to this node (deliver and ack units) */
  packetsReceived: number;
  acksSent: number;
  acksReceived: number;
  malformedPackets: number;
  /** Packets this node forwarded for others (acting as relay) */
  packetsForwarded: number;
  /** Packets dropped without being malformed (unknown session, relaying disabled, ...) */
  packetsDropped: number;
  bytesSent: number;
  bytesReceived: number;
  sessionsOpened: number;
  sessionsFailed: number;
  retransmitRatio: number;
  lastSendTimestamp: number;
  lastReceiveTimestamp: number;
}

export interface TrafficStatsEvents {
  onRetransmitWarning: (stats: TrafficStatsData, reason: string) => void;
}

export interface TrafficStatsOptions {
  retransmitThreshold?: number; // retransmissions per packet sent that triggers warning (default: 0.5)
  events?: Partial<TrafficStatsEvents>;
}

/** Cooldown between retransmit warnings (10 seconds) */
const WARNING_COOLDOWN_MS = 10 * 1000;

/** Packets sent before the retransmit ratio is considered meaningful */
const MIN_SAMPLE_PACKETS = 20;

/** Maximum counter value to prevent overflow (1 billion) */
const MAX_COUNTER_VALUE = 1_000_000_000;

type Counter =
  | 'packetsSent'
  | 'retransmissions'
  | 'packetsReceived'
  | 'acksSent'
  | 'acksReceived'
  | 'malformedPackets'
  | 'packetsForwarded'
  | 'packetsDropped'
  | 'bytesSent'
  | 'bytesReceived'
  | 'sessionsOpened'
  | 'sessionsFailed';

function emptyCounters(): Record<Counter, number> {
  return {
    packetsSent: 0,
    retransmissions: 0,
    packetsReceived: 0,
    acksSent: 0,
    acksReceived: 0,
    malformedPackets: 0,
    packetsForwarded: 0,
    packetsDropped: 0,
    bytesSent: 0,
    bytesReceived: 0,
    sessionsOpened: 0,
    sessionsFailed: 0,
  };
}

export class TrafficStats {
  private counters = emptyCounters();
  private lastSendTimestamp = 0;
  private lastReceiveTimestamp = 0;
  private retransmitThreshold: number;
  private events: Partial<TrafficStatsEvents>;
  private lastWarningAt = 0;

  constructor(options: TrafficStatsOptions = {}) {
    this.retransmitThreshold = options.retransmitThreshold ?? 0.5;
    this.events = options.events ?? {};
  }

  recordPacketSent(byteSize: number, retransmission = false): void {
    this.add('packetsSent', 1);
    this.add('bytesSent', byteSize);
    if (retransmission) {
      this.add('retransmissions', 1);
      this.checkRetransmits();
    }
    this.lastSendTimestamp = Date.now();
  }

  recordPacketReceived(byteSize: number): void {
    this.add('packetsReceived', 1);
    this.add('bytesReceived', byteSize);
    this.lastReceiveTimestamp = Date.now();
  }

  recordAckSent(): void {
    this.add('acksSent', 1);
  }

  recordAckReceived(): void {
    this.add('acksReceived', 1);
  }

  recordMalformed(): void {
    this.add('malformedPackets', 1);
  }

  recordForwarded(byteSize: number): void {
    this.add('packetsForwarded', 1);
    this.add('bytesSent', byteSize);
    this.lastSendTimestamp = Date.now();
  }

  recordDropped(): void {
    this.add('packetsDropped', 1);
  }

  recordSessionOpened(): void {
    this.add('sessionsOpened', 1);
  }

  recordSessionFailed(): void {
    this.add('sessionsFailed', 1);
  }

  getStats(): TrafficStatsData {
    const sent = this.counters.packetsSent;
    const ratio = sent > 0 ? this.counters.retransmissions / sent : 0;

    return {
      ...this.counters,
      retransmitRatio: Math.round(ratio * 100) / 100,
      lastSendTimestamp: this.lastSendTimestamp,
      lastReceiveTimestamp: this.lastReceiveTimestamp,
    };
  }

  reset(): void {
    this.counters = emptyCounters();
    this.lastSendTimestamp = 0;
    this.lastReceiveTimestamp = 0;
    this.lastWarningAt = 0;
  }

  private add(counter: Counter, amount: number): void {
    this.counters[counter] = Math.min(this.counters[counter] + amount, MAX_COUNTER_VALUE);
  }

  private checkRetransmits(): void {
    const now = Date.now();
    if (now - this.lastWarningAt < WARNING_COOLDOWN_MS) {
      return;
    }
    if (this.counters.packetsSent < MIN_SAMPLE_PACKETS) {
      return;
    }

    const stats = this.getStats();
    if (stats.retransmitRatio > this.retransmitThreshold) {
      this.lastWarningAt = now;
      this.events.onRetransmitWarning?.(
        stats,
        `retransmit ratio ${stats.retransmitRatio} exceeds threshold ${this.retransmitThreshold}`,
      );
    }
  }
}
