import type { RelayAddress, RelayIdentity } from '../identity/keypair.js';

export type RelayStatus = 'online' | 'stale' | 'offline';

export interface RelayEntry {
  identity: RelayIdentity;
  /** Undefined for pinned relays, which are always considered online. */
  lastSeen?: number;
}

/** Source of known relays and their reachability. */
export interface RelayDirectory {
  getRelays(): RelayEntry[];
  getRelayStatus(address: RelayAddress): RelayStatus;
}

/** Maximum clock drift tolerance (5 minutes into future) */
const MAX_FUTURE_DRIFT_MS = 5 * 60 * 1000;

/** Maximum age for lastSeen (1 hour - beyond this, relay is definitely offline) */
const MAX_PAST_LASTSEEN_MS = 60 * 60 * 1000;

export class MemoryRelayDirectory implements RelayDirectory {
  private relays = new Map<RelayAddress, RelayEntry>();
  private staleThresholdMs: number;

  constructor(staleThresholdMs = 60_000) {
    this.staleThresholdMs = staleThresholdMs;
  }

  private clamp(timestamp: number): number {
    const now = Date.now();
    return Math.max(Math.min(timestamp, now + MAX_FUTURE_DRIFT_MS), now - MAX_PAST_LASTSEEN_MS);
  }

  /**
   * Add or replace a relay. Without `lastSeen` the relay is pinned (statically configured).
   */
  addRelay(identity: RelayIdentity, lastSeen?: number): void {
    this.relays.set(identity.address, {
      identity,
      lastSeen: lastSeen === undefined ? undefined : this.clamp(lastSeen),
    });
  }

  removeRelay(address: RelayAddress): boolean {
    return this.relays.delete(address);
  }

  getRelay(address: RelayAddress): RelayEntry | undefined {
    return this.relays.get(address);
  }

  updateLastSeen(address: RelayAddress, timestamp?: number): void {
    const entry = this.relays.get(address);
    if (entry) {
      entry.lastSeen = this.clamp(timestamp ?? Date.now());
    }
  }

  getRelayStatus(address: RelayAddress): RelayStatus {
    const entry = this.relays.get(address);
    if (!entry) return 'offline';
    if (entry.lastSeen === undefined) return 'online';
    const elapsed = Date.now() - entry.lastSeen;
    if (elapsed < this.staleThresholdMs) return 'online';
    if (elapsed < this.staleThresholdMs * 2) return 'stale';
    return 'offline';
  }

  getRelays(): RelayEntry[] {
    return Array.from(this.relays.values());
  }

  size(): number {
    return this.relays.size;
  }

  clear(): void {
    this.relays.clear();
  }
}
