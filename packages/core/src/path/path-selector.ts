import { type RandomSource, secureRandom } from '../crypto/secure-random.js';
import { EdgeError } from '../errors/edge-error.js';
import { type RelayAddress, type RelayIdentity, identityFromAddress } from '../identity/keypair.js';
import { createLogger } from '../logging/logger.js';
import { MAX_HOPS, MIN_HOPS, type PathDescriptor, createPathDescriptor, isValidHopCount } from './path-descriptor.js';
import type { RelayDirectory } from './relay-directory.js';

export interface PathSelectorOptions {
  selfAddress: RelayAddress;
  directory: RelayDirectory;
  /** Pinned first hop, e.g. the relay this node is connected to. */
  entryRelay?: RelayIdentity;
  random?: RandomSource;
}

interface RelayScore {
  successes: number;
  failures: number;
}

/** Cap on remembered destinations; oldest is forgotten first. */
const MAX_REMEMBERED_PATHS = 1024;
const MAX_SCORE_COUNT = Number.MAX_SAFE_INTEGER;

const log = createLogger('PathSelector');

/**
 * Chooses relay paths by weighted random draw without replacement.
 *
 * A relay's weight is `(successes + 1) / (successes + failures + 2)`, so unknown relays start at
 * 0.5. Consecutive selections for one destination differ whenever an alternative exists.
 */
export class PathSelector {
  private selfAddress: RelayAddress;
  private directory: RelayDirectory;
  private entryRelay: RelayIdentity | null;
  private random: RandomSource;
  private scores = new Map<RelayAddress, RelayScore>();
  private lastPaths = new Map<RelayAddress, readonly RelayAddress[]>();

  constructor(options: PathSelectorOptions) {
    this.selfAddress = options.selfAddress;
    this.directory = options.directory;
    this.entryRelay = options.entryRelay ?? null;
    this.random = options.random ?? secureRandom;
  }

  /**
   * `exitRelay` pins the last hop, normally the relay the destination is connected to. When it is
   * also the entry relay, only a one-hop path exists.
   */
  selectPath(
    destination: RelayIdentity | RelayAddress,
    hopCount: number,
    excludeSet?: Iterable<RelayAddress>,
    exitRelay?: RelayIdentity | RelayAddress,
  ): PathDescriptor {
    if (!isValidHopCount(hopCount)) {
      throw new EdgeError('INVALID_PATH', `Hop count must be between ${MIN_HOPS} and ${MAX_HOPS}`, { hopCount });
    }

    const target = typeof destination === 'string' ? this.toIdentity(destination, 'Destination') : destination;
    if (target.address === this.selfAddress) {
      throw new EdgeError('INVALID_PATH', 'Cannot build a path to self');
    }

    const excluded = new Set(excludeSet ?? []);
    const head: RelayIdentity[] = [];
    const tail: RelayIdentity[] = [];
    if (this.entryRelay) {
      this.checkPinned('Entry', this.entryRelay, target, excluded);
      head.push(this.entryRelay);
    }
    if (exitRelay !== undefined) {
      const exit = typeof exitRelay === 'string' ? this.toIdentity(exitRelay, 'Exit relay') : exitRelay;
      if (exit.address === this.selfAddress) {
        throw new EdgeError('INVALID_PATH', 'Cannot use this node as exit relay');
      }
      this.checkPinned('Exit', exit, target, excluded);
      if (exit.address !== head[0]?.address) {
        tail.push(exit);
      } else if (hopCount !== 1) {
        throw new EdgeError(
          'NO_ROUTE_AVAILABLE',
          'Entry relay is also the exit relay; only one hop reaches the destination',
          { destination: target.address, hopCount },
        );
      }
    }

    const pinned = [...head, ...tail];
    for (const relay of pinned) excluded.add(relay.address);
    const needed = hopCount - pinned.length;
    if (needed < 0) {
      throw new EdgeError('NO_ROUTE_AVAILABLE', 'Pinned relays do not fit the requested hop count', {
        destination: target.address,
        hopCount,
        pinned: pinned.length,
      });
    }

    const candidates = this.eligibleRelays(target.address, excluded);
    if (candidates.length < needed) {
      throw new EdgeError('NO_ROUTE_AVAILABLE', 'Not enough eligible relays for the requested hop count', {
        destination: target.address,
        hopCount,
        available: candidates.length + pinned.length,
      });
    }

    const drawn = this.drawWeighted(candidates, needed);
    const previous = this.lastPaths.get(target.address);
    if (previous && sameAddresses([...head, ...drawn, ...tail], previous)) {
      this.perturb(drawn, candidates);
    }

    const path = createPathDescriptor([...head, ...drawn, ...tail], target);
    this.remember(target.address, path);
    log.debug('path selected', { destination: target.address, hops: path.hops.length });
    return path;
  }

  recordSuccess(path: PathDescriptor): void {
    for (const hop of path.hops) {
      const score = this.scoreFor(hop.address);
      score.successes = Math.min(score.successes + 1, MAX_SCORE_COUNT);
    }
  }

  recordFailure(path: PathDescriptor): void {
    for (const hop of path.hops) {
      const score = this.scoreFor(hop.address);
      score.failures = Math.min(score.failures + 1, MAX_SCORE_COUNT);
    }
  }

  getScore(address: RelayAddress): number {
    const score = this.scores.get(address);
    if (!score) return 0.5;
    return (score.successes + 1) / (score.successes + score.failures + 2);
  }

  private toIdentity(address: RelayAddress, label: string): RelayIdentity {
    try {
      return identityFromAddress(address);
    } catch (error) {
      throw new EdgeError('INVALID_PATH', `${label} is not a valid relay address`, { address, error });
    }
  }

  private checkPinned(label: string, relay: RelayIdentity, target: RelayIdentity, excluded: Set<RelayAddress>): void {
    if (excluded.has(relay.address) || relay.address === target.address) {
      throw new EdgeError('NO_ROUTE_AVAILABLE', `${label} relay cannot be used for this destination`, {
        destination: target.address,
        relay: relay.address,
      });
    }
  }

  private eligibleRelays(destination: RelayAddress, excluded: Set<RelayAddress>): RelayIdentity[] {
    const eligible = new Map<RelayAddress, RelayIdentity>();
    for (const entry of this.directory.getRelays()) {
      const address = entry.identity.address;
      if (address === this.selfAddress) continue;
      if (address === destination) continue;
      if (excluded.has(address)) continue;
      if (this.directory.getRelayStatus(address) !== 'online') continue;
      eligible.set(address, entry.identity);
    }
    return Array.from(eligible.values());
  }

  private drawWeighted(candidates: readonly RelayIdentity[], count: number): RelayIdentity[] {
    const pool = [...candidates];
    const drawn: RelayIdentity[] = [];
    while (drawn.length < count) {
      const index = this.pickIndex(pool);
      drawn.push(...pool.splice(index, 1));
    }
    return drawn;
  }

  private pickIndex(pool: readonly RelayIdentity[]): number {
    const weights = pool.map((relay) => this.getScore(relay.address));
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    const target = this.random() * total;
    let cumulative = 0;
    for (let i = 0; i < weights.length; i++) {
      cumulative += weights[i] ?? 0;
      if (target < cumulative) return i;
    }
    return pool.length - 1;
  }

  /** Makes `drawn` differ from the previous path: replace one relay if possible, otherwise reorder. */
  private perturb(drawn: RelayIdentity[], candidates: readonly RelayIdentity[]): void {
    // only the pinned entry relay; nothing to vary
    if (drawn.length === 0) return;
    const chosen = new Set(drawn.map((relay) => relay.address));
    const unused = candidates.filter((relay) => !chosen.has(relay.address));
    if (unused.length > 0) {
      const position = Math.floor(this.random() * drawn.length);
      const replacement = unused[this.pickIndex(unused)];
      if (replacement) drawn[position] = replacement;
      return;
    }
    if (drawn.length > 1) {
      const i = Math.floor(this.random() * drawn.length);
      const j = (i + 1 + Math.floor(this.random() * (drawn.length - 1))) % drawn.length;
      const first = drawn[i];
      const second = drawn[j];
      if (first && second) {
        drawn[i] = second;
        drawn[j] = first;
      }
    }
  }

  private remember(destination: RelayAddress, path: PathDescriptor): void {
    this.lastPaths.delete(destination);
    this.lastPaths.set(
      destination,
      path.hops.map((hop) => hop.address),
    );
    if (this.lastPaths.size > MAX_REMEMBERED_PATHS) {
      const oldest = this.lastPaths.keys().next();
      if (!oldest.done) this.lastPaths.delete(oldest.value);
    }
  }

  private scoreFor(address: RelayAddress): RelayScore {
    let score = this.scores.get(address);
    if (!score) {
      score = { successes: 0, failures: 0 };
      this.scores.set(address, score);
    }
    return score;
  }
}

function sameAddresses(relays: readonly RelayIdentity[], previous: readonly RelayAddress[]): boolean {
  return relays.length === previous.length && relays.every((relay, i) => relay.address === previous[i]);
}
