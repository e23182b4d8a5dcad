import { EdgeError } from '../errors/edge-error.js';
import { type RelayAddress, type RelayIdentity, identityFromAddress } from '../identity/keypair.js';

export const MIN_HOPS = 1;
export const MAX_HOPS = 5;

/**
 * Ordered relays from this node to a destination. Frozen on creation and discarded with the
 * session that uses it.
 */
export interface PathDescriptor {
  readonly hops: readonly RelayIdentity[];
  readonly destination: RelayIdentity;
}

export function isValidHopCount(hopCount: number): boolean {
  return Number.isInteger(hopCount) && hopCount >= MIN_HOPS && hopCount <= MAX_HOPS;
}

export function createPathDescriptor(hops: readonly RelayIdentity[], destination: RelayIdentity): PathDescriptor {
  if (!isValidHopCount(hops.length)) {
    throw new EdgeError('INVALID_PATH', `A path needs between ${MIN_HOPS} and ${MAX_HOPS} hops`, {
      hopCount: hops.length,
    });
  }

  const seen = new Set<RelayAddress>([destination.address]);
  for (const hop of hops) {
    if (seen.has(hop.address)) {
      throw new EdgeError('INVALID_PATH', 'A relay appears more than once in the path', { address: hop.address });
    }
    seen.add(hop.address);
  }

  return Object.freeze({ hops: Object.freeze([...hops]), destination });
}

export function pathRelayAddresses(path: PathDescriptor): RelayAddress[] {
  return path.hops.map((hop) => hop.address);
}

export function pathKey(path: PathDescriptor): string {
  return [...pathRelayAddresses(path), path.destination.address].join('>');
}

export function pathsEqual(a: PathDescriptor, b: PathDescriptor): boolean {
  return pathKey(a) === pathKey(b);
}

/** The route a peer uses to answer: the relays in reverse, ending at `origin`. */
export function returnRouteFor(path: PathDescriptor, origin: RelayAddress): RelayAddress[] {
  return [...pathRelayAddresses(path)].reverse().concat(origin);
}

/** Inverse of {@link returnRouteFor}: the last address is the destination. */
export function pathFromRoute(route: readonly RelayAddress[]): PathDescriptor {
  const destination = route.at(-1);
  if (destination === undefined) {
    throw new EdgeError('INVALID_PATH', 'Route is empty');
  }
  let identities: RelayIdentity[];
  let destinationIdentity: RelayIdentity;
  try {
    identities = route.slice(0, -1).map(identityFromAddress);
    destinationIdentity = identityFromAddress(destination);
  } catch (error) {
    throw new EdgeError('INVALID_PATH', 'Route contains an invalid address', { error });
  }
  return createPathDescriptor(identities, destinationIdentity);
}
