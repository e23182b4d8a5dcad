export {
  MAX_HOPS,
  MIN_HOPS,
  createPathDescriptor,
  isValidHopCount,
  pathFromRoute,
  pathKey,
  pathRelayAddresses,
  pathsEqual,
  returnRouteFor,
} from './path-descriptor.js';
export type { PathDescriptor } from './path-descriptor.js';
export { MemoryRelayDirectory } from './relay-directory.js';
export type { RelayDirectory, RelayEntry, RelayStatus } from './relay-directory.js';
export { PathSelector } from './path-selector.js';
export type { PathSelectorOptions } from './path-selector.js';
