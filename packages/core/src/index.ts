export const EDGLI_PROTOCOL_VERSION = '0.1.0';

export { EdgeError, isEdgeError } from './errors/index.js';
export type { EdgeErrorCode } from './errors/index.js';

export {
  createLogger,
  formatLogLine,
  getLogLevel,
  parseLogFormat,
  parseLogLevel,
  setLogFormat,
  setLogLevel,
  setLogSink,
} from './logging/index.js';
export type { LogFields, LogFormat, LogLevel, LogSink, LogThreshold, Logger } from './logging/index.js';

export { bytesToHex, hexToBytes, secureRandom, secureRandomHex, sequenceRandom } from './crypto/index.js';
export type { RandomSource } from './crypto/index.js';

export {
  ADDRESS_BYTES,
  FileStorageAdapter,
  IdentityManager,
  MemoryStorage,
  addressToPublicKey,
  decodeIdentity,
  encodeIdentity,
  generateKeypair,
  identityFromAddress,
  identityFromKeypair,
  isRelayAddress,
  keypairFromSecretKey,
  publicKeyToAddress,
} from './identity/index.js';
export type {
  FileStorageOptions,
  IdentityStorage,
  RelayAddress,
  RelayIdentity,
  RelayKeypair,
} from './identity/index.js';

export {
  MAX_HOPS,
  MIN_HOPS,
  MemoryRelayDirectory,
  PathSelector,
  createPathDescriptor,
  isValidHopCount,
  pathFromRoute,
  pathKey,
  pathRelayAddresses,
  pathsEqual,
  returnRouteFor,
} from './path/index.js';
export type { PathDescriptor, PathSelectorOptions, RelayDirectory, RelayEntry, RelayStatus } from './path/index.js';

export { FrameFlags, HOP_OVERHEAD, PACKET_SIZE, PacketCodec, PacketKind } from './codec/index.js';
export type {
  AckFrame,
  AcknowledgementUnit,
  DecodedUnit,
  DeliverFrame,
  DeliverPayload,
  DeliveryMeta,
  ForwardInstruction,
} from './codec/index.js';

export {
  DEFAULT_SESSION_CONFIG,
  MAX_RETAINED_TERMINAL_SESSIONS,
  MessageStream,
  OPEN_SEQUENCE,
  Session,
  SessionManager,
  generateSessionId,
  isSessionId,
  isTerminalState,
  resolveSessionConfig,
} from './session/index.js';
export type {
  OpenOptions,
  PacketTransmitter,
  SessionConfig,
  SessionEvents,
  SessionFailureReason,
  SessionId,
  SessionInfo,
  SessionManagerEvents,
  SessionManagerOptions,
  SessionOptions,
  SessionRole,
  SessionState,
} from './session/index.js';

export { MemoryNetwork, decodeRelayFrame, encodeRelayFrame, parseControlMessage } from './transport/index.js';
export type {
  DeliveryDecision,
  HeldPacket,
  PacketInterceptor,
  RelayControlMessage,
  RelayFrame,
  TransportAdapter,
} from './transport/index.js';

export { PacketRelay } from './relay/index.js';
export type { PacketRelayEvents, PacketRelayOptions, RelayDropReason } from './relay/index.js';

export { TrafficStats } from './stats/index.js';
export type { TrafficStatsData, TrafficStatsEvents, TrafficStatsOptions } from './stats/index.js';
