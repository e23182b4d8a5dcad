export {
  DEFAULT_SESSION_CONFIG,
  generateSessionId,
  isSessionId,
  isTerminalState,
  resolveSessionConfig,
} from './types.js';
export type {
  SessionConfig,
  SessionFailureReason,
  SessionId,
  SessionInfo,
  SessionRole,
  SessionState,
} from './types.js';
export { MessageStream } from './message-stream.js';
export { ReassemblyBuffer } from './reassembly-buffer.js';
export type { AcceptResult, AcceptStatus, ReassemblyEvent } from './reassembly-buffer.js';
export { OPEN_SEQUENCE, Session } from './session.js';
export type { PacketTransmitter, SessionEvents, SessionOptions } from './session.js';
export { MAX_RETAINED_TERMINAL_SESSIONS, SessionManager } from './session-manager.js';
export type { OpenOptions, SessionManagerEvents, SessionManagerOptions } from './session-manager.js';
