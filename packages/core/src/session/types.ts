import { secureRandomHex } from '../crypto/secure-random.js';

/** 16 random bytes as 32 lowercase hex characters. */
export type SessionId = string;

export type SessionState = 'establishing' | 'active' | 'draining' | 'closed' | 'failed';

export type SessionRole = 'initiator' | 'responder';

export type SessionFailureReason = 'setup-timeout' | 'retry-exhausted';

export interface SessionConfig {
  /** Delay before an unacknowledged packet is sent again */
  retransmitTimeoutMs: number;
  /** Retransmissions allowed per data packet before the session fails */
  maxRetries: number;
  /** Total OPEN sends before the session fails with setup-timeout */
  setupAttempts: number;
  /** Upper bound on draining before the session is closed anyway */
  drainTimeoutMs: number;
  /** Maximum outstanding packets; further fragments wait in the pending queue */
  sendWindow: number;
  /** How far ahead of the next expected sequence inbound frames are buffered */
  reorderWindow: number;
  maxMessageSize: number;
}

export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = Object.freeze({
  retransmitTimeoutMs: 2000,
  maxRetries: 3,
  setupAttempts: 3,
  drainTimeoutMs: 5000,
  sendWindow: 64,
  reorderWindow: 256,
  maxMessageSize: 65536,
});

/** Merges defined overrides over the defaults; `undefined` keeps the default. */
export function resolveSessionConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  const d = DEFAULT_SESSION_CONFIG;
  return {
    retransmitTimeoutMs: overrides.retransmitTimeoutMs ?? d.retransmitTimeoutMs,
    maxRetries: overrides.maxRetries ?? d.maxRetries,
    setupAttempts: overrides.setupAttempts ?? d.setupAttempts,
    drainTimeoutMs: overrides.drainTimeoutMs ?? d.drainTimeoutMs,
    sendWindow: overrides.sendWindow ?? d.sendWindow,
    reorderWindow: overrides.reorderWindow ?? d.reorderWindow,
    maxMessageSize: overrides.maxMessageSize ?? d.maxMessageSize,
  };
}

const SESSION_ID_PATTERN = /^[0-9a-f]{32}$/;

export function generateSessionId(): SessionId {
  return secureRandomHex(32);
}

export function isSessionId(value: string): value is SessionId {
  return SESSION_ID_PATTERN.test(value);
}

export function isTerminalState(state: SessionState): boolean {
  return state === 'closed' || state === 'failed';
}

export interface SessionInfo {
  id: SessionId;
  role: SessionRole;
  state: SessionState;
  destination: string;
  /** Relay addresses in path order */
  route: readonly string[];
  outstanding: number;
  pending: number;
  failureReason: SessionFailureReason | null;
  createdAt: number;
}
