export type EdgeErrorCode =
  | 'NO_ROUTE_AVAILABLE'
  | 'FRAGMENT_TOO_LARGE'
  | 'MALFORMED_PACKET'
  | 'SESSION_CLOSED'
  | 'TOO_MANY_SESSIONS'
  | 'SESSION_FAILED'
  | 'INVALID_PATH'
  | 'CONFIG_INVALID'
  | 'TRANSPORT_FAILED'
  | 'IDENTITY_MISSING';

export class EdgeError extends Error {
  readonly code: EdgeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: EdgeErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'EdgeError';
    this.code = code;
    this.context = context;
  }
}

export function isEdgeError(value: unknown, code?: EdgeErrorCode): value is EdgeError {
  if (!(value instanceof EdgeError)) return false;
  return code === undefined || value.code === code;
}
