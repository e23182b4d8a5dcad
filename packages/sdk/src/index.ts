export { EDGLI_PROTOCOL_VERSION, EdgeError, isEdgeError } from 'edgli-protocol';
export type { EdgeErrorCode, SessionId, SessionInfo, SessionState } from 'edgli-protocol';
export { EdgeClient } from './edge-client.js';
export type {
  EdgeClientOptions,
  SessionFailedHandler,
  SessionOpenedHandler,
  SessionStateHandler,
  StatusHandler,
} from './edge-client.js';
export { edgeClientConfigSchema, isLoopbackIPv4, loadConfig, parseConfig } from './config.js';
export type { EdgeClientConfig, EdgeClientConfigInput, LoadConfigOptions } from './config.js';
export { WebSocketTransport } from './ws-transport.js';
export type { WebSocketTransportEvents, WebSocketTransportOptions } from './ws-transport.js';
