export {
  createLogger,
  formatLogLine,
  getLogLevel,
  parseLogFormat,
  parseLogLevel,
  setLogFormat,
  setLogLevel,
  setLogSink,
} from './logger.js';
export type { LogFields, LogFormat, LogLevel, LogSink, LogThreshold, Logger } from './logger.js';
