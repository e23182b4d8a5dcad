/**
 * Component loggers.
 *
 * Every line is prefixed with its component (`[SessionManager] ...`). The threshold comes from
 * `EDGLI_LOG_LEVEL` (debug, info, warn, error, silent) and `EDGLI_LOG_FORMAT=json` switches to one
 * JSON object per line. Both can be changed at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';
export type LogFormat = 'text' | 'json';
export type LogFields = Record<string, unknown>;
export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  readonly component: string;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogThreshold | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogThreshold(normalized) ? normalized : undefined;
}

export function parseLogFormat(value: string | undefined): LogFormat | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'json' || normalized === 'text') return normalized;
  return undefined;
}

function readEnv(name: string): string | undefined {
  return typeof process !== 'undefined' ? process.env[name] : undefined;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    default:
      console.log(line);
      break;
  }
};

let threshold: LogThreshold = parseLogLevel(readEnv('EDGLI_LOG_LEVEL')) ?? 'info';
let format: LogFormat = parseLogFormat(readEnv('EDGLI_LOG_FORMAT')) ?? 'text';
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

export function setLogFormat(next: LogFormat): void {
  format = next;
}

/** Replace the output sink; `null` restores the console. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  fields: LogFields | undefined,
  lineFormat: LogFormat,
): string {
  if (lineFormat === 'json') {
    const normalized: LogFields = {};
    for (const [key, value] of Object.entries(fields ?? {})) {
      normalized[key] = value instanceof Error ? value.message : value;
    }
    return JSON.stringify({ ...normalized, level, component, message });
  }

  const suffix = Object.entries(fields ?? {})
    .map(([key, value]) => `${key}=${renderValue(value)}`)
    .join(' ');
  return suffix ? `[${component}] ${message} ${suffix}` : `[${component}] ${message}`;
}

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    sink(level, formatLogLine(level, component, message, fields, format));
  };

  return {
    component,
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}
