/**
 * Subsystem Logger
 *
 * Structured, leveled logging shared by every speaker component. Each component
 * creates its own logger tagged with a subsystem name (e.g. 'speaker/realtime').
 *
 * Environment:
 *   SPEAKER_LOG_LEVEL = debug|info|warn|error (default: info)
 *   SPEAKER_LOG_JSON  = 1 (default: text)
 *   SPEAKER_DEBUG     = 1 (forces debug)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogData = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  fatal(message: string, data?: LogData): void;
}

export interface LogSink {
  (level: LogLevel, line: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, fatal: 4 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnvironment(): LogLevel {
  if (process.env.SPEAKER_DEBUG === '1' || process.env.SPEAKER_DEBUG === 'true') {
    return 'debug';
  }
  const raw = (process.env.SPEAKER_LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let minLevel: LogLevel = levelFromEnvironment();
let jsonMode = process.env.SPEAKER_LOG_JSON === '1';

const defaultSink: LogSink = (level, line) => {
  if (LEVEL_ORDER[level] >= LEVEL_ORDER.warn) {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
};

let sink: LogSink = defaultSink;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function setJsonLogging(enabled: boolean): void {
  jsonMode = enabled;
}

/** Redirects log output; pass nothing to restore stdout/stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? defaultSink;
}

/**
 * Turns an unknown thrown value into loggable fields.
 */
export function describeError(error: unknown): LogData {
  if (error instanceof Error) {
    const data: LogData = { error: error.message, name: error.name };
    if ('code' in error && typeof error.code === 'string') {
      data.code = error.code;
    }
    return data;
  }
  return { error: String(error) };
}

export function formatLogLine(
  level: LogLevel,
  subsystem: string,
  message: string,
  data: LogData | undefined,
  timestamp: Date,
  json: boolean,
): string {
  const ts = timestamp.toISOString();

  if (json) {
    const entry: LogData = { ts, level, subsystem, msg: message };
    if (data) entry.data = data;
    return JSON.stringify(entry);
  }

  const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${subsystem}]`;
  return data && Object.keys(data).length > 0
    ? `${prefix} ${message} ${JSON.stringify(data)}`
    : `${prefix} ${message}`;
}

function emit(level: LogLevel, subsystem: string, message: string, data?: LogData): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  sink(level, formatLogLine(level, subsystem, message, data, new Date(), jsonMode));
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return {
    subsystem,
    debug: (message, data) => emit('debug', subsystem, message, data),
    info: (message, data) => emit('info', subsystem, message, data),
    warn: (message, data) => emit('warn', subsystem, message, data),
    error: (message, data) => emit('error', subsystem, message, data),
    fatal: (message, data) => emit('fatal', subsystem, message, data),
  };
}
