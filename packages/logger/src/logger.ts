export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown> | undefined;
}

/** Destination for log entries. Writes happen synchronously, in call order. */
export interface Sink {
  write(entry: LogEntry): void;
}

export interface LogMethod {
  (msg: string): void;
  (context: Record<string, unknown>, msg: string): void;
}

export interface Logger extends Record<LogLevel, LogMethod> {
  readonly category: string;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: readonly Sink[] | undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Copy `value` into plain data a sink can print or store. Errors keep their
 * name, message and stack; bigints and dates become strings; functions and
 * undefined properties are dropped; a reference back to an enclosing object
 * becomes `'[Circular]'`.
 */
function toLoggable(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { message: value.message, name: value.name, stack: value.stack };
  if (ancestors.has(value)) return '[Circular]';

  ancestors.add(value);
  const copy = Array.isArray(value)
    ? value.map((item: unknown) => toLoggable(item, ancestors))
    : loggableRecord(Object.entries(value), ancestors);
  ancestors.delete(value);
  return copy;
}

function loggableRecord(entries: [string, unknown][], ancestors: Set<object>): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const [key, item] of entries) {
    if (item === undefined || typeof item === 'function') continue;
    record[key] = toLoggable(item, ancestors);
  }
  return record;
}

interface LoggerState {
  level: LogLevel;
  sinks: readonly Sink[];
}

// Read on every call, so loggers created at module load follow initLogger().
let state: LoggerState = { level: 'info', sinks: [] };
const loggers = new Map<string, Logger>();

function createLogger(category: string): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (first: string | Record<string, unknown>, msg?: string) => {
      if (state.sinks.length === 0 || severity(level) < severity(state.level)) return;

      const entry: LogEntry = { category, level, msg: msg ?? '', timestamp: new Date() };
      if (typeof first === 'string') {
        entry.msg = first;
      } else {
        entry.context = loggableRecord(Object.entries(first), new Set<object>([first]));
      }
      for (const sink of state.sinks) {
        sink.write(entry);
      }
    };

  return {
    category,
    debug: method('debug'),
    error: method('error'),
    info: method('info'),
    trace: method('trace'),
    warn: method('warn'),
  };
}

/**
 * Set the level and sinks every category logger writes through. With no
 * sinks, which is the state until this is first called, logging is a no-op.
 */
export function initLogger(config: LoggerConfig): void {
  state = { level: config.level ?? 'info', sinks: [...(config.sinks ?? [])] };
  loggers.clear();
}

/** Logger for `category`, shared by every caller asking for the same one. */
export function getLogger(category: string): Logger {
  let logger = loggers.get(category);
  if (logger === undefined) {
    logger = createLogger(category);
    loggers.set(category, logger);
  }
  return logger;
}
