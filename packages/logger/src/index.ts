export {
  getLogger,
  initLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogMethod,
  type Sink,
} from './logger.js';
export { ConsoleSink, formatEntry, type ConsoleSinkOptions } from './sinks/console.js';
export { MemorySink } from './sinks/memory.js';
export { initLoggerFromEnv, loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
