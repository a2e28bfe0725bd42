import { z } from 'zod';

import { initLogger, isLogLevel, type LogLevel, type Sink } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'], { message: 'Expected "true" or "false"' })
    .default(fallback)
    .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  FRAMECHECK_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine((val): val is LogLevel => isLogLevel(val), { message: 'Invalid log level' })
    .default('info'),
  FRAMECHECK_LOG_CONSOLE: booleanFlag('false'),
  FRAMECHECK_LOG_COLOR: booleanFlag('false'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${issues}`);
  }
  return result.data;
}

/**
 * Configure the global logger from the environment.
 * Console output stays off under NODE_ENV=test regardless of FRAMECHECK_LOG_CONSOLE.
 */
export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const config = validateLoggerEnv(env);
  const sinks: Sink[] = [];

  if (config.FRAMECHECK_LOG_CONSOLE && config.NODE_ENV !== 'test') {
    sinks.push(new ConsoleSink({ color: config.FRAMECHECK_LOG_COLOR }));
  }

  initLogger({ level: config.FRAMECHECK_LOG_LEVEL, sinks });
  return config;
}
