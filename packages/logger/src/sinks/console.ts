import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  /** Wrap the level in ANSI colour codes. */
  color?: boolean | undefined;
}

const RESET = '\x1b[0m';

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  error: '\x1b[31m',
  info: '\x1b[32m',
  trace: '\x1b[90m',
  warn: '\x1b[33m',
};

const pad2 = (n: number) => String(n).padStart(2, '0');

/** `[09:05:07] INFO  [schema] validated {warnings=2, table="people"}` */
export function formatEntry(entry: LogEntry, color = false): string {
  const { timestamp: t } = entry;
  const time = `[${pad2(t.getHours())}:${pad2(t.getMinutes())}:${pad2(t.getSeconds())}]`;
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${LEVEL_COLORS[entry.level]}${label}${RESET}` : label;
  const context =
    entry.context === undefined
      ? ''
      : ` {${Object.entries(entry.context)
          .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
          .join(', ')}}`;
  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

/** Writes each entry as one console line; warnings and errors go to stderr. */
export class ConsoleSink implements Sink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    const line = formatEntry(entry, this.color);
    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
