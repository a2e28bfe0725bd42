import type { LogEntry, LogLevel, Sink } from '../logger.js';

/**
 * Synchronous sink that keeps entries in memory.
 * Used by tests and by callers that attach log lines to a validation report.
 */
export class MemorySink implements Sink {
  private readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  all(): readonly LogEntry[] {
    return this.entries;
  }

  byCategory(category: string): LogEntry[] {
    return this.entries.filter((entry) => entry.category === category);
  }

  byLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
