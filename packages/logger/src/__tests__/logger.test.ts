/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { initLoggerFromEnv, validateLoggerEnv } from '../env.schema.js';
import { getLogger, initLogger, isLogLevel, type Sink } from '../logger.js';
import { ConsoleSink, formatEntry } from '../sinks/console.js';
import { MemorySink } from '../sinks/memory.js';

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should be silent by default when not initialized', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = getLogger('test');

    logger.info('test message');
    logger.error('error message');

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });

  it('should log to sink when initialized', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('validation-engine').info('tree evaluated');

    expect(sink.all()).toHaveLength(1);
    expect(sink.all()[0]?.level).toBe('info');
    expect(sink.all()[0]?.category).toBe('validation-engine');
    expect(sink.all()[0]?.msg).toBe('tree evaluated');
  });

  it('should respect log levels', () => {
    const sink = new MemorySink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('test');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(sink.all().map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('should attach context objects', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('schema').info({ columns: 3, ordered: false }, 'schema validated');

    expect(sink.all()[0]?.msg).toBe('schema validated');
    expect(sink.all()[0]?.context).toEqual({ columns: 3, ordered: false });
  });

  it('should serialize Error objects in context', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('test').error({ error: new Error('bad index') }, 'evaluation failed');

    expect(sink.all()[0]?.context?.['error']).toMatchObject({
      name: 'Error',
      message: 'bad index',
      stack: expect.stringContaining('Error: bad index') as string,
    });
  });

  it('should replace circular references and bigints in context', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    const obj: Record<string, unknown> = { name: 'node' };
    obj['self'] = obj;
    getLogger('test').info({ data: obj, total: BigInt('9007199254740993') }, 'context test');

    expect(sink.all()[0]?.context).toEqual({
      data: { name: 'node', self: '[Circular]' },
      total: '9007199254740993',
    });
  });

  it('should keep shared references, print dates and drop undefined values', () => {
    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    const shared = { column: 'age' };
    getLogger('test').info(
      { at: new Date(Date.UTC(2024, 0, 2)), first: shared, missing: undefined, second: [shared] },
      'shared context'
    );

    expect(sink.all()[0]?.context).toEqual({
      at: '2024-01-02T00:00:00.000Z',
      first: { column: 'age' },
      second: [{ column: 'age' }],
    });
    expect(Object.keys(sink.all()[0]?.context ?? {})).toEqual(['at', 'first', 'second']);
  });

  it('should cache loggers by category until re-initialized', () => {
    const first = getLogger('test');
    expect(getLogger('test')).toBe(first);
    expect(getLogger('other')).not.toBe(first);

    initLogger({ sinks: [] });
    expect(getLogger('test')).not.toBe(first);
  });

  it('should let loggers created before initLogger write after init', () => {
    const logger = getLogger('early');
    logger.info('before init');

    const sink = new MemorySink();
    initLogger({ level: 'info', sinks: [sink] });
    logger.info('after init');

    expect(sink.all().map((e) => e.msg)).toEqual(['after init']);
  });

  it('should write to every sink in call order', () => {
    const lines: string[] = [];
    const sink = (name: string): Sink => ({
      write: (entry) => {
        lines.push(`${name}:${entry.msg}`);
      },
    });

    initLogger({ level: 'info', sinks: [sink('a'), sink('b')] });
    getLogger('test').info('one');
    getLogger('test').warn('two');

    expect(lines).toEqual(['a:one', 'b:one', 'a:two', 'b:two']);
  });

  it('should recognise level names', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('fatal')).toBe(false);
  });
});

describe('MemorySink', () => {
  it('should filter entries by category and level', () => {
    const sink = new MemorySink();
    initLogger({ level: 'trace', sinks: [sink] });

    getLogger('a').debug('one');
    getLogger('b').warn('two');
    getLogger('a').warn('three');

    expect(sink.byCategory('a').map((e) => e.msg)).toEqual(['one', 'three']);
    expect(sink.byLevel('warn').map((e) => e.msg)).toEqual(['two', 'three']);

    sink.clear();
    expect(sink.all()).toHaveLength(0);
  });
});

describe('ConsoleSink', () => {
  it('should format level, category, message and context', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sink = new ConsoleSink({ color: false });

    sink.write({
      level: 'info',
      category: 'schema',
      timestamp: new Date(2024, 0, 1, 9, 5, 7),
      msg: 'validated',
      context: { warnings: 2, table: 'people' },
    });

    expect(consoleSpy).toHaveBeenCalledWith('[09:05:07] INFO  [schema] validated {warnings=2, table="people"}');
    consoleSpy.mockRestore();
  });

  it('should route error/warn to console.error/warn', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sink = new ConsoleSink();

    sink.write({ level: 'error', category: 'test', timestamp: new Date(), msg: 'error message' });
    sink.write({ level: 'warn', category: 'test', timestamp: new Date(), msg: 'warn message' });

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('error message'));
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('warn message'));
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('should colour the level when enabled', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sink = new ConsoleSink({ color: true });

    sink.write({ level: 'debug', category: 'test', timestamp: new Date(), msg: 'coloured' });

    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('\x1b[36mDEBUG\x1b[0m'));
    consoleSpy.mockRestore();
  });
});

describe('formatEntry', () => {
  it('should leave out the context braces when there is no context', () => {
    const entry = {
      category: 'validation-engine',
      level: 'warn',
      msg: 'stopped',
      timestamp: new Date(2024, 5, 1, 23, 0, 9),
    } as const;
    expect(formatEntry(entry)).toBe('[23:00:09] WARN  [validation-engine] stopped');
    expect(formatEntry(entry, true)).toBe('[23:00:09] \x1b[33mWARN \x1b[0m [validation-engine] stopped');
  });
});

describe('initLoggerFromEnv', () => {
  afterEach(() => {
    initLogger({ sinks: [] });
  });

  it('should apply defaults', () => {
    expect(validateLoggerEnv({})).toEqual({
      FRAMECHECK_LOG_LEVEL: 'info',
      FRAMECHECK_LOG_CONSOLE: false,
      FRAMECHECK_LOG_COLOR: false,
      NODE_ENV: 'development',
    });
  });

  it('should normalize the log level', () => {
    expect(validateLoggerEnv({ FRAMECHECK_LOG_LEVEL: ' DEBUG ' }).FRAMECHECK_LOG_LEVEL).toBe('debug');
  });

  it('should list every invalid variable', () => {
    expect(() => validateLoggerEnv({ FRAMECHECK_LOG_LEVEL: 'loud', FRAMECHECK_LOG_CONSOLE: 'yes' })).toThrow(
      'Logger environment validation failed:\n  - FRAMECHECK_LOG_LEVEL: Invalid log level\n  - FRAMECHECK_LOG_CONSOLE: Expected "true" or "false"'
    );
  });

  it('should keep the console silent under NODE_ENV=test', () => {
    const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    initLoggerFromEnv({ FRAMECHECK_LOG_CONSOLE: 'true', NODE_ENV: 'test' });
    getLogger('test').info('hidden');

    expect(consoleSpy).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });
});
