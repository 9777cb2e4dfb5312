/**
 * Tests for Logger class
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, createLogger, createSilentLogger } from '../../lib/src/logging/logger.js';
import { LogLevel, type LoggerOptions } from '../../lib/src/logging/types.js';

function capture(options: LoggerOptions = {}): { logger: Logger; lines: string[]; levels: LogLevel[] } {
  const lines: string[] = [];
  const levels: LogLevel[] = [];
  const logger = new Logger({
    timestamps: false,
    colors: false,
    ...options,
    output: (line, level) => {
      lines.push(line);
      levels.push(level);
    },
  });
  return { logger, lines, levels };
}

describe('Logger', () => {
  let consoleSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    consoleWarnSpy.mockRestore();
  });

  describe('constructor', () => {
    it('should create logger with default config', () => {
      const config = new Logger().getConfig();

      expect(config.level).toBe(LogLevel.INFO);
      expect(config.format).toBe('text');
      expect(config.timestamps).toBe(true);
      expect(config.context).toEqual({});
    });

    it('should accept custom config', () => {
      const logger = new Logger({ level: LogLevel.DEBUG, format: 'json', source: 'test' });
      const config = logger.getConfig();

      expect(config.level).toBe(LogLevel.DEBUG);
      expect(config.format).toBe('json');
      expect(config.source).toBe('test');
    });
  });

  describe('child', () => {
    it('should join sources with a colon', () => {
      const child = new Logger({ source: 'ingest' }).child('pipeline');

      expect(child.getConfig().source).toBe('ingest:pipeline');
    });

    it('should use the child source when the parent has none', () => {
      expect(new Logger().child('csv').getConfig().source).toBe('csv');
    });

    it('should inherit level and format', () => {
      const child = new Logger({ level: LogLevel.DEBUG, format: 'json' }).child('child');

      expect(child.getLevel()).toBe(LogLevel.DEBUG);
      expect(child.getConfig().format).toBe('json');
    });

    it('should merge bound context into every entry', () => {
      const { logger, lines } = capture({ context: { run: 'r1' } });
      logger.child('store', { backend: 'pgvector' }).info('connected');

      expect(lines).toEqual(['INFO  [store] connected {"run":"r1","backend":"pgvector"}']);
    });
  });

  describe('level filtering', () => {
    it('should route errors to console.error', () => {
      new Logger({ level: LogLevel.ERROR }).error('Error message');

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it('should route warnings to console.warn', () => {
      new Logger({ level: LogLevel.WARN }).warn('Warning message');

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    it('should route info to console.log', () => {
      new Logger({ level: LogLevel.INFO }).info('Info message');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });

    it('should not log debug messages when level is INFO', () => {
      const { logger, lines } = capture({ level: LogLevel.INFO });
      logger.debug('hidden');
      logger.trace('hidden');

      expect(lines).toEqual([]);
    });

    it('should log trace messages when level is TRACE', () => {
      const { logger, levels } = capture({ level: LogLevel.TRACE });
      logger.trace('visible');

      expect(levels).toEqual([LogLevel.TRACE]);
    });

    it('should report enabled levels', () => {
      const logger = new Logger({ level: LogLevel.WARN });

      expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.WARN)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
    });
  });

  describe('text format', () => {
    it('should format level, source and message', () => {
      const { logger, lines } = capture({ source: 'test' });
      logger.info('hello');

      expect(lines).toEqual(['INFO  [test] hello']);
    });

    it('should append context as JSON', () => {
      const { logger, lines } = capture();
      logger.warn('slow batch', { batch: 3 });

      expect(lines).toEqual(['WARN  slow batch {"batch":3}']);
    });

    it('should include an ISO timestamp when enabled', () => {
      const { logger, lines } = capture({ timestamps: true });
      logger.info('stamped');

      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO  stamped$/);
    });

    it('should append error name and message', () => {
      const { logger, lines } = capture();
      logger.error('insert failed', new Error('boom'));

      expect(lines).toEqual(['ERROR insert failed \n  Error: Error: boom']);
    });

    it('should include the stack only at DEBUG or above', () => {
      const { logger, lines } = capture({ level: LogLevel.DEBUG });
      logger.error('insert failed', new Error('boom'));

      expect(lines[0]).toContain('\n  Error: Error: boom \n  Error: boom\n');
    });
  });

  describe('error overloads', () => {
    it('should treat a plain object as context', () => {
      const { logger, lines } = capture();
      logger.error('row skipped', { index: 4 });

      expect(lines).toEqual(['ERROR row skipped {"index":4}']);
    });

    it('should accept an error and context together', () => {
      const { logger, lines } = capture();
      logger.error('batch failed', new TypeError('bad'), { batch: 2 });

      expect(lines).toEqual(['ERROR batch failed {"batch":2} \n  Error: TypeError: bad']);
    });

    it('should format non-Error values as UnknownError', () => {
      const { logger, lines } = capture();
      logger.error('odd failure', 'socket closed');

      expect(lines).toEqual(['ERROR odd failure \n  Error: UnknownError: socket closed']);
    });
  });

  describe('json format', () => {
    it('should emit one JSON object per entry', () => {
      const { logger, lines } = capture({ format: 'json', source: 'pipeline' });
      logger.info('Batch insertion complete', { successful: 3 });

      const parsed: unknown = JSON.parse(lines[0] ?? '');
      expect(parsed).toMatchObject({
        level: 'INFO',
        message: 'Batch insertion complete',
        source: 'pipeline',
        context: { successful: 3 },
      });
    });

    it('should omit absent fields', () => {
      const { logger, lines } = capture({ format: 'json' });
      logger.info('plain');

      const parsed: unknown = JSON.parse(lines[0] ?? '');
      expect(Object.keys(parsed ?? {})).toEqual(['timestamp', 'level', 'message']);
    });
  });

  describe('compact format', () => {
    it('should print time, level initial and message', () => {
      const { logger, lines } = capture({ format: 'compact' });
      logger.warn('careful', { ignored: true });

      expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2} W careful$/);
    });
  });

  describe('pretty format', () => {
    it('should color the level when colors are enabled', () => {
      const { logger, lines } = capture({ format: 'pretty', colors: true });
      logger.info('colored');

      expect(lines).toEqual(['\x1b[34mINFO \x1b[0m colored']);
    });
  });
});

describe('createLogger', () => {
  it('should set the source', () => {
    expect(createLogger('ingest', { level: LogLevel.DEBUG }).getConfig().source).toBe('ingest');
  });
});

describe('createSilentLogger', () => {
  it('should write nothing to the console', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createSilentLogger();
    logger.info('quiet');
    logger.error('quiet', new Error('quiet'));

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();

    logSpy.mockRestore();
    errorSpy.mockRestore();
  });
});
