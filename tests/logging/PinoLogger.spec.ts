import { afterEach, describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { PinoLogger } from '../../src/logging/PinoLogger.js';
import { createLogger, resetLoggerFactory, setLoggerFactory } from '../../src/logging/loggerFactory.js';
import { normalizeLogLevel, resolveLogLevel } from '../../src/logging/logLevel.js';
import type { ILogger } from '../../src/logging/ILogger.js';

function capture(level = 'debug') {
  const lines: Array<Record<string, unknown>> = [];
  const stream = {
    write(line: string): void {
      lines.push(JSON.parse(line));
    },
  };
  return { lines, logger: new PinoLogger(undefined, pino({ level, base: null }, stream)) };
}

describe('PinoLogger', () => {
  it('writes the message with its metadata', () => {
    const { lines, logger } = capture();
    logger.info('Engine created', { context: 'etl' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 30, msg: 'Engine created', context: 'etl' });
  });

  it('serializes Error values in metadata', () => {
    const { lines, logger } = capture();
    logger.error('Rollback failed', { error: new Error('connection terminated') });

    expect(lines[0].level).toBe(50);
    expect(lines[0].error).toMatchObject({ name: 'Error', message: 'connection terminated' });
  });

  it('binds child fields', () => {
    const { lines, logger } = capture();
    logger.child({ connection: 'primary' }).warn('Transaction rolled back');
    expect(lines[0]).toMatchObject({ level: 40, connection: 'primary', msg: 'Transaction rolled back' });
  });

  it('drops entries below the configured level', () => {
    const { lines, logger } = capture('info');
    logger.debug('Evicting least recently used context');
    expect(lines).toEqual([]);
  });
});

describe('log levels', () => {
  it('maps aliases onto pino levels', () => {
    expect(normalizeLogLevel(' WARNING ')).toBe('warn');
    expect(normalizeLogLevel('Critical')).toBe('fatal');
    expect(normalizeLogLevel('verbose')).toBe('verbose');
  });

  it('falls back to info for empty or unknown names', () => {
    expect(resolveLogLevel('WARNING')).toBe('warn');
    expect(resolveLogLevel('critical')).toBe('fatal');
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});

describe('loggerFactory', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetLoggerFactory();
  });

  it('routes createLogger through a replacement factory', () => {
    const stub: ILogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
      child: vi.fn(() => stub),
    };
    const factory = vi.fn(() => stub);
    setLoggerFactory(factory);

    expect(createLogger('SessionFactory')).toBe(stub);
    expect(factory).toHaveBeenCalledWith('SessionFactory');
  });

  it('falls back to a pino-backed logger after reset', () => {
    setLoggerFactory(() => {
      throw new Error('should not be called');
    });
    resetLoggerFactory();
    expect(createLogger('GraphSession')).toBeInstanceOf(PinoLogger);
  });

  it.each(['WARNING', 'CRITICAL', 'verbose'])('builds the root logger with LOG_LEVEL=%s', (level) => {
    vi.stubEnv('LOG_LEVEL', level);
    resetLoggerFactory();
    expect(createLogger('ConnectionLifecycleManager')).toBeInstanceOf(PinoLogger);
  });
});
