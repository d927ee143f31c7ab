import { describe, it, expect, vi } from 'vitest';
import { StorageError } from '../../src/errors.js';
import {
  createLogger,
  createTransports,
  resolveLoggerConfig,
  serializeError,
  type LogSink,
} from '../../src/logger.js';

function recordingSink() {
  const log = vi.fn<Parameters<LogSink['log']>, void>();
  const sink: LogSink = { log };
  return { sink, log };
}

describe('resolveLoggerConfig', () => {
  it('defaults to debug on the console outside production', () => {
    expect(resolveLoggerConfig({ NODE_ENV: 'development' })).toMatchObject({
      level: 'debug',
      enableConsole: true,
      enableFile: false,
      json: false,
      maxFiles: '14d',
      maxSize: '20m',
    });
  });

  it('logs JSON at info in production', () => {
    expect(resolveLoggerConfig({ NODE_ENV: 'production' })).toMatchObject({ level: 'info', json: true });
  });

  it('accepts trace and ignores unknown levels', () => {
    expect(resolveLoggerConfig({ LOG_LEVEL: 'TRACE' }).level).toBe('trace');
    expect(resolveLoggerConfig({ LOG_LEVEL: 'verbose', NODE_ENV: 'production' }).level).toBe('info');
  });

  it('never writes files under test', () => {
    expect(resolveLoggerConfig({ LOG_FILE: 'true', NODE_ENV: 'test' }).enableFile).toBe(false);
    expect(resolveLoggerConfig({ LOG_FILE: 'true', NODE_ENV: 'development' }).enableFile).toBe(true);
  });

  it('builds no transports when console and files are off', () => {
    const config = resolveLoggerConfig({ LOG_CONSOLE: 'false', NODE_ENV: 'test' });

    expect(createTransports(config)).toEqual([]);
  });
});

describe('serializeError', () => {
  it('keeps code and context from application errors', () => {
    const error = new StorageError('Failed to upload', 's3', 'churn/abc.bin');

    expect(serializeError(error)).toMatchObject({
      name: 'StorageError',
      message: 'Failed to upload',
      code: 'STORAGE_ERROR',
      context: { provider: 's3', location: 'churn/abc.bin' },
    });
  });

  it('wraps non-error values', () => {
    expect(serializeError('boom')).toEqual({ value: 'boom' });
  });
});

describe('Logger', () => {
  it('tags every record with its namespace', () => {
    const { sink, log } = recordingSink();

    createLogger('@modelledger/core', sink).info('Registry saved', { models: 2 });

    expect(log).toHaveBeenCalledWith('info', 'Registry saved', {
      namespace: '@modelledger/core',
      models: 2,
    });
  });

  it('carries child context into each line', () => {
    const { sink, log } = recordingSink();
    const child = createLogger('@modelledger/api', sink).child({ requestId: 'req-1' });

    child.trace('Batch processed', { size: 3 });

    expect(log).toHaveBeenCalledWith('trace', 'Batch processed', {
      namespace: '@modelledger/api',
      requestId: 'req-1',
      size: 3,
    });
  });

  it('serializes the error argument', () => {
    const { sink, log } = recordingSink();
    const error = new Error('disk full');

    createLogger('@modelledger/cli', sink).error('CLI error', error, { command: 'store' });

    expect(log).toHaveBeenCalledWith('error', 'CLI error', {
      namespace: '@modelledger/cli',
      command: 'store',
      error: { name: 'Error', message: 'disk full', stack: error.stack },
    });
  });
});
