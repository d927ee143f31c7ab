/**
 * Structured Logging
 * ==================
 * Winston logger shared by every package. Console output goes to stderr so command
 * output on stdout stays machine-readable (`--format json|csv`).
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3, trace: 4 };

winston.addColors({ error: 'red', warn: 'yellow', info: 'green', debug: 'blue', trace: 'gray' });

/**
 * Fields the registry, transports and gateway attach to log lines
 */
export interface LogContext {
  requestId?: string;
  modelName?: string;
  commitHash?: string;
  storageLocation?: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  /** Rotated files under `logDir`; always off under NODE_ENV=test */
  enableFile: boolean;
  json: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

/**
 * Where log records end up. The winston logger built here is the production sink.
 */
export interface LogSink {
  log(level: LogLevel, message: string, meta: Record<string, unknown>): void;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const production = env.NODE_ENV === 'production';
  const requested = env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  return {
    level: isLogLevel(requested) ? requested : production ? 'info' : 'debug',
    enableConsole: env.LOG_CONSOLE !== 'false',
    enableFile: env.LOG_FILE === 'true' && env.NODE_ENV !== 'test',
    json: production,
    logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, namespace, ...meta }) => {
    const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `[${String(timestamp)}] ${level} ${String(namespace)}: ${String(message)}${metaStr}`;
  })
);

function rotatingFile(config: LoggerConfig, name: string, level?: LogLevel): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(config.logDir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level,
    format: structuredFormat,
    maxSize: config.maxSize,
    maxFiles: config.maxFiles,
    zippedArchive: true,
  });
}

export function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: config.json ? structuredFormat : consoleFormat,
        stderrLevels: [...LOG_LEVELS],
      })
    );
  }

  if (config.enableFile) {
    fs.mkdirSync(config.logDir, { recursive: true });
    transports.push(rotatingFile(config, 'error', 'error'), rotatingFile(config, 'combined'));
  }

  return transports;
}

function createWinstonSink(config: LoggerConfig): winston.Logger {
  const transports = createTransports(config);
  return winston.createLogger({
    levels: LEVEL_PRIORITY,
    level: config.level,
    format: structuredFormat,
    defaultMeta: { service: 'modelledger' },
    transports,
    // LOG_CONSOLE=false without LOG_FILE leaves no transports
    silent: transports.length === 0,
    exitOnError: false,
  });
}

/**
 * Error fields for a log record. `code` and `context` are kept when the error carries
 * them (AppError and its subclasses).
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { value: error };
  }
  const fields: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if ('code' in error && typeof error.code === 'string') {
    fields.code = error.code;
  }
  if ('context' in error && error.context !== undefined) {
    fields.context = error.context;
  }
  return fields;
}

class Logger {
  constructor(
    private readonly namespace: string,
    private readonly sink: LogSink,
    private readonly context: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    this.sink.log(level, message, { namespace: this.namespace, ...this.context, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error === undefined) {
      this.write('error', message, context);
      return;
    }
    this.write('error', message, { ...context, error: serializeError(error) });
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  /**
   * Logger sharing this one's namespace and sink, with `context` added to every line
   */
  child(context: LogContext): Logger {
    return new Logger(this.namespace, this.sink, { ...this.context, ...context });
  }
}

const defaultSink = createWinstonSink(resolveLoggerConfig());

/**
 * Package logger, e.g. `createLogger('@modelledger/storage')`
 */
export function createLogger(namespace: string, sink: LogSink = defaultSink): Logger {
  return new Logger(namespace, sink);
}

export const logger = createLogger('modelledger');

export { Logger };
