/**
 * @modelledger/utils - Shared utilities package
 *
 * Golden Path: this package exports only
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 *
 * No registry or storage code - that lives in @modelledger/core and @modelledger/storage
 */

export { logger, Logger, createLogger, LOG_LEVELS } from './logger.js';
export type { LogContext, LogLevel, LogSink } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
