/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import {
  AppError,
  ConfigurationError,
  CorruptDataError,
  DirtyRepositoryError,
  NotInitializedError,
  UnknownModelError,
  UnknownVersionError,
  logger,
} from '@modelledger/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /secret[_-]?(access[_-]?)?key/i,
  /password/i,
  /private[_-]?key/i,
  /bearer\s/i,
  /authorization:/i,
];

/**
 * - `not-found`: the thing asked for is not registered (benign)
 * - `operator-action`: configuration, repository state or a damaged registry needs fixing
 * - `failure`: anything else (transport failures, bugs)
 */
export type ErrorCategory = 'not-found' | 'operator-action' | 'failure';

export interface ErrorDescription {
  category: ErrorCategory;
  message: string;
}

const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
  'not-found': 'Not found',
  'operator-action': 'Action required',
  failure: 'Error',
};

/**
 * Check if a string contains sensitive information
 */
function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Sanitize error message to remove sensitive information
 */
function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Classify an error for display
 */
export function describeError(error: unknown): ErrorDescription {
  const message = formatError(error);

  if (
    error instanceof NotInitializedError ||
    error instanceof CorruptDataError ||
    error instanceof ConfigurationError ||
    error instanceof DirtyRepositoryError
  ) {
    return { category: 'operator-action', message };
  }
  if (
    error instanceof UnknownModelError ||
    error instanceof UnknownVersionError ||
    (error instanceof AppError && error.statusCode === 404)
  ) {
    return { category: 'not-found', message };
  }
  return { category: 'failure', message };
}

/**
 * Log error with full context (for debugging)
 * This should include full error details, but never expose secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  if (error instanceof AppError) {
    logger.error('CLI error', error, { code: error.code, context: sanitizedContext });
  } else {
    logger.error('CLI error', error, { context: sanitizedContext });
  }
}

/**
 * Single stderr line for a described error, prefixed by its category
 */
export function renderError(description: ErrorDescription): string {
  return `${CATEGORY_PREFIX[description.category]}: ${description.message}`;
}

/**
 * Handle and describe error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorDescription {
  // Log full error for debugging
  logError(error, context);

  return describeError(error);
}
