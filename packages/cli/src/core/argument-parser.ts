/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@modelledger/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.output<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  // Format Zod errors into user-friendly messages
  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Normalize Commander.js options to a flat object
 *
 * IMPORTANT: Do NOT rename keys. Commander.js already converts --model-name to modelName.
 * This function only normalizes VALUES:
 * - undefined/null values are dropped
 * - String "true"/"false" → boolean
 * - Everything else is preserved as-is. Numeric strings stay strings (commit hashes and model
 *   names can be all digits); schemas coerce numbers with z.coerce.
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (value === 'true') {
      normalized[key] = true;
    } else if (value === 'false') {
      normalized[key] = false;
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
