import { handleError, renderError } from './error-handler.js';

/**
 * Print a failure and exit with status 1
 */
export function die(error: unknown): never {
  console.error(renderError(handleError(error)));
  process.exit(1);
}
